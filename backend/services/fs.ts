import { promises as fs } from 'fs';
import path from 'path';
import fg from 'fast-glob';

export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png', '.bmp'];

function ensureTrailingSep(dir: string): string {
  return dir.endsWith(path.sep) ? dir : `${dir}${path.sep}`;
}

export function toFileUri(targetPath: string): string {
  const normalized = path.resolve(targetPath).replace(/\\/g, '/');
  if (normalized.startsWith('/')) {
    return `file://${normalized}`;
  }
  return `file:///${normalized}`;
}

/** '.JPG' / 'jpg' → 'jpg' */
function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\.+/, '').toLowerCase();
}

/**
 * 列出目录下（不递归）扩展名匹配的图片，按文件名排序后返回绝对路径
 */
export async function listImages(
  imageDirectory: string,
  extensions: readonly string[] = DEFAULT_IMAGE_EXTENSIONS
): Promise<string[]> {
  const baseDir = path.resolve(imageDirectory);
  try {
    const stat = await fs.stat(baseDir);
    if (!stat.isDirectory()) {
      throw new Error(`Not a directory: ${baseDir}`);
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Image directory not found: ${baseDir}`);
    }
    throw error;
  }

  const wanted = new Set(extensions.map(normalizeExtension).filter(Boolean));
  const matches = await fg('*', {
    cwd: baseDir,
    onlyFiles: true,
    dot: false,
    caseSensitiveMatch: false,
  });

  return matches
    .filter((name) => wanted.has(normalizeExtension(path.extname(name))))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.join(baseDir, name));
}

/**
 * 输出目录文件系统：写入 .tex 等产物，路径不得逃出输出目录
 */
export class BookFilesystem {
  private readonly rootDir: string;
  private readonly rootWithSep: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.rootWithSep = ensureTrailingSep(this.rootDir);
  }

  private async ensureRoot(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  resolve(relativePath: string): string {
    // 只接受相对路径
    const trimmed = relativePath.replace(/\\/g, '/').trim();
    if (path.isAbsolute(relativePath) || trimmed.split('/').includes('..')) {
      throw new Error('Path escapes output root');
    }
    const resolved = path.resolve(this.rootDir, trimmed);
    if (!resolved.startsWith(this.rootWithSep)) {
      throw new Error('Path escapes output root');
    }
    return resolved;
  }

  async writeFile(relativePath: string, data: string | Buffer): Promise<string> {
    await this.ensureRoot();
    const targetPath = this.resolve(relativePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.writeFile(targetPath, data, typeof data === 'string' ? 'utf-8' : undefined);
    return targetPath;
  }
}

const cache = new Map<string, BookFilesystem>();

export function getBookFilesystem(outputDirectory: string): BookFilesystem {
  const rootDir = path.resolve(outputDirectory);
  let existing = cache.get(rootDir);
  if (!existing) {
    existing = new BookFilesystem(rootDir);
    cache.set(rootDir, existing);
  }
  return existing;
}
