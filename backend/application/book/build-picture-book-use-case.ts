/**
 * 生成画册用例：列图 → 读元数据 → 排序 → 定尺寸 → 分页 → 输出 .tex →（可选）编译 PDF
 * 单张图片读取失败或尺寸非法只记警告并跳过；配置错误直接抛出
 */
import { randomUUID } from 'crypto';
import path from 'path';
import type { BookConfig } from '../../app-config.js';
import { toPerPagePolicy } from '../../app-config.js';
import type { LogLevel, LogMeta } from '../../services/log-manager.js';
import { errorMessage } from '../../utils/error-message.js';
import type { ImageMetadataPort } from '../../domain/images/ports/image-metadata-port.js';
import type { DocumentCompilerPort, DocumentEmitterPort } from '../../domain/document/ports/document-emitter-port.js';
import {
  ConfigurationError,
  captionHeightIn,
  computeUsablePage,
  isPictureBookError,
  layoutPages,
  orderImages,
  PAGE_MARGIN_IN,
  resolveSize,
  sizingHeightFor,
} from '../../domain/layout/index.js';
import type { ImageRecord, Page, PageGeometry, PictureBookErrorCode, PlacedImage } from '../../domain/layout/index.js';

export interface ImageWarning {
  filename: string;
  path: string;
  code: PictureBookErrorCode;
  message: string;
}

export interface BuildPictureBookUseCaseParams {
  imageDirectory: string;
  outputDirectory: string;
  documentName: string;
  config: BookConfig;
  skipPdf?: boolean;
  runId?: string;
}

export interface BuildPictureBookUseCaseResult {
  runId: string;
  geometry: PageGeometry;
  pages: Page[];
  imageCount: number;
  warnings: ImageWarning[];
  documentPath: string;
  pdfPath: string | null;
}

export interface BuildPictureBookUseCaseDeps {
  metadataProvider: ImageMetadataPort;
  emitter: DocumentEmitterPort;
  compiler: DocumentCompilerPort;
  listImages: (imageDirectory: string, extensions: readonly string[]) => Promise<string[]>;
  writeOutput: (outputDirectory: string, fileName: string, content: string) => Promise<string>;
  logSystem: (level: LogLevel, message: string, meta?: LogMeta) => Promise<void>;
  logRun: (runId: string, payload: LogMeta) => Promise<void>;
}

function assertDocumentName(documentName: string): void {
  const trimmed = documentName.trim();
  if (!trimmed || trimmed !== path.basename(trimmed) || trimmed === '.' || trimmed === '..') {
    throw new ConfigurationError(`Invalid document name "${documentName}"`);
  }
}

function toWarning(filePath: string, error: unknown): ImageWarning | null {
  if (!isPictureBookError(error) || error.code === 'CONFIGURATION_ERROR') return null;
  return {
    filename: path.basename(filePath),
    path: filePath,
    code: error.code,
    message: error.message,
  };
}

export async function buildPictureBookUseCase(
  deps: BuildPictureBookUseCaseDeps,
  params: BuildPictureBookUseCaseParams
): Promise<BuildPictureBookUseCaseResult> {
  const { config } = params;
  const runId = params.runId ?? randomUUID();
  assertDocumentName(params.documentName);

  // 配置错误在任何 I/O 之前暴露
  const geometry = computeUsablePage(config.pageSize, config.orientation, PAGE_MARGIN_IN);
  const policy = toPerPagePolicy(config.perPage);
  // 每张图片的竖直占用 = 图片高 + 间距 + 下方标题行
  const verticalGap = config.imageSpacingIn + captionHeightIn(config.captionFontSizePt);
  const maxImageHeight = sizingHeightFor(policy, geometry.usableHeight, verticalGap);

  const imageDirectory = path.resolve(params.imageDirectory);
  const warnings: ImageWarning[] = [];
  const warn = async (warning: ImageWarning): Promise<void> => {
    warnings.push(warning);
    await deps.logSystem('warn', `Skipping ${warning.filename}: ${warning.message}`, { runId, code: warning.code });
  };

  await deps.logRun(runId, { action: 'run_started', imageDirectory, geometry, policy });

  const files = await deps.listImages(imageDirectory, config.imageExtensions);
  await deps.logSystem('info', `Found ${files.length} image(s) in ${imageDirectory}`, { runId });

  const reads = await Promise.all(
    files.map(async (filePath): Promise<ImageRecord | ImageWarning> => {
      try {
        return await deps.metadataProvider.read(filePath);
      } catch (error) {
        const warning = toWarning(filePath, error);
        if (!warning) throw error;
        return warning;
      }
    })
  );

  const records: ImageRecord[] = [];
  for (const item of reads) {
    if ('code' in item) {
      await warn(item);
    } else {
      records.push(item);
    }
  }

  const placed: PlacedImage[] = [];
  for (const record of orderImages(records)) {
    try {
      const size = resolveSize(
        record.pixelWidth,
        record.pixelHeight,
        geometry.usableWidth,
        maxImageHeight,
        config.scalingFactor,
        config.baseDpi
      );
      placed.push({ ...record, ...size });
    } catch (error) {
      const warning = toWarning(record.path, error);
      if (!warning) throw error;
      await warn(warning);
    }
  }

  const pages = layoutPages(placed, geometry.usableHeight, verticalGap, policy);
  await deps.logSystem('info', `Laid out ${placed.length} image(s) on ${pages.length} page(s)`, { runId });

  const source = deps.emitter.render({
    pages,
    geometry,
    imageDirectory,
    imageSpacingIn: config.imageSpacingIn,
    captionFontSizePt: config.captionFontSizePt,
  });
  const documentPath = await deps.writeOutput(
    params.outputDirectory,
    `${params.documentName.trim()}.${deps.emitter.extension}`,
    source
  );
  await deps.logRun(runId, {
    action: 'document_written',
    documentPath,
    pageCount: pages.length,
    imageCount: placed.length,
    warnings: warnings.length,
  });

  let pdfPath: string | null = null;
  if (!params.skipPdf) {
    try {
      pdfPath = await deps.compiler.compile(documentPath);
    } catch (error) {
      await deps.logRun(runId, { action: 'compile_failed', documentPath, error: errorMessage(error) });
      throw error;
    }
    await deps.logRun(runId, { action: 'compiled', pdfPath });
  }

  return {
    runId,
    geometry,
    pages,
    imageCount: placed.length,
    warnings,
    documentPath,
    pdfPath,
  };
}
