import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildPictureBookUseCase } from '../../../backend/application/book/index.js';
import { loadConfig } from '../../../backend/app-config.js';
import { DEFAULT_LOG_CONFIG } from '../../../backend/config/log-config.js';
import { createBuildPictureBookDeps } from '../../../backend/infrastructure/create-deps.js';
import { LogManager } from '../../../backend/services/log-manager.js';

async function writePng(filePath: string, width: number, height: number, mtimeSeconds: number): Promise<void> {
  const buffer = await sharp({
    create: { width, height, channels: 3, background: { r: 120, g: 160, b: 200 } },
  })
    .png()
    .toBuffer();
  await fs.writeFile(filePath, buffer);
  await fs.utimes(filePath, mtimeSeconds, mtimeSeconds);
}

describe('build picture book [integration]', () => {
  let root: string;
  let imageDirectory: string;
  let outputDirectory: string;
  let logManager: LogManager;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'picture-book-run-'));
    imageDirectory = path.join(root, 'images');
    outputDirectory = path.join(root, 'output');
    await fs.mkdir(imageDirectory);

    // 修改时间决定顺序：c → a → b
    await writePng(path.join(imageDirectory, 'a_beach.png'), 720, 480, 1_700_000_200);
    await writePng(path.join(imageDirectory, 'b.png'), 480, 480, 1_700_000_300);
    await writePng(path.join(imageDirectory, 'c.png'), 96, 192, 1_700_000_100);
    await fs.writeFile(path.join(imageDirectory, 'broken.jpg'), 'not a jpeg', 'utf-8');
    await fs.writeFile(path.join(imageDirectory, 'readme.txt'), 'ignored', 'utf-8');

    logManager = new LogManager({
      ...DEFAULT_LOG_CONFIG,
      logDir: path.join(root, 'logs'),
      system: { enabled: true, consoleOutput: false },
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('reads real images, writes the .tex file and hands it to the compiler', async () => {
    const deps = createBuildPictureBookDeps({ logManager });
    const compile = vi.fn(async (sourcePath: string) => sourcePath.replace(/\.tex$/, '.pdf'));
    const { config } = await loadConfig({ env: {} });

    const result = await buildPictureBookUseCase(
      { ...deps, compiler: { compile } },
      { imageDirectory, outputDirectory, documentName: 'holiday', config, runId: 'run-integration' }
    );

    // c 1x2in, a 7.5x5in, b 5x5in；间距加标题行每张约 0.44in，b 放不下
    expect(result.pages.map((p) => p.images.map((i) => i.filename))).toEqual([['c.png', 'a_beach.png'], ['b.png']]);
    expect(result.warnings.map((w) => [w.filename, w.code])).toEqual([['broken.jpg', 'UNREADABLE_IMAGE']]);

    const texPath = path.join(outputDirectory, 'holiday.tex');
    expect(result.documentPath).toBe(texPath);
    expect(result.pdfPath).toBe(path.join(outputDirectory, 'holiday.pdf'));
    expect(compile).toHaveBeenCalledWith(texPath);

    const tex = await fs.readFile(texPath, 'utf-8');
    expect(tex).toContain(`\\graphicspath{{${imageDirectory.replace(/\\/g, '/')}/}}`);
    expect(tex).toContain('\\includegraphics[width=1.000in,height=2.000in]{c.png}\\\\');
    expect(tex).toContain('\\includegraphics[width=7.500in,height=5.000in]{a_beach.png}\\\\');
    expect(tex).toContain('\\texttt{a\\_beach.png}');
    expect(tex.match(/\\clearpage/g)).toHaveLength(2);

    const runLogPath = path.join(root, 'logs', 'runs', new Date().toISOString().split('T')[0], 'run-integration.jsonl');
    const runLog = (await fs.readFile(runLogPath, 'utf-8'))
      .split('\n')
      .filter((line) => line.trim())
      .map((line): Record<string, unknown> => JSON.parse(line));
    expect(runLog.map((entry) => entry.action)).toEqual(['run_started', 'document_written', 'compiled']);
    expect(runLog[1]).toMatchObject({ pageCount: 2, imageCount: 3, warnings: 1 });
  });

  it('puts one image per page in full-page mode', async () => {
    const deps = createBuildPictureBookDeps({ logManager });
    const { config } = await loadConfig({ overrides: { perPage: 1, orientation: 'landscape' }, env: {} });

    const result = await buildPictureBookUseCase(deps, {
      imageDirectory,
      outputDirectory,
      documentName: 'single',
      config,
      skipPdf: true,
    });

    expect(result.pages.map((p) => p.images.map((i) => i.filename))).toEqual([['c.png'], ['a_beach.png'], ['b.png']]);
    expect(result.geometry).toMatchObject({ usableWidth: 10, usableHeight: 7.5 });
    expect(result.pdfPath).toBeNull();
    expect(await fs.readFile(path.join(outputDirectory, 'single.tex'), 'utf-8')).toContain(
      '\\geometry{paperwidth=11.000in,paperheight=8.500in}'
    );
  });

  it('fails when the image directory does not exist', async () => {
    const deps = createBuildPictureBookDeps({ logManager });
    const { config } = await loadConfig({ env: {} });

    await expect(
      buildPictureBookUseCase(deps, {
        imageDirectory: path.join(root, 'missing'),
        outputDirectory,
        documentName: 'none',
        config,
        skipPdf: true,
      })
    ).rejects.toThrow('Image directory not found');
  });
});
