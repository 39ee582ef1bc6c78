/** 命令行接口：解析参数、加载配置，委托应用层生成画册用例。 */
import { parseArgs } from 'util';
import { loadConfig } from '../../app-config.js';
import type { BookConfigInput } from '../../app-config.js';
import { buildPictureBookUseCase } from '../../application/book/build-picture-book-use-case.js';
import type { BuildPictureBookUseCaseDeps } from '../../application/book/build-picture-book-use-case.js';
import { getLogConfig } from '../../config/log-config.js';
import type { LogConfig } from '../../config/log-config.js';
import { ConfigurationError } from '../../domain/layout/errors.js';
import { createBuildPictureBookDeps } from '../../infrastructure/create-deps.js';
import { toFileUri } from '../../services/fs.js';
import { LogManager } from '../../services/log-manager.js';
import { errorMessage } from '../../utils/error-message.js';

export const USAGE = `Usage: picture-book --image-directory <dir> --output-directory <dir> --document-name <name> [options]

Options:
  --config <file>               YAML config file (default: $PICTURE_BOOK_CONFIG)
  --page-size <size>            letter | a4 | legal (default: letter)
  --orientation <value>         portrait | landscape (default: portrait)
  --scale <factor>              scaling factor between 0.1 and 1.0 (default: 1.0)
  --per-page <n|auto>           images per page, or auto to fill by height (default: auto)
  --image-spacing <inches>      vertical space between images (default: 0.3)
  --image-name-font-size <pt>   caption font size in points (default: 8)
  --image-dpi <dpi>             pixel density for converting pixels to inches (default: 96)
  --no-pdf                      skip PDF generation
  -h, --help                    show this help`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliOptions {
  imageDirectory: string;
  outputDirectory: string;
  documentName: string;
  configPath?: string;
  skipPdf: boolean;
  overrides: BookConfigInput;
}

export type ParsedCli = { kind: 'help' } | { kind: 'run'; options: CliOptions } | { kind: 'error'; message: string };

class CliUsageError extends Error {}

function parseNumberFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new CliUsageError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function parsePerPage(value: string | undefined): BookConfigInput['perPage'] {
  if (value === undefined) return undefined;
  if (value.trim().toLowerCase() === 'auto') return 'auto';
  if (!/^\d+$/.test(value.trim())) {
    throw new CliUsageError(`--per-page expects a positive integer or "auto", got "${value}"`);
  }
  return Number(value);
}

export function parseCliArgs(argv: string[]): ParsedCli {
  try {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'image-directory': { type: 'string' },
        'output-directory': { type: 'string' },
        'document-name': { type: 'string' },
        config: { type: 'string' },
        'page-size': { type: 'string' },
        orientation: { type: 'string' },
        scale: { type: 'string' },
        'per-page': { type: 'string' },
        'image-spacing': { type: 'string' },
        'image-name-font-size': { type: 'string' },
        'image-dpi': { type: 'string' },
        'no-pdf': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });

    if (values.help) return { kind: 'help' };

    const imageDirectory = values['image-directory'];
    const outputDirectory = values['output-directory'];
    const documentName = values['document-name'];
    const missing = [
      imageDirectory ? null : '--image-directory',
      outputDirectory ? null : '--output-directory',
      documentName ? null : '--document-name',
    ].filter((flag): flag is string => flag !== null);
    if (!imageDirectory || !outputDirectory || !documentName) {
      return { kind: 'error', message: `Missing required option(s): ${missing.join(', ')}` };
    }

    return {
      kind: 'run',
      options: {
        imageDirectory,
        outputDirectory,
        documentName,
        configPath: values.config,
        skipPdf: values['no-pdf'] === true,
        overrides: {
          pageSize: values['page-size'],
          orientation: values.orientation,
          scalingFactor: parseNumberFlag('scale', values.scale),
          perPage: parsePerPage(values['per-page']),
          imageSpacingIn: parseNumberFlag('image-spacing', values['image-spacing']),
          captionFontSizePt: parseNumberFlag('image-name-font-size', values['image-name-font-size']),
          baseDpi: parseNumberFlag('image-dpi', values['image-dpi']),
        },
      },
    };
  } catch (error) {
    // parseArgs 对未知参数抛 TypeError
    if (error instanceof CliUsageError || error instanceof TypeError) {
      return { kind: 'error', message: error.message };
    }
    throw error;
  }
}

/** 命令行运行时日志只写文件；跳过的图片由 CLI 自己输出到 stderr */
export function cliLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const base = getLogConfig(env);
  return { ...base, system: { ...base.system, consoleOutput: false } };
}

export interface RunCliOptions {
  deps?: BuildPictureBookUseCaseDeps;
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  const parsed = parseCliArgs(argv);
  if (parsed.kind === 'help') {
    out(USAGE);
    return EXIT_OK;
  }
  if (parsed.kind === 'error') {
    err(parsed.message);
    err(USAGE);
    return EXIT_USAGE;
  }

  const { options: cli } = parsed;
  try {
    const { config, configPath } = await loadConfig({
      configPath: cli.configPath,
      overrides: cli.overrides,
      env: options.env,
    });
    const deps =
      options.deps ?? createBuildPictureBookDeps({ logManager: new LogManager(cliLogConfig(options.env)) });
    if (configPath) {
      await deps.logSystem('debug', `Using config file ${configPath}`);
    }

    const result = await buildPictureBookUseCase(deps, {
      imageDirectory: cli.imageDirectory,
      outputDirectory: cli.outputDirectory,
      documentName: cli.documentName,
      config,
      skipPdf: cli.skipPdf,
    });

    for (const warning of result.warnings) {
      err(`Warning: skipped ${warning.filename} (${warning.message})`);
    }
    out(`Created ${result.documentPath} (${result.imageCount} image(s), ${result.pages.length} page(s))`);
    if (result.pdfPath) {
      out(`Successfully created PDF: ${toFileUri(result.pdfPath)}`);
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      err(`Configuration error: ${error.message}`);
      return EXIT_USAGE;
    }
    err(`Failed to create picture book: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}
