/**
 * 画册配置：默认值 < YAML 配置文件 < 调用方覆盖（命令行参数），统一经 zod 校验
 * 配置文件路径：显式传入，否则读环境变量 PICTURE_BOOK_CONFIG，都没有则只用默认值
 */
import { promises as fs } from 'fs';
import path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './domain/layout/errors.js';
import { MAX_SCALING_FACTOR, MIN_SCALING_FACTOR } from './domain/layout/image-sizer.js';
import type { PerPagePolicy } from './domain/layout/types.js';
import { DEFAULT_IMAGE_EXTENSIONS } from './services/fs.js';
import { errorMessage } from './utils/error-message.js';

export const bookConfigSchema = z
  .object({
    pageSize: z.string().trim().toLowerCase().pipe(z.enum(['letter', 'a4', 'legal'])),
    orientation: z.string().trim().toLowerCase().pipe(z.enum(['portrait', 'landscape'])),
    scalingFactor: z.number().min(MIN_SCALING_FACTOR).max(MAX_SCALING_FACTOR),
    perPage: z.union([z.literal('auto'), z.number().int().min(1)]),
    imageSpacingIn: z.number().min(0),
    captionFontSizePt: z.number().int().positive(),
    baseDpi: z.number().positive(),
    imageExtensions: z.array(z.string().min(1)).min(1),
  })
  .strict();

export type BookConfig = z.infer<typeof bookConfigSchema>;
export type BookConfigInput = Partial<z.input<typeof bookConfigSchema>>;

export const DEFAULT_BOOK_CONFIG: BookConfig = {
  pageSize: 'letter',
  orientation: 'portrait',
  scalingFactor: 1.0,
  perPage: 'auto',
  imageSpacingIn: 0.3,
  captionFontSizePt: 8,
  baseDpi: 96,
  imageExtensions: [...DEFAULT_IMAGE_EXTENSIONS],
};

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: BookConfigInput;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: BookConfig;
  /** 实际读取的配置文件绝对路径，未使用配置文件时为 null */
  configPath: string | null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 丢弃值为 undefined 的键，避免覆盖下层配置 */
function definedEntries(input: BookConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const absolutePath = path.resolve(configPath);
  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${absolutePath}: ${errorMessage(error)}`);
  }

  // 空文件视为无配置
  if (parsed === undefined || parsed === null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${absolutePath} must contain a mapping`);
  }
  return parsed;
}

export function parseBookConfig(raw: unknown): BookConfig {
  const result = bookConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? (env.PICTURE_BOOK_CONFIG?.trim() || undefined);
  const fileConfig = configPath ? await readConfigFile(configPath) : {};

  const config = parseBookConfig({
    ...DEFAULT_BOOK_CONFIG,
    ...fileConfig,
    ...definedEntries(options.overrides ?? {}),
  });
  return { config, configPath: configPath ? path.resolve(configPath) : null };
}

export function toPerPagePolicy(perPage: BookConfig['perPage']): PerPagePolicy {
  return perPage === 'auto' ? { kind: 'greedy' } : { kind: 'fixed', count: perPage };
}
