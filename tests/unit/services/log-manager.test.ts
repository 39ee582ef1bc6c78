import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LogManager } from '../../../backend/services/log-manager.js';
import { DEFAULT_LOG_CONFIG, getLogConfig, shouldLog } from '../../../backend/config/log-config.js';
import type { LogConfig } from '../../../backend/config/log-config.js';

async function readJsonLines(filePath: string): Promise<Array<Record<string, unknown>>> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.trim())
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe('shouldLog', () => {
  it('compares against the configured level', () => {
    expect(shouldLog('debug', 'info')).toBe(false);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('error', 'warn')).toBe(true);
    expect(shouldLog('warn', 'error')).toBe(false);
  });
});

describe('getLogConfig', () => {
  it('picks the level from NODE_ENV', () => {
    expect(getLogConfig({ NODE_ENV: 'production' }).level).toBe('warn');
    expect(getLogConfig({ NODE_ENV: 'development' }).level).toBe('debug');
    expect(getLogConfig({}).level).toBe('debug');
    expect(getLogConfig({ NODE_ENV: 'test' }).system.consoleOutput).toBe(false);
  });

  it('lets PICTURE_BOOK_LOG_DIR override the directory', () => {
    expect(getLogConfig({ NODE_ENV: 'production', PICTURE_BOOK_LOG_DIR: ' /var/log/book ' }).logDir).toBe('/var/log/book');
    expect(getLogConfig({ NODE_ENV: 'production' }).logDir).toBe('./logs');
  });
});

describe('LogManager', () => {
  let dir: string;

  const configFor = (overrides: Partial<LogConfig> = {}): LogConfig => ({
    ...DEFAULT_LOG_CONFIG,
    logDir: dir,
    system: { enabled: true, consoleOutput: false },
    ...overrides,
  });

  const runLogPath = (runId: string): string =>
    path.join(dir, 'runs', new Date().toISOString().split('T')[0], `${runId}.jsonl`);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'picture-book-logs-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes system entries as json lines, errors to error.log', async () => {
    const logManager = new LogManager(configFor());

    await logManager.logSystem('info', 'laid out', { pages: 3 });
    await logManager.logSystem('error', 'compile failed');

    const app = await readJsonLines(path.join(dir, 'system', 'app.log'));
    expect(app).toHaveLength(1);
    expect(app[0]).toMatchObject({ level: 'info', message: 'laid out', pages: 3 });

    const errors = await readJsonLines(path.join(dir, 'system', 'error.log'));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ level: 'error', message: 'compile failed' });
  });

  it('drops entries below the configured level', async () => {
    const logManager = new LogManager(configFor({ level: 'warn' }));

    await logManager.logSystem('info', 'ignored');

    await expect(fs.access(path.join(dir, 'system', 'app.log'))).rejects.toThrow();
  });

  it('mirrors to the console when enabled', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logManager = new LogManager(configFor({ system: { enabled: true, consoleOutput: true } }));

    await logManager.logSystem('warn', 'skipped broken.png', { code: 'UNREADABLE_IMAGE' });

    expect(warn).toHaveBeenCalledWith('[WARN] skipped broken.png', { code: 'UNREADABLE_IMAGE' });
  });

  it('appends run entries to runs/<date>/<runId>.jsonl', async () => {
    const logManager = new LogManager(configFor());

    await logManager.logRun('run-1', { action: 'run_started' });
    await logManager.logRun('run-1', { action: 'document_written', pageCount: 2 });

    const entries = await readJsonLines(runLogPath('run-1'));
    expect(entries.map((e) => e.action)).toEqual(['run_started', 'document_written']);
    expect(entries[1]).toMatchObject({ pageCount: 2 });
    expect(typeof entries[0].logId).toBe('string');
    expect(typeof entries[0].timestamp).toBe('string');
  });

  it('skips run logging when disabled', async () => {
    const logManager = new LogManager(configFor({ runs: { enabled: false } }));
    await logManager.logRun('run-2', { action: 'run_started' });
    await expect(fs.access(runLogPath('run-2'))).rejects.toThrow();
  });
});
