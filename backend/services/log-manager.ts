/**
 * Log Manager - 统一日志管理
 * 系统日志写入 logs/system/，每次画册生成的运行记录写入 logs/runs/{date}/{runId}.jsonl
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { getLogConfig, shouldLog } from '../config/log-config.js';
import type { LogConfig, LogLevel } from '../config/log-config.js';

export type { LogLevel } from '../config/log-config.js';
export type LogType = 'system' | 'runs';

export type LogMeta = Record<string, unknown>;

/**
 * 统一日志管理器
 */
export class LogManager {
  private readonly logRoot: string;
  private readonly config: LogConfig;

  constructor(config: LogConfig = getLogConfig()) {
    this.config = config;
    this.logRoot = path.resolve(process.cwd(), config.logDir);
  }

  /**
   * 确保日志目录存在
   */
  private async ensureLogDir(type: LogType): Promise<string> {
    const dateStr = new Date().toISOString().split('T')[0];
    const dirPath = type === 'system' ? path.join(this.logRoot, 'system') : path.join(this.logRoot, type, dateStr);

    await fs.mkdir(dirPath, { recursive: true });
    return dirPath;
  }

  /**
   * 记录系统日志
   */
  async logSystem(level: LogLevel, message: string, meta?: LogMeta): Promise<void> {
    if (!this.config.system.enabled || !shouldLog(level, this.config.level)) return;

    if (this.config.system.consoleOutput) {
      const consoleMsg = `[${level.toUpperCase()}] ${message}`;
      const args: unknown[] = meta ? [consoleMsg, meta] : [consoleMsg];
      if (level === 'error') {
        console.error(...args);
      } else if (level === 'warn') {
        console.warn(...args);
      } else {
        console.log(...args);
      }
    }

    try {
      const dirPath = await this.ensureLogDir('system');
      const logFile = path.join(dirPath, level === 'error' ? 'error.log' : 'app.log');

      const logEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...meta,
      };

      await fs.appendFile(logFile, JSON.stringify(logEntry) + '\n', 'utf-8');
    } catch (error) {
      console.error('[LogManager] Failed to log system:', error);
    }
  }

  /**
   * 记录单次运行日志（不受级别过滤）
   */
  async logRun(runId: string, entry: LogMeta): Promise<void> {
    if (!this.config.runs.enabled) return;

    try {
      const dirPath = await this.ensureLogDir('runs');
      const logFile = path.join(dirPath, `${runId}.jsonl`);

      const logEntry = {
        ...entry,
        logId: randomUUID(),
        timestamp: new Date().toISOString(),
      };

      await fs.appendFile(logFile, JSON.stringify(logEntry) + '\n', 'utf-8');
    } catch (error) {
      console.error('[LogManager] Failed to log run:', error);
    }
  }
}

// 单例实例
let logManagerInstance: LogManager | null = null;

/**
 * 获取 LogManager 单例
 */
export function getLogManager(): LogManager {
  if (!logManagerInstance) {
    logManagerInstance = new LogManager();
  }
  return logManagerInstance;
}
