/**
 * Log Configuration
 * 日志系统配置
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogConfig {
  // 日志级别
  level: LogLevel;

  // 日志根目录
  logDir: string;

  system: {
    enabled: boolean;
    consoleOutput: boolean; // 是否同时输出到控制台
  };

  // 每次生成的运行记录（jsonl）
  runs: {
    enabled: boolean;
  };
}

/**
 * 默认日志配置
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  logDir: './logs',
  system: {
    enabled: true,
    consoleOutput: true,
  },
  runs: {
    enabled: true,
  },
};

/**
 * 开发环境日志配置
 */
export const DEV_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'debug',
};

/**
 * 生产环境日志配置
 */
export const PROD_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'warn',
};

/**
 * 测试环境：只记录错误，不写控制台
 */
export const TEST_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'error',
  system: {
    ...DEFAULT_LOG_CONFIG.system,
    consoleOutput: false,
  },
};

/**
 * 根据环境获取日志配置；PICTURE_BOOK_LOG_DIR 覆盖日志目录
 */
export function getLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const base = (() => {
    switch (env.NODE_ENV || 'development') {
      case 'production':
        return PROD_LOG_CONFIG;
      case 'test':
        return TEST_LOG_CONFIG;
      case 'development':
      default:
        return DEV_LOG_CONFIG;
    }
  })();

  const logDir = env.PICTURE_BOOK_LOG_DIR?.trim();
  return logDir ? { ...base, logDir } : base;
}

/**
 * 检查日志级别是否应该记录
 */
export function shouldLog(messageLevel: LogLevel, configLevel: LogLevel = 'info'): boolean {
  const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
  const messageLevelIndex = levels.indexOf(messageLevel);
  const configLevelIndex = levels.indexOf(configLevel);

  return messageLevelIndex >= configLevelIndex;
}
