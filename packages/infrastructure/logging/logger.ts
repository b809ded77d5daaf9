/**
 * 構造化ロガー
 *
 * pino で1行1JSONを出力する（12 Factor #11 Logs）。
 * アプリケーション層は Logger インターフェースだけに依存する。
 */
import pino from 'pino';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * スコープ付きロガーを作成
 *
 * destination を省略すると stdout に書く
 */
export function createLogger(
  scope: string,
  level: LogLevel = defaultLevel(),
  destination?: pino.DestinationStream
): Logger {
  const options: pino.LoggerOptions = {
    name: scope,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  const base = destination ? pino(options, destination) : pino(options);

  return {
    debug: (message, context) => base.debug(context ?? {}, message),
    info: (message, context) => base.info(context ?? {}, message),
    warn: (message, context) => base.warn(context ?? {}, message),
    error: (message, context) => base.error(context ?? {}, message),
  };
}
