/**
 * @fileoverview Process-wide logger backed by pino, writing JSON lines to stderr.
 * @module src/utils/internal/logger
 */
import {
  destination,
  pino,
  stdTimeFunctions,
  type Logger as PinoLogger,
} from 'pino';

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'crit'
  | 'silent';

type PinoLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const PINO_LEVELS: Record<LogLevel, PinoLevel> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
  silent: 'silent',
};

export type LogContext = Record<string, unknown>;

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function serializeContext(context?: LogContext): LogContext {
  if (!context) return {};
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = serializeValue(value);
  }
  return out;
}

/**
 * Thin wrapper that keeps a syslog-style method set over pino.
 */
export class Logger {
  private static instance: Logger | undefined;
  private readonly pinoLogger: PinoLogger;

  private constructor() {
    this.pinoLogger = pino(
      {
        level: 'info',
        base: null,
        timestamp: stdTimeFunctions.isoTime,
      },
      destination({ dest: 2, sync: true }),
    );
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLevel(level: LogLevel): void {
    this.pinoLogger.level = PINO_LEVELS[level];
  }

  public debug(msg: string, context?: LogContext): void {
    this.pinoLogger.debug(serializeContext(context), msg);
  }

  public info(msg: string, context?: LogContext): void {
    this.pinoLogger.info(serializeContext(context), msg);
  }

  public notice(msg: string, context?: LogContext): void {
    this.pinoLogger.info({ ...serializeContext(context), notice: true }, msg);
  }

  public warning(msg: string, context?: LogContext): void {
    this.pinoLogger.warn(serializeContext(context), msg);
  }

  public error(msg: string, context?: LogContext): void {
    this.pinoLogger.error(serializeContext(context), msg);
  }

  public crit(msg: string, context?: LogContext): void {
    this.pinoLogger.fatal(serializeContext(context), msg);
  }
}

export const logger = Logger.getInstance();
