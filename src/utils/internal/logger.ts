/**
 * @fileoverview Singleton logger built on pino. Exposes the MCP log levels and
 * writes JSON lines to stderr so stdout stays free for the stdio transport and
 * the CLI summary.
 * @module src/utils/internal/logger
 */
import pino, { type Logger as PinoLogger } from 'pino';

/**
 * Log levels defined by the Model Context Protocol, lowest first.
 */
export const mcpLogLevels = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
] as const;

export type McpLogLevel = (typeof mcpLogLevels)[number];

const pinoLevels: Record<McpLogLevel, pino.Level> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
};

/**
 * Loose bag of structured fields attached to a log line, typically a
 * `RequestContext` spread together with call-specific values.
 */
export type LogContext = Record<string, unknown>;

function serializeErrors(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] =
      value instanceof Error
        ? { name: value.name, message: value.message, stack: value.stack }
        : value;
  }
  return out;
}

export class Logger {
  private static instance: Logger | undefined;
  private pinoLogger: PinoLogger;
  private currentLevel: McpLogLevel = 'info';

  private constructor() {
    this.pinoLogger = pino(
      { level: pinoLevels[this.currentLevel], base: null },
      pino.destination({ dest: 2, sync: true }),
    );
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  get level(): McpLogLevel {
    return this.currentLevel;
  }

  setLevel(level: McpLogLevel): void {
    this.currentLevel = level;
    this.pinoLogger.level = pinoLevels[level];
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  notice(message: string, context?: LogContext): void {
    this.write('notice', message, context);
  }

  warning(message: string, context?: LogContext): void {
    this.write('warning', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  crit(message: string, context?: LogContext): void {
    this.write('crit', message, context);
  }

  private write(
    level: McpLogLevel,
    message: string,
    context: LogContext | undefined,
  ): void {
    const fields = context ? serializeErrors(context) : {};
    this.pinoLogger[pinoLevels[level]]({ ...fields, mcpLevel: level }, message);
  }
}

export const logger = Logger.getInstance();
