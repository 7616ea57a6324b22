import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogMeta {
  correlationId?: string;
  context?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function currentLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : 'info';
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function appendToLogFile(entry: Record<string, unknown>): void {
  const logDir = process.env.LOG_DIR;
  if (!logDir) return;

  const dateStr = new Date().toISOString().split('T')[0];
  const logFile = path.join(logDir, `deck-studio-${dateStr}.log`);

  try {
    fs.mkdirSync(logDir, { recursive: true });
    fs.appendFileSync(logFile, JSON.stringify(entry) + '\n');
  } catch (err) {
    console.error('[Logger] Failed to write to log file:', err);
  }
}

export function writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel()]) return;

  appendToLogFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  });

  const { context, ...rest } = meta ?? {};
  const contextPrefix = context ? `[${context}] ` : '';
  const correlationPrefix = rest.correlationId ? `[${rest.correlationId}] ` : '';
  const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const line = `[${level.toUpperCase()}] ${contextPrefix}${correlationPrefix}${message}${metaStr}`;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, err?: unknown, meta?: LogMeta): void;
}

function errorMeta(err: unknown): Partial<LogMeta> {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  if (err !== undefined) {
    return { error: String(err) };
  }
  return {};
}

/**
 * Logger bound to a component name, e.g. createLogger('SlideLibrary').
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message, meta) => writeLog('debug', message, { ...meta, context }),
    info: (message, meta) => writeLog('info', message, { ...meta, context }),
    warn: (message, meta) => writeLog('warn', message, { ...meta, context }),
    error: (message, err, meta) => writeLog('error', message, { ...errorMeta(err), ...meta, context }),
  };
}

export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private route: string;

  constructor(route: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.route = route;
  }

  private getMeta(extra?: LogMeta): LogMeta {
    return {
      context: 'HTTP',
      correlationId: this.correlationId,
      route: this.route,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  info(message: string, extra?: LogMeta): void {
    writeLog('info', message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: LogMeta): void {
    writeLog('error', message, this.getMeta({ ...errorMeta(err), ...extra }));
  }

  getCorrelationId(): string {
    return this.correlationId;
  }
}
