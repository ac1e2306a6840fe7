// Logging utility

import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Helper function to format JSON data
function formatJSON(data: unknown): string {
  try {
    if (typeof data === 'object' && data !== null) {
      return JSON.stringify(data, null, 2);
    }
    return String(data);
  } catch {
    return String(data);
  }
}

// Helper function to format meta data
function formatMeta(meta: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(meta)) {
    if (value !== undefined && value !== null) {
      if (typeof value === 'object') {
        parts.push(`${key}:\n${formatJSON(value)}`);
      } else {
        parts.push(`${key}=${String(value)}`);
      }
    }
  }
  return parts.length > 0 ? '\n' + parts.join('\n') : '';
}

// Color codes for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

const levelColors: Record<string, string> = {
  error: colors.red + colors.bright,
  warn: colors.yellow + colors.bright,
  info: colors.cyan + colors.bright,
  debug: colors.gray,
};

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const color = levelColors[level] || colors.white;
    const { reset, dim, gray } = colors;

    let metaStr = '';
    if (stack) {
      metaStr = `\n${dim}${String(stack)}${reset}`;
    } else if (Object.keys(meta).length) {
      metaStr = formatMeta(meta)
        .split('\n')
        .map((line) => `${gray}${line}${reset}`)
        .join('\n');
    }

    const levelStr = `${color}${level.toUpperCase().padEnd(5)}${reset}`;
    return `${dim}${String(timestamp)}${reset} ${levelStr} ${String(message)}${metaStr}`;
  }),
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const metaStr = stack ? `\n${String(stack)}` : Object.keys(meta).length ? formatMeta(meta) : '';
    return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}${metaStr}`;
  }),
);

class WinstonLogger implements Logger {
  private winstonLogger: winston.Logger;

  constructor(level: LogLevel, logFile?: string) {
    const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> =
      [new winston.transports.Console({ format: consoleFormat })];

    if (logFile) {
      const filename = resolve(logFile);
      const dir = dirname(filename);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      transports.push(new winston.transports.File({ filename, format: fileFormat }));
    }

    this.winstonLogger = winston.createLogger({ level, transports });
  }

  get level(): string {
    return this.winstonLogger.level;
  }

  set level(level: LogLevel) {
    this.winstonLogger.level = level;
  }

  debug(message: string, ...args: unknown[]): void {
    this.winstonLogger.debug(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.winstonLogger.info(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.winstonLogger.warn(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.winstonLogger.error(message, ...args);
  }
}

// Default log level from environment variable, 'info' otherwise
const envLevel = process.env.LOG_LEVEL;
const defaultLogger = new WinstonLogger(isLogLevel(envLevel) ? envLevel : 'info', process.env.LOG_FILE);

export function setLogLevel(level: LogLevel): void {
  defaultLogger.level = level;
}

export function getLogLevel(): string {
  return defaultLogger.level;
}

export const logger: Logger = defaultLogger;
