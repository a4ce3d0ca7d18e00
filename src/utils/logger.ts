import fs from 'fs';
import path from 'path';
import { config } from '../config/index.js';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
};

function serializeData(data: unknown): string {
  if (data instanceof Error) {
    return '\n' + data.message + (data.stack ? '\n' + data.stack : '');
  }
  if (typeof data === 'object' && data !== null) {
    try {
      return '\n' + JSON.stringify(data, null, 2);
    } catch {
      return '\n' + String(data);
    }
  }
  return ' ' + String(data);
}

class Logger {
  private minLevel: number;
  private filePath: string | null = null;

  constructor(level: LogLevel = 'info') {
    this.minLevel = LOG_LEVELS[level];
  }

  setLevel(level: LogLevel): void {
    this.minLevel = LOG_LEVELS[level];
  }

  /**
   * Mirror every line (without colours) into `<dir>/<tag>_<timestamp>.log`.
   * Returns the file path.
   */
  attachFile(dir: string, tag: string, timestamp: string): string {
    fs.mkdirSync(dir, { recursive: true });
    this.filePath = path.join(dir, `${tag}_${timestamp}.log`);
    return this.filePath;
  }

  detachFile(): void {
    this.filePath = null;
  }

  get logFile(): string | null {
    return this.filePath;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.minLevel;
  }

  private write(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const suffix = data === undefined ? '' : serializeData(data);

    if (this.filePath) {
      fs.appendFileSync(this.filePath, `[${timestamp}] ${levelStr} ${message}${suffix}\n`, 'utf-8');
    }

    return `${COLORS[level]}[${timestamp}] ${levelStr}${COLORS.reset} ${message}${suffix}`;
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(this.write('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.write('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(this.write('warn', message, data));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.write('error', message, error));
    }
  }
}

export const logger = new Logger(config.logLevel);
