import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);
let logFile: string | null = process.env.LOG_FILE || null;

function resolveLevel(raw: string | undefined): LogLevel {
  const value = (raw || '').toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return data.message;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function log(level: LogLevel, message: string, data?: unknown) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const consoleMethod = level === 'info' ? 'log' : level;
  if (data === undefined) {
    console[consoleMethod](message);
  } else {
    console[consoleMethod](message, data);
  }

  if (logFile) {
    const timestamp = new Date().toISOString();
    const logLine = `[${timestamp}] ${level.toUpperCase()}: ${message} ${formatData(data)}\n`;
    fs.appendFile(logFile, logLine, (err) => {
      if (err) {
        console.error(`Failed to write log file ${logFile}:`, err.message);
        logFile = null;
      }
    });
  }
}

/** Reconfigures the process-wide logger, typically once from the CLI. */
export function configureLogger(options: { level?: LogLevel; file?: string | null }): void {
  if (options.level) threshold = options.level;
  if (options.file !== undefined) {
    logFile = options.file ? path.resolve(options.file) : null;
    if (logFile) fs.mkdirSync(path.dirname(logFile), { recursive: true });
  }
}

export const logger = {
  debug: (msg: string, data?: unknown) => log('debug', msg, data),
  info: (msg: string, data?: unknown) => log('info', msg, data),
  warn: (msg: string, data?: unknown) => log('warn', msg, data),
  error: (msg: string, data?: unknown) => log('error', msg, data),
};

export type Logger = typeof logger;
