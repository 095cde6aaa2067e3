import fs from 'fs';
import path from 'path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type LogFn = (category: string, message: string, data?: unknown) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  getLogPath: () => string;
}

export interface LoggerOptions {
  dir: string;
  fileName?: string;
  // Entries below this level are dropped
  level?: LogLevel;
  // Echo warnings and errors to the console
  echo?: boolean;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const lowered = value?.toLowerCase();
  return LOG_LEVELS.find(level => level === lowered) ?? fallback;
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return error;
}

function formatEntry(level: LogLevel, category: string, message: string, data?: unknown): string {
  let entry = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}] ${message}`;

  if (data !== undefined) {
    try {
      const payload = describeError(data);
      entry += `\n${typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2)}`;
    } catch {
      entry += `\n[Unable to serialize data]`;
    }
  }

  return entry + '\n' + '='.repeat(80) + '\n';
}

/**
 * File logger: one append per entry, tagged with a category such as
 * 'AI Router' or 'Game'.
 */
export function createLogger(options: LoggerOptions): Logger {
  const logFile = path.join(options.dir, options.fileName ?? 'quiz.log');
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'debug');
  const echo = options.echo ?? true;

  fs.mkdirSync(options.dir, { recursive: true });

  const write = (level: LogLevel): LogFn => (category, message, data) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const entry = formatEntry(level, category, message, data);
    fs.appendFileSync(logFile, entry);

    if (!echo) {
      return;
    }
    if (level === 'error') {
      console.error(entry);
    } else if (level === 'warn') {
      console.warn(entry);
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    getLogPath: () => logFile,
  };
}

export const logger = createLogger({
  dir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  level: parseLogLevel(process.env.LOG_LEVEL, 'debug'),
  echo: process.env.LOG_ECHO !== 'false',
});

export default logger;
