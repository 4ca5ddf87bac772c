import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'INFO' | 'WARNING' | 'ERROR';

export type Logger = {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
};

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  return `${now.toISOString()} - ${level} - ${message}`;
}

/**
 * Console logger that also appends every line to `logFile`.
 * The log file is only ever appended to, across runs.
 */
export function createLogger(logFile: string | null): Logger {
  let ready: Promise<unknown> | null = null;

  const write = async (level: LogLevel, message: string) => {
    if (level === 'ERROR') console.error(message);
    else if (level === 'WARNING') console.warn(message);
    else console.log(message);

    if (!logFile) return;
    ready ??= mkdir(path.dirname(logFile), { recursive: true });
    await ready;
    await appendFile(logFile, `${formatLogLine(level, message)}\n`, 'utf8');
  };

  return {
    info: (message) => write('INFO', message),
    warn: (message) => write('WARNING', message),
    error: (message) => write('ERROR', message)
  };
}
