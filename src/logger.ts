/**
 * Logger — writes to the console and, once initialized, to a session log file.
 *
 * The log file is truncated each time Logger.init() is called,
 * so it always contains only the current run's logs.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { LOG_FILE_NAME } from './constants';

let logStream: fs.WriteStream | null = null;
let consoleEnabled = true;

/** Extract a readable message from anything thrown */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function formatData(data: unknown): string {
  if (data === null || data === undefined) return '';
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

function timestamp(): string {
  const d = new Date();
  const hh = String(d.getHours()).padStart(2, '0');
  const mm = String(d.getMinutes()).padStart(2, '0');
  const ss = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${hh}:${mm}:${ss}.${ms}`;
}

function writeLine(level: string, message: string, data: unknown): void {
  const line = `${timestamp()} [${level}] ${message}${formatData(data)}\n`;

  if (consoleEnabled) {
    if (level === 'ERROR') console.error(line.trimEnd());
    else if (level === 'WARN') console.warn(line.trimEnd());
    else console.log(line.trimEnd());
  }

  if (logStream) {
    logStream.write(line);
  }
}

const Logger = {
  /**
   * Initialize file logging. Call once at startup.
   * Truncates the log file so only the current run is kept.
   */
  init(logDir: string): void {
    const logFilePath = path.join(logDir, LOG_FILE_NAME);
    if (logStream) {
      logStream.end();
      logStream = null;
    }
    try {
      fs.mkdirSync(logDir, { recursive: true });
      logStream = fs.createWriteStream(logFilePath, { flags: 'w' });
      logStream.on('error', (err) => {
        console.error('Log stream error:', err);
        logStream = null;
      });
    } catch (err) {
      console.error('Failed to create log file:', err);
    }
    writeLine('INFO', `=== Run started (${new Date().toISOString()}) ===`, null);
  },

  /** Silence console output (tests, or when stdout carries results) */
  disableConsole(): void {
    consoleEnabled = false;
  },

  enableConsole(): void {
    consoleEnabled = true;
  },

  debug(message: string, data: unknown = null): void {
    writeLine('DEBUG', message, data);
  },

  info(message: string, data: unknown = null): void {
    writeLine('INFO', message, data);
  },

  warn(message: string, data: unknown = null): void {
    writeLine('WARN', message, data);
  },

  error(message: string, error: unknown = null): void {
    writeLine('ERROR', message, error);
  },

  /** Flush and close the log stream (call before the process exits) */
  close(): void {
    if (!logStream) return;
    logStream.end(`${timestamp()} [INFO] === Run ended ===\n`);
    logStream = null;
  }
};

export default Logger;
