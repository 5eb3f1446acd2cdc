import fs from 'fs';
import path from 'path';
import util from 'util';
import { config } from '../config.js';

// Configuration for logging levels
const LOG_LEVELS = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  element: {
    resolved(description: string, data?: unknown): void;
    retry(description: string, data?: unknown): void;
  };
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  close(): void;
  getLogFilePath(): string | null;
}

declare global {
  // eslint-disable-next-line no-var
  var __pageObjectsLogger: Logger | undefined;
}

// Utility to format objects for logging
export function formatData(data: unknown): string {
  if (data === undefined || data === null) return '';

  if (typeof data === 'string') return data;

  // Handle Error objects specially
  if (data instanceof Error) {
    return `${data.message}\n${data.stack ?? ''}`;
  }

  return util.inspect(data, {
    depth: 4,
    colors: false,
    maxArrayLength: 10,
    breakLength: 120
  });
}

// Get ANSI color code for log level
function getColorForLevel(level: LogLevel): string {
  switch (level) {
    case 'DEBUG': return '\x1b[90m'; // Gray
    case 'INFO': return '\x1b[32m';  // Green
    case 'WARN': return '\x1b[33m';  // Yellow
    case 'ERROR': return '\x1b[31m'; // Red
  }
}

export function createLogger(options: { level: LogLevel; logDir?: string }): Logger {
  let currentLevel: LogLevel = options.level;
  let logFilePath: string | null = null;
  let logStream: fs.WriteStream | null = null;

  if (options.logDir) {
    const logsDir = path.resolve(process.cwd(), options.logDir);
    fs.mkdirSync(logsDir, { recursive: true });

    // One file per process so parallel runs never interleave
    logFilePath = path.join(logsDir, `page-objects-${process.pid}.log`);
    logStream = fs.createWriteStream(logFilePath, { flags: 'a' });
  }

  function log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

    const timestamp = new Date().toISOString();
    const formattedData = formatData(data);
    const suffix = formattedData ? '\n' + formattedData : '';

    logStream?.write(`[${timestamp}] [${level}] ${message}${suffix}\n`);

    const consoleMsg = `[${timestamp}] ${getColorForLevel(level)}[${level}]\x1b[0m ${message}`;
    if (level === 'ERROR') {
      console.error(consoleMsg, suffix);
    } else {
      console.log(consoleMsg, suffix);
    }
  }

  const logger: Logger = {
    debug: (msg, data) => log('DEBUG', msg, data),
    info: (msg, data) => log('INFO', msg, data),
    warn: (msg, data) => log('WARN', msg, data),
    error: (msg, data) => log('ERROR', msg, data),

    // Element lifecycle events
    element: {
      resolved: (description, data) => {
        log('DEBUG', `Element resolved: ${description}`, data);
      },
      retry: (description, data) => {
        log('DEBUG', `Stale element, re-resolving: ${description}`, data);
      }
    },

    setLevel: (level) => {
      currentLevel = level;
    },

    getLevel: () => currentLevel,

    close: () => {
      if (logStream && !logStream.closed) {
        logStream.end();
      }
    },

    getLogFilePath: () => logFilePath
  };

  if (logFilePath) {
    log('DEBUG', `Logger initialized with file: ${logFilePath}`);
  }

  return logger;
}

function sharedLogger(): Logger {
  // Reuse the instance across module reloads
  if (globalThis.__pageObjectsLogger) {
    return globalThis.__pageObjectsLogger;
  }

  const instance = createLogger({ level: config.LOG_LEVEL, logDir: config.LOG_DIR });
  globalThis.__pageObjectsLogger = instance;

  if (instance.getLogFilePath()) {
    process.on('exit', () => instance.close());
  }

  return instance;
}

const logger = sharedLogger();

export default logger;
