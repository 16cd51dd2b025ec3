import { ENV } from '@/config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  message: string;
  data?: unknown;
}

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) return fallback;
  return LEVELS_BY_NAME[value.trim().toLowerCase()] ?? fallback;
}

export class Logger {
  private level: LogLevel;
  private logs: LogEntry[] = [];
  private listeners: ((log: LogEntry) => void)[] = [];
  private maxLogs = 1000;
  private silent = false;

  constructor(level: LogLevel = LogLevel.INFO) {
    this.level = level;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /** Keep buffering and notifying listeners but stop writing to the console */
  setSilent(silent: boolean) {
    this.silent = silent;
  }

  subscribe(listener: (log: LogEntry) => void) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  getLogs() {
    return this.logs;
  }

  clear() {
    this.logs = [];
  }

  private addLog(level: LogLevelName, message: string, data?: unknown) {
    const timestamp = formatTimestamp(new Date());
    const entry: LogEntry = { timestamp, level, message, data };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    this.listeners.forEach((l) => l(entry));

    if (this.silent) return;

    const consoleMsg = this.formatMessage(timestamp, level, message, data);
    if (level === 'DEBUG') console.debug(consoleMsg);
    else if (level === 'INFO') console.info(consoleMsg);
    else if (level === 'WARN') console.warn(consoleMsg);
    else if (level === 'ERROR') console.error(consoleMsg);
  }

  private formatMessage(timestamp: string, level: string, message: string, data?: unknown) {
    let dataString = '';
    if (data !== undefined) {
      try {
        dataString = `\nData: ${JSON.stringify(data instanceof Error ? serializeError(data) : data, null, 2)}`;
      } catch {
        dataString = `\nData: [Circular or Non-Serializable Object]`;
      }
    }
    return `[${timestamp}] [${level}] ${message}${dataString}`;
  }

  debug(message: string, data?: unknown) {
    if (this.level <= LogLevel.DEBUG) {
      this.addLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: unknown) {
    if (this.level <= LogLevel.INFO) {
      this.addLog('INFO', message, data);
    }
  }

  warn(message: string, data?: unknown) {
    if (this.level <= LogLevel.WARN) {
      this.addLog('WARN', message, data);
    }
  }

  error(message: string, data?: unknown) {
    if (this.level <= LogLevel.ERROR) {
      this.addLog('ERROR', message, data);
    }
  }
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS.mmm
 */
function formatTimestamp(now: Date): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
}

function serializeError(error: Error) {
  return { name: error.name, message: error.message, stack: error.stack };
}

export const logger = new Logger(parseLogLevel(ENV.LOG_LEVEL, LogLevel.INFO));
