export enum LogLevel {
  INFO = 'INFO',
  ERROR = 'ERROR',
  WARN = 'WARN',
  DEBUG = 'DEBUG',
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  method?: string;
  url?: string;
  statusCode?: number;
  error?: unknown;
  duration?: number | string;
  ip?: string;
  [key: string]: unknown;
}

const STANDARD_FIELDS = new Set(['timestamp', 'level', 'message', 'method', 'url', 'statusCode', 'duration', 'ip', 'error']);

function isSilenced(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL?.toUpperCase();
  if (configured === 'SILENT') {
    return true;
  }
  if (level === LogLevel.DEBUG) {
    return process.env.NODE_ENV !== 'development' && configured !== 'DEBUG';
  }
  return configured === 'ERROR' && level !== LogLevel.ERROR;
}

export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toLocaleTimeString();
  const parts: string[] = [];

  let statusCodeStr = '';
  if (entry.statusCode !== undefined) {
    if (entry.statusCode >= 500) {
      statusCodeStr = `[${entry.statusCode}] 🔴`;
    } else if (entry.statusCode >= 400) {
      statusCodeStr = `[${entry.statusCode}] 🟠`;
    } else if (entry.statusCode >= 300) {
      statusCodeStr = `[${entry.statusCode}] 🟡`;
    } else {
      statusCodeStr = `[${entry.statusCode}] 🟢`;
    }
  }

  const headerParts = [`[${timestamp}]`, `[${entry.level}]`];

  if (statusCodeStr) {
    headerParts.push(statusCodeStr);
  }

  if (entry.method && entry.url) {
    headerParts.push(`${entry.method} ${entry.url}`);
  }

  if (entry.duration !== undefined) {
    const durationStr = typeof entry.duration === 'string' ? entry.duration : `${entry.duration}ms`;
    headerParts.push(`(${durationStr})`);
  }

  if (entry.ip) {
    headerParts.push(`IP: ${entry.ip}`);
  }

  parts.push(headerParts.join(' '));
  parts.push(`📝 ${entry.message}`);

  const dataFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      dataFields[key] = value;
    }
  }

  if (Object.keys(dataFields).length > 0) {
    parts.push(`📦 Data:\n${JSON.stringify(dataFields, null, 2)}`);
  }

  if (entry.error !== undefined) {
    parts.push(`❌ Error Details:`);
    if (entry.error instanceof Error) {
      parts.push(`   ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack && process.env.NODE_ENV === 'development') {
        parts.push(entry.error.stack.split('\n').map((line) => `   ${line}`).join('\n'));
      }
    } else {
      parts.push(`   ${JSON.stringify(entry.error)}`);
    }
  }

  return parts.join('\n');
}

export class Logger {
  static log(level: LogLevel, message: string, data?: Partial<LogEntry>): void {
    if (isSilenced(level)) {
      return;
    }

    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const logMessage = formatLogEntry(entry);

    switch (level) {
      case LogLevel.ERROR:
        console.error(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }

  static info(message: string, data?: Partial<LogEntry>): void {
    this.log(LogLevel.INFO, message, data);
  }

  static error(message: string, error?: unknown, data?: Partial<LogEntry>): void {
    this.log(LogLevel.ERROR, message, { ...data, error });
  }

  static warn(message: string, data?: Partial<LogEntry>): void {
    this.log(LogLevel.WARN, message, data);
  }

  static debug(message: string, data?: Partial<LogEntry>): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  /**
   * Security-relevant denial. The cause stays in the log and never reaches the caller.
   */
  static audit(event: string, data?: Partial<LogEntry>): void {
    this.log(LogLevel.WARN, `🔒 ${event}`, { ...data, audit: event });
  }
}
