/**
 * In-memory logging for one analysis request.
 * Every entry is echoed to the console and the last MAX_ENTRIES are kept; the
 * orchestrator returns them with each outcome and the analyze route sends them
 * back for degraded runs.
 *
 * Usage:
 *   const logger = createRequestLogger({ prefix: `orchestrator ${requestId}` });
 *   logger.info('Entering tier', { tier: 'PRIMARY', pending: 5 });
 *   logger.warn('Image failed', { imageId: 'img_2', code: 'TRANSIENT_PROVIDER' });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: number;      // timestamp
  level: LogLevel;
  msg: string;     // message, prefix included
  data?: unknown;  // optional structured data
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export interface RequestLogger extends Logger {
  entries(): LogEntry[];
}

export interface RequestLoggerOptions {
  prefix?: string;
  /** Write to the console as well (default true) */
  echo?: boolean;
  maxEntries?: number;
}

const MAX_ENTRIES = 500;

/**
 * Create a logger bound to a single request.
 */
export function createRequestLogger(options: RequestLoggerOptions = {}): RequestLogger {
  const prefix = options.prefix || '';
  const echo = options.echo ?? true;
  const maxEntries = options.maxEntries ?? MAX_ENTRIES;
  const buffer: LogEntry[] = [];

  function log(level: LogLevel, msg: string, data?: unknown): void {
    const fullMsg = prefix ? `[${prefix}] ${msg}` : msg;

    buffer.push({
      ts: Date.now(),
      level,
      msg: fullMsg,
      data: data !== undefined ? sanitizeData(data) : undefined,
    });
    if (buffer.length > maxEntries) {
      buffer.splice(0, buffer.length - maxEntries);
    }

    if (!echo) return;
    const consoleMsg = `[${level.toUpperCase()}] ${fullMsg}`;
    const write = level === 'debug' ? console.log : console[level];
    if (data !== undefined) {
      write(consoleMsg, data);
    } else {
      write(consoleMsg);
    }
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    entries: () => buffer.slice(),
  };
}

/**
 * Logger that writes to the console only, tagged with `[prefix]`.
 */
export function consoleLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (msg, data) => (data !== undefined ? console.log(tag, msg, data) : console.log(tag, msg)),
    info: (msg, data) => (data !== undefined ? console.log(tag, msg, data) : console.log(tag, msg)),
    warn: (msg, data) => (data !== undefined ? console.warn(tag, msg, data) : console.warn(tag, msg)),
    error: (msg, data) => (data !== undefined ? console.error(tag, msg, data) : console.error(tag, msg)),
  };
}

/**
 * Sanitize data for JSON serialization.
 * Errors are reduced to name/message/stack; unserializable values become strings.
 */
export function sanitizeData(data: unknown): unknown {
  if (data === null || data === undefined) return data;

  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      stack: data.stack?.split('\n').slice(0, 5).join('\n'),
    };
  }

  if (typeof data !== 'object') return data;

  try {
    const json = JSON.stringify(data);
    if (json.length > 10000) {
      return `${json.slice(0, 10000)}...(truncated)`;
    }
    return data;
  } catch {
    return String(data);
  }
}
