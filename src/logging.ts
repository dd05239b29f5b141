/**
 * Logging utilities with sensitive data redaction
 */

const SENSITIVE_FIELDS = ['password', 'privatekey', 'passphrase'];
const REDACTED = '****';

/**
 * Redacts sensitive information from an object
 */
export function redactSensitiveData(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return obj;
  }

  if (obj instanceof Error) {
    const code = 'code' in obj ? obj.code : undefined;
    return { name: obj.name, message: redactErrorMessage(obj.message), code };
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSensitiveData);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_FIELDS.includes(key.toLowerCase())) {
        redacted[key] = value ? REDACTED : value;
      } else {
        redacted[key] = redactSensitiveData(value);
      }
    }
    return redacted;
  }

  return obj;
}

/**
 * Redacts secrets that commonly end up in proxy command lines and error messages
 */
export function redactErrorMessage(message: string): string {
  const patterns = [
    /password[=:\s]+[^\s]+/gi,
    /passphrase[=:\s]+[^\s]+/gi,
    /token[=:\s]+[^\s]+/gi,
    /-----BEGIN[^-]+-----[\s\S]*?-----END[^-]+-----/gi
  ];

  let redacted = message;
  for (const pattern of patterns) {
    redacted = redacted.replace(pattern, REDACTED);
  }

  return redacted;
}

/**
 * Logger levels
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export type LogSink = (line: string) => void;

/**
 * Simple logger with redaction
 */
export class Logger {
  private level: LogLevel;
  private sink: LogSink;

  constructor(level: LogLevel = LogLevel.INFO, sink: LogSink = line => process.stderr.write(line + '\n')) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (level > this.level) {
      return;
    }

    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    let output = `[${timestamp}] ${levelName}: ${redactErrorMessage(message)}`;

    if (data !== undefined) {
      const redactedData = redactSensitiveData(data);
      output += ` ${JSON.stringify(redactedData)}`;
    }

    // stdout may be carrying the SSH transport
    this.sink(output);
  }

  error(message: string, data?: unknown) {
    this.log(LogLevel.ERROR, message, data);
  }

  warn(message: string, data?: unknown) {
    this.log(LogLevel.WARN, message, data);
  }

  info(message: string, data?: unknown) {
    this.log(LogLevel.INFO, message, data);
  }

  debug(message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, message, data);
  }
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  'error': LogLevel.ERROR,
  'warn': LogLevel.WARN,
  'info': LogLevel.INFO,
  'debug': LogLevel.DEBUG
};

/**
 * Maps a LOG_LEVEL value to a level, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVEL_MAP[value?.toLowerCase() ?? 'info'] ?? LogLevel.INFO;
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));

/**
 * Performance measurement utilities
 */
export class Timer {
  private readonly startTime: number;

  constructor() {
    this.startTime = Date.now();
  }

  elapsed(): number {
    return Date.now() - this.startTime;
  }
}

/**
 * Creates a timer for measuring operation duration
 */
export function createTimer(): Timer {
  return new Timer();
}
