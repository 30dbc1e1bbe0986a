/**
 * Structured logging with secret redaction
 *
 * Security requirements:
 * - Never log bearer tokens or other credentials in plaintext
 * - Redact sensitive headers (Authorization, Cookie)
 * - Support structured JSON logging for CI/automation
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Pretty print JSON (default: false) */
  prettyPrint?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,

  // JWT tokens (service account tokens are JWTs)
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // Generic secrets
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
  /token[_-]?[a-zA-Z0-9]{10,}/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'x-auth-token',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys (lowercased) that should have their values redacted
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'bearertoken',
  'bearer_token',
  'accesstoken',
  'access_token',
  'authorization',
  'credentials',
  'private_key',
  'privatekey',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_REDACT_DEPTH = 10;

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('test-secret-value') // 'test...alue'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values anywhere in a value (deep copy)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_REDACT_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item, depth + 1));
  }
  if (typeof value === 'object' && value !== null) {
    const entries: [string, unknown][] = Object.entries(value);
    return redactContext(Object.fromEntries(entries), depth + 1);
  }
  return value;
}

/**
 * Redact a log context object
 */
export function redactContext(
  context: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      if (typeof value === 'string' && value.length > 0) {
        result[key] = redactString(value);
      } else if (value !== null && value !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = value;
      }
    } else {
      result[key] = redactValue(value, depth);
    }
  }
  return result;
}

/**
 * Redact sensitive headers from a Headers object or plain object
 */
export function redactHeaders(headers: Headers | Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  const add = (value: string, key: string): void => {
    result[key] = SENSITIVE_HEADERS.has(key.toLowerCase())
      ? redactString(value)
      : redactPatterns(value);
  };

  if (headers instanceof Headers) {
    headers.forEach(add);
  } else {
    for (const [key, value] of Object.entries(headers)) {
      add(value, key);
    }
  }
  return result;
}

/**
 * Narrow an arbitrary string (e.g. an environment variable) to a log level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with JSON output and automatic secret redaction
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private readonly context: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, context: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      prettyPrint: config.prettyPrint ?? false,
    };
    this.context = redactContext(context);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.context, ...(context ? redactContext(context) : {}) };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack}`);
      }
    }

    return parts.join(' ');
  }

  /**
   * Logs go to stderr so command output on stdout stays machine-readable
   */
  private output(entry: LogEntry): void {
    console.error(this.formatEntry(entry));
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.output(this.createEntry(level, message, context, error));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(
    method: string,
    url: string,
    options?: { headers?: Headers | Record<string, string>; body?: unknown }
  ): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: options?.headers ? redactHeaders(options.headers) : undefined,
      body: options?.body,
    });
  }

  /**
   * Log an HTTP response; failures are logged at warn level
   */
  response(status: number, url: string, options?: { durationMs?: number }): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.log(level, `HTTP Response ${status}: ${url}`, {
      status,
      durationMs: options?.durationMs,
    });
  }

  /**
   * Create a child logger with additional bound context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(this.config, { ...this.context, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger, configured from MANIFEST_LOG_LEVEL / MANIFEST_LOG_JSON
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.MANIFEST_LOG_LEVEL),
  json: process.env.MANIFEST_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
