/**
 * Leveled logging with secret redaction
 *
 * Security requirements:
 * - Never log client secrets, bind passwords or bearer tokens in plaintext
 * - Redact sensitive headers (Authorization, Cookie)
 * - Support structured JSON logging for container log collectors
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
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
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
  /** Output as JSON lines (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

/**
 * Where formatted lines go; swapped out in tests
 */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // client_secret=... in form bodies or URLs
  /client_secret=[^&\s]+/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys that should have their values redacted (compared lower-cased)
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'bindpassword',
  'secret',
  'clientsecret',
  'client_secret',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'authorization',
  'credentials',
]);

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Sends every level to stderr, keeping stdout for command output
 */
export const stderrSink: LogSink = {
  log: (line) => console.error(line),
  warn: (line) => console.error(line),
  error: (line) => console.error(line),
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('abcdefghijklmnop') // 'abcd...mnop'
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
    // Reset lastIndex for global patterns
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in a value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  return redactObject(Object.fromEntries(Object.entries(value)), depth);
}

/**
 * Redact sensitive values in a context object (deep copy with redaction)
 */
export function redactObject(
  obj: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      if (typeof item === 'string' && item.length > 0) {
        result[key] = redactString(item);
      } else if (item !== null && item !== undefined && item !== '') {
        result[key] = '[REDACTED]';
      } else {
        result[key] = item;
      }
    } else {
      result[key] = redactValue(item, depth + 1);
    }
  }

  return result;
}

/**
 * Redact sensitive headers from a plain header record
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_HEADERS.has(lowerKey)) {
      result[key] = redactString(value);
    } else {
      result[key] = redactPatterns(value);
    }
  }

  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with human or JSON output and automatic secret redaction
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private readonly sink: LogSink;

  constructor(config: LoggerConfig = {}, sink: LogSink = consoleSink) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      context: config.context ?? {},
    };
    this.sink = sink;
  }

  /**
   * Check if a log level should be output
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  /**
   * Create a log entry
   */
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

    const merged = { ...this.config.context, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactObject(merged);
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

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    // Human-readable format
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack && this.config.level === 'debug') {
        parts.push(`\n  ${entry.error.stack}`);
      }
    }

    return parts.join(' ');
  }

  /**
   * Output a log entry
   */
  private output(level: LogLevel, entry: LogEntry): void {
    const formatted = this.formatEntry(entry);

    switch (level) {
      case 'error':
        this.sink.error(formatted);
        break;
      case 'warn':
        this.sink.warn(formatted);
        break;
      default:
        this.sink.log(formatted);
    }
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('debug')) return;
    this.output('debug', this.createEntry('debug', message, context));
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('info')) return;
    this.output('info', this.createEntry('info', message, context));
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('warn')) return;
    this.output('warn', this.createEntry('warn', message, context));
  }

  /**
   * Log at error level
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('error')) return;
    this.output('error', this.createEntry('error', message, context, error));
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(method: string, url: string, headers?: Record<string, string>): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: headers ? redactHeaders(headers) : undefined,
    });
  }

  /**
   * Log an HTTP response
   */
  response(status: number, url: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    if (!this.isLevelEnabled(level)) return;
    this.output(
      level,
      this.createEntry(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
        status,
        durationMs,
      })
    );
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(
      { ...this.config, context: { ...this.config.context, ...context } },
      this.sink
    );
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  /**
   * Get current configuration
   */
  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Process-wide logger; the CLI raises it to debug when DEBUG is set
 */
export const logger = new Logger();

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}, sink?: LogSink): Logger {
  return new Logger(config, sink);
}
