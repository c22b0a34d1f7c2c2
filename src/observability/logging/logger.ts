// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Leveled Logging with Components & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON lines in production, compact pretty-print in development
// - Component-based child loggers
// - Redaction of credential-like keys (api_key, token, secret, ...)
// - Everything is written to stderr: stdout belongs to the stdio MCP transport
//
// Usage:
//   import { getLogger } from '../observability/logging/index.js';
//
//   const logger = getLogger({ component: 'client' });
//   logger.info('Request sent', { url });
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Redact credential-like keys */
  redact?: boolean;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;

  /** Where formatted lines go */
  sink?: (line: string) => void;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redact: true,
  serviceName: 'abstract-api-mcp',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
  sink: writeStderr,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment or config.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const SENSITIVE_KEY = /key|secret|token|password|authorization/i;

export function redact(value: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (Array.isArray(value)) {
    return value.map(item => redact(item, depth + 1));
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? '[REDACTED]' : redact(inner, depth + 1);
    }
    return result;
  }

  return value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component ? { component } : {}),
    ...context,
  };

  if (globalConfig.redact) {
    const redacted = redact(entry);
    return redacted && typeof redacted === 'object' && !Array.isArray(redacted)
      ? { ...redacted }
      : entry;
  }

  return entry;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const time = typeof entry.time === 'string' ? entry.time : '';
  const component = typeof entry.component === 'string' ? `[${entry.component}] ` : '';
  const timeStr = time.split('T')[1]?.replace('Z', '') ?? '';

  const contextFields = Object.fromEntries(
    Object.entries(entry).filter(([key]) => !STANDARD_FIELDS.has(key))
  );
  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${DIM}${JSON.stringify(contextFields)}${RESET}`
    : '';

  return `${DIM}${timeStr}${RESET} ${COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} ${component}${String(entry.msg)}${contextStr}`;
}

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const sink = globalConfig.sink ?? writeStderr;
  sink(globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry));
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const levelNum = (): number => LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (LOG_LEVELS[level] < levelNum()) {
      return;
    }
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context }, component));
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (LOG_LEVELS[level] < levelNum()) {
      return;
    }
    const errorContext = error ? formatError(error) : {};
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled: (level: LogLevel): boolean => LOG_LEVELS[level] >= levelNum(),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = { ...DEFAULT_CONFIG };
}
