/**
 * Structured Log Levels — follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  — Raw records on load, recordExists SQL and parameters.
 *   DEBUG  — No-op outcomes: member already present, manual member kept, create/update/remove
 *            refused, malformed group-set reference, group id that is not an autogroup.
 *   INFO   — Changes to the store: member added/removed, group created/updated/deleted.
 *   WARN   — Rejected construction argument, reconcile on a group that does not exist.
 *   ERROR  — A service operation failed; the error is rethrown to the caller.
 *   FATAL  — Threshold only; nothing logs at this level.
 *   OFF    — Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** Construction, validation and hydration of autogroups */
  ENTITY = 'autogroup.entity',
  /** ensureMember / ensureNotMember decisions */
  MEMBERSHIP = 'autogroup.membership',
  /** create / update / remove */
  LIFECYCLE = 'autogroup.lifecycle',
  /** System events emitted by the mutation primitives */
  EVENT = 'autogroup.event',
  /** PostgreSQL queries */
  DATABASE = 'database',
}

export interface LogConfig {
  /** Global minimum log level (default: INFO, can be overridden by LOG_LEVEL env var). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'autogroup.membership': LogLevel.TRACE, 'database': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum size of a single data value in bytes (default: 8KB). Larger values are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : parseLogFormat(process.env.LOG_FORMAT),
  };
}

function parseLogFormat(raw: string | undefined): 'json' | 'pretty' {
  return raw?.trim().toLowerCase() === 'json' ? 'json' : 'pretty';
}

function isLogCategory(value: string): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "autogroup.membership=TRACE,database=WARN"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
