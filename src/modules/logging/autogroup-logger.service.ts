import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * Correlation context attached to every log entry within one orchestration call.
 */
export interface CorrelationContext {
  /** Unique operation ID (UUID) shared by all entries of one call. */
  operationId: string;
  /** Group the operation works on, once known */
  groupId?: number;
  /** Course the group belongs to, once known */
  courseId?: number;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  operationId?: string;
  groupId?: number;
  courseId?: number;
  /** Duration in ms since the context started */
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

const SECRET_KEY_PATTERN = /secret|password|token|enrolmentkey|connectionstring/i;
const REDACTED = '[REDACTED]';
const MAX_REDACT_DEPTH = 8;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Copy of `value` with secret-named keys replaced in nested objects, arrays and Maps. */
function redactSecrets(value: unknown, depth: number): unknown {
  if (value instanceof Map) {
    return redactSecrets(Object.fromEntries(value), depth);
  }
  if (!Array.isArray(value) && !isPlainObject(value)) {
    return value;
  }
  if (depth >= MAX_REDACT_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSecrets(item, depth + 1));
  }
  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactSecrets(nested, depth + 1);
  }
  return result;
}

/**
 * AutogroupLogger — structured, leveled, correlation-aware logger.
 *
 * - RFC 5424-inspired levels with per-category overrides
 * - Correlation context propagated across async boundaries
 * - JSON output for production, pretty output for development
 * - Ring buffer of recent entries for inspection
 *
 * Usage:
 *   this.logger.info(LogCategory.MEMBERSHIP, 'Member added', { groupId: 5, userId: 7 });
 */
@Injectable()
export class AutogroupLogger {
  private config: LogConfig;

  private readonly ringBuffer: StructuredLogEntry[] = [];
  private readonly maxRingBufferSize = 500;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  getContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  /** Update fields on the current correlation context. */
  enrichContext(partial: Partial<CorrelationContext>): void {
    const current = correlationStorage.getStore();
    if (current) {
      Object.assign(current, partial);
    }
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  updateConfig(partial: Partial<LogConfig>): void {
    Object.assign(this.config, partial);
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  // ─── Ring buffer ──────────────────────────────────────────────────

  getRecentLogs(options?: {
    limit?: number;
    level?: LogLevel;
    category?: LogCategory;
    operationId?: string;
  }): StructuredLogEntry[] {
    let entries = [...this.ringBuffer];

    if (options?.level !== undefined) {
      const minLevel = options.level;
      entries = entries.filter((e) => parseLogLevel(e.level) >= minLevel);
    }
    if (options?.category) {
      const category: string = options.category;
      entries = entries.filter((e) => e.category === category);
    }
    if (options?.operationId) {
      entries = entries.filter((e) => e.operationId === options.operationId);
    }

    const limit = options?.limit ?? 100;
    return entries.slice(-limit);
  }

  // ─── Core logging logic ───────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const ctx = correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      operationId: ctx?.operationId,
      groupId: ctx?.groupId,
      courseId: ctx?.courseId,
    };

    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = errorInfo;
      if (!this.config.includeStackTraces) {
        delete entry.error.stack;
      }
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > this.maxRingBufferSize) {
      this.ringBuffer.shift();
    }

    this.emit(level, entry);
  }

  /** Check if a log at the given level + category should be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (level === LogLevel.OFF) return false;
    const categoryLevel = category === undefined ? undefined : this.config.categoryLevels[category];
    if (categoryLevel !== undefined) {
      return level >= categoryLevel;
    }
    return level >= this.config.globalLevel;
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Redact secrets at any depth, then truncate large values. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(data)) {
      if (SECRET_KEY_PATTERN.test(key)) {
        result[key] = REDACTED;
        continue;
      }

      const value = redactSecrets(raw, 0);
      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private emit(level: LogLevel, entry: StructuredLogEntry): void {
    const line = this.config.format === 'json' ? JSON.stringify(entry) : this.formatPretty(level, entry);
    if (this.config.format === 'json') {
      if (level >= LogLevel.WARN) {
        process.stderr.write(line + '\n');
      } else {
        process.stdout.write(line + '\n');
      }
      return;
    }

    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  private formatPretty(level: LogLevel, entry: StructuredLogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(20);
    const op = entry.operationId ? ` [${entry.operationId.slice(0, 8)}]` : '';
    const grp = entry.groupId !== undefined ? ` group:${entry.groupId}` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${op}${grp}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack && this.config.includeStackTraces) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }
    return line;
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;
      default: return text;
    }
  }
}
