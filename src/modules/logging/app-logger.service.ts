import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';

import {
  LogCategory,
  LogLevel,
  levelName,
  parseLevel,
  settingsFromEnv,
  type LogLevelName,
  type LoggerSettings,
} from './log-levels';

/** Per-request fields stamped onto every entry logged while the request runs. */
export interface CorrelationContext {
  requestId: string;
  method?: string;
  path?: string;
  /** Root group being resolved, once the resolver knows it */
  groupId?: string;
  startTime?: number;
}

export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevelName;
  category: LogCategory;
  message: string;
  requestId?: string;
  groupId?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: { message: string; name?: string; stack?: string };
  data?: Record<string, unknown>;
}

export interface RecentLogQuery {
  limit?: number;
  /** Minimum level */
  level?: LogLevel;
  category?: LogCategory;
  requestId?: string;
}

const RECENT_CAPACITY = 500;
const DEFAULT_RECENT_LIMIT = 100;
const SECRET_KEY = /secret|password|token|authorization|bearer/i;

const correlation = new AsyncLocalStorage<CorrelationContext>();

/**
 * Structured, leveled logger shared by the whole service.
 *
 * Entries carry the correlation context of the request they were logged in,
 * go to stdout/stderr as JSON lines or as one pretty console line, and the
 * last few hundred stay in memory for `GET /admin/log-config/recent`.
 *
 *   this.logger.info(LogCategory.MEMBERSHIP, 'Group membership resolved', { groupId, members: 12 });
 */
@Injectable()
export class AppLogger {
  private settings: LoggerSettings = settingsFromEnv();
  private readonly recent: StructuredLogEntry[] = [];

  // ─── Correlation ───────────────────────────────────────────────────

  runWithContext<T>(context: CorrelationContext, fn: () => T): T {
    return correlation.run(context, fn);
  }

  /** Adds fields to the current request's context; outside a request this does nothing. */
  enrichContext(fields: Partial<CorrelationContext>): void {
    const context = correlation.getStore();
    if (context) Object.assign(context, fields);
  }

  // ─── Settings ──────────────────────────────────────────────────────

  getSettings(): LoggerSettings {
    return { ...this.settings, categoryLevels: { ...this.settings.categoryLevels } };
  }

  applySettings(changes: Partial<LoggerSettings>): void {
    this.settings = { ...this.settings, ...changes };
  }

  setGlobalLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  setCategoryLevel(category: LogCategory, level: LogLevel): void {
    this.settings.categoryLevels = { ...this.settings.categoryLevels, [category]: level };
  }

  clearCategoryLevel(category: LogCategory): void {
    const levels = { ...this.settings.categoryLevels };
    delete levels[category];
    this.settings.categoryLevels = levels;
  }

  // ─── Logging ───────────────────────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, category, message, data, error);
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write(LogLevel.FATAL, category, message, data, error);
  }

  // ─── Recent entries ────────────────────────────────────────────────

  getRecentLogs(query: RecentLogQuery = {}): StructuredLogEntry[] {
    const { level: minLevel, category, requestId } = query;
    const matches = this.recent.filter(
      (entry) =>
        (minLevel === undefined || (parseLevel(entry.level) ?? LogLevel.OFF) >= minLevel) &&
        (category === undefined || entry.category === category) &&
        (requestId === undefined || entry.requestId === requestId),
    );
    return matches.slice(-(query.limit ?? DEFAULT_RECENT_LIMIT));
  }

  clearRecentLogs(): void {
    this.recent.length = 0;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private threshold(category: LogCategory): LogLevel {
    return this.settings.categoryLevels[category] ?? this.settings.level;
  }

  private write(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
  ): void {
    if (level < this.threshold(category)) return;

    const context = correlation.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: levelName(level),
      category,
      message,
      requestId: context?.requestId,
      groupId: context?.groupId,
      method: context?.method,
      path: context?.path,
    };
    if (context?.startTime !== undefined) entry.durationMs = Date.now() - context.startTime;
    if (error !== undefined) entry.error = describeError(error, this.settings.includeStacks);
    if (data) entry.data = redact(data, this.settings.maxValueLength);

    this.recent.push(entry);
    if (this.recent.length > RECENT_CAPACITY) this.recent.shift();

    if (this.settings.format === 'json') {
      const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
      stream.write(`${JSON.stringify(entry)}\n`);
    } else {
      printPretty(level, entry);
    }
  }
}

function describeError(error: unknown, includeStack: boolean): NonNullable<StructuredLogEntry['error']> {
  if (!(error instanceof Error)) return { message: String(error) };
  return includeStack
    ? { message: error.message, name: error.name, stack: error.stack }
    : { message: error.message, name: error.name };
}

/** Masks secret-looking keys and truncates long values. */
function redact(data: Record<string, unknown>, maxLength: number): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]): [string, unknown] => {
      if (SECRET_KEY.test(key)) return [key, '[REDACTED]'];
      if (typeof value === 'string' && value.length > maxLength) {
        return [key, `${value.slice(0, maxLength)}...[truncated ${value.length - maxLength}B]`];
      }
      if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        if (serialized.length > maxLength) return [key, `${serialized.slice(0, maxLength)}...[truncated]`];
      }
      return [key, value];
    }),
  );
}

const LEVEL_COLOURS: Record<LogLevelName, number> = {
  TRACE: 90,
  DEBUG: 36,
  INFO: 32,
  WARN: 33,
  ERROR: 31,
  FATAL: 35,
  OFF: 0,
};

/** `HH:mm:ss.SSS LEVEL category [request] METHOD /path +12ms message | {data}` */
function printPretty(level: LogLevel, entry: StructuredLogEntry): void {
  const label = entry.level.padEnd(5);
  const parts = [
    entry.timestamp.slice(11, 23),
    process.stdout.isTTY ? `\x1b[${LEVEL_COLOURS[entry.level]}m${label}\x1b[0m` : label,
    entry.category.padEnd(10),
  ];
  if (entry.requestId) parts.push(`[${entry.requestId.slice(0, 8)}]`);
  if (entry.method && entry.path) parts.push(entry.method, entry.path);
  if (entry.durationMs !== undefined) parts.push(`+${entry.durationMs}ms`);
  parts.push(entry.message);

  let line = parts.join(' ');
  if (entry.error) {
    line += ` | ${entry.error.name ?? 'Error'}: ${entry.error.message}`;
    if (entry.error.stack) line += `\n${entry.error.stack}`;
  }
  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` | ${JSON.stringify(entry.data)}`;
  }

  /* eslint-disable no-console */
  if (level >= LogLevel.ERROR) console.error(line);
  else if (level === LogLevel.WARN) console.warn(line);
  else if (level === LogLevel.INFO) console.log(line);
  else console.debug(line);
  /* eslint-enable no-console */
}
