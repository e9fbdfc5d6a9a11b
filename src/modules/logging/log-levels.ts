/**
 * Log levels, categories and the logger's runtime settings.
 *
 * Levels are ordered by severity; a level lets through itself and everything
 * above it. OFF is only ever a threshold, never the level of an entry.
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

export const LOG_LEVEL_NAMES = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'OFF'] as const;
export type LogLevelName = typeof LOG_LEVEL_NAMES[number];

/** Case-insensitive level name lookup; anything else is undefined. */
export function parseLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.trim().toUpperCase();
  const index = LOG_LEVEL_NAMES.findIndex((candidate) => candidate === name);
  return index === -1 ? undefined : index;
}

export function levelName(level: LogLevel): LogLevelName {
  return LOG_LEVEL_NAMES[level];
}

export enum LogCategory {
  HTTP = 'http',
  AUTH = 'auth',
  /** Graph or in-memory directory calls */
  DIRECTORY = 'directory',
  MEMBERSHIP = 'membership',
  EXPORT = 'export',
  GENERAL = 'general',
}

export const LOG_CATEGORIES: readonly LogCategory[] = Object.values(LogCategory);

export function isLogCategory(value: unknown): value is LogCategory {
  return LOG_CATEGORIES.some((category) => category === value);
}

export type LogFormat = 'json' | 'pretty';

export type CategoryLevels = Partial<Record<LogCategory, LogLevel>>;

export interface LoggerSettings {
  level: LogLevel;
  /** Per-category thresholds; a category without one uses `level`. */
  categoryLevels: CategoryLevels;
  format: LogFormat;
  includeStacks: boolean;
  /** Longest string or serialized object kept in `data` before truncation. */
  maxValueLength: number;
}

/**
 * "directory=TRACE,auth=WARN". Pairs naming an unknown category or level are
 * dropped.
 */
export function parseCategoryLevels(raw: string | undefined): CategoryLevels {
  const levels: CategoryLevels = {};
  for (const pair of (raw ?? '').split(',')) {
    const [category, level] = pair.split('=').map((part) => part.trim());
    const parsed = parseLevel(level);
    if (isLogCategory(category) && parsed !== undefined) {
      levels[category] = parsed;
    }
  }
  return levels;
}

/**
 * LOG_LEVEL, LOG_CATEGORY_LEVELS, LOG_FORMAT, LOG_INCLUDE_STACKS and
 * LOG_MAX_PAYLOAD_SIZE. Production always logs JSON.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const maxValueLength = Number(env.LOG_MAX_PAYLOAD_SIZE);
  return {
    level: parseLevel(env.LOG_LEVEL) ?? LogLevel.INFO,
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    format: env.NODE_ENV === 'production' || env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
    includeStacks: env.LOG_INCLUDE_STACKS !== 'false',
    maxValueLength: Number.isInteger(maxValueLength) && maxValueLength > 0 ? maxValueLength : 8192,
  };
}
