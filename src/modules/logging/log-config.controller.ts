import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Put,
  Query,
} from '@nestjs/common';

import { AppLogger, type StructuredLogEntry } from './app-logger.service';
import {
  LOG_CATEGORIES,
  LOG_LEVEL_NAMES,
  isLogCategory,
  levelName,
  parseLevel,
  type CategoryLevels,
  type LogCategory,
  type LogLevel,
  type LogLevelName,
  type LoggerSettings,
} from './log-levels';

export interface LogConfigView {
  globalLevel: LogLevelName;
  categoryLevels: Partial<Record<LogCategory, LogLevelName>>;
  format: LoggerSettings['format'];
  includeStacks: boolean;
  maxValueLength: number;
  availableLevels: readonly LogLevelName[];
  availableCategories: readonly LogCategory[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Settings named in a PUT body. Fields with the wrong type or an unknown
 * level, format or category are left out rather than rejected.
 */
export function settingsPatchFrom(body: unknown): Partial<LoggerSettings> {
  if (!isRecord(body)) return {};
  const patch: Partial<LoggerSettings> = {};

  const level = typeof body.globalLevel === 'string' ? parseLevel(body.globalLevel) : undefined;
  if (level !== undefined) patch.level = level;
  if (body.format === 'json' || body.format === 'pretty') patch.format = body.format;
  if (typeof body.includeStacks === 'boolean') patch.includeStacks = body.includeStacks;
  if (typeof body.maxValueLength === 'number' && Number.isInteger(body.maxValueLength) && body.maxValueLength > 0) {
    patch.maxValueLength = body.maxValueLength;
  }
  if (isRecord(body.categoryLevels)) {
    const categoryLevels: CategoryLevels = {};
    for (const [category, raw] of Object.entries(body.categoryLevels)) {
      const parsed = typeof raw === 'string' ? parseLevel(raw) : undefined;
      if (isLogCategory(category) && parsed !== undefined) categoryLevels[category] = parsed;
    }
    patch.categoryLevels = categoryLevels;
  }
  return patch;
}

/**
 * Runtime log settings and the recent-entry buffer, under /admin/log-config.
 */
@Controller('admin/log-config')
export class LogConfigController {
  constructor(private readonly logger: AppLogger) {}

  @Get()
  getConfig(): LogConfigView {
    const settings = this.logger.getSettings();
    const categoryLevels: Partial<Record<LogCategory, LogLevelName>> = {};
    for (const category of LOG_CATEGORIES) {
      const level = settings.categoryLevels[category];
      if (level !== undefined) categoryLevels[category] = levelName(level);
    }
    return {
      globalLevel: levelName(settings.level),
      categoryLevels,
      format: settings.format,
      includeStacks: settings.includeStacks,
      maxValueLength: settings.maxValueLength,
      availableLevels: LOG_LEVEL_NAMES,
      availableCategories: LOG_CATEGORIES,
    };
  }

  /** Partial update; `categoryLevels`, when present, replaces every override. */
  @Put()
  updateConfig(@Body() body: unknown): { message: string; config: LogConfigView } {
    this.logger.applySettings(settingsPatchFrom(body));
    return { message: 'Log configuration updated', config: this.getConfig() };
  }

  @Put('level/:level')
  setGlobalLevel(@Param('level') raw: string): { message: string; globalLevel: LogLevelName } {
    const level = this.requireLevel(raw);
    this.logger.setGlobalLevel(level);
    return { message: `Global log level set to ${levelName(level)}`, globalLevel: levelName(level) };
  }

  @Put('category/:category/:level')
  setCategoryLevel(@Param('category') category: string, @Param('level') raw: string): { message: string } {
    if (!isLogCategory(category)) {
      throw new BadRequestException(`Unknown category '${category}'. Available: ${LOG_CATEGORIES.join(', ')}`);
    }
    const level = this.requireLevel(raw);
    this.logger.setCategoryLevel(category, level);
    return { message: `Category '${category}' log level set to ${levelName(level)}` };
  }

  /** Idempotent; an unknown category is not an error. */
  @Delete('category/:category')
  @HttpCode(204)
  clearCategoryLevel(@Param('category') category: string): void {
    if (isLogCategory(category)) this.logger.clearCategoryLevel(category);
  }

  /** GET /admin/log-config/recent?limit=&level=&category=&requestId= */
  @Get('recent')
  getRecentLogs(
    @Query('limit') limit?: string,
    @Query('level') level?: string,
    @Query('category') category?: string,
    @Query('requestId') requestId?: string,
  ): { count: number; entries: StructuredLogEntry[] } {
    const parsedLimit = Number(limit);
    const entries = this.logger.getRecentLogs({
      limit: Number.isInteger(parsedLimit) && parsedLimit > 0 ? parsedLimit : undefined,
      level: parseLevel(level),
      category: isLogCategory(category) ? category : undefined,
      requestId: requestId || undefined,
    });
    return { count: entries.length, entries };
  }

  @Delete('recent')
  @HttpCode(204)
  clearRecentLogs(): void {
    this.logger.clearRecentLogs();
  }

  private requireLevel(raw: string): LogLevel {
    const level = parseLevel(raw);
    if (level === undefined) {
      throw new BadRequestException(`Unknown log level '${raw}'`);
    }
    return level;
  }
}
