import {
  LOG_CATEGORIES,
  LogCategory,
  LogLevel,
  isLogCategory,
  levelName,
  parseCategoryLevels,
  parseLevel,
  settingsFromEnv,
} from './log-levels';

describe('log-levels', () => {
  describe('parseLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLevel('TRACE')).toBe(LogLevel.TRACE);
      expect(parseLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLevel('  Warn ')).toBe(LogLevel.WARN);
      expect(parseLevel('off')).toBe(LogLevel.OFF);
    });

    it('should return undefined for anything else', () => {
      expect(parseLevel(undefined)).toBeUndefined();
      expect(parseLevel('')).toBeUndefined();
      expect(parseLevel('VERBOSE')).toBeUndefined();
      expect(parseLevel('2')).toBeUndefined();
    });
  });

  it('levelName should be the inverse of parseLevel', () => {
    expect(levelName(LogLevel.TRACE)).toBe('TRACE');
    expect(levelName(LogLevel.FATAL)).toBe('FATAL');
    expect(parseLevel(levelName(LogLevel.ERROR))).toBe(LogLevel.ERROR);
  });

  describe('categories', () => {
    it('should list every category', () => {
      expect(LOG_CATEGORIES).toEqual(['http', 'auth', 'directory', 'membership', 'export', 'general']);
    });

    it('isLogCategory should accept only known categories', () => {
      expect(isLogCategory('directory')).toBe(true);
      expect(isLogCategory('repository.user')).toBe(false);
      expect(isLogCategory(42)).toBe(false);
    });
  });

  describe('parseCategoryLevels', () => {
    it('should read category=LEVEL pairs', () => {
      expect(parseCategoryLevels('directory=TRACE, auth = warn')).toEqual({
        [LogCategory.DIRECTORY]: LogLevel.TRACE,
        [LogCategory.AUTH]: LogLevel.WARN,
      });
    });

    it('should drop unknown categories, unknown levels and malformed pairs', () => {
      expect(parseCategoryLevels(',,=,bad,invalid.category=DEBUG,http=LOUD,membership=INFO,')).toEqual({
        [LogCategory.MEMBERSHIP]: LogLevel.INFO,
      });
      expect(parseCategoryLevels(undefined)).toEqual({});
    });
  });

  describe('settingsFromEnv', () => {
    it('should default to INFO, pretty output, stacks on and 8 KiB values', () => {
      expect(settingsFromEnv({})).toEqual({
        level: LogLevel.INFO,
        categoryLevels: {},
        format: 'pretty',
        includeStacks: true,
        maxValueLength: 8192,
      });
    });

    it('should read every LOG_* variable', () => {
      expect(
        settingsFromEnv({
          LOG_LEVEL: 'trace',
          LOG_CATEGORY_LEVELS: 'http=ERROR',
          LOG_FORMAT: 'json',
          LOG_INCLUDE_STACKS: 'false',
          LOG_MAX_PAYLOAD_SIZE: '4096',
        }),
      ).toEqual({
        level: LogLevel.TRACE,
        categoryLevels: { [LogCategory.HTTP]: LogLevel.ERROR },
        format: 'json',
        includeStacks: false,
        maxValueLength: 4096,
      });
    });

    it('should always log JSON in production', () => {
      expect(settingsFromEnv({ NODE_ENV: 'production', LOG_FORMAT: 'pretty' }).format).toBe('json');
    });

    it('should ignore an unknown level and a non-positive payload size', () => {
      const settings = settingsFromEnv({ LOG_LEVEL: 'LOUD', LOG_MAX_PAYLOAD_SIZE: '-5' });
      expect(settings.level).toBe(LogLevel.INFO);
      expect(settings.maxValueLength).toBe(8192);
    });
  });
});
