import { describe, expect, it } from 'vitest';
import { SERVICE_NAME, componentLogger, formatConsoleLine, logger } from '../src/utils/logger.js';

describe('logger', () => {
  it('should tag every entry with the service name', () => {
    expect(logger.defaultMeta).toEqual({ service: SERVICE_NAME });
  });

  it('should put the component in the console prefix and the rest in the meta', () => {
    expect(
      formatConsoleLine({
        timestamp: '2026-03-01 08:30:00',
        level: 'info',
        message: 'GET /api/daily-tip 200',
        service: SERVICE_NAME,
        component: 'http',
        durationMs: 4,
      })
    ).toBe('2026-03-01 08:30:00 [info] http: GET /api/daily-tip 200 {"durationMs":4}');
  });

  it('should leave out the tag and meta when there are none', () => {
    expect(formatConsoleLine({ level: 'warn', message: 'Reference file not found', service: SERVICE_NAME })).toBe(
      '[warn]: Reference file not found'
    );
  });

  it('should build child loggers for components', () => {
    expect(typeof componentLogger('reference-data').info).toBe('function');
  });
});
