/**
 * Logger Utility Tests
 */

import { calendarLogger, createLogger, isLogLevel, logger, setLogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  const initialLevel = logger.level;

  afterEach(() => {
    if (isLogLevel(initialLevel)) {
      setLogLevel(initialLevel);
    }
  });

  it('should validate level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('should tag child loggers with their component', () => {
    expect(createLogger('test-component').bindings()).toEqual({ component: 'test-component' });
  });

  it('should apply setLogLevel to the root and existing component loggers', () => {
    const child = createLogger('level-test');

    setLogLevel('error');

    expect(logger.level).toBe('error');
    expect(child.level).toBe('error');
    expect(calendarLogger.level).toBe('error');
  });
});
