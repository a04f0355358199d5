import { afterEach, describe, test, expect, jest } from '@jest/globals';
import { logger } from '../src/index.js';

describe('logger', () => {
  const savedLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (savedLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = savedLevel;
  });

  test('is silent under the test runner', () => {
    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('debug')).toBe(false);
  });

  test('importing with an unknown LOG_LEVEL does not throw', () => {
    process.env.LOG_LEVEL = 'warning';
    jest.isolateModules(() => {
      const mod: typeof import('../src/index.js') = require('../src/index.js');
      expect(mod.logger.level).toBe('silent');
      expect(mod.parseInt32('5')).toBe(5);
    });
  });
});
