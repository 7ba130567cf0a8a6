/**
 * @module logging/logger.test
 * @description Unit tests for the console logger level filter
 * @status COMPLETE
 * @dependencies src/logging/logger.ts
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { createConsoleLogger } from './logger';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the minimum level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createConsoleLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[warn] shown');
  });

  it('routes errors to console.error with their context', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger('debug');

    logger.error('analyzer failed', { analyzer: 'n-plus-one' });

    expect(error).toHaveBeenCalledWith('[error] analyzer failed', { analyzer: 'n-plus-one' });
  });
});
