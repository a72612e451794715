/**
 * Logger Tests
 * @evolve/session
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { childLogger, createConsoleLogger } from '../logger';
import { createTestLogger } from './fixtures';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop debug and info output unless debug is on', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createConsoleLogger();
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown', 1);

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Evolve]', 'shown', 1);
  });

  it('should write everything with debug on', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = createConsoleLogger('[App]', true);
    logger.debug('details');
    logger.error('failed');

    expect(debug).toHaveBeenCalledWith('[App]', 'details');
    expect(error).toHaveBeenCalledWith('[App]', 'failed');
  });
});

describe('childLogger', () => {
  it('should tag messages with the component', () => {
    const parent = createTestLogger();
    const child = childLogger(parent, 'RefreshCoordinator');

    child.debug('Starting refresh');
    child.warn('slow', 3);

    expect(parent.debug).toHaveBeenCalledWith('[RefreshCoordinator] Starting refresh');
    expect(parent.warn).toHaveBeenCalledWith('[RefreshCoordinator] slow', 3);
  });
});
