import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags each level with the scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('SnakePage');

    logger.log('Component mounted');
    logger.warn('slow frame', 42);
    logger.error('Frame failed');

    expect(log).toHaveBeenCalledWith('[SnakePage]', 'Component mounted');
    expect(warn).toHaveBeenCalledWith('[SnakePage]', 'slow frame', 42);
    expect(error).toHaveBeenCalledWith('[SnakePage]', 'Frame failed');
  });
});
