/**
 * Tests for logger helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { scopedLogger, type Logger } from '../logger.js';

describe('scopedLogger', () => {
  it('prefixes messages with the scope', () => {
    const base: Logger = { warn: vi.fn(), debug: vi.fn() };
    const logger = scopedLogger(base, 'search');

    logger.warn('brave failed');
    logger.debug?.('trying tavily');

    expect(base.warn).toHaveBeenCalledWith('[search] brave failed');
    expect(base.debug).toHaveBeenCalledWith('[search] trying tavily');
  });

  it('leaves optional levels undefined when the base lacks them', () => {
    const logger = scopedLogger({ warn: vi.fn() }, 'x');

    expect(logger.info).toBeUndefined();
    expect(logger.debug).toBeUndefined();
  });
});
