/**
 * Tests for unified singleton reset utility
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resetAll } from '../reset.js';
import { resetDatabase, closeDb } from '../../database/index.js';
import { _clearEnvCache } from '../../config/env.js';

vi.mock('../../database/index.js', () => ({
  resetDatabase: vi.fn(),
  closeDb: vi.fn(),
}));

vi.mock('../../config/env.js', () => ({
  _clearEnvCache: vi.fn(),
}));

describe('resetAll', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('calls all reset functions', () => {
    resetAll();

    expect(resetDatabase).toHaveBeenCalledTimes(1);
    expect(closeDb).toHaveBeenCalledTimes(1);
    expect(_clearEnvCache).toHaveBeenCalledTimes(1);
  });

  it('resets the operations singleton before closing the connection', () => {
    const callOrder: string[] = [];

    vi.mocked(resetDatabase).mockImplementation(() => {
      callOrder.push('database');
    });
    vi.mocked(closeDb).mockImplementation(() => {
      callOrder.push('closeDb');
    });
    vi.mocked(_clearEnvCache).mockImplementation(() => {
      callOrder.push('env');
    });

    resetAll();

    expect(callOrder).toEqual(['database', 'closeDb', 'env']);
  });

  it('can be called multiple times safely', () => {
    resetAll();
    resetAll();

    expect(resetDatabase).toHaveBeenCalledTimes(2);
    expect(closeDb).toHaveBeenCalledTimes(2);
  });
});
