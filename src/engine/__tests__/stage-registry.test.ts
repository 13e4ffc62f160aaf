/**
 * Stage registry tests
 */

import { describe, it, expect } from 'vitest';
import { getStage, STAGE_REGISTRY } from '../stage-registry.js';
import { STAGE_HANDLERS } from '../stages.js';
import { ENGINE_STATES, isActiveState } from '../types.js';

describe('STAGE_REGISTRY', () => {
  it('describes every engine state once, in state order', () => {
    expect(STAGE_REGISTRY.map((stage) => stage.state)).toEqual([...ENGINE_STATES]);
  });

  it('has a handler for every active state', () => {
    const active = ENGINE_STATES.filter(isActiveState);
    expect(Object.keys(STAGE_HANDLERS).sort()).toEqual([...active].sort());
  });

  it('only hands over to known states', () => {
    for (const stage of STAGE_REGISTRY) {
      for (const next of stage.next) {
        expect(getStage(next)).toBeDefined();
      }
    }
  });

  it('terminal states hand over to nothing', () => {
    expect(getStage('done')?.next).toEqual([]);
    expect(getStage('reflect')?.next).toEqual(['research_fan_out', 'finalize']);
  });
});
