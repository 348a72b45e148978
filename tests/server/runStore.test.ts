import { describe, expect, it } from 'vitest';
import { RunStore } from '../../server/services/runStore.js';
import { DEFAULT_SIMULATION_CONFIG } from '../../simulation/config/simulationConfig.js';
import type { SimulationReport } from '../../simulation/types/simulation.js';

function report(runId: string): SimulationReport {
  return {
    runId,
    scenario: null,
    config: DEFAULT_SIMULATION_CONFIG,
    finishedAt: 10,
    stoppedEarly: false,
    flows: [],
    classes: [],
    droppedPayloads: 0,
    assigned: {},
    payloads: [],
    inconsistencies: []
  };
}

describe('RunStore', () => {
  it('evicts the oldest run past its limit', () => {
    const store = new RunStore(2);
    store.save(report('a'));
    store.save(report('b'));
    store.save(report('c'));

    expect(store.size).toBe(2);
    expect(store.get('a')).toBeUndefined();
    expect(store.list().map((summary) => summary.runId)).toEqual(['b', 'c']);
    expect(store.latest()?.runId).toBe('c');
  });

  it('moves a re-saved run to the newest position', () => {
    const store = new RunStore(2);
    store.save(report('a'));
    store.save(report('b'));
    store.save(report('a'));
    store.save(report('c'));

    expect(store.list().map((summary) => summary.runId)).toEqual(['a', 'c']);
  });

  it('returns nothing when empty', () => {
    expect(new RunStore(1).latest()).toBeUndefined();
  });

  it('rejects a non-positive limit', () => {
    expect(() => new RunStore(0)).toThrow('Run history limit must be a positive integer, got 0');
  });
});
