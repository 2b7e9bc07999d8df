import { describe, it, expect } from 'vitest';
import { produce } from 'immer';
import { WorkerSystem } from '@/engine/systems/production/WorkerSystem';
import type { SettlementState } from '@/engine/state/SettlementState';
import { expectError, expectOk, makeState } from '../integration/helpers';

function balanced(state: SettlementState): boolean {
  return state.idleWorkers + WorkerSystem.assigned(state) === state.population;
}

describe('WorkerSystem', () => {
  const withSawmill = makeState(s => { s.buildings.les = 1; s.buildings.kam = 1; });

  it('assigns idle workers and frees them again', () => {
    const three = expectOk(WorkerSystem.assign(withSawmill, 'les', 3));
    expect(three.workers.les).toBe(3);
    expect(three.idleWorkers).toBe(5);
    const one = expectOk(WorkerSystem.assign(three, 'les', 1));
    expect(one.idleWorkers).toBe(7);
    expect(balanced(one)).toBe(true);
  });

  it('requires the building to exist', () => {
    expect(expectError(WorkerSystem.assign(makeState(), 'les', 1))).toEqual({
      kind: 'invalid_reference',
      reference: { kind: 'building', id: 'les' },
    });
  });

  it('rejects negative and fractional counts', () => {
    expect(expectError(WorkerSystem.assign(withSawmill, 'les', -1)).kind).toBe('invalid_quantity');
    expect(expectError(WorkerSystem.assign(withSawmill, 'les', 1.5)).kind).toBe('invalid_quantity');
  });

  it('cannot assign more than are idle', () => {
    expect(expectError(WorkerSystem.assign(withSawmill, 'les', 9))).toEqual({
      kind: 'unaffordable',
      shortfall: [{ subject: 'workers', required: 9, available: 8 }],
    });
  });

  it('removes from the idle pool first', () => {
    const state = expectOk(WorkerSystem.assign(withSawmill, 'les', 6));
    const next = produce(state, d => WorkerSystem.removeInhabitant(d));
    expect(next.population).toBe(7);
    expect(next.idleWorkers).toBe(1);
    expect(next.workers.les).toBe(6);
  });

  it('then from the most staffed building, first in catalog order on ties', () => {
    const state = makeState(s => {
      s.buildings.les = 1;
      s.buildings.kam = 1;
      s.workers.les = 4;
      s.workers.kam = 4;
      s.idleWorkers = 0;
    });
    const next = produce(state, d => WorkerSystem.removeInhabitant(d));
    expect(next.workers).toEqual({ les: 3, kam: 4 });
    expect(next.idleWorkers).toBe(0);
    expect(balanced(next)).toBe(true);
  });

  it('stays balanced through births and losses', () => {
    let state = expectOk(WorkerSystem.assign(withSawmill, 'kam', 5));
    state = produce(state, d => {
      WorkerSystem.addInhabitant(d);
      WorkerSystem.removeInhabitant(d);
      WorkerSystem.removeInhabitant(d);
      WorkerSystem.removeInhabitant(d);
      WorkerSystem.removeInhabitant(d);
    });
    expect(state.population).toBe(5);
    expect(state.idleWorkers).toBe(0);
    expect(state.workers.kam).toBe(5);
    expect(balanced(state)).toBe(true);
  });
});
