// ─────────────────────────────────────────────
//  Worker System — allocating population to buildings
//  Invariant: idleWorkers + Σ workers = population.
// ─────────────────────────────────────────────

import { produce, type Draft } from 'immer';
import { BUILDING_IDS, type BuildingId } from '@/engine/data/types/Building';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult } from '@/engine/state/SettlementAction';
import { MathUtils } from '@/engine/utils/MathUtils';

function assigned(state: SettlementState): number {
  return MathUtils.sum(BUILDING_IDS.map(id => state.workers[id]));
}

export const WorkerSystem = {
  assigned,

  idle(state: SettlementState): number {
    return state.population - assigned(state);
  },

  /** Set the number of workers in a building type to exactly `count`. */
  assign(state: SettlementState, building: BuildingId, count: number): ActionResult {
    if ((state.buildings[building] ?? 0) <= 0) {
      return fail({ kind: 'invalid_reference', reference: { kind: 'building', id: building } });
    }
    if (!Number.isInteger(count) || count < 0) return fail({ kind: 'invalid_quantity', amount: count });

    const current = state.workers[building] ?? 0;
    const needed = count - current;
    if (needed > state.idleWorkers) {
      return fail({
        kind: 'unaffordable',
        shortfall: [{ subject: 'workers', required: needed, available: state.idleWorkers }],
      });
    }

    return succeed(produce(state, draft => {
      draft.workers[building] = count;
      draft.idleWorkers = WorkerSystem.idle(draft);
    }), `${count} workers at ${building}`);
  },

  /** One inhabitant leaves: idle first, else the most staffed building (catalog order on ties). */
  removeInhabitant(draft: Draft<SettlementState>): void {
    if (draft.population <= 0) return;
    if (draft.idleWorkers <= 0) {
      let target: BuildingId | null = null;
      for (const id of BUILDING_IDS) {
        const n = draft.workers[id] ?? 0;
        if (n > 0 && (target === null || n > (draft.workers[target] ?? 0))) target = id;
      }
      if (target !== null) draft.workers[target] = (draft.workers[target] ?? 0) - 1;
    }
    draft.population -= 1;
    draft.idleWorkers = WorkerSystem.idle(draft);
  },

  addInhabitant(draft: Draft<SettlementState>): void {
    draft.population += 1;
    draft.idleWorkers = WorkerSystem.idle(draft);
  },
};
