// ─────────────────────────────────────────────
//  Resource Ledger — stock accounting under the storage cap
//  The currency is uncapped; everything else lives in [0, capacity].
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import {
  CURRENCY, entriesOf,
  type Cost, type ResourceAmounts, type ResourceId, type Shortfall,
} from '@/engine/data/types/Resource';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';

export const ResourceLedger = {
  capacity(state: SettlementState, catalog: Catalog): number {
    return catalog.storage.baseCapacity + catalog.storage.perUnit * state.storageUnits;
  },

  stockOf(state: SettlementState, resource: ResourceId): number {
    return state.resources[resource] ?? 0;
  },

  /**
   * Apply a signed delta. Non-currency stock is clamped into
   * [0, capacity]; callers check affordability before debiting.
   */
  adjust(draft: Draft<SettlementState>, catalog: Catalog, resource: ResourceId, delta: number): void {
    const current = draft.resources[resource] ?? 0;
    if (resource === CURRENCY) {
      draft.resources[resource] = current + delta;
      return;
    }
    draft.resources[resource] = delta >= 0
      ? Math.min(ResourceLedger.capacity(draft, catalog), current + delta)
      : Math.max(0, current + delta);
  },

  credit(draft: Draft<SettlementState>, catalog: Catalog, amounts: ResourceAmounts): void {
    for (const [id, amt] of entriesOf(amounts)) ResourceLedger.adjust(draft, catalog, id, amt);
  },

  debit(draft: Draft<SettlementState>, catalog: Catalog, amounts: ResourceAmounts): void {
    for (const [id, amt] of entriesOf(amounts)) ResourceLedger.adjust(draft, catalog, id, -amt);
  },

  /** Everything missing to pay `cost`; empty when affordable. */
  shortfall(state: SettlementState, cost: Cost): Shortfall[] {
    const missing: Shortfall[] = [];
    for (const [id, required] of entriesOf(cost.resources)) {
      const available = ResourceLedger.stockOf(state, id);
      if (available < required) missing.push({ subject: id, required, available });
    }
    const research = cost.research ?? 0;
    if (state.researchProgress < research) {
      missing.push({ subject: 'research', required: research, available: state.researchProgress });
    }
    return missing;
  },

  affordable(state: SettlementState, cost: Cost): boolean {
    return ResourceLedger.shortfall(state, cost).length === 0;
  },

  scale(amounts: ResourceAmounts, factor: number): ResourceAmounts {
    const out: ResourceAmounts = {};
    for (const [id, amt] of entriesOf(amounts)) out[id] = amt * factor;
    return out;
  },

  /** Total of every stock except the currency */
  wealth(state: SettlementState): number {
    let total = 0;
    for (const [id, amt] of entriesOf(state.resources)) {
      if (id !== CURRENCY) total += amt;
    }
    return total;
  },
};
