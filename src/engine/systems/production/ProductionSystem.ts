// ─────────────────────────────────────────────
//  Production System — direct gathering + passive building output
// ─────────────────────────────────────────────

import { produce, type Draft } from 'immer';
import { BUILDING_IDS } from '@/engine/data/types/Building';
import { entriesOf } from '@/engine/data/types/Resource';
import type { MiningActionId } from '@/engine/data/types/Production';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { MathUtils } from '@/engine/utils/MathUtils';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EcosystemSystem } from '../ecosystem/EcosystemSystem';
import { EventCalendar } from '../calendar/EventCalendar';
import { RelationshipSystem } from '../relationship/RelationshipSystem';

export const ProductionSystem = {
  currentMultiplier(state: SettlementState, catalog: Catalog): number {
    return catalog.multiplierSteps[state.multiplierMode] ?? 1;
  },

  toggleMultiplier(state: SettlementState, catalog: Catalog): SettlementState {
    return produce(state, draft => {
      draft.multiplierMode = (draft.multiplierMode + 1) % catalog.multiplierSteps.length;
    });
  },

  happinessModifier(state: SettlementState, catalog: Catalog): number {
    const { happinessSlope, happinessRange } = catalog.production;
    const neutral = catalog.population.neutralHappiness;
    return MathUtils.clamp(1 + (state.happiness - neutral) * happinessSlope, ...happinessRange);
  },

  /** Scale applied to every base yield of a gathering action */
  miningFactor(state: SettlementState, catalog: Catalog): number {
    return ProductionSystem.currentMultiplier(state, catalog)
      * EventCalendar.hostility(state, catalog)
      * ProductionSystem.happinessModifier(state, catalog)
      * EcosystemSystem.productionModifier(state, catalog)
      * state.modifiers.miningEfficiency;
  },

  mine(state: SettlementState, ctx: EngineContext, action: MiningActionId): ActionResult {
    const { catalog } = ctx;
    const data = catalog.mining[action];
    if (!data) return fail({ kind: 'invalid_reference', reference: { kind: 'mining_action', id: action } });

    const factor = ProductionSystem.miningFactor(state, catalog);
    const gained: string[] = [];
    const next = produce(state, draft => {
      for (const [id, amt] of entriesOf(data.yields)) {
        ResourceLedger.adjust(draft, catalog, id, amt * factor);
        gained.push(`+${(amt * factor).toFixed(1)} ${id}`);
      }
      if (data.reaction) RelationshipSystem.applyReaction(draft, catalog, data.reaction);
      ProductionSystem.runBuildings(draft, catalog);
    });
    return succeed(next, `${data.name}: ${gained.join(', ')}`);
  },

  /** Per-type output = perUnit × count × ecosystem × worker bonus; food also × foodProduction. */
  runBuildings(draft: Draft<SettlementState>, catalog: Catalog): void {
    const { workerBonusPerWorker, workerBonusCap } = catalog.production;
    const eco = EcosystemSystem.productionModifier(draft, catalog);
    for (const id of BUILDING_IDS) {
      const count = draft.buildings[id] ?? 0;
      const data = catalog.buildings[id];
      if (count <= 0 || !data) continue;
      const workerBonus = 1 + workerBonusPerWorker * Math.min(draft.workers[id] ?? 0, workerBonusCap);
      for (const [res, perUnit] of entriesOf(data.output)) {
        let amount = perUnit * count * eco * workerBonus;
        if (res === 'food') amount *= draft.modifiers.foodProduction;
        ResourceLedger.adjust(draft, catalog, res, amount);
      }
    }
  },
};
