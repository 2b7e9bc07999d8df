// ─────────────────────────────────────────────
//  Crafting System — multi-input → multi-output recipes
//  Check everything, then debit, then credit. Never a partial craft.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import { RECIPE_IDS, type RecipeId } from '@/engine/data/types/Production';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EventCalendar } from '../calendar/EventCalendar';
import { TechnologySystem } from '../progression/TechnologySystem';
import { ProductionSystem } from './ProductionSystem';

export const CraftingSystem = {
  /** Scale on both inputs and outputs */
  batchFactor(state: SettlementState, catalog: Catalog): number {
    return ProductionSystem.currentMultiplier(state, catalog)
      * EventCalendar.hostility(state, catalog)
      * state.modifiers.craftSpeed;
  },

  /** Recipes whose unlock gate is open */
  available(state: SettlementState, catalog: Catalog): RecipeId[] {
    return RECIPE_IDS.filter(id => {
      const recipe = catalog.recipes[id];
      return recipe !== undefined
        && (!recipe.requires || TechnologySystem.isUnlocked(state, recipe.requires));
    });
  },

  craft(state: SettlementState, ctx: EngineContext, recipe: RecipeId): ActionResult {
    const { catalog } = ctx;
    const data = catalog.recipes[recipe];
    if (!data) return fail({ kind: 'invalid_reference', reference: { kind: 'recipe', id: recipe } });
    if (data.requires && !TechnologySystem.isUnlocked(state, data.requires)) {
      return fail({ kind: 'prerequisite_unmet', requirement: data.requires });
    }

    const factor = CraftingSystem.batchFactor(state, catalog);
    const inputs = ResourceLedger.scale(data.inputs, factor);
    const research = (data.research ?? 0) * factor;
    const shortfall = ResourceLedger.shortfall(state, { resources: inputs, research });
    if (shortfall.length > 0) return fail({ kind: 'unaffordable', shortfall });

    return succeed(produce(state, draft => {
      ResourceLedger.debit(draft, catalog, inputs);
      draft.researchProgress -= research;
      ResourceLedger.credit(draft, catalog, ResourceLedger.scale(data.outputs, factor));
    }), `Crafted ${data.name} ×${factor.toFixed(2)}`);
  },
};
