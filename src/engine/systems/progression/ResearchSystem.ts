// ─────────────────────────────────────────────
//  Research System — turning stock into research points
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { ResourceId } from '@/engine/data/types/Resource';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';

export const ResearchSystem = {
  /** Study the whole stock of one resource. The stock is consumed. */
  study(state: SettlementState, ctx: EngineContext, resource: ResourceId): ActionResult {
    const stock = ResourceLedger.stockOf(state, resource);
    if (stock <= 0) return fail({ kind: 'invalid_quantity', amount: stock });

    const rules = ctx.catalog.research;
    const gained = stock * rules.studyRate * state.modifiers.researchBonus;
    const next = produce(state, draft => {
      draft.resources[resource] = 0;
      draft.researchProgress += gained;
      if (draft.researchProgress >= rules.completeAt && !draft.researchComplete) {
        draft.researchComplete = true;
        Logger.log('Research complete!', 'research');
      }
    });
    return succeed(next, `Studied ${resource}: +${gained.toFixed(2)} research`);
  },
};
