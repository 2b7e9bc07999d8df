// ─────────────────────────────────────────────
//  Construction System — raising buildings and storage
//  Building cost grows with each unit already built; storage is flat.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { StructureId } from '@/engine/data/types/Building';
import type { ResourceAmounts } from '@/engine/data/types/Resource';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { RelationshipSystem } from '../relationship/RelationshipSystem';

export const ConstructionSystem = {
  /** Current price of the next unit, or null for an unknown structure */
  costOf(state: SettlementState, catalog: Catalog, structure: StructureId): ResourceAmounts | null {
    if (structure === 'store') return catalog.storage.cost;
    const data = catalog.buildings[structure];
    if (!data) return null;
    const count = state.buildings[structure] ?? 0;
    return ResourceLedger.scale(data.cost, 1 + count * catalog.production.buildCostGrowth);
  },

  build(state: SettlementState, ctx: EngineContext, structure: StructureId): ActionResult {
    const { catalog } = ctx;
    const cost = ConstructionSystem.costOf(state, catalog, structure);
    if (!cost) return fail({ kind: 'invalid_reference', reference: { kind: 'building', id: structure } });

    const shortfall = ResourceLedger.shortfall(state, { resources: cost });
    if (shortfall.length > 0) return fail({ kind: 'unaffordable', shortfall });

    if (structure === 'store') {
      Logger.log(`${catalog.storage.name} built`, 'economy');
      return succeed(produce(state, draft => {
        ResourceLedger.debit(draft, catalog, cost);
        draft.storageUnits += 1;
      }), `Built ${catalog.storage.name}`);
    }

    const data = catalog.buildings[structure];
    const name = data?.name ?? structure;
    Logger.log(`${name} built`, 'economy');
    return succeed(produce(state, draft => {
      ResourceLedger.debit(draft, catalog, cost);
      draft.buildings[structure] = (draft.buildings[structure] ?? 0) + 1;
      if (data?.reaction) RelationshipSystem.applyReaction(draft, catalog, data.reaction);
    }), `Built ${name}`);
  },
};
