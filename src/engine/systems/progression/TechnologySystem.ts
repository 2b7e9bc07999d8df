// ─────────────────────────────────────────────
//  Technology System — prerequisite graph + one-shot research
//  Locked → Available → Unlocked. Only Unlocked is stored.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import {
  TECHNOLOGY_IDS,
  type TechnologyEntry, type TechnologyId, type UnlockRef, type UnlockStatus,
} from '@/engine/data/types/Progression';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { RelationshipSystem } from '../relationship/RelationshipSystem';
import { EffectSystem } from './EffectSystem';

export const TechnologySystem = {
  isUnlocked(state: SettlementState, ref: UnlockRef): boolean {
    return ref.kind === 'technology'
      ? state.researchedTechnologies.includes(ref.id)
      : state.discoveredSecrets.includes(ref.id);
  },

  missingPrerequisites(state: SettlementState, catalog: Catalog, id: TechnologyId): TechnologyId[] {
    const requires = catalog.technologies[id]?.requires ?? [];
    return requires.filter(req => !state.researchedTechnologies.includes(req));
  },

  status(state: SettlementState, catalog: Catalog, id: TechnologyId): UnlockStatus {
    if (state.researchedTechnologies.includes(id)) return 'unlocked';
    const data = catalog.technologies[id];
    if (!data) return 'locked';
    const ready = TechnologySystem.missingPrerequisites(state, catalog, id).length === 0
      && ResourceLedger.affordable(state, data.cost);
    return ready ? 'available' : 'locked';
  },

  board(state: SettlementState, catalog: Catalog): TechnologyEntry[] {
    const entries: TechnologyEntry[] = [];
    for (const id of TECHNOLOGY_IDS) {
      const data = catalog.technologies[id];
      if (!data) continue;
      entries.push({
        id,
        name: data.name,
        status: TechnologySystem.status(state, catalog, id),
        requires: data.requires,
        cost: data.cost,
      });
    }
    return entries;
  },

  /**
   * Research a technology. Resource costs are debited; the research
   * threshold is only checked. A second call is a no-op.
   */
  research(state: SettlementState, ctx: EngineContext, id: TechnologyId): ActionResult {
    const { catalog } = ctx;
    const data = catalog.technologies[id];
    if (!data) return fail({ kind: 'invalid_reference', reference: { kind: 'technology', id } });
    if (state.researchedTechnologies.includes(id)) return succeed(state, `${data.name} is already researched`);

    const missing = TechnologySystem.missingPrerequisites(state, catalog, id)[0];
    if (missing !== undefined) {
      return fail({ kind: 'prerequisite_unmet', requirement: { kind: 'technology', id: missing } });
    }
    const shortfall = ResourceLedger.shortfall(state, data.cost);
    if (shortfall.length > 0) return fail({ kind: 'unaffordable', shortfall });

    Logger.log(`Technology researched: ${data.name}`, 'research');
    return succeed(produce(state, draft => {
      ResourceLedger.debit(draft, catalog, data.cost.resources);
      draft.researchedTechnologies.push(id);
      for (const effect of data.effects) EffectSystem.apply(draft, catalog, effect);
      if (data.reaction) RelationshipSystem.applyReaction(draft, catalog, data.reaction);
    }), `Researched ${data.name}`);
  },
};
