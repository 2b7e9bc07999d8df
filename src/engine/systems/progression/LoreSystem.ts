// ─────────────────────────────────────────────
//  Lore System — ancient secrets
//  Same cost / one-shot pattern as technologies, no prerequisite edges.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import { SECRET_IDS, type SecretId, type UnlockStatus } from '@/engine/data/types/Progression';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EffectSystem } from './EffectSystem';

export const LoreSystem = {
  status(state: SettlementState, catalog: Catalog, id: SecretId): UnlockStatus {
    if (state.discoveredSecrets.includes(id)) return 'unlocked';
    const data = catalog.secrets[id];
    return data && ResourceLedger.affordable(state, data.cost) ? 'available' : 'locked';
  },

  /** Secrets not yet discovered, in catalog order */
  undiscovered(state: SettlementState): SecretId[] {
    return SECRET_IDS.filter(id => !state.discoveredSecrets.includes(id));
  },

  discover(state: SettlementState, ctx: EngineContext, id: SecretId): ActionResult {
    const { catalog } = ctx;
    const data = catalog.secrets[id];
    if (!data) return fail({ kind: 'invalid_reference', reference: { kind: 'secret', id } });
    if (state.discoveredSecrets.includes(id)) return succeed(state, `${data.name} is already discovered`);

    const shortfall = ResourceLedger.shortfall(state, data.cost);
    if (shortfall.length > 0) return fail({ kind: 'unaffordable', shortfall });

    Logger.log(`Secret discovered: ${data.name} (${EffectSystem.describe(data.effect)})`, 'research');
    return succeed(produce(state, draft => {
      ResourceLedger.debit(draft, catalog, data.cost.resources);
      draft.discoveredSecrets.push(id);
      EffectSystem.apply(draft, catalog, data.effect);
    }), `Discovered ${data.name}`);
  },
};
