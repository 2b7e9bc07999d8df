// ─────────────────────────────────────────────
//  Discover Secret Action
// ─────────────────────────────────────────────

import type { SecretId } from '@/engine/data/types/Progression';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { LoreSystem } from '@/engine/systems/progression/LoreSystem';

export class DiscoverSecretAction implements SettlementAction {
  readonly type = 'DISCOVER_SECRET';

  constructor(private readonly secret: SecretId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return LoreSystem.discover(state, ctx, this.secret);
  }
}
