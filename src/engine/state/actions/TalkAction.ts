// ─────────────────────────────────────────────
//  Talk Action — greet a character
// ─────────────────────────────────────────────

import type { CharacterId } from '@/engine/data/types/Character';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { RelationshipSystem } from '@/engine/systems/relationship/RelationshipSystem';

export class TalkAction implements SettlementAction {
  readonly type = 'TALK';

  constructor(private readonly character: CharacterId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return RelationshipSystem.talk(state, ctx, this.character);
  }
}
