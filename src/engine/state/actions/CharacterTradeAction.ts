// ─────────────────────────────────────────────
//  Character Trade Action — buy from a character's offer list
// ─────────────────────────────────────────────

import type { CharacterId } from '@/engine/data/types/Character';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { RelationshipSystem } from '@/engine/systems/relationship/RelationshipSystem';

export class CharacterTradeAction implements SettlementAction {
  readonly type = 'CHARACTER_TRADE';

  constructor(
    private readonly character: CharacterId,
    private readonly offerIndex: number,
    private readonly amount: number,
  ) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return RelationshipSystem.tradeWithCharacter(state, ctx, this.character, this.offerIndex, this.amount);
  }
}
