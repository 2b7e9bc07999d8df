// ─────────────────────────────────────────────
//  Complete Quest Action — hand in a fulfilled quest
// ─────────────────────────────────────────────

import type { CharacterId, QuestId } from '@/engine/data/types/Character';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { RelationshipSystem } from '@/engine/systems/relationship/RelationshipSystem';

export class CompleteQuestAction implements SettlementAction {
  readonly type = 'COMPLETE_QUEST';

  constructor(
    private readonly character: CharacterId,
    private readonly quest: QuestId,
  ) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return RelationshipSystem.completeQuest(state, ctx, this.character, this.quest);
  }
}
