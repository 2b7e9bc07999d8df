// ─────────────────────────────────────────────
//  Craft Action — run one recipe batch
// ─────────────────────────────────────────────

import type { RecipeId } from '@/engine/data/types/Production';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { CraftingSystem } from '@/engine/systems/production/CraftingSystem';

export class CraftAction implements SettlementAction {
  readonly type = 'CRAFT';

  constructor(private readonly recipe: RecipeId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return CraftingSystem.craft(state, ctx, this.recipe);
  }
}
