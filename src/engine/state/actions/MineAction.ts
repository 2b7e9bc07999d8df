// ─────────────────────────────────────────────
//  Mine Action — gather by hand, then run the buildings
// ─────────────────────────────────────────────

import type { MiningActionId } from '@/engine/data/types/Production';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { ProductionSystem } from '@/engine/systems/production/ProductionSystem';

export class MineAction implements SettlementAction {
  readonly type = 'MINE';

  constructor(private readonly action: MiningActionId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return ProductionSystem.mine(state, ctx, this.action);
  }
}
