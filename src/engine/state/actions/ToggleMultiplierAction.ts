// ─────────────────────────────────────────────
//  Toggle Multiplier Action — cycle ×1 → ×10 → ×100 → ×1
// ─────────────────────────────────────────────

import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import { succeed } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { ProductionSystem } from '@/engine/systems/production/ProductionSystem';

export class ToggleMultiplierAction implements SettlementAction {
  readonly type = 'TOGGLE_MULTIPLIER';

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    const next = ProductionSystem.toggleMultiplier(state, ctx.catalog);
    return succeed(next, `Multiplier: ×${ProductionSystem.currentMultiplier(next, ctx.catalog)}`);
  }
}
