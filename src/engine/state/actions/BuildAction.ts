// ─────────────────────────────────────────────
//  Build Action — one building or storage unit
// ─────────────────────────────────────────────

import type { StructureId } from '@/engine/data/types/Building';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { ConstructionSystem } from '@/engine/systems/production/ConstructionSystem';

export class BuildAction implements SettlementAction {
  readonly type = 'BUILD';

  constructor(private readonly structure: StructureId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return ConstructionSystem.build(state, ctx, this.structure);
  }
}
