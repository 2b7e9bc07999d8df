// ─────────────────────────────────────────────
//  Research Technology Action
// ─────────────────────────────────────────────

import type { TechnologyId } from '@/engine/data/types/Progression';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { TechnologySystem } from '@/engine/systems/progression/TechnologySystem';

export class ResearchTechnologyAction implements SettlementAction {
  readonly type = 'RESEARCH_TECHNOLOGY';

  constructor(private readonly technology: TechnologyId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return TechnologySystem.research(state, ctx, this.technology);
  }
}
