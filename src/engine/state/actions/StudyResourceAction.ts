// ─────────────────────────────────────────────
//  Study Resource Action — convert a stock into research
// ─────────────────────────────────────────────

import type { ResourceId } from '@/engine/data/types/Resource';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { ResearchSystem } from '@/engine/systems/progression/ResearchSystem';

export class StudyResourceAction implements SettlementAction {
  readonly type = 'STUDY_RESOURCE';

  constructor(private readonly resource: ResourceId) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return ResearchSystem.study(state, ctx, this.resource);
  }
}
