// ─────────────────────────────────────────────
//  Assign Workers Action — set the staff of a building type
// ─────────────────────────────────────────────

import type { BuildingId } from '@/engine/data/types/Building';
import type { SettlementAction, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { WorkerSystem } from '@/engine/systems/production/WorkerSystem';

export class AssignWorkersAction implements SettlementAction {
  readonly type = 'ASSIGN_WORKERS';

  constructor(
    private readonly building: BuildingId,
    private readonly count: number,
  ) {}

  execute(state: SettlementState): ActionResult {
    return WorkerSystem.assign(state, this.building, this.count);
  }
}
