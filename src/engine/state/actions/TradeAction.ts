// ─────────────────────────────────────────────
//  Trade Action — buy or sell on the open market
// ─────────────────────────────────────────────

import type { ResourceId } from '@/engine/data/types/Resource';
import type { SettlementAction, EngineContext, ActionResult } from '../SettlementAction';
import type { SettlementState } from '../SettlementState';
import { MarketSystem } from '@/engine/systems/market/MarketSystem';

export type TradeSide = 'buy' | 'sell';

export class TradeAction implements SettlementAction {
  readonly type = 'TRADE';

  constructor(
    private readonly side: TradeSide,
    private readonly resource: ResourceId,
    private readonly amount: number,
  ) {}

  execute(state: SettlementState, ctx: EngineContext): ActionResult {
    return MarketSystem.trade(state, ctx, this.resource, this.amount, this.side === 'buy');
  }
}
