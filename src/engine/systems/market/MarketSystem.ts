// ─────────────────────────────────────────────
//  Market System — dynamic pricing + trade execution
//  price = base × saturation × event × trend × noise, floored,
//  then smoothed against the rolling history.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import { CURRENCY, type ResourceId } from '@/engine/data/types/Resource';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import type { RandomSource } from '@/engine/utils/SeededRandom';
import { MathUtils } from '@/engine/utils/MathUtils';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EventCalendar } from '../calendar/EventCalendar';

export type SaturationLabel = 'glut' | 'shortage' | 'stable';

export interface PriceQuote {
  /** State with the new sample recorded in the price history */
  state: SettlementState;
  price: number;
}

function effectiveCapacity(state: SettlementState, catalog: Catalog, resource: ResourceId): number {
  const capacity = ResourceLedger.capacity(state, catalog);
  const scaled = resource === CURRENCY ? capacity * catalog.market.currencyCapacityFactor : capacity;
  return Math.max(1, scaled);
}

export const MarketSystem = {
  saturation(state: SettlementState, catalog: Catalog, resource: ResourceId): number {
    return ResourceLedger.stockOf(state, resource) / effectiveCapacity(state, catalog, resource);
  },

  /** First matching rule wins; nothing matching means 1.0. */
  saturationModifier(ratio: number, catalog: Catalog): number {
    for (const rule of catalog.market.saturation) {
      if (rule.above !== undefined && ratio > rule.above) return rule.modifier;
      if (rule.below !== undefined && ratio < rule.below) return rule.modifier;
    }
    return 1;
  },

  saturationLabel(state: SettlementState, catalog: Catalog, resource: ResourceId): SaturationLabel {
    const capacity = ResourceLedger.capacity(state, catalog) || 1;
    const ratio = ResourceLedger.stockOf(state, resource) / capacity;
    const { glutAbove, shortageBelow } = catalog.market.labels;
    if (ratio > glutAbove) return 'glut';
    if (ratio < shortageBelow) return 'shortage';
    return 'stable';
  },

  /** Price one unit now. Every quote is recorded, so quoting changes state. */
  quote(state: SettlementState, catalog: Catalog, rng: RandomSource, resource: ResourceId): PriceQuote {
    const rules = catalog.market;
    const base = catalog.basePrices[resource] ?? 1;
    const modifier =
      MarketSystem.saturationModifier(MarketSystem.saturation(state, catalog, resource), catalog)
      * EventCalendar.marketModifier(state, catalog)
      * state.market.trend;
    const noise = 1 + rng.nextFloat(-rules.noise, rules.noise);
    const instant = Math.max(rules.priceFloor, base * modifier * noise);

    const history = [...(state.market.priceHistory[resource] ?? []), instant].slice(-rules.historyWindow);
    const next = produce(state, draft => {
      draft.market.priceHistory[resource] = history;
    });
    return { state: next, price: (instant + MathUtils.mean(history)) / 2 };
  },

  /**
   * Buy or sell `amount` at the quoted price × `priceFactor`.
   * Atomic on stocks. A rejected trade still reports its price sample
   * through `observed`.
   */
  trade(
    state: SettlementState,
    ctx: EngineContext,
    resource: ResourceId,
    amount: number,
    isBuying: boolean,
    priceFactor = 1,
  ): ActionResult {
    if (!Number.isFinite(amount) || amount <= 0) return fail({ kind: 'invalid_quantity', amount });
    if (resource === CURRENCY) return fail({ kind: 'invalid_reference', reference: { kind: 'resource', id: resource } });

    const { catalog } = ctx;
    const quoted = MarketSystem.quote(state, catalog, ctx.rng, resource);
    const total = quoted.price * priceFactor * amount;

    if (isBuying) {
      const wallet = ResourceLedger.stockOf(state, CURRENCY);
      if (wallet < total) {
        return fail(
          { kind: 'unaffordable', shortfall: [{ subject: CURRENCY, required: total, available: wallet }] },
          quoted.state,
        );
      }
      return succeed(produce(quoted.state, draft => {
        ResourceLedger.adjust(draft, catalog, CURRENCY, -total);
        ResourceLedger.adjust(draft, catalog, resource, amount);
      }), `Bought ${amount} ${resource} for ${total.toFixed(2)} ${CURRENCY}`);
    }

    const stock = ResourceLedger.stockOf(state, resource);
    if (stock < amount) {
      return fail(
        { kind: 'unaffordable', shortfall: [{ subject: resource, required: amount, available: stock }] },
        quoted.state,
      );
    }
    return succeed(produce(quoted.state, draft => {
      ResourceLedger.adjust(draft, catalog, resource, -amount);
      ResourceLedger.adjust(draft, catalog, CURRENCY, total);
    }), `Sold ${amount} ${resource} for ${total.toFixed(2)} ${CURRENCY}`);
  },
};
