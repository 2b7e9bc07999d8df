// ─────────────────────────────────────────────
//  Effect System — applies unlock effects
//  Floors raise a multiplier to max(current, value) and never stack.
//  Scales multiply and do compound.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { Effect } from '@/engine/data/types/Effect';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EcosystemSystem } from '../ecosystem/EcosystemSystem';

function assertNever(effect: never): never {
  throw new Error(`Unhandled effect: ${JSON.stringify(effect)}`);
}

export const EffectSystem = {
  apply(draft: Draft<SettlementState>, catalog: Catalog, effect: Effect): void {
    const m = draft.modifiers;
    switch (effect.kind) {
      case 'food_production_floor':
        m.foodProduction = Math.max(m.foodProduction, effect.value);
        return;
      case 'mining_efficiency_floor':
        m.miningEfficiency = Math.max(m.miningEfficiency, effect.value);
        return;
      case 'craft_speed_floor':
        m.craftSpeed = Math.max(m.craftSpeed, effect.value);
        return;
      case 'research_bonus_floor':
        m.researchBonus = Math.max(m.researchBonus, effect.value);
        return;
      case 'craft_speed_scale':
        m.craftSpeed *= effect.factor;
        return;
      case 'industry_penalty_scale':
        m.ecoIndustryPenalty *= effect.factor;
        return;
      case 'market_trend_scale':
        draft.market.trend *= effect.factor;
        return;
      case 'happiness_bonus':
        draft.happiness = Math.min(100, draft.happiness + effect.amount);
        return;
      case 'resource_grant':
        ResourceLedger.adjust(draft, catalog, effect.resource, effect.amount);
        return;
      case 'biome_restore':
        EcosystemSystem.restoreBiomes(draft, effect.amount);
        return;
      default:
        assertNever(effect);
    }
  },

  describe(effect: Effect): string {
    switch (effect.kind) {
      case 'food_production_floor': return `food production ×${effect.value}`;
      case 'mining_efficiency_floor': return `mining efficiency ×${effect.value}`;
      case 'craft_speed_floor': return `craft speed ×${effect.value}`;
      case 'research_bonus_floor': return `research bonus ×${effect.value}`;
      case 'craft_speed_scale': return `craft speed scaled by ${effect.factor}`;
      case 'industry_penalty_scale': return `industrial eco load scaled by ${effect.factor}`;
      case 'market_trend_scale': return `market trend scaled by ${effect.factor}`;
      case 'happiness_bonus': return `happiness +${effect.amount}`;
      case 'resource_grant': return `+${effect.amount} ${effect.resource}`;
      case 'biome_restore': return `biomes restored by ${effect.amount}`;
      default: return assertNever(effect);
    }
  },
};
