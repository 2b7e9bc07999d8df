// ─────────────────────────────────────────────
//  Effect — closed set of things an unlock can do
//  Floors never stack; scales compound.
// ─────────────────────────────────────────────

import type { ResourceId } from './Resource';

export type Effect =
  | { kind: 'food_production_floor'; value: number }
  | { kind: 'mining_efficiency_floor'; value: number }
  | { kind: 'craft_speed_floor'; value: number }
  | { kind: 'research_bonus_floor'; value: number }
  | { kind: 'craft_speed_scale'; factor: number }
  | { kind: 'industry_penalty_scale'; factor: number }
  | { kind: 'market_trend_scale'; factor: number }
  | { kind: 'happiness_bonus'; amount: number }
  | { kind: 'resource_grant'; resource: ResourceId; amount: number }
  | { kind: 'biome_restore'; amount: number };

export type EffectKind = Effect['kind'];

/** Floating multipliers the effects act on */
export interface Modifiers {
  craftSpeed: number;
  researchBonus: number;
  foodProduction: number;
  miningEfficiency: number;
  ecoIndustryPenalty: number;
}
