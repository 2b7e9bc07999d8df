// ─────────────────────────────────────────────
//  Legacy Types — achievements, victory, final titles
// ─────────────────────────────────────────────

import type { ResourceId } from './Resource';
import type { Effect } from './Effect';

export const ACHIEVEMENT_IDS = [
  'first_settlement', 'master_crafter', 'ecological_balance', 'tech_pioneer',
] as const;
export type AchievementId = typeof ACHIEVEMENT_IDS[number];

export const VICTORY_TYPES = ['technological', 'economic', 'ecological', 'cultural'] as const;
export type VictoryType = typeof VICTORY_TYPES[number];

export type AchievementCondition =
  | { kind: 'building_count'; atLeast: number }
  | { kind: 'resource'; resource: ResourceId; atLeast: number }
  | { kind: 'ecosystem_health'; atLeast: number }
  | { kind: 'research'; atLeast: number };

export interface AchievementData {
  name: string;
  condition: AchievementCondition;
  reward: Effect;
}

export interface VictoryThresholds {
  research: number;
  /** Non-currency stock total must exceed this */
  wealth: number;
  /** Ecosystem health must exceed this */
  ecology: number;
  secrets: number;
}

export interface TitleStep {
  atLeast: number;
  title: string;
}

export interface LegacyRules {
  economicStockWeight: number;
  economicCurrencyWeight: number;
  culturalPerAchievement: number;
  crossBonus: { ecologyAbove: number; economic: number; cultural: number };
  titles: Record<VictoryType, TitleStep[]>;
  defaultTitle: string;
}

export interface LegacyResult {
  category: VictoryType;
  title: string;
  score: number;
  scores: Record<VictoryType, number>;
}
