// ─────────────────────────────────────────────
//  Catalog — static game data, loaded once from JSON
//  Registries are keyed by the id unions; the loader
//  rejects unknown ids and missing entries.
// ─────────────────────────────────────────────

import type { ResourceAmounts } from './Resource';
import type { BuildingId, BuildingData, StorageData } from './Building';
import type { BiomeHealth, HealthTier } from './Ecosystem';
import type { MiningActionId, MiningActionData, RecipeId, RecipeData } from './Production';
import type { TechnologyId, TechnologyData, SecretId, SecretData } from './Progression';
import type {
  CharacterId, CharacterData, CharacterActionId, ActionImpact,
  TraitRule, Greeting, QuestId, QuestData,
} from './Character';
import type { AchievementId, AchievementData, VictoryThresholds, LegacyRules } from './Legacy';
import type { CalendarRules, RandomEventData } from './Calendar';
import type { Difficulty, DifficultyProfile } from './Config';

export interface TierRule {
  atLeast: number;
  tier: HealthTier;
  modifier: number;
}

export interface EcosystemRules {
  initialBiomes: BiomeHealth;
  regeneration: number;
  /** Biomes at or above this value do not regenerate */
  regenerationCeiling: number;
  workerLoad: { base: number; perWorker: number; workerCap: number };
  pollutionPerBuilding: number;
  biodiversityPollutionWeight: number;
  /** Descending by `atLeast`; the last entry is the fallback */
  tiers: TierRule[];
}

export interface SaturationRule {
  above?: number;
  below?: number;
  modifier: number;
}

export interface MarketRules {
  historyWindow: number;
  noise: number;
  priceFloor: number;
  currencyCapacityFactor: number;
  /** Evaluated in order; first match wins, else 1.0 */
  saturation: SaturationRule[];
  /** Thresholds for the read-only glut/shortage label (raw capacity, no currency factor) */
  labels: { glutAbove: number; shortageBelow: number };
}

export interface PopulationRules {
  neutralHappiness: number;
  fedHappinessStep: number;
  starvationPenalty: number;
  deficitWeight: number;
  starvationChance: number;
  birthThreshold: number;
  birthChance: number;
}

export interface ProductionRules {
  workerBonusPerWorker: number;
  workerBonusCap: number;
  happinessSlope: number;
  happinessRange: [number, number];
  buildCostGrowth: number;
}

export interface ResearchRules {
  studyRate: number;
  completeAt: number;
}

export interface RelationshipRules {
  tradeThreshold: number;
  loyalDiscountAt: number;
  loyalDiscount: number;
  tradeBonus: number;
  talkBonus: number;
  talkCeiling: number;
}

export interface Catalog {
  basePrices: ResourceAmounts;
  startingStock: ResourceAmounts;
  storage: StorageData;
  multiplierSteps: number[];
  buildings: Partial<Record<BuildingId, BuildingData>>;
  mining: Partial<Record<MiningActionId, MiningActionData>>;
  recipes: Partial<Record<RecipeId, RecipeData>>;
  technologies: Partial<Record<TechnologyId, TechnologyData>>;
  secrets: Partial<Record<SecretId, SecretData>>;
  characters: Partial<Record<CharacterId, CharacterData>>;
  actionImpacts: Partial<Record<CharacterActionId, ActionImpact>>;
  traitRules: TraitRule[];
  greetings: Greeting[];
  quests: Partial<Record<QuestId, QuestData>>;
  achievements: Partial<Record<AchievementId, AchievementData>>;
  randomEvents: { chance: number; table: RandomEventData[] };
  calendar: CalendarRules;
  ecosystem: EcosystemRules;
  market: MarketRules;
  population: PopulationRules;
  production: ProductionRules;
  research: ResearchRules;
  relationship: RelationshipRules;
  victory: VictoryThresholds;
  legacy: LegacyRules;
  difficulty: Record<Difficulty, DifficultyProfile>;
}
