// ─────────────────────────────────────────────
//  CatalogLoader
//  Parses the static game data once at startup.
//  Unknown ids fail here, not deep inside a tick.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { Catalog } from '@/engine/data/types/Catalog';
import { RESOURCE_IDS } from '@/engine/data/types/Resource';
import { BUILDING_IDS } from '@/engine/data/types/Building';
import { BIOME_IDS } from '@/engine/data/types/Ecosystem';
import { MINING_ACTION_IDS, RECIPE_IDS } from '@/engine/data/types/Production';
import { TECHNOLOGY_IDS, SECRET_IDS } from '@/engine/data/types/Progression';
import {
  CHARACTER_IDS, TRAIT_IDS, CHARACTER_ACTION_IDS, QUEST_IDS,
} from '@/engine/data/types/Character';
import { ACHIEVEMENT_IDS } from '@/engine/data/types/Legacy';
import { RANDOM_EVENT_IDS } from '@/engine/data/types/Calendar';
import catalogJson from '@/assets/data/catalog.json';

// ── Shared pieces ──

const ResourceId = z.enum(RESOURCE_IDS);
const BiomeId = z.enum(BIOME_IDS);
const TechnologyId = z.enum(TECHNOLOGY_IDS);
const SecretId = z.enum(SECRET_IDS);

const Amounts = z.record(ResourceId, z.number().finite());
const Range = z.tuple([z.number().int(), z.number().int()])
  .refine(([lo, hi]) => lo <= hi, 'range must be ascending');

const CostSchema = z.object({
  resources: Amounts,
  research: z.number().nonnegative().optional(),
});

const ReactionSchema = z.object({
  action: z.enum(CHARACTER_ACTION_IDS),
  trait: z.enum(TRAIT_IDS).optional(),
});

const UnlockRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('technology'), id: TechnologyId }),
  z.object({ kind: z.literal('secret'), id: SecretId }),
]);

const EffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('food_production_floor'), value: z.number() }),
  z.object({ kind: z.literal('mining_efficiency_floor'), value: z.number() }),
  z.object({ kind: z.literal('craft_speed_floor'), value: z.number() }),
  z.object({ kind: z.literal('research_bonus_floor'), value: z.number() }),
  z.object({ kind: z.literal('craft_speed_scale'), factor: z.number().positive() }),
  z.object({ kind: z.literal('industry_penalty_scale'), factor: z.number().positive() }),
  z.object({ kind: z.literal('market_trend_scale'), factor: z.number().positive() }),
  z.object({ kind: z.literal('happiness_bonus'), amount: z.number() }),
  z.object({ kind: z.literal('resource_grant'), resource: ResourceId, amount: z.number() }),
  z.object({ kind: z.literal('biome_restore'), amount: z.number() }),
]);

/** Every id in `ids` must have an entry; z.record alone only rejects unknown keys. */
function requireAll(ids: readonly string[]) {
  return (rec: object, ctx: z.RefinementCtx): void => {
    for (const id of ids) {
      if (!(id in rec)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing entry "${id}"` });
      }
    }
  };
}

const Threshold = z.object({ atLeast: z.number() });

// ── Registries ──

const BuildingSchema = z.object({
  name: z.string(),
  cost: Amounts,
  output: Amounts,
  biomeImpact: z.record(BiomeId, z.number()),
  reaction: ReactionSchema.optional(),
});

const MiningSchema = z.object({
  name: z.string(),
  yields: Amounts,
  reaction: ReactionSchema.optional(),
});

const RecipeSchema = z.object({
  name: z.string(),
  inputs: Amounts,
  research: z.number().nonnegative().optional(),
  outputs: Amounts,
  requires: UnlockRefSchema.optional(),
});

const TechnologySchema = z.object({
  name: z.string(),
  description: z.string(),
  requires: z.array(TechnologyId),
  cost: CostSchema,
  effects: z.array(EffectSchema),
  reaction: ReactionSchema.optional(),
});

const SecretSchema = z.object({
  name: z.string(),
  description: z.string(),
  cost: CostSchema,
  effect: EffectSchema,
});

const CharacterSchema = z.object({
  name: z.string(),
  description: z.string(),
  skills: z.record(z.string(), z.number()),
  traits: z.array(z.enum(TRAIT_IDS)),
  startingRelationship: z.number().min(-100).max(100),
  quests: z.array(z.enum(QUEST_IDS)),
  offers: z.array(z.object({ resource: ResourceId, markup: z.number().positive() })),
});

const QuestConditionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('biome'), biome: BiomeId, atLeast: z.number() }),
  z.object({ kind: z.literal('biodiversity'), atLeast: z.number() }),
  z.object({ kind: z.literal('resource'), resource: ResourceId, atLeast: z.number() }),
  z.object({ kind: z.literal('research'), atLeast: z.number() }),
  z.object({ kind: z.literal('technology'), id: TechnologyId }),
  z.object({ kind: z.literal('secret'), id: SecretId }),
]);

const QuestSchema = z.object({
  title: z.string(),
  condition: QuestConditionSchema,
  relationship: z.number(),
  grant: z.object({ resource: ResourceId, amount: z.number().positive() }).optional(),
});

const AchievementSchema = z.object({
  name: z.string(),
  condition: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('building_count'), atLeast: z.number() }),
    z.object({ kind: z.literal('resource'), resource: ResourceId, atLeast: z.number() }),
    z.object({ kind: z.literal('ecosystem_health'), atLeast: z.number() }),
    z.object({ kind: z.literal('research'), atLeast: z.number() }),
  ]),
  reward: EffectSchema,
});

const TitleSteps = z.array(z.object({ atLeast: z.number(), title: z.string() }));

const DifficultySchema = z.object({
  grants: Amounts,
  ecoIndustryPenalty: z.number().positive(),
  happiness: z.number(),
});

// ── Catalog ──

const CatalogSchema = z.object({
  basePrices: Amounts,
  startingStock: Amounts,
  storage: z.object({
    name: z.string(),
    cost: Amounts,
    baseCapacity: z.number().nonnegative(),
    perUnit: z.number().positive(),
    initialUnits: z.number().int().nonnegative(),
  }),
  multiplierSteps: z.array(z.number().positive()).min(1),
  buildings: z.record(z.enum(BUILDING_IDS), BuildingSchema)
    .superRefine(requireAll(BUILDING_IDS)),
  mining: z.record(z.enum(MINING_ACTION_IDS), MiningSchema)
    .superRefine(requireAll(MINING_ACTION_IDS)),
  recipes: z.record(z.enum(RECIPE_IDS), RecipeSchema)
    .superRefine(requireAll(RECIPE_IDS)),
  technologies: z.record(TechnologyId, TechnologySchema)
    .superRefine(requireAll(TECHNOLOGY_IDS)),
  secrets: z.record(SecretId, SecretSchema)
    .superRefine(requireAll(SECRET_IDS)),
  characters: z.record(z.enum(CHARACTER_IDS), CharacterSchema)
    .superRefine(requireAll(CHARACTER_IDS)),
  actionImpacts: z.record(
    z.enum(CHARACTER_ACTION_IDS),
    z.object({ impact: z.number(), tags: z.array(z.string()) }),
  ),
  traitRules: z.array(z.object({
    trait: z.enum(TRAIT_IDS),
    tag: z.string(),
    multiplier: z.number().optional(),
    bonus: z.number().optional(),
    memory: z.string(),
  })),
  greetings: z.array(Threshold.extend({ line: z.string() })).min(1),
  quests: z.record(z.enum(QUEST_IDS), QuestSchema)
    .superRefine(requireAll(QUEST_IDS)),
  achievements: z.record(z.enum(ACHIEVEMENT_IDS), AchievementSchema)
    .superRefine(requireAll(ACHIEVEMENT_IDS)),
  randomEvents: z.object({
    chance: z.number().min(0).max(1),
    table: z.array(z.object({
      id: z.enum(RANDOM_EVENT_IDS),
      text: z.string(),
      deltas: Amounts,
      biomeDamage: z.object({ biome: BiomeId, amount: z.number().nonnegative() }).optional(),
    })),
  }),
  calendar: z.object({
    primaryStart: Range,
    secondaryStart: Range,
    duration: Range,
    primary: z.object({ hostility: z.number(), market: z.number() }),
    derived: z.array(z.object({
      startFactor: z.number(),
      durationFactor: z.number(),
      hostility: z.number(),
    })),
  }),
  ecosystem: z.object({
    initialBiomes: z.object({
      forest: z.number(), rivers: z.number(), soil: z.number(), air: z.number(),
    }),
    regeneration: z.number(),
    regenerationCeiling: z.number(),
    workerLoad: z.object({ base: z.number(), perWorker: z.number(), workerCap: z.number() }),
    pollutionPerBuilding: z.number(),
    biodiversityPollutionWeight: z.number(),
    tiers: z.array(Threshold.extend({
      tier: z.enum(['healthy', 'stable', 'degraded', 'critical']),
      modifier: z.number(),
    })).min(1),
  }),
  market: z.object({
    historyWindow: z.number().int().positive(),
    noise: z.number().nonnegative(),
    priceFloor: z.number().positive(),
    currencyCapacityFactor: z.number().positive(),
    saturation: z.array(z.object({
      above: z.number().optional(),
      below: z.number().optional(),
      modifier: z.number(),
    })),
    labels: z.object({ glutAbove: z.number(), shortageBelow: z.number() }),
  }),
  population: z.object({
    neutralHappiness: z.number(),
    fedHappinessStep: z.number(),
    starvationPenalty: z.number(),
    deficitWeight: z.number(),
    starvationChance: z.number().min(0).max(1),
    birthThreshold: z.number(),
    birthChance: z.number().min(0).max(1),
  }),
  production: z.object({
    workerBonusPerWorker: z.number(),
    workerBonusCap: z.number().int(),
    happinessSlope: z.number(),
    happinessRange: z.tuple([z.number(), z.number()]),
    buildCostGrowth: z.number(),
  }),
  research: z.object({ studyRate: z.number().positive(), completeAt: z.number().positive() }),
  relationship: z.object({
    tradeThreshold: z.number(),
    loyalDiscountAt: z.number(),
    loyalDiscount: z.number().positive(),
    tradeBonus: z.number(),
    talkBonus: z.number(),
    talkCeiling: z.number(),
  }),
  victory: z.object({
    research: z.number(),
    wealth: z.number(),
    ecology: z.number(),
    secrets: z.number().int(),
  }),
  legacy: z.object({
    economicStockWeight: z.number(),
    economicCurrencyWeight: z.number(),
    culturalPerAchievement: z.number(),
    crossBonus: z.object({ ecologyAbove: z.number(), economic: z.number(), cultural: z.number() }),
    titles: z.object({
      technological: TitleSteps,
      economic: TitleSteps,
      ecological: TitleSteps,
      cultural: TitleSteps,
    }),
    defaultTitle: z.string(),
  }),
  difficulty: z.object({
    easy: DifficultySchema,
    normal: DifficultySchema,
    hard: DifficultySchema,
  }),
}).superRefine((catalog, ctx) => {
  // Prerequisite edges must point backwards in declaration order, which keeps the graph acyclic.
  const seen = new Set<string>();
  for (const id of TECHNOLOGY_IDS) {
    for (const req of catalog.technologies[id]?.requires ?? []) {
      if (!seen.has(req)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['technologies', id, 'requires'],
          message: `"${id}" requires "${req}", which is not declared before it`,
        });
      }
    }
    seen.add(id);
  }
});

export class CatalogError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid catalog:\n  ${issues.join('\n  ')}`);
    this.name = 'CatalogError';
  }
}

/**
 * Validates raw catalog data. Defaults to the bundled catalog.json.
 * Throws CatalogError listing every problem found.
 */
export function loadCatalog(raw: unknown = catalogJson): Catalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogError(
      parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`),
    );
  }
  return parsed.data;
}

let _catalog: Catalog | null = null;

/** Bundled catalog, parsed on first use. */
export function defaultCatalog(): Catalog {
  _catalog ??= loadCatalog();
  return _catalog;
}
