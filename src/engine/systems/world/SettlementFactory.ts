// ─────────────────────────────────────────────
//  Settlement Factory — builds a fresh day-0 state
//  Calendar windows are drawn here and nowhere else.
// ─────────────────────────────────────────────

import { CHARACTER_IDS, type CharacterId, type CharacterState } from '@/engine/data/types/Character';
import { BIOME_IDS } from '@/engine/data/types/Ecosystem';
import { entriesOf, type ResourceStock } from '@/engine/data/types/Resource';
import type { SettlementState } from '@/engine/state/SettlementState';
import type { EngineContext } from '@/engine/state/SettlementAction';
import { MathUtils } from '@/engine/utils/MathUtils';
import { EventCalendar } from '../calendar/EventCalendar';

export function createSettlement(ctx: EngineContext): SettlementState {
  const { catalog, config, rng } = ctx;
  const profile = catalog.difficulty[config.difficulty];

  const resources: ResourceStock = { ...catalog.startingStock };
  for (const [id, delta] of entriesOf(profile.grants)) {
    resources[id] = Math.max(0, (resources[id] ?? 0) + delta);
  }

  const characters: Partial<Record<CharacterId, CharacterState>> = {};
  for (const id of CHARACTER_IDS) {
    const data = catalog.characters[id];
    if (!data) continue;
    characters[id] = {
      relationship: data.startingRelationship,
      openQuests: [...data.quests],
      memory: [],
    };
  }

  return {
    day: 0,
    multiplierMode: 0,
    researchProgress: 0,
    researchComplete: false,
    victory: null,
    modifiers: {
      craftSpeed: 1,
      researchBonus: 1,
      foodProduction: 1,
      miningEfficiency: 1,
      ecoIndustryPenalty: profile.ecoIndustryPenalty,
    },
    happiness: MathUtils.clamp(catalog.population.neutralHappiness + profile.happiness, 0, 100),
    resources,
    buildings: {},
    storageUnits: catalog.storage.initialUnits,
    population: config.basePopulation,
    idleWorkers: config.basePopulation,
    workers: {},
    researchedTechnologies: [],
    discoveredSecrets: [],
    unlockedAchievements: [],
    characters,
    ecosystem: {
      biomes: { ...catalog.ecosystem.initialBiomes },
      pollution: 0,
      biodiversity: MathUtils.mean(BIOME_IDS.map(b => catalog.ecosystem.initialBiomes[b])),
    },
    market: { priceHistory: {}, trend: 1 },
    calendar: EventCalendar.generate(rng, catalog),
  };
}
