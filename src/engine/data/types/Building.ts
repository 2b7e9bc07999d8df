// ─────────────────────────────────────────────
//  Building Types
// ─────────────────────────────────────────────

import type { ResourceAmounts } from './Resource';
import type { BiomeId } from './Ecosystem';
import type { CharacterReaction } from './Character';

export const BUILDING_IDS = ['les', 'sob', 'kam', 'pol', 'pes', 'gli'] as const;

/** les = sawmill, sob = herbalist hut, kam = quarry, pol = wheat field, pes = sand pit, gli = clay pit */
export type BuildingId = typeof BUILDING_IDS[number];

/** Anything the construction menu can raise; storage units are tracked apart from buildings. */
export type StructureId = BuildingId | 'store';

export type BuildingCounts = Partial<Record<BuildingId, number>>;
export type WorkerAssignment = Partial<Record<BuildingId, number>>;

export interface BuildingData {
  name: string;
  cost: ResourceAmounts;
  /** Per-unit passive output */
  output: ResourceAmounts;
  /** Per-unit biome delta applied on every ecosystem tick */
  biomeImpact: Partial<Record<BiomeId, number>>;
  reaction?: CharacterReaction;
}

export interface StorageData {
  name: string;
  cost: ResourceAmounts;
  baseCapacity: number;
  perUnit: number;
  initialUnits: number;
}
