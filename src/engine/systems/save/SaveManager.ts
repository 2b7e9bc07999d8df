// ─────────────────────────────────────────────
//  SaveManager — persistence for SettlementState
//  Snapshots are versioned JSON validated on the way back in.
//  I/O failures are logged; they never interrupt the simulation.
// ─────────────────────────────────────────────

import { z } from 'zod';
import { RESOURCE_IDS } from '@/engine/data/types/Resource';
import { BUILDING_IDS } from '@/engine/data/types/Building';
import { TECHNOLOGY_IDS, SECRET_IDS } from '@/engine/data/types/Progression';
import { CHARACTER_IDS, QUEST_IDS } from '@/engine/data/types/Character';
import { ACHIEVEMENT_IDS, VICTORY_TYPES } from '@/engine/data/types/Legacy';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { defaultCatalog } from '@/engine/loader/CatalogLoader';
import { Logger } from '@/engine/utils/Logger';
import type { SaveBackend } from './SaveBackend';

export const SNAPSHOT_VERSION = 1;

const ResourceId = z.enum(RESOURCE_IDS);
const BuildingId = z.enum(BUILDING_IDS);
const Count = z.number().int().nonnegative();

/** Snapshot shape plus the ledger and market invariants of `catalog`. */
function snapshotStateSchema(catalog: Catalog) {
  return z.object({
    day: Count,
    multiplierMode: Count.max(catalog.multiplierSteps.length - 1),
    researchProgress: z.number(),
    researchComplete: z.boolean(),
    victory: z.enum(VICTORY_TYPES).nullable(),
    modifiers: z.object({
      craftSpeed: z.number(),
      researchBonus: z.number(),
      foodProduction: z.number(),
      miningEfficiency: z.number(),
      ecoIndustryPenalty: z.number(),
    }),
    happiness: z.number(),
    resources: z.record(ResourceId, z.number().nonnegative()),
    buildings: z.record(BuildingId, Count),
    storageUnits: Count,
    population: Count,
    idleWorkers: Count,
    workers: z.record(BuildingId, Count),
    researchedTechnologies: z.array(z.enum(TECHNOLOGY_IDS)),
    discoveredSecrets: z.array(z.enum(SECRET_IDS)),
    unlockedAchievements: z.array(z.enum(ACHIEVEMENT_IDS)),
    characters: z.record(z.enum(CHARACTER_IDS), z.object({
      relationship: z.number().min(-100).max(100),
      openQuests: z.array(z.enum(QUEST_IDS)),
      memory: z.array(z.string()),
    })),
    ecosystem: z.object({
      biomes: z.object({
        forest: z.number().min(0).max(100),
        rivers: z.number().min(0).max(100),
        soil: z.number().min(0).max(100),
        air: z.number().min(0).max(100),
      }),
      pollution: z.number(),
      biodiversity: z.number(),
    }),
    market: z.object({
      priceHistory: z.record(ResourceId, z.array(z.number().min(catalog.market.priceFloor))),
      trend: z.number(),
    }),
    calendar: z.object({
      primaryStart: z.number().int(),
      secondaryStart: z.number().int(),
      duration: z.number().int(),
    }),
  }).refine(
    s => s.idleWorkers + Object.values(s.workers).reduce((a, n) => a + (n ?? 0), 0) === s.population,
    'worker accounting does not add up to the population',
  );
}

function saveSlotSchema(catalog: Catalog) {
  return z.object({
    version: z.literal(SNAPSHOT_VERSION),
    id: z.string(),
    timestamp: z.number(),
    day: z.number(),
    snapshot: snapshotStateSchema(catalog),
  });
}

export type SaveSlot = z.infer<ReturnType<typeof saveSlotSchema>>;

/** Plain-data copy of the state; immer output is frozen, JSON is not. */
export function createSnapshot(state: SettlementState): SettlementState {
  return structuredClone(state);
}

/** Validate an untrusted snapshot. Null when it does not describe a settlement. */
export function restoreState(raw: unknown, catalog: Catalog = defaultCatalog()): SettlementState | null {
  const parsed = snapshotStateSchema(catalog).safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class SaveManager {
  private readonly schema: ReturnType<typeof saveSlotSchema>;

  constructor(private readonly backend: SaveBackend, catalog: Catalog = defaultCatalog()) {
    this.schema = saveSlotSchema(catalog);
  }

  async save(slotId: string, state: SettlementState): Promise<void> {
    try {
      const slot: SaveSlot = {
        version: SNAPSHOT_VERSION,
        id: slotId,
        timestamp: Date.now(),
        day: state.day,
        snapshot: createSnapshot(state),
      };
      await this.backend.write(slotId, JSON.stringify(slot));
      Logger.log(`Saved slot "${slotId}" (day ${state.day})`, 'system');
    } catch (err) {
      Logger.warn(`[SaveManager] Save of "${slotId}" failed`, err);
    }
  }

  /** Null when the slot is missing, unreadable or corrupt. */
  async load(slotId: string): Promise<SaveSlot | null> {
    let text: string | null;
    try {
      text = await this.backend.read(slotId);
    } catch (err) {
      Logger.warn(`[SaveManager] Load of "${slotId}" failed`, err);
      return null;
    }
    if (text === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      Logger.warn(`[SaveManager] Slot "${slotId}" is not valid JSON`, err);
      return null;
    }
    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      Logger.warn(`[SaveManager] Slot "${slotId}" is corrupt: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      return null;
    }
    return parsed.data;
  }

  async hasSave(slotId: string): Promise<boolean> {
    return (await this.load(slotId)) !== null;
  }

  async deleteSave(slotId: string): Promise<void> {
    try {
      await this.backend.remove(slotId);
    } catch (err) {
      Logger.warn(`[SaveManager] Delete of "${slotId}" failed`, err);
    }
  }
}
