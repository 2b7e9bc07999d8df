// ─────────────────────────────────────────────
//  SettlementState — the whole simulation at one instant
//  Immutable. Systems return a new state via immer produce.
// ─────────────────────────────────────────────

import type { ResourceId, ResourceStock } from '@/engine/data/types/Resource';
import type { BuildingCounts, WorkerAssignment } from '@/engine/data/types/Building';
import type { EcosystemState } from '@/engine/data/types/Ecosystem';
import type { Modifiers } from '@/engine/data/types/Effect';
import type { TechnologyId, SecretId } from '@/engine/data/types/Progression';
import type { CharacterId, CharacterState } from '@/engine/data/types/Character';
import type { AchievementId, VictoryType } from '@/engine/data/types/Legacy';
import type { CalendarState } from '@/engine/data/types/Calendar';

export interface MarketState {
  /** Last instantaneous prices per resource, oldest first */
  priceHistory: Partial<Record<ResourceId, number[]>>;
  trend: number;
}

export interface SettlementState {
  day: number;
  /** Index into catalog.multiplierSteps */
  multiplierMode: number;
  researchProgress: number;
  researchComplete: boolean;
  /** Latched: first victory reached, never cleared */
  victory: VictoryType | null;
  modifiers: Modifiers;
  happiness: number;

  resources: ResourceStock;
  buildings: BuildingCounts;
  storageUnits: number;

  population: number;
  idleWorkers: number;
  workers: WorkerAssignment;

  researchedTechnologies: TechnologyId[];
  discoveredSecrets: SecretId[];
  unlockedAchievements: AchievementId[];
  characters: Partial<Record<CharacterId, CharacterState>>;

  ecosystem: EcosystemState;
  market: MarketState;
  calendar: CalendarState;
}
