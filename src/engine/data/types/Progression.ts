// ─────────────────────────────────────────────
//  Progression Types — technologies + ancient secrets
// ─────────────────────────────────────────────

import type { Cost } from './Resource';
import type { Effect } from './Effect';
import type { CharacterReaction } from './Character';

export const TECHNOLOGY_IDS = [
  'basic_agriculture', 'advanced_mining', 'ecology', 'industrial_revolution',
] as const;
export type TechnologyId = typeof TECHNOLOGY_IDS[number];

export const SECRET_IDS = ['seed_of_prosperity', 'memory_crystal', 'forge_of_souls'] as const;
export type SecretId = typeof SECRET_IDS[number];

/** Locked → Available → Unlocked. Only Unlocked is stored; Available is derived. */
export type UnlockStatus = 'locked' | 'available' | 'unlocked';

/** Gate on a recipe: either a researched technology or a discovered secret */
export type UnlockRef =
  | { kind: 'technology'; id: TechnologyId }
  | { kind: 'secret'; id: SecretId };

export interface TechnologyData {
  name: string;
  description: string;
  requires: TechnologyId[];
  cost: Cost;
  effects: Effect[];
  reaction?: CharacterReaction;
}

export interface SecretData {
  name: string;
  description: string;
  cost: Cost;
  effect: Effect;
}

export interface TechnologyEntry {
  id: TechnologyId;
  name: string;
  status: UnlockStatus;
  requires: TechnologyId[];
  cost: Cost;
}
