// ─────────────────────────────────────────────
//  Production Types — direct gathering + crafting
// ─────────────────────────────────────────────

import type { ResourceAmounts } from './Resource';
import type { UnlockRef } from './Progression';
import type { CharacterReaction } from './Character';

export const MINING_ACTION_IDS = [
  'fell_timber', 'press_grapes', 'quarry_rock', 'farm_fields', 'dig_sand', 'dig_clay',
] as const;
export type MiningActionId = typeof MINING_ACTION_IDS[number];

export const RECIPE_IDS = [
  'coal', 'steel', 'bronze', 'acid', 'chlorine', 'instrument', 'ancient_tool',
] as const;
export type RecipeId = typeof RECIPE_IDS[number];

export interface MiningActionData {
  name: string;
  yields: ResourceAmounts;
  reaction?: CharacterReaction;
}

export interface RecipeData {
  name: string;
  inputs: ResourceAmounts;
  /** Research points consumed per craft */
  research?: number;
  outputs: ResourceAmounts;
  requires?: UnlockRef;
}
