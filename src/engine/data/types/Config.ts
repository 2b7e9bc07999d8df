// ─────────────────────────────────────────────
//  Engine configuration
// ─────────────────────────────────────────────

import type { ResourceAmounts } from './Resource';

export type Difficulty = 'easy' | 'normal' | 'hard';

export interface EngineConfig {
  difficulty: Difficulty;
  basePopulation: number;
  /** Food eaten per inhabitant per day */
  foodPerCapita: number;
  /** Daily pull of happiness toward 50 */
  happinessDecay: number;
  /** Autosave when day % autosaveEvery === 0 */
  autosaveEvery: number;
  /** null = seed from the clock */
  seed: number | null;
  /** Directory holding one JSON file per save slot */
  savePath: string;
}

export const DEFAULT_CONFIG: EngineConfig = {
  difficulty: 'normal',
  basePopulation: 8,
  foodPerCapita: 0.4,
  happinessDecay: 0.25,
  autosaveEvery: 5,
  seed: null,
  savePath: '.homestead',
};

export interface DifficultyProfile {
  /** Signed starting-stock adjustments */
  grants: ResourceAmounts;
  ecoIndustryPenalty: number;
  happiness: number;
}
