// ─────────────────────────────────────────────
//  Ecosystem Types
// ─────────────────────────────────────────────

export const BIOME_IDS = ['forest', 'rivers', 'soil', 'air'] as const;

export type BiomeId = typeof BIOME_IDS[number];

export type BiomeHealth = Record<BiomeId, number>;

export type HealthTier = 'healthy' | 'stable' | 'degraded' | 'critical';

export interface EcosystemState {
  biomes: BiomeHealth;
  pollution: number;
  biodiversity: number;
}

export interface EcosystemSummary {
  health: number;
  tier: HealthTier;
  productionModifier: number;
  pollution: number;
  biodiversity: number;
}
