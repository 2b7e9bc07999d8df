// ─────────────────────────────────────────────
//  Ecosystem System — biome health, pollution, biodiversity
//  Deterministic: no randomness in this module.
// ─────────────────────────────────────────────

import { produce, type Draft } from 'immer';
import { BIOME_IDS, type BiomeHealth, type BiomeId, type EcosystemSummary } from '@/engine/data/types/Ecosystem';
import { BUILDING_IDS } from '@/engine/data/types/Building';
import type { Catalog, TierRule } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { MathUtils } from '@/engine/utils/MathUtils';

function biomeValues(biomes: BiomeHealth): number[] {
  return BIOME_IDS.map(id => biomes[id]);
}

function totalBuildings(state: SettlementState): number {
  return MathUtils.sum(BUILDING_IDS.map(id => state.buildings[id]));
}

function totalWorkers(state: SettlementState): number {
  return MathUtils.sum(BUILDING_IDS.map(id => state.workers[id]));
}

export const EcosystemSystem = {
  overallHealth(state: SettlementState): number {
    return MathUtils.mean(biomeValues(state.ecosystem.biomes));
  },

  /** Tier for a health value; the last rule is the fallback. */
  tierFor(health: number, catalog: Catalog): TierRule {
    const tiers = [...catalog.ecosystem.tiers].sort((a, b) => b.atLeast - a.atLeast);
    const match = tiers.find(t => health >= t.atLeast) ?? tiers[tiers.length - 1];
    // Schema guarantees at least one tier
    return match ?? { atLeast: 0, tier: 'critical', modifier: 1 };
  },

  productionModifier(state: SettlementState, catalog: Catalog): number {
    return EcosystemSystem.tierFor(EcosystemSystem.overallHealth(state), catalog).modifier;
  },

  /**
   * Environmental load of the workforce, scaled by the difficulty's
   * industry penalty. Flattens out past the worker cap.
   */
  loadFactor(state: SettlementState, catalog: Catalog): number {
    const { base, perWorker, workerCap } = catalog.ecosystem.workerLoad;
    const load = base + perWorker * Math.min(totalWorkers(state), workerCap);
    return load * state.modifiers.ecoIndustryPenalty;
  },

  tick(state: SettlementState, catalog: Catalog): SettlementState {
    const rules = catalog.ecosystem;
    const factor = EcosystemSystem.loadFactor(state, catalog);

    return produce(state, draft => {
      const biomes = draft.ecosystem.biomes;
      for (const id of BUILDING_IDS) {
        const count = state.buildings[id] ?? 0;
        const impact = catalog.buildings[id]?.biomeImpact;
        if (count <= 0 || !impact) continue;
        for (const biome of BIOME_IDS) {
          const perUnit = impact[biome];
          if (perUnit !== undefined) biomes[biome] += perUnit * count * factor;
        }
      }
      for (const biome of BIOME_IDS) {
        if (biomes[biome] < rules.regenerationCeiling) biomes[biome] += rules.regeneration;
        biomes[biome] = MathUtils.clamp(biomes[biome], 0, 100);
      }

      const pollution = Math.min(100, rules.pollutionPerBuilding * totalBuildings(state) * factor);
      draft.ecosystem.pollution = pollution;
      draft.ecosystem.biodiversity = Math.max(
        0,
        MathUtils.mean(biomeValues(biomes)) - rules.biodiversityPollutionWeight * pollution,
      );
    });
  },

  damageBiome(draft: Draft<SettlementState>, biome: BiomeId, amount: number): void {
    const biomes = draft.ecosystem.biomes;
    biomes[biome] = MathUtils.clamp(biomes[biome] - amount, 0, 100);
  },

  restoreBiomes(draft: Draft<SettlementState>, amount: number): void {
    const biomes = draft.ecosystem.biomes;
    for (const biome of BIOME_IDS) {
      biomes[biome] = MathUtils.clamp(biomes[biome] + amount, 0, 100);
    }
  },

  summary(state: SettlementState, catalog: Catalog): EcosystemSummary {
    const health = EcosystemSystem.overallHealth(state);
    const tier = EcosystemSystem.tierFor(health, catalog);
    return {
      health,
      tier: tier.tier,
      productionModifier: tier.modifier,
      pollution: state.ecosystem.pollution,
      biodiversity: state.ecosystem.biodiversity,
    };
  },

  totalBuildings,
  totalWorkers,
};
