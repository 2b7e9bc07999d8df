import { describe, it, expect } from 'vitest';
import { produce } from 'immer';
import { EcosystemSystem } from '@/engine/systems/ecosystem/EcosystemSystem';
import { catalog, makeState } from '../integration/helpers';

describe('EcosystemSystem', () => {
  it('starts critical at the mean of the initial biomes', () => {
    const state = makeState();
    expect(EcosystemSystem.overallHealth(state)).toBe(3.75);
    expect(EcosystemSystem.summary(state, catalog)).toEqual({
      health: 3.75,
      tier: 'critical',
      productionModifier: 0.6,
      pollution: 0,
      biodiversity: 3.75,
    });
  });

  it.each([
    [85, 'healthy', 1.2],
    [80, 'healthy', 1.2],
    [65, 'stable', 1.0],
    [55, 'degraded', 0.8],
    [35, 'critical', 0.6],
  ])('health %d is %s (×%s)', (health, tier, modifier) => {
    expect(EcosystemSystem.tierFor(health, catalog)).toMatchObject({ tier, modifier });
  });

  describe('loadFactor', () => {
    it('grows per worker and flattens at the cap', () => {
      expect(EcosystemSystem.loadFactor(makeState(), catalog)).toBe(0.75);
      const staffed = makeState(s => { s.workers.les = 4; s.idleWorkers = 4; });
      expect(EcosystemSystem.loadFactor(staffed, catalog)).toBeCloseTo(0.95);
      const crowded = makeState(s => { s.population = 30; s.workers.les = 30; s.idleWorkers = 0; });
      expect(EcosystemSystem.loadFactor(crowded, catalog)).toBeCloseTo(1.25);
    });

    it('scales with the industry penalty', () => {
      const hard = makeState(s => { s.modifiers.ecoIndustryPenalty = 1.2; });
      expect(EcosystemSystem.loadFactor(hard, catalog)).toBeCloseTo(0.9);
    });
  });

  describe('tick', () => {
    it('regenerates every biome below the ceiling', () => {
      const next = EcosystemSystem.tick(makeState(), catalog);
      expect(next.ecosystem.biomes.forest).toBeCloseTo(5.6);
      expect(next.ecosystem.biomes.rivers).toBeCloseTo(0.6);
      expect(next.ecosystem.biomes.soil).toBeCloseTo(8.6);
      expect(next.ecosystem.biomes.air).toBeCloseTo(2.6);
      expect(next.ecosystem.pollution).toBe(0);
    });

    it('does not regenerate above the ceiling', () => {
      const lush = makeState(s => { s.ecosystem.biomes.forest = 95; });
      expect(EcosystemSystem.tick(lush, catalog).ecosystem.biomes.forest).toBe(95);
    });

    it('applies building impacts, pollution and biodiversity', () => {
      const state = makeState(s => {
        s.buildings.les = 2;
        s.ecosystem.biomes = { forest: 50, rivers: 50, soil: 50, air: 50 };
      });
      const next = EcosystemSystem.tick(state, catalog);
      // impact × count × load 0.75, then +0.6 regeneration
      expect(next.ecosystem.biomes.forest).toBeCloseTo(50 - 0.6 * 2 * 0.75 + 0.6);
      expect(next.ecosystem.biomes.air).toBeCloseTo(50 - 0.15 * 2 * 0.75 + 0.6);
      expect(next.ecosystem.biomes.rivers).toBeCloseTo(50.6);
      expect(next.ecosystem.pollution).toBeCloseTo(0.25 * 2 * 0.75);
      const mean = (49.7 + 50.6 + 50.6 + 50.375) / 4;
      expect(next.ecosystem.biodiversity).toBeCloseTo(mean - 0.25 * 0.375);
    });

    it('clamps biomes into [0, 100]', () => {
      const ruined = makeState(s => {
        s.buildings.pes = 200;
        s.ecosystem.biomes = { forest: 99.9, rivers: 1, soil: 1, air: 100 };
      });
      const next = EcosystemSystem.tick(ruined, catalog);
      expect(next.ecosystem.biomes.soil).toBe(0);
      expect(next.ecosystem.biomes.rivers).toBe(0);
      expect(next.ecosystem.biomes.air).toBe(100);
      expect(next.ecosystem.biomes.forest).toBe(99.9);
    });
  });

  it('damageBiome and restoreBiomes stay in bounds', () => {
    const next = produce(makeState(), d => {
      EcosystemSystem.damageBiome(d, 'forest', 40);
      EcosystemSystem.restoreBiomes(d, 95);
    });
    expect(next.ecosystem.biomes).toEqual({ forest: 95, rivers: 95, soil: 100, air: 97 });
  });
});
