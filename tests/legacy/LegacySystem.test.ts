import { describe, it, expect } from 'vitest';
import type { SettlementState } from '@/engine/state/SettlementState';
import { LegacySystem } from '@/engine/systems/legacy/LegacySystem';
import { catalog, makeState } from '../integration/helpers';

const wealthy = makeState(s => {
  s.resources = { wood: 125, rock: 125, food: 125, iron: 125, coal: 125, steel: 125, wine: 10 };
});

describe('LegacySystem', () => {
  describe('victoryCondition', () => {
    it('is null for a fresh settlement', () => {
      expect(LegacySystem.victoryCondition(makeState(), catalog)).toBeNull();
    });

    it('checks technology, economy, ecology, then culture', () => {
      expect(LegacySystem.victoryCondition(
        makeState(s => { s.researchProgress = 100; s.discoveredSecrets.push('memory_crystal', 'forge_of_souls'); }),
        catalog,
      )).toBe('technological');
      expect(LegacySystem.victoryCondition(wealthy, catalog)).toBe('economic');
      expect(LegacySystem.victoryCondition(
        makeState(s => { s.ecosystem.biomes = { forest: 90, rivers: 90, soil: 90, air: 90 }; }),
        catalog,
      )).toBe('ecological');
      expect(LegacySystem.victoryCondition(
        makeState(s => { s.discoveredSecrets.push('memory_crystal', 'forge_of_souls'); }),
        catalog,
      )).toBe('cultural');
    });

    it('does not count the currency as wealth', () => {
      const hoard = makeState(s => { s.resources.wine = 5000; });
      expect(LegacySystem.victoryCondition(hoard, catalog)).toBeNull();
    });
  });

  describe('checkVictory', () => {
    it('latches the first victory', () => {
      const won = LegacySystem.checkVictory(wealthy, catalog);
      expect(won.victory).toBe('economic');
      const later = { ...won, researchProgress: 150 };
      expect(LegacySystem.checkVictory(later, catalog)).toBe(later);
    });

    it('takes the earlier type when two conditions hold at once', () => {
      const richAndGreen = makeState(s => {
        s.resources = { wood: 125, rock: 125, food: 125, iron: 125, coal: 125, steel: 125, wine: 10 };
        s.ecosystem.biomes = { forest: 90, rivers: 90, soil: 90, air: 90 };
      });
      const won = LegacySystem.checkVictory(richAndGreen, catalog);
      expect(won.victory).toBe('economic');
      const cultured: SettlementState = { ...won, discoveredSecrets: ['memory_crystal', 'forge_of_souls'] };
      expect(LegacySystem.checkVictory(cultured, catalog).victory).toBe('economic');
    });
  });

  describe('checkAchievements', () => {
    it('unlocks once and applies the reward', () => {
      const state = makeState(s => { s.researchProgress = 50; });
      const first = LegacySystem.checkAchievements(state, catalog);
      expect(first.unlockedAchievements).toEqual(['tech_pioneer']);
      expect(first.modifiers.researchBonus).toBe(1.5);
      expect(LegacySystem.checkAchievements(first, catalog)).toBe(first);
    });

    it('grants resources for a settlement of three buildings', () => {
      const state = makeState(s => { s.buildings.les = 2; s.buildings.pol = 1; });
      const next = LegacySystem.checkAchievements(state, catalog);
      expect(next.unlockedAchievements).toEqual(['first_settlement']);
      expect(next.resources.builder_materials).toBe(10);
    });
  });

  describe('finalLegacy', () => {
    it('falls back to the default title', () => {
      const result = LegacySystem.finalLegacy(makeState(), catalog);
      expect(result.category).toBe('ecological');
      expect(result.title).toBe('Survivor');
      expect(result.scores.economic).toBeCloseTo(32 * 0.1 + 10 * 0.05);
    });

    it('picks the best category and its highest title', () => {
      const result = LegacySystem.finalLegacy(makeState(s => { s.researchProgress = 92; }), catalog);
      expect(result).toMatchObject({ category: 'technological', title: 'Great Innovator', score: 92 });
    });

    it('boosts economy and culture when the land is healthy', () => {
      const state = makeState(s => {
        s.ecosystem.biomes = { forest: 80, rivers: 80, soil: 80, air: 80 };
        s.unlockedAchievements.push('first_settlement', 'master_crafter', 'tech_pioneer');
      });
      const result = LegacySystem.finalLegacy(state, catalog);
      expect(result.scores.cultural).toBeCloseTo(82.5);
      expect(result.scores.economic).toBeCloseTo((32 * 0.1 + 10 * 0.05) * 1.2);
      expect(result).toMatchObject({ category: 'cultural', title: 'Cultural Icon' });
    });

    it('resolves ties in category order', () => {
      const state = makeState(s => {
        s.researchProgress = 50;
        s.ecosystem.biomes = { forest: 50, rivers: 50, soil: 50, air: 50 };
      });
      expect(LegacySystem.finalLegacy(state, catalog)).toMatchObject({
        category: 'technological',
        title: 'Inventor',
      });
    });
  });
});
