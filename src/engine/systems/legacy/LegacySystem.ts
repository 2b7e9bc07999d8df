// ─────────────────────────────────────────────
//  Legacy System — achievements, victory latch, final titles
// ─────────────────────────────────────────────

import { produce } from 'immer';
import {
  ACHIEVEMENT_IDS, VICTORY_TYPES,
  type AchievementCondition, type AchievementId, type LegacyResult, type VictoryType,
} from '@/engine/data/types/Legacy';
import { CURRENCY } from '@/engine/data/types/Resource';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EcosystemSystem } from '../ecosystem/EcosystemSystem';
import { EffectSystem } from '../progression/EffectSystem';

export const LegacySystem = {
  conditionMet(state: SettlementState, condition: AchievementCondition): boolean {
    switch (condition.kind) {
      case 'building_count': return EcosystemSystem.totalBuildings(state) >= condition.atLeast;
      case 'resource': return ResourceLedger.stockOf(state, condition.resource) >= condition.atLeast;
      case 'ecosystem_health': return EcosystemSystem.overallHealth(state) >= condition.atLeast;
      case 'research': return state.researchProgress >= condition.atLeast;
    }
  },

  /** Unlock every newly satisfied achievement once and apply its reward. */
  checkAchievements(state: SettlementState, catalog: Catalog): SettlementState {
    const due: AchievementId[] = ACHIEVEMENT_IDS.filter(id => {
      const data = catalog.achievements[id];
      return data !== undefined
        && !state.unlockedAchievements.includes(id)
        && LegacySystem.conditionMet(state, data.condition);
    });
    if (due.length === 0) return state;

    return produce(state, draft => {
      for (const id of due) {
        const data = catalog.achievements[id];
        if (!data) continue;
        draft.unlockedAchievements.push(id);
        EffectSystem.apply(draft, catalog, data.reward);
        Logger.log(`Achievement: ${data.name} (${EffectSystem.describe(data.reward)})`, 'event');
      }
    });
  },

  /** First satisfied condition in priority order, ignoring the latch */
  victoryCondition(state: SettlementState, catalog: Catalog): VictoryType | null {
    const v = catalog.victory;
    if (state.researchComplete || state.researchProgress >= v.research) return 'technological';
    if (ResourceLedger.wealth(state) > v.wealth) return 'economic';
    if (EcosystemSystem.overallHealth(state) > v.ecology) return 'ecological';
    if (state.discoveredSecrets.length >= v.secrets) return 'cultural';
    return null;
  },

  /** Latched: once a victory is recorded the state is returned untouched. */
  checkVictory(state: SettlementState, catalog: Catalog): SettlementState {
    if (state.victory !== null) return state;
    const type = LegacySystem.victoryCondition(state, catalog);
    if (type === null) return state;
    Logger.log(`Victory: ${type}`, 'event');
    return produce(state, draft => {
      draft.victory = type;
    });
  },

  scores(state: SettlementState, catalog: Catalog): Record<VictoryType, number> {
    const rules = catalog.legacy;
    const ecological = EcosystemSystem.overallHealth(state);
    let economic = ResourceLedger.wealth(state) * rules.economicStockWeight
      + ResourceLedger.stockOf(state, CURRENCY) * rules.economicCurrencyWeight;
    let cultural = state.unlockedAchievements.length * rules.culturalPerAchievement;
    if (ecological > rules.crossBonus.ecologyAbove) {
      economic *= rules.crossBonus.economic;
      cultural *= rules.crossBonus.cultural;
    }
    return {
      technological: state.researchProgress,
      economic,
      ecological,
      cultural,
    };
  },

  /** Best category (first on ties) and its title. Valid before and after victory. */
  finalLegacy(state: SettlementState, catalog: Catalog): LegacyResult {
    const scores = LegacySystem.scores(state, catalog);
    let category: VictoryType = VICTORY_TYPES[0];
    for (const type of VICTORY_TYPES) {
      if (scores[type] > scores[category]) category = type;
    }
    const score = scores[category];
    const steps = [...catalog.legacy.titles[category]].sort((a, b) => b.atLeast - a.atLeast);
    const title = steps.find(s => score >= s.atLeast)?.title ?? catalog.legacy.defaultTitle;
    return { category, title, score, scores };
  },
};
