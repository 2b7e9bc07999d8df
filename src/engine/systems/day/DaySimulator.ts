// ─────────────────────────────────────────────
//  Day Simulator — dawn and dusk halves of a day step
//  Dawn: ecosystem tick → achievements → random event
//  Dusk: day +1 → food, happiness, population → autosave flag → victory
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { RandomEventData } from '@/engine/data/types/Calendar';
import type { AchievementId, VictoryType } from '@/engine/data/types/Legacy';
import type { SettlementState } from '@/engine/state/SettlementState';
import type { EngineContext } from '@/engine/state/SettlementAction';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EcosystemSystem } from '../ecosystem/EcosystemSystem';
import { EventCalendar } from '../calendar/EventCalendar';
import { LegacySystem } from '../legacy/LegacySystem';
import { WorkerSystem } from '../production/WorkerSystem';

export interface DawnReport {
  state: SettlementState;
  achievements: AchievementId[];
  event: RandomEventData | null;
}

export interface DuskReport {
  state: SettlementState;
  foodNeeded: number;
  starved: boolean;
  populationChange: -1 | 0 | 1;
  autosaveDue: boolean;
  /** Set only on the day the latch closes */
  victory: VictoryType | null;
}

export const DaySimulator = {
  beginDay(state: SettlementState, ctx: EngineContext): DawnReport {
    const { catalog, rng } = ctx;
    const ticked = EcosystemSystem.tick(state, catalog);
    const checked = LegacySystem.checkAchievements(ticked, catalog);
    const achievements = checked.unlockedAchievements.filter(id => !ticked.unlockedAchievements.includes(id));
    const { state: next, event } = EventCalendar.maybeTrigger(checked, catalog, rng);
    if (event) Logger.log(event.text, 'event');
    return { state: next, achievements, event };
  },

  endDay(state: SettlementState, ctx: EngineContext): DuskReport {
    const { catalog, config, rng } = ctx;
    const rules = catalog.population;
    const need = state.population * config.foodPerCapita;
    const food = ResourceLedger.stockOf(state, 'food');
    const starved = food < need;

    // Rolls happen in a fixed order so seeded runs replay exactly.
    // A starving settlement always rolls; the last inhabitant is never lost.
    const roll = starved && rng.chance(rules.starvationChance);
    const loses = roll && state.population > 1;

    let populationChange: DuskReport['populationChange'] = loses ? -1 : 0;
    const dusk = produce(state, draft => {
      draft.day += 1;

      if (!starved) {
        ResourceLedger.adjust(draft, catalog, 'food', -need);
        draft.happiness = Math.min(100, draft.happiness + rules.fedHappinessStep);
      } else {
        const deficit = need - food;
        draft.resources.food = 0;
        draft.happiness = Math.max(0, draft.happiness - (rules.starvationPenalty + rules.deficitWeight * deficit));
        if (loses) WorkerSystem.removeInhabitant(draft);
      }

      draft.happiness = MathUtils.approach(draft.happiness, rules.neutralHappiness, config.happinessDecay);

      if (draft.happiness >= rules.birthThreshold && rng.chance(rules.birthChance)) {
        WorkerSystem.addInhabitant(draft);
        populationChange = 1;
      }
    });

    if (starved) Logger.log(`Not enough food: ${food.toFixed(1)}/${need.toFixed(1)}`, 'economy');

    const judged = LegacySystem.checkVictory(dusk, catalog);
    return {
      state: judged,
      foodNeeded: need,
      starved,
      populationChange,
      autosaveDue: judged.day % config.autosaveEvery === 0,
      victory: judged.victory !== dusk.victory ? judged.victory : null,
    };
  },

  /** Both halves back to back, no player actions in between */
  tick(state: SettlementState, ctx: EngineContext): { dawn: DawnReport; dusk: DuskReport } {
    const dawn = DaySimulator.beginDay(state, ctx);
    const dusk = DaySimulator.endDay(dawn.state, ctx);
    return { dawn, dusk };
  },
};
