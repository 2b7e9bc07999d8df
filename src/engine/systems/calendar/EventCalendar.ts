// ─────────────────────────────────────────────
//  Event Calendar — scheduled windows + random events
//  Windows are drawn once at world creation and never regenerated.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { CalendarState, EventWindow, RandomEventData } from '@/engine/data/types/Calendar';
import type { Catalog } from '@/engine/data/types/Catalog';
import { entriesOf } from '@/engine/data/types/Resource';
import type { SettlementState } from '@/engine/state/SettlementState';
import type { RandomSource } from '@/engine/utils/SeededRandom';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { EcosystemSystem } from '../ecosystem/EcosystemSystem';

export interface RandomEventOutcome {
  state: SettlementState;
  event: RandomEventData | null;
}

export const EventCalendar = {
  /** Draw order is fixed: primary start, secondary start, duration. */
  generate(rng: RandomSource, catalog: Catalog): CalendarState {
    const rules = catalog.calendar;
    return {
      primaryStart: rng.nextInt(...rules.primaryStart),
      secondaryStart: rng.nextInt(...rules.secondaryStart),
      duration: rng.nextInt(...rules.duration),
    };
  },

  /** Primary window first, then the derived windows in catalog order. Bounds are inclusive. */
  windows(calendar: CalendarState, catalog: Catalog): EventWindow[] {
    const rules = catalog.calendar;
    const { primaryStart, secondaryStart, duration } = calendar;
    return [
      {
        start: primaryStart,
        end: primaryStart + duration,
        hostility: rules.primary.hostility,
        market: rules.primary.market,
        primary: true,
      },
      ...rules.derived.map(d => {
        const start = secondaryStart * d.startFactor;
        return {
          start,
          end: start + duration * d.durationFactor,
          hostility: d.hostility,
          market: 1,
          primary: false,
        };
      }),
    ];
  },

  activeWindow(state: SettlementState, catalog: Catalog): EventWindow | undefined {
    return EventCalendar.windows(state.calendar, catalog)
      .find(w => state.day >= w.start && state.day <= w.end);
  },

  hostility(state: SettlementState, catalog: Catalog): number {
    return EventCalendar.activeWindow(state, catalog)?.hostility ?? 1;
  },

  marketModifier(state: SettlementState, catalog: Catalog): number {
    return EventCalendar.activeWindow(state, catalog)?.market ?? 1;
  },

  /** Roll for a flavor event and apply its deltas. At most one per call. */
  maybeTrigger(state: SettlementState, catalog: Catalog, rng: RandomSource): RandomEventOutcome {
    const { chance, table } = catalog.randomEvents;
    if (!rng.chance(chance)) return { state, event: null };
    const event = rng.pick(table);
    if (!event) return { state, event: null };

    const next = produce(state, draft => {
      for (const [id, delta] of entriesOf(event.deltas)) {
        ResourceLedger.adjust(draft, catalog, id, delta);
      }
      if (event.biomeDamage) {
        EcosystemSystem.damageBiome(draft, event.biomeDamage.biome, event.biomeDamage.amount);
      }
    });
    return { state: next, event };
  },
};
