// ─────────────────────────────────────────────
//  Calendar Types — scheduled windows + random events
// ─────────────────────────────────────────────

import type { ResourceAmounts } from './Resource';
import type { BiomeId } from './Ecosystem';

export const RANDOM_EVENT_IDS = ['heavy_rains', 'storm', 'caravan', 'wildfire', 'new_deposit'] as const;
export type RandomEventId = typeof RANDOM_EVENT_IDS[number];

/** Fixed once at world creation; never regenerated on load. */
export interface CalendarState {
  primaryStart: number;
  secondaryStart: number;
  duration: number;
}

export interface DerivedWindowRule {
  /** Window starts at secondaryStart × startFactor */
  startFactor: number;
  /** Window lasts duration × durationFactor days */
  durationFactor: number;
  hostility: number;
}

export interface CalendarRules {
  primaryStart: [number, number];
  secondaryStart: [number, number];
  duration: [number, number];
  primary: { hostility: number; market: number };
  derived: DerivedWindowRule[];
}

export interface EventWindow {
  start: number;
  end: number;
  hostility: number;
  market: number;
  primary: boolean;
}

export interface RandomEventData {
  id: RandomEventId;
  text: string;
  deltas: ResourceAmounts;
  biomeDamage?: { biome: BiomeId; amount: number };
}
