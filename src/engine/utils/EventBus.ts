// ─────────────────────────────────────────────
//  Typed Event Bus
//  One bus per engine instance; systems stay pure and
//  the coordinator publishes what happened.
// ─────────────────────────────────────────────

import type { AchievementId, VictoryType } from '@/engine/data/types/Legacy';
import type { TechnologyId, SecretId } from '@/engine/data/types/Progression';
import type { CharacterId } from '@/engine/data/types/Character';
import type { RandomEventId } from '@/engine/data/types/Calendar';
import type { DayPhase } from '@/engine/state/SettlementStore';

/** Centralised map of all settlement events and their payload types */
export interface SettlementEventMap {
  // Day cycle
  phaseChanged:        { phase: DayPhase; day: number };
  dayEnded:            { day: number; population: number; happiness: number };
  autosaveDue:         { day: number };

  // Progression
  achievementUnlocked: { id: AchievementId };
  technologyResearched:{ id: TechnologyId };
  secretDiscovered:    { id: SecretId };

  // World
  randomEvent:         { id: RandomEventId; day: number };
  populationChanged:   { from: number; to: number; cause: 'birth' | 'starvation' };
  relationshipChanged: { character: CharacterId; from: number; to: number };

  // Outcome
  victory:             { type: VictoryType; day: number };
}

type Listener<T> = (payload: T) => void;
type ListenerTable<M> = { [K in keyof M]?: Listener<M[K]>[] };

export class TypedEventBus<M extends object> {
  private listeners: ListenerTable<M> = {};

  on<K extends keyof M>(event: K, listener: Listener<M[K]>): void {
    const arr = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
  }

  off<K extends keyof M>(event: K, listener: Listener<M[K]>): void {
    const arr = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const arr = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners */
  clear(): void {
    this.listeners = {};
  }
}

export type SettlementEventBus = TypedEventBus<SettlementEventMap>;

export function createEventBus(): SettlementEventBus {
  return new TypedEventBus<SettlementEventMap>();
}
