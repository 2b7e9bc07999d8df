// ─────────────────────────────────────────────
//  Settlement Store — holds the current state + day phase
//  Systems produce new states with immer; the store swaps them in.
// ─────────────────────────────────────────────

import type { SettlementState } from './SettlementState';
import type { ActionResult, EngineContext, SettlementAction } from './SettlementAction';

export type DayPhase = 'dawn' | 'player_actions';

type StoreListener = (state: SettlementState) => void;

export class SettlementStore {
  private state: SettlementState;
  private phase: DayPhase = 'dawn';
  private listeners: StoreListener[] = [];

  constructor(initial: SettlementState) {
    this.state = initial;
  }

  getState(): SettlementState {
    return this.state;
  }

  getPhase(): DayPhase {
    return this.phase;
  }

  setPhase(phase: DayPhase): void {
    this.phase = phase;
  }

  /** Run a player action. A failure keeps only what it observed. */
  dispatch(action: SettlementAction, ctx: EngineContext): ActionResult {
    const result = action.execute(this.state, ctx);
    this.replace(result.ok ? result.state : result.observed ?? this.state);
    return result;
  }

  /** Replace the state with the output of a system step. */
  replace(next: SettlementState): void {
    if (next === this.state) return;
    this.state = next;
    this.notify();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
