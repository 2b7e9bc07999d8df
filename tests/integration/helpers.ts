// ─────────────────────────────────────────────
//  Integration Test Helpers
//  Headless settlements with scripted randomness.
//  Drive them through systems, actions or the engine.
// ─────────────────────────────────────────────

import { produce, type Draft } from 'immer';
import type { EngineConfig } from '@/engine/data/types/Config';
import { DEFAULT_CONFIG } from '@/engine/data/types/Config';
import type { SettlementState } from '@/engine/state/SettlementState';
import type { ActionResult, EngineContext, SettlementError } from '@/engine/state/SettlementAction';
import type { RandomSource } from '@/engine/utils/SeededRandom';
import { loadCatalog } from '@/engine/loader/CatalogLoader';
import { createSettlement } from '@/engine/systems/world/SettlementFactory';

export const catalog = loadCatalog();

// ── Randomness ───────────────────────────────

/**
 * Plays back the given next() values in order, then `fallback` forever.
 * With the default 0.5: chance(p) fails for p ≤ 0.5, market noise is
 * exactly 0, and the calendar lands on primary 40 / secondary 150 / duration 40.
 */
export class FixedRandom implements RandomSource {
  private queue: number[];
  calls = 0;

  constructor(values: number[] = [], private readonly fallback = 0.5) {
    this.queue = [...values];
  }

  push(...values: number[]): void {
    this.queue.push(...values);
  }

  next(): number {
    this.calls++;
    return this.queue.shift() ?? this.fallback;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.next() * items.length)];
  }
}

// ── Context + state factories ────────────────

export function makeContext(
  config: Partial<EngineConfig> = {},
  rng: RandomSource = new FixedRandom(),
): EngineContext {
  return { catalog, config: { ...DEFAULT_CONFIG, seed: 1, ...config }, rng };
}

/** Fresh day-0 settlement, optionally tweaked. Draws the calendar from a neutral rng. */
export function makeState(
  recipe?: (draft: Draft<SettlementState>) => void,
  config: Partial<EngineConfig> = {},
): SettlementState {
  const base = createSettlement(makeContext(config));
  return recipe ? produce(base, recipe) : base;
}

// ── Result helpers ───────────────────────────

export function expectOk(result: ActionResult): SettlementState {
  if (!result.ok) throw new Error(`expected success, got ${JSON.stringify(result.error)}`);
  return result.state;
}

export function expectError(result: ActionResult): SettlementError {
  if (result.ok) throw new Error('expected failure, got success');
  return result.error;
}
