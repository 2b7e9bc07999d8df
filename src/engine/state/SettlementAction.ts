// ─────────────────────────────────────────────
//  Settlement Action — command pattern for player actions
//  Failures are values. A failed action changes no stocks; it may
//  hand back an `observed` state carrying bookkeeping only (price samples).
// ─────────────────────────────────────────────

import type { Shortfall } from '@/engine/data/types/Resource';
import type { UnlockRef } from '@/engine/data/types/Progression';
import type { CharacterId, QuestId } from '@/engine/data/types/Character';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { EngineConfig } from '@/engine/data/types/Config';
import type { RandomSource } from '@/engine/utils/SeededRandom';
import type { SettlementState } from './SettlementState';

export type ReferenceKind =
  | 'resource' | 'building' | 'mining_action' | 'recipe' | 'technology'
  | 'secret' | 'character' | 'offer' | 'quest';

export type Requirement =
  | UnlockRef
  | { kind: 'relationship'; character: CharacterId; atLeast: number }
  | { kind: 'quest_condition'; quest: QuestId };

export type SettlementError =
  | { kind: 'unaffordable'; shortfall: Shortfall[] }
  | { kind: 'invalid_reference'; reference: { kind: ReferenceKind; id: string } }
  | { kind: 'prerequisite_unmet'; requirement: Requirement }
  | { kind: 'invalid_quantity'; amount: number };

export type ActionResult =
  | { ok: true; state: SettlementState; message?: string }
  | { ok: false; error: SettlementError; observed?: SettlementState };

/** Everything an operation may read besides the state itself. */
export interface EngineContext {
  catalog: Catalog;
  config: EngineConfig;
  rng: RandomSource;
}

export interface SettlementAction {
  readonly type: string;
  execute(state: SettlementState, ctx: EngineContext): ActionResult;
}

export function succeed(state: SettlementState, message?: string): ActionResult {
  return message === undefined ? { ok: true, state } : { ok: true, state, message };
}

export function fail(error: SettlementError, observed?: SettlementState): ActionResult {
  return observed === undefined ? { ok: false, error } : { ok: false, error, observed };
}

export function describeError(error: SettlementError): string {
  switch (error.kind) {
    case 'unaffordable':
      return 'Not enough ' + error.shortfall
        .map(s => `${s.subject} (${round2(s.available)}/${round2(s.required)})`)
        .join(', ');
    case 'invalid_reference':
      return `Unknown ${error.reference.kind}: ${error.reference.id}`;
    case 'prerequisite_unmet': {
      const r = error.requirement;
      if (r.kind === 'relationship') return `${r.character} needs a relationship of ${r.atLeast}`;
      if (r.kind === 'quest_condition') return `Quest ${r.quest} is not fulfilled yet`;
      return `Requires ${r.kind} ${r.id}`;
    }
    case 'invalid_quantity':
      return `Invalid quantity: ${error.amount}`;
  }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
