// ─────────────────────────────────────────────
//  Relationship System — NPC affinity, dialogue, trade, quests
//  Scores live in [-100, 100]; memory is append-only.
// ─────────────────────────────────────────────

import { produce, type Draft } from 'immer';
import type {
  CharacterActionId, CharacterId, CharacterReaction,
  QuestCondition, QuestId, RelationshipTier,
} from '@/engine/data/types/Character';
import { CHARACTER_IDS } from '@/engine/data/types/Character';
import type { Catalog } from '@/engine/data/types/Catalog';
import type { SettlementState } from '@/engine/state/SettlementState';
import { fail, succeed, type ActionResult, type EngineContext } from '@/engine/state/SettlementAction';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';
import { ResourceLedger } from '../ledger/ResourceLedger';
import { MarketSystem } from '../market/MarketSystem';

const TIERS: Array<[number, RelationshipTier]> = [
  [80, 'adores'],
  [60, 'respects'],
  [40, 'friendly'],
  [20, 'neutral'],
  [0, 'wary'],
  [-20, 'displeased'],
  [-40, 'hostile'],
];

export interface ReactionOutcome {
  delta: number;
  memories: string[];
}

function unknownCharacter(id: string): ActionResult {
  return fail({ kind: 'invalid_reference', reference: { kind: 'character', id } });
}

export const RelationshipSystem = {
  tier(score: number): RelationshipTier {
    for (const [atLeast, tier] of TIERS) {
      if (score >= atLeast) return tier;
    }
    return 'hates';
  },

  scoreOf(state: SettlementState, id: CharacterId): number {
    return state.characters[id]?.relationship ?? 0;
  },

  /** Base impact from the action table, adjusted by the character's trait rules. */
  impactOf(catalog: Catalog, id: CharacterId, action: CharacterActionId): ReactionOutcome {
    const entry = catalog.actionImpacts[action];
    const traits = catalog.characters[id]?.traits ?? [];
    if (!entry) return { delta: 0, memories: [] };

    let delta = entry.impact;
    const memories: string[] = [];
    for (const rule of catalog.traitRules) {
      if (!traits.includes(rule.trait) || !entry.tags.includes(rule.tag)) continue;
      if (rule.multiplier !== undefined) delta *= rule.multiplier;
      if (rule.bonus !== undefined) delta += rule.bonus;
      memories.push(rule.memory);
    }
    return { delta, memories };
  },

  reactToAction(draft: Draft<SettlementState>, catalog: Catalog, id: CharacterId, action: CharacterActionId): void {
    const character = draft.characters[id];
    if (!character) return;
    const { delta, memories } = RelationshipSystem.impactOf(catalog, id, action);
    character.relationship = MathUtils.clamp(character.relationship + delta, -100, 100);
    character.memory.push(...memories);
  },

  /** Every character the reaction targets (all, or holders of its trait) reacts. */
  applyReaction(draft: Draft<SettlementState>, catalog: Catalog, reaction: CharacterReaction): void {
    for (const id of CHARACTER_IDS) {
      const traits = catalog.characters[id]?.traits ?? [];
      if (reaction.trait !== undefined && !traits.includes(reaction.trait)) continue;
      RelationshipSystem.reactToAction(draft, catalog, id, reaction.action);
    }
  },

  greeting(catalog: Catalog, score: number): string {
    let line = catalog.greetings[0]?.line ?? '';
    let best = -Infinity;
    for (const g of catalog.greetings) {
      if (g.atLeast <= score && g.atLeast > best) {
        best = g.atLeast;
        line = g.line;
      }
    }
    return line;
  },

  /** Greets by the current score; talking warms the character up to the ceiling. */
  talk(state: SettlementState, ctx: EngineContext, id: CharacterId): ActionResult {
    const { catalog } = ctx;
    const character = state.characters[id];
    const data = catalog.characters[id];
    if (!character || !data) return unknownCharacter(id);

    const rules = catalog.relationship;
    const line = RelationshipSystem.greeting(catalog, character.relationship);
    const next = character.relationship < rules.talkCeiling
      ? produce(state, draft => {
        const c = draft.characters[id];
        if (c) c.relationship = Math.min(100, c.relationship + rules.talkBonus);
      })
      : state;
    return succeed(next, `${data.name}: "${line}"`);
  },

  canTrade(state: SettlementState, catalog: Catalog, id: CharacterId): boolean {
    return RelationshipSystem.scoreOf(state, id) >= catalog.relationship.tradeThreshold;
  },

  tradeWithCharacter(
    state: SettlementState,
    ctx: EngineContext,
    id: CharacterId,
    offerIndex: number,
    amount: number,
  ): ActionResult {
    const { catalog } = ctx;
    const character = state.characters[id];
    const data = catalog.characters[id];
    if (!character || !data) return unknownCharacter(id);

    const offer = data.offers[offerIndex];
    if (!offer) return fail({ kind: 'invalid_reference', reference: { kind: 'offer', id: `${id}#${offerIndex}` } });

    const rules = catalog.relationship;
    if (!RelationshipSystem.canTrade(state, catalog, id)) {
      return fail({
        kind: 'prerequisite_unmet',
        requirement: { kind: 'relationship', character: id, atLeast: rules.tradeThreshold },
      });
    }

    const discount = character.relationship >= rules.loyalDiscountAt ? rules.loyalDiscount : 1;
    const result = MarketSystem.trade(state, ctx, offer.resource, amount, true, offer.markup * discount);
    if (!result.ok) return result;

    return succeed(produce(result.state, draft => {
      const c = draft.characters[id];
      if (c) c.relationship = MathUtils.clamp(c.relationship + rules.tradeBonus, -100, 100);
    }), `${data.name} trades: ${result.message ?? ''}`.trim());
  },

  questMet(state: SettlementState, condition: QuestCondition): boolean {
    switch (condition.kind) {
      case 'biome': return state.ecosystem.biomes[condition.biome] >= condition.atLeast;
      case 'biodiversity': return state.ecosystem.biodiversity >= condition.atLeast;
      case 'resource': return ResourceLedger.stockOf(state, condition.resource) >= condition.atLeast;
      case 'research': return state.researchProgress >= condition.atLeast;
      case 'technology': return state.researchedTechnologies.includes(condition.id);
      case 'secret': return state.discoveredSecrets.includes(condition.id);
    }
  },

  completeQuest(state: SettlementState, ctx: EngineContext, id: CharacterId, quest: QuestId): ActionResult {
    const { catalog } = ctx;
    const character = state.characters[id];
    if (!character) return unknownCharacter(id);

    const data = catalog.quests[quest];
    if (!data || !character.openQuests.includes(quest)) {
      return fail({ kind: 'invalid_reference', reference: { kind: 'quest', id: quest } });
    }
    if (!RelationshipSystem.questMet(state, data.condition)) {
      return fail({ kind: 'prerequisite_unmet', requirement: { kind: 'quest_condition', quest } });
    }

    Logger.log(`Quest complete: ${data.title}`, 'social');
    return succeed(produce(state, draft => {
      const c = draft.characters[id];
      if (!c) return;
      c.openQuests = c.openQuests.filter(q => q !== quest);
      c.relationship = MathUtils.clamp(c.relationship + data.relationship, -100, 100);
      c.memory.push(`quest_completed:${quest}`);
      if (data.grant) ResourceLedger.adjust(draft, catalog, data.grant.resource, data.grant.amount);
    }), `Quest complete: ${data.title}`);
  },
};
