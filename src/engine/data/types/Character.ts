// ─────────────────────────────────────────────
//  Character Types — NPC relationships
// ─────────────────────────────────────────────

import type { ResourceId } from './Resource';
import type { BiomeId } from './Ecosystem';
import type { TechnologyId, SecretId } from './Progression';

export const CHARACTER_IDS = ['forest_elder', 'mine_master', 'lore_keeper'] as const;
export type CharacterId = typeof CHARACTER_IDS[number];

export const TRAIT_IDS = [
  'environmentalist', 'wise', 'patient',
  'pragmatic', 'blacksmith', 'progressive',
  'scholar', 'curious', 'traditionalist',
] as const;
export type TraitId = typeof TRAIT_IDS[number];

export const CHARACTER_ACTION_IDS = [
  'deforestation', 'build_sawmill', 'build_herbalist', 'research_ecology',
  'pollute_river', 'cleanup_pollution', 'build_forge',
] as const;
export type CharacterActionId = typeof CHARACTER_ACTION_IDS[number];

export const QUEST_IDS = [
  'protect_grove', 'restore_biodiversity',
  'find_rare_ores', 'improve_tools',
  'explore_ruins', 'recover_knowledge',
] as const;
export type QuestId = typeof QUEST_IDS[number];

export type RelationshipTier =
  | 'adores' | 'respects' | 'friendly' | 'neutral'
  | 'wary' | 'displeased' | 'hostile' | 'hates';

/** Who reacts when the player does something: everyone, or only holders of a trait */
export interface CharacterReaction {
  action: CharacterActionId;
  trait?: TraitId;
}

export interface ActionImpact {
  impact: number;
  tags: string[];
}

/** Trait-conditioned adjustment applied when an action carries `tag` */
export interface TraitRule {
  trait: TraitId;
  tag: string;
  multiplier?: number;
  bonus?: number;
  memory: string;
}

export type QuestCondition =
  | { kind: 'biome'; biome: BiomeId; atLeast: number }
  | { kind: 'biodiversity'; atLeast: number }
  | { kind: 'resource'; resource: ResourceId; atLeast: number }
  | { kind: 'research'; atLeast: number }
  | { kind: 'technology'; id: TechnologyId }
  | { kind: 'secret'; id: SecretId };

export interface QuestData {
  title: string;
  condition: QuestCondition;
  relationship: number;
  grant?: { resource: ResourceId; amount: number };
}

export interface TradeOffer {
  resource: ResourceId;
  markup: number;
}

export interface CharacterData {
  name: string;
  description: string;
  skills: Record<string, number>;
  traits: TraitId[];
  startingRelationship: number;
  quests: QuestId[];
  offers: TradeOffer[];
}

/** Mutable per-save part of a character */
export interface CharacterState {
  relationship: number;
  openQuests: QuestId[];
  memory: string[];
}

export interface Greeting {
  atLeast: number;
  line: string;
}
