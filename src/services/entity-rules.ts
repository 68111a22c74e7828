/**
 * Rule tables for entity extraction and event classification.
 * Tables are ordered: the first matching rule wins.
 */

import { EventType, TraitName } from '../types/index.js';

/** Patterns whose first group captures an entity name */
export const ENTITY_PATTERNS: readonly RegExp[] = [
  /([\p{L}\p{N}_]+) tamed/giu,
  /([\p{L}\p{N}_]+) died/giu,
  /([\p{L}\p{N}_]+) was killed/giu,
  /([\p{L}\p{N}_]+) joined/giu,
  /([\p{L}\p{N}_]+) left/giu,
  /([\p{L}\p{N}_]+) said/giu,
  /([\p{L}\p{N}_]+) placed/giu,
  /([\p{L}\p{N}_]+) destroyed/giu,
  /Tribe ([\p{L}\p{N}_]+)/giu,
  /Player ([\p{L}\p{N}_]+)/giu
];

export const ENTITY_STOPLIST: ReadonlySet<string> = new Set(['the', 'and', 'was', 'you', 'all', 'any']);

export const MIN_ENTITY_NAME_LENGTH = 3;

export interface EventRule {
  type: EventType;
  keywords: readonly string[];
}

export const EVENT_RULES: readonly EventRule[] = [
  { type: 'taming', keywords: ['tamed', 'tame completed', 'dinosaur tamed'] },
  { type: 'death', keywords: ['died', 'was killed', 'death'] },
  { type: 'building', keywords: ['placed', 'built', 'constructed', 'foundation'] },
  { type: 'pvp', keywords: ['destroyed', 'killed', 'raided', 'attacked'] },
  { type: 'joining', keywords: ['joined', 'connected'] },
  { type: 'leaving', keywords: ['left', 'disconnected'] },
  { type: 'tribe', keywords: ['tribe', 'invited', 'promoted', 'demoted'] },
  { type: 'chat', keywords: ['said', 'chat', 'global'] }
];

export const DETAIL_PATTERNS = {
  // group 1: level, group 2: creature phrase
  tamed: /tamed an? (?:level (\d+) )?(\p{L}[\p{L} ]*)/iu,
  level: /level (\d+)/i,
  killedBy: /killed by (?:an? |the )?([\p{L}\p{N}_]+)/iu,
  structure: /placed (?:an? )?(\p{L}+(?: \p{L}+)?)/iu,
  target: /(?:destroyed|raided|attacked|killed) (?:an? |the )?([\p{L}\p{N}_]+)/iu
} as const;

/** Prefixes that belong to the creature name rather than being the name */
export const SUBTYPE_PREFIXES: ReadonlySet<string> = new Set(['tek', 'rock', 'alpha', 'aberrant']);

/** Killers that make a death count as a PvP encounter */
export const PVP_KILLERS: ReadonlySet<string> = new Set(['player', 'tribe']);

export interface CategoryRule {
  category: string;
  members: readonly string[];
}

export const SUBTYPE_CATEGORIES: readonly CategoryRule[] = [
  { category: 'utility', members: ['ankylo', 'doedicurus', 'beaver', 'argentavis', 'quetzal'] },
  { category: 'combat', members: ['rex', 'giga', 'spino', 'carno', 'therizino'] },
  { category: 'transport', members: ['argentavis', 'quetzal', 'wyvern', 'griffin', 'phoenix'] },
  { category: 'gathering', members: ['ankylo', 'doedicurus', 'mammoth', 'therizino'] },
  { category: 'tek', members: ['tek parasaur', 'tek raptor', 'tek rex', 'tek stego'] },
  { category: 'rare', members: ['wyvern', 'griffin', 'phoenix', 'reaper', 'rock drake'] }
];

export const UNCATEGORIZED = 'other';

export const PERSONALITY_LABELS: Readonly<Partial<Record<TraitName, string>>> = {
  tamer: 'dinosaur enthusiast',
  builder: 'master architect',
  aggressive: 'PvP warrior',
  social: 'community leader',
  explorer: 'adventurous survivor'
};

export const TRAIT_NAMES: readonly TraitName[] = ['aggressive', 'builder', 'tamer', 'explorer', 'social'];

export const PROFILE_THRESHOLDS = {
  casualTraitCeiling: 0.3,
  favoriteSubtype: 2,
  favoriteCategory: 3,
  building: 10,
  pvp: 5,
  notableDeaths: 20,
  notableTames: 15,
  notableStructures: 50,
  maxActivities: 3,
  maxStats: 2
} as const;
