/**
 * Core type definitions for the context assembly engine
 */

export interface SummaryRecord {
  id: number;
  ownerKey: string;
  timestamp: string; // ISO timestamp
  text: string;
  tokenCount: number;
}

export interface MemoryRecord {
  id: string;
  ownerKey: string;
  contentHash: string;
  responseText: string;
  sourceText: string;
  embedding: number[];
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface ScoredMemory {
  responseText: string;
  similarity: number;
  timestamp: string;
}

export type EventType =
  | 'taming'
  | 'death'
  | 'building'
  | 'pvp'
  | 'joining'
  | 'leaving'
  | 'tribe'
  | 'chat';

export type TraitName = 'tamer' | 'builder' | 'aggressive' | 'social' | 'explorer';

export interface EventDetails {
  subtype?: string;   // creature tamed
  category?: string;  // creature category
  level?: number;
  killedBy?: string;
  structure?: string;
  target?: string;
}

export interface ClassifiedEvent {
  type: EventType | 'unknown';
  details: EventDetails;
  raw: string;
}

export interface EntityProfile {
  entityName: string;
  firstSeen: string;
  lastSeen: string;
  counters: Partial<Record<EventType, number>>;
  favoriteSubtypes: Record<string, number>;
  subtypeCategories: Record<string, number>;
  traitVector: Partial<Record<TraitName, number>>;
}

export interface EntityEvent {
  entityName: string;
  eventType: EventType;
  details: EventDetails;
  ownerKey: string;
  timestamp: string;
}

export interface ConversationThread {
  records: SummaryRecord[];
  startedAt: string;
  endedAt: string;
  /** Mean relatedness between consecutive records (1 for single-record threads) */
  cohesion: number;
}

/**
 * Result of one retrieval tier. `empty` means the tier worked and found
 * nothing; `degraded` means it failed and `value` is a stand-in.
 */
export type TierResult<T> =
  | { status: 'success'; value: T }
  | { status: 'empty'; value: T }
  | { status: 'degraded'; value: T; error: string };

export type Headroom = 'ok' | 'limited';

export interface BudgetAllocation {
  promptTokens: number;
  available: number;
  numPredict: number;
  headroom: Headroom;
}

export type AssemblyStage =
  | 'idle'
  | 'extracting'
  | 'retrieving'
  | 'merging'
  | 'budget-computed'
  | 'ready';

export interface AssembledContext {
  prompt: string;
  entities: string[];
  numPredict: number;
  allocation: BudgetAllocation;
  tiers: {
    profiles: TierResult<string[]>;
    history: TierResult<string[]>;
    memories: TierResult<string[]>;
    entityContext: TierResult<string>;
  };
}

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; error: string };
