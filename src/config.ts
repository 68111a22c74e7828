/**
 * Engine configuration
 *
 * The environment is read exactly once, by `loadConfig`, and turned into an
 * immutable `EngineConfig`. Components receive the slice they need through
 * their constructors.
 */

import { z } from 'zod';
import { EventType, TraitName } from './types/index.js';
import { LogLevel } from './utils/logger.js';

export interface TemporalDecayStep {
  withinMinutes: number;
  score: number;
}

export interface TraitIncrement {
  trait: TraitName;
  amount: number;
}

export interface BudgetConfig {
  contextWindow: number;
  safetyBuffer: number;
  minOutputTokens: number;
  maxOutputTokens: number;
}

export interface HistoryConfig {
  conversationWeight: number;
  recentResponseLimit: number;
  threadThreshold: number;
  temporalDecay: readonly TemporalDecayStep[];
  /** Score for records further apart than the last step */
  temporalFloor: number;
}

export interface SemanticConfig {
  enabled: boolean;
  relevanceThreshold: number;
  topK: number;
  embeddingModel: string;
  baseURL: string;
  apiKey: string;
}

export interface ProfileConfig {
  cacheTtlMs: number;
  blurbCharCap: number;
  maxEntities: number;
  traitIncrements: Readonly<Partial<Record<EventType, TraitIncrement>>>;
}

export interface AssemblerConfig {
  promptTokenBudget: number;
  historyShare: number;
  tierTimeoutMs: number;
}

export interface GenerationConfig {
  baseURL: string;
  apiKey: string;
  model: string;
  temperature: number;
  tone: string;
}

export interface EngineConfig {
  databasePath: string;
  logLevel: LogLevel;
  tokenizerEncoding: TokenizerEncoding;
  budget: BudgetConfig;
  history: HistoryConfig;
  semantic: SemanticConfig;
  profiles: ProfileConfig;
  assembler: AssemblerConfig;
  generation: GenerationConfig;
  minEventLines: number;
}

export const TOKENIZER_ENCODINGS = ['cl100k_base', 'p50k_base', 'r50k_base', 'gpt2', 'none'] as const;
export type TokenizerEncoding = (typeof TOKENIZER_ENCODINGS)[number];

// Hand-tuned; treat as defaults rather than fixed behavior
export const DEFAULT_TEMPORAL_DECAY: readonly TemporalDecayStep[] = [
  { withinMinutes: 5, score: 1.0 },
  { withinMinutes: 15, score: 0.8 },
  { withinMinutes: 60, score: 0.6 },
  { withinMinutes: 240, score: 0.3 }
];

export const DEFAULT_TRAIT_INCREMENTS: Readonly<Partial<Record<EventType, TraitIncrement>>> = {
  taming: { trait: 'tamer', amount: 0.1 },
  building: { trait: 'builder', amount: 0.1 },
  pvp: { trait: 'aggressive', amount: 0.05 },
  chat: { trait: 'social', amount: 0.05 },
  tribe: { trait: 'social', amount: 0.05 }
};

const envFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(value => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const ratio = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);
const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const EnvSchema = z
  .object({
    DB_PATH: z.string().min(1).default('./data/recap.db'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    DEBUG: envFlag(false),

    CONTEXT_WINDOW: positiveInt(4096),
    SAFETY_BUFFER: z.coerce.number().int().min(0).default(48),
    MIN_OUTPUT_TOKENS: positiveInt(64),
    MAX_OUTPUT_TOKENS: positiveInt(512),
    TOKENIZER_ENCODING: z.enum(TOKENIZER_ENCODINGS).default('cl100k_base'),

    PROMPT_TOKEN_BUDGET: positiveInt(2048),
    HISTORY_SHARE: ratio(0.6),
    TIER_TIMEOUT_MS: positiveInt(3000),

    CONVERSATION_WEIGHT: ratio(0.3),
    RECENT_RESPONSE_LIMIT: positiveInt(5),
    THREAD_THRESHOLD: ratio(0.3),

    SEMANTIC_MEMORY_ENABLED: envFlag(true),
    MEMORY_RELEVANCE_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.7),
    MAX_MEMORIES_PER_SEARCH: positiveInt(3),
    EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBEDDING_BASE_URL: z.string().url().optional(),

    PROFILE_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),
    ENTITY_BLURB_CHAR_CAP: positiveInt(800),

    MIN_EVENT_LINES: z.coerce.number().int().min(0).default(3),

    LLM_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    LLM_API_KEY: z.string().min(1).default('ollama'),
    LLM_MODEL: z.string().min(1).default('llama3.1'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.8),
    AI_TONE: z.string().default('funny and sarcastic')
  })
  .superRefine((env, ctx) => {
    if (env.MIN_OUTPUT_TOKENS > env.MAX_OUTPUT_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_OUTPUT_TOKENS'],
        message: `MIN_OUTPUT_TOKENS (${env.MIN_OUTPUT_TOKENS}) exceeds MAX_OUTPUT_TOKENS (${env.MAX_OUTPUT_TOKENS})`
      });
    }
    if (env.SAFETY_BUFFER >= env.CONTEXT_WINDOW) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SAFETY_BUFFER'],
        message: 'SAFETY_BUFFER must be smaller than CONTEXT_WINDOW'
      });
    }
  });

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the engine configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Empty strings mean "unset" in .env files
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  const e = result.data;

  return {
    databasePath: e.DB_PATH,
    logLevel: e.LOG_LEVEL ?? (e.DEBUG ? 'debug' : 'info'),
    tokenizerEncoding: e.TOKENIZER_ENCODING,
    budget: {
      contextWindow: e.CONTEXT_WINDOW,
      safetyBuffer: e.SAFETY_BUFFER,
      minOutputTokens: e.MIN_OUTPUT_TOKENS,
      maxOutputTokens: e.MAX_OUTPUT_TOKENS
    },
    history: {
      conversationWeight: e.CONVERSATION_WEIGHT,
      recentResponseLimit: e.RECENT_RESPONSE_LIMIT,
      threadThreshold: e.THREAD_THRESHOLD,
      temporalDecay: DEFAULT_TEMPORAL_DECAY,
      temporalFloor: 0.1
    },
    semantic: {
      enabled: e.SEMANTIC_MEMORY_ENABLED,
      relevanceThreshold: e.MEMORY_RELEVANCE_THRESHOLD,
      topK: e.MAX_MEMORIES_PER_SEARCH,
      embeddingModel: e.EMBEDDING_MODEL,
      baseURL: e.EMBEDDING_BASE_URL ?? e.LLM_BASE_URL,
      apiKey: e.LLM_API_KEY
    },
    profiles: {
      cacheTtlMs: e.PROFILE_CACHE_TTL_MS,
      blurbCharCap: e.ENTITY_BLURB_CHAR_CAP,
      maxEntities: 5,
      traitIncrements: DEFAULT_TRAIT_INCREMENTS
    },
    assembler: {
      promptTokenBudget: e.PROMPT_TOKEN_BUDGET,
      historyShare: e.HISTORY_SHARE,
      tierTimeoutMs: e.TIER_TIMEOUT_MS
    },
    generation: {
      baseURL: e.LLM_BASE_URL,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      tone: e.AI_TONE
    },
    minEventLines: e.MIN_EVENT_LINES
  };
}
