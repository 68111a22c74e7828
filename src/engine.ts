/**
 * Engine wiring
 * Builds every component from one EngineConfig and one database handle
 */

import { EngineConfig } from './config.js';
import { CommentaryCycle, DeliveryChannel } from './services/commentary-cycle.js';
import { ContextAssembler } from './services/context-assembler.js';
import { ConversationThreadManager } from './services/conversation-threads.js';
import { EmbeddingProvider, OpenAIEmbeddingProvider } from './services/embeddings.js';
import { EntityProfileStore } from './services/entity-profiles.js';
import { GenerationClient, OpenAIGenerationClient } from './services/generation.js';
import { SqliteMemoryRepository } from './services/memory-repository.js';
import { ProfileCache, TtlProfileCache } from './services/profile-cache.js';
import { SqliteProfileRepository } from './services/profile-repository.js';
import { SemanticMemoryStore } from './services/semantic-memory.js';
import { SqliteDatabase, openDatabase } from './services/storage.js';
import { SqliteSummaryStore, SummaryStore } from './services/summary-store.js';
import { TokenBudgetAllocator } from './services/token-budget.js';
import { Logger, createLogger } from './utils/logger.js';
import { TokenCounter } from './utils/token-counter.js';

export interface EngineOverrides {
  db?: SqliteDatabase;
  tokenCounter?: TokenCounter;
  /** null turns semantic memory off */
  embeddings?: EmbeddingProvider | null;
  generator?: GenerationClient;
  delivery?: DeliveryChannel;
  profileCache?: ProfileCache;
  /** Root logger; each component logs through a scoped child */
  logger?: Logger;
}

export interface Engine {
  config: EngineConfig;
  db: SqliteDatabase;
  summaries: SummaryStore;
  threads: ConversationThreadManager;
  memories: SemanticMemoryStore;
  profiles: EntityProfileStore;
  allocator: TokenBudgetAllocator;
  assembler: ContextAssembler;
  cycle: CommentaryCycle;
  close(): void;
}

export const consoleDelivery: DeliveryChannel = {
  async deliver(_ownerKey, text) {
    console.log(`\n${text}\n`);
  }
};

export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  const root = overrides.logger ?? createLogger('recap', config.logLevel);
  const logger = (scope: string) => root.child(scope);
  const db = overrides.db ?? openDatabase(config.databasePath);

  const tokenCounter = overrides.tokenCounter ?? TokenCounter.forEncoding(config.tokenizerEncoding, logger('token-counter'));
  const summaries = new SqliteSummaryStore(db, tokenCounter);
  const threads = new ConversationThreadManager(summaries, config.history, logger('conversation-threads'));

  const embeddings = overrides.embeddings !== undefined
    ? overrides.embeddings
    : config.semantic.enabled ? new OpenAIEmbeddingProvider(config.semantic) : null;
  const memories = new SemanticMemoryStore(
    new SqliteMemoryRepository(db),
    embeddings,
    config.semantic,
    logger('semantic-memory')
  );

  const profiles = new EntityProfileStore(
    new SqliteProfileRepository(db),
    overrides.profileCache ?? new TtlProfileCache(config.profiles.cacheTtlMs),
    config.profiles,
    logger('entity-profiles')
  );

  const allocator = new TokenBudgetAllocator(config.budget, tokenCounter);
  const assembler = new ContextAssembler(
    summaries,
    threads,
    memories,
    profiles,
    allocator,
    config.assembler,
    logger('context-assembler')
  );

  const generator = overrides.generator ?? new OpenAIGenerationClient(config.generation, logger('generation'));
  const cycle = new CommentaryCycle(
    assembler,
    generator,
    summaries,
    memories,
    overrides.delivery ?? consoleDelivery,
    { minEventLines: config.minEventLines },
    logger('commentary-cycle')
  );

  return {
    config,
    db,
    summaries,
    threads,
    memories,
    profiles,
    allocator,
    assembler,
    cycle,
    close: () => db.close()
  };
}
