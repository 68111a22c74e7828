/**
 * Semantic Memory Store
 * Embeds past responses with their source lines and retrieves the ones most
 * similar to a new batch of events
 */

import { createHash } from 'crypto';
import { SemanticConfig } from '../config.js';
import { MemoryRecord, ScoredMemory, TierResult } from '../types/index.js';
import { EmbeddingDimensionError } from '../utils/errors.js';
import { Logger, createLogger, describeError } from '../utils/logger.js';
import { cosineSimilarity, dotProduct, interpretSimilarity, magnitude } from '../utils/similarity.js';
import { degraded, empty, fromList } from '../utils/tier-result.js';
import { EmbeddingProvider } from './embeddings.js';
import { MemoryRepository } from './memory-repository.js';

export interface SimilarityExplanation {
  text1Preview: string;
  text2Preview: string;
  dimensions: number;
  magnitude1: number;
  magnitude2: number;
  dotProduct: number;
  cosineSimilarity: number;
  interpretation: string;
  passesThreshold: boolean;
  threshold: number;
}

export interface SemanticMemoryStats {
  enabled: boolean;
  totalMemories: number;
  memoriesByOwner: Record<string, number>;
  embeddingModel: string | null;
  dimensions: number | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const PREVIEW_CHARS = 100;

export function combineMemoryText(responseText: string, sourceText: string): string {
  return `Response: ${responseText}\n\nContext: ${sourceText}`;
}

export function contentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

export class SemanticMemoryStore {
  private disabledReason: string | null = null;
  private dimensions: number | null = null;

  constructor(
    private readonly repository: MemoryRepository,
    private readonly embeddings: EmbeddingProvider | null,
    private readonly config: SemanticConfig,
    private readonly logger: Logger = createLogger('semantic-memory'),
    private readonly now: () => Date = () => new Date()
  ) {
    if (!config.enabled || embeddings === null) {
      this.disable('semantic memory is turned off');
    }
  }

  get isEnabled(): boolean {
    return this.disabledReason === null;
  }

  /**
   * Embed and persist a response together with the lines it was written for.
   * Returns false for duplicates and whenever the memory could not be written.
   */
  async store(
    ownerKey: string,
    responseText: string,
    sourceText: string,
    metadata: Record<string, unknown> = {}
  ): Promise<boolean> {
    if (!this.isEnabled) return false;

    const combined = combineMemoryText(responseText, sourceText);
    const hash = contentHash(combined);

    try {
      if (this.repository.exists(ownerKey, hash)) {
        this.logger.debug(`Memory already stored for ${ownerKey} (${hash.slice(0, 8)})`);
        return false;
      }
    } catch (error) {
      this.logger.error(`Failed to check for duplicate memory: ${describeError(error)}`);
      return false;
    }

    const embedding = await this.embed(combined);
    if (embedding === null) return false;

    try {
      const expected = this.expectedDimensions(embedding.length);
      if (embedding.length !== expected) {
        throw new EmbeddingDimensionError(expected, embedding.length);
      }

      const timestamp = this.now().toISOString();
      const record: MemoryRecord = {
        id: `${ownerKey}_${timestamp}_${hash.slice(0, 8)}`,
        ownerKey,
        contentHash: hash,
        responseText,
        sourceText,
        embedding,
        timestamp,
        metadata: {
          ...metadata,
          owner: ownerKey,
          timestamp,
          sourceLineCount: sourceText.split('\n').filter(line => line.trim() !== '').length
        }
      };

      const inserted = this.repository.insert(record);
      if (inserted) {
        this.logger.debug(`Stored memory for ${ownerKey}: ${preview(responseText)}`);
      }
      return inserted;
    } catch (error) {
      this.logger.error(`Failed to store memory for ${ownerKey}: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Response texts of the most similar past memories, best first
   */
  async search(queryText: string, ownerKey: string): Promise<string[]> {
    const result = await this.searchDetailed(queryText, ownerKey);
    return result.value.map(memory => memory.responseText);
  }

  async searchDetailed(queryText: string, ownerKey: string): Promise<TierResult<ScoredMemory[]>> {
    if (!this.isEnabled) return empty([]);

    const query = await this.embed(queryText);
    if (query === null) {
      return degraded([], this.disabledReason ?? 'embedding unavailable');
    }

    let records: MemoryRecord[];
    try {
      records = this.repository.listByOwner(ownerKey);
    } catch (error) {
      this.logger.error(`Failed to load memories for ${ownerKey}: ${describeError(error)}`);
      return degraded([], error);
    }

    const scored: ScoredMemory[] = [];
    let skipped = 0;
    for (const record of records) {
      if (record.embedding.length !== query.length) {
        skipped++;
        continue;
      }
      const similarity = cosineSimilarity(query, record.embedding);
      if (similarity >= this.config.relevanceThreshold) {
        scored.push({ responseText: record.responseText, similarity, timestamp: record.timestamp });
      }
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} memories for ${ownerKey} with mismatched embedding dimensions`);
    }

    scored.sort((a, b) => b.similarity - a.similarity);
    const top = scored.slice(0, this.config.topK);

    this.logger.debug(
      `Found ${top.length} relevant memories for ${ownerKey} ` +
      `(${records.length} searched, threshold ${this.config.relevanceThreshold})`
    );
    return fromList(top);
  }

  /**
   * Similarity breakdown for two texts, or null when embeddings are unavailable
   */
  async explainSimilarity(text1: string, text2: string): Promise<SimilarityExplanation | null> {
    if (!this.isEnabled) return null;

    const first = await this.embed(text1);
    const second = first === null ? null : await this.embed(text2);
    if (first === null || second === null) return null;

    const similarity = cosineSimilarity(first, second);
    return {
      text1Preview: preview(text1),
      text2Preview: preview(text2),
      dimensions: first.length,
      magnitude1: magnitude(first),
      magnitude2: magnitude(second),
      dotProduct: dotProduct(first, second),
      cosineSimilarity: similarity,
      interpretation: interpretSimilarity(similarity),
      passesThreshold: similarity >= this.config.relevanceThreshold,
      threshold: this.config.relevanceThreshold
    };
  }

  getStats(): SemanticMemoryStats {
    const stats = this.repository.stats();
    return {
      enabled: this.isEnabled,
      totalMemories: stats.total,
      memoriesByOwner: stats.byOwner,
      embeddingModel: this.embeddings?.model ?? null,
      dimensions: this.dimensions ?? this.repository.knownDimensions()
    };
  }

  /**
   * Delete memories older than `days`; returns how many were removed
   */
  cleanupOlderThan(days: number): number {
    const cutoff = new Date(this.now().getTime() - days * DAY_MS);
    const deleted = this.repository.deleteOlderThan(cutoff);
    if (deleted > 0) {
      this.logger.info(`Cleaned up ${deleted} memories older than ${days} days`);
    }
    return deleted;
  }

  private async embed(text: string): Promise<number[] | null> {
    if (this.embeddings === null || !this.isEnabled) return null;

    try {
      return await this.embeddings.embed(text);
    } catch (error) {
      this.disable(describeError(error));
      return null;
    }
  }

  /** Dimension of the first stored embedding, or of the first one seen */
  private expectedDimensions(candidate: number): number {
    if (this.dimensions === null) {
      this.dimensions = this.repository.knownDimensions() ?? candidate;
    }
    return this.dimensions;
  }

  private disable(reason: string): void {
    if (this.disabledReason !== null) return;
    this.disabledReason = reason;
    this.logger.warn(`Semantic memory disabled: ${reason}`);
  }
}
