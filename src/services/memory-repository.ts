/**
 * Memory Repository - persisted response/context pairs with their embeddings
 */

import { MemoryRecord } from '../types/index.js';
import { SqliteDatabase, decodeEmbedding, encodeEmbedding, withStorage } from './storage.js';

export interface MemoryStats {
  total: number;
  byOwner: Record<string, number>;
}

export interface MemoryRepository {
  exists(ownerKey: string, contentHash: string): boolean;
  /** @returns false when a record with the same owner and hash already exists */
  insert(record: MemoryRecord): boolean;
  /** Records for an owner, newest first */
  listByOwner(ownerKey: string): MemoryRecord[];
  /** Embedding length of any stored record, or null when the table is empty */
  knownDimensions(): number | null;
  stats(): MemoryStats;
  deleteOlderThan(cutoff: Date): number;
}

interface MemoryRow {
  id: string;
  owner_key: string;
  content_hash: string;
  response_text: string;
  source_text: string;
  embedding: Buffer;
  timestamp: string;
  metadata: string;
}

function parseMetadata(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toRecord(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    ownerKey: row.owner_key,
    contentHash: row.content_hash,
    responseText: row.response_text,
    sourceText: row.source_text,
    embedding: decodeEmbedding(row.embedding),
    timestamp: row.timestamp,
    metadata: parseMetadata(row.metadata)
  };
}

export class SqliteMemoryRepository implements MemoryRepository {
  constructor(private readonly db: SqliteDatabase) {}

  exists(ownerKey: string, contentHash: string): boolean {
    return withStorage('check memory hash', () =>
      this.db
        .prepare<[string, string], { found: number }>(
          'SELECT 1 AS found FROM memories WHERE owner_key = ? AND content_hash = ? LIMIT 1'
        )
        .get(ownerKey, contentHash) !== undefined
    );
  }

  insert(record: MemoryRecord): boolean {
    return withStorage('insert memory', () => {
      const info = this.db
        .prepare<[string, string, string, string, string, Buffer, number, string, string]>(
          `INSERT OR IGNORE INTO memories
             (id, owner_key, content_hash, response_text, source_text, embedding, dimensions, timestamp, metadata)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.id,
          record.ownerKey,
          record.contentHash,
          record.responseText,
          record.sourceText,
          encodeEmbedding(record.embedding),
          record.embedding.length,
          record.timestamp,
          JSON.stringify(record.metadata)
        );
      return info.changes === 1;
    });
  }

  listByOwner(ownerKey: string): MemoryRecord[] {
    return withStorage('list memories', () =>
      this.db
        .prepare<[string], MemoryRow>(
          `SELECT id, owner_key, content_hash, response_text, source_text, embedding, timestamp, metadata
             FROM memories WHERE owner_key = ? ORDER BY timestamp DESC`
        )
        .all(ownerKey)
        .map(toRecord)
    );
  }

  knownDimensions(): number | null {
    return withStorage('read embedding dimensions', () => {
      const row = this.db
        .prepare<[], { dimensions: number }>('SELECT dimensions FROM memories LIMIT 1')
        .get();
      return row ? row.dimensions : null;
    });
  }

  stats(): MemoryStats {
    return withStorage('memory stats', () => {
      const rows = this.db
        .prepare<[], { owner_key: string; total: number }>(
          'SELECT owner_key, COUNT(*) AS total FROM memories GROUP BY owner_key'
        )
        .all();

      const byOwner: Record<string, number> = {};
      let total = 0;
      for (const row of rows) {
        byOwner[row.owner_key] = row.total;
        total += row.total;
      }
      return { total, byOwner };
    });
  }

  deleteOlderThan(cutoff: Date): number {
    return withStorage('delete old memories', () =>
      this.db.prepare<[string]>('DELETE FROM memories WHERE timestamp < ?').run(cutoff.toISOString()).changes
    );
  }
}
