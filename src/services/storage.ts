/**
 * SQLite storage shared by the summary, memory and profile stores
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { StorageError } from '../utils/errors.js';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS summaries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner_key TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    text TEXT NOT NULL,
    token_count INTEGER NOT NULL CHECK (token_count >= 1)
  );
  CREATE INDEX IF NOT EXISTS idx_summaries_owner ON summaries(owner_key, id);

  CREATE TABLE IF NOT EXISTS memories (
    id TEXT PRIMARY KEY,
    owner_key TEXT NOT NULL,
    content_hash TEXT NOT NULL,
    response_text TEXT NOT NULL,
    source_text TEXT NOT NULL,
    embedding BLOB NOT NULL,
    dimensions INTEGER NOT NULL,
    timestamp TEXT NOT NULL,
    metadata TEXT NOT NULL,
    UNIQUE (owner_key, content_hash)
  );
  CREATE INDEX IF NOT EXISTS idx_memories_owner_timestamp ON memories(owner_key, timestamp);

  CREATE TABLE IF NOT EXISTS entity_profiles (
    entity_name TEXT PRIMARY KEY,
    first_seen TEXT NOT NULL,
    last_seen TEXT NOT NULL,
    state TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS entity_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entity_name TEXT NOT NULL,
    event_type TEXT NOT NULL,
    details TEXT NOT NULL,
    owner_key TEXT NOT NULL,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_entity_events_owner ON entity_events(owner_key, entity_name);
`;

/**
 * Open (creating if needed) the engine database. Pass ":memory:" for an
 * in-process database.
 */
export function openDatabase(path: string): SqliteDatabase {
  try {
    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(path);
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new StorageError('open database', { cause: error });
  }
}

/**
 * Run a storage operation, wrapping driver errors in StorageError
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageError) throw error;
    throw new StorageError(operation, { cause: error });
  }
}

export function encodeEmbedding(embedding: readonly number[]): Buffer {
  const floats = Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export function decodeEmbedding(blob: Buffer): number[] {
  // Copy first: driver buffers are not guaranteed to be 4-byte aligned
  const bytes = new Uint8Array(blob.byteLength);
  bytes.set(blob);
  return Array.from(new Float32Array(bytes.buffer));
}
