/**
 * Summary Store - persisted generated responses, one stream per owner key
 */

import { SummaryRecord } from '../types/index.js';
import { TokenCounter } from '../utils/token-counter.js';
import { SqliteDatabase, withStorage } from './storage.js';

export interface SummaryStatistics {
  ownerKey: string;
  totalSummaries: number;
  recentSummaries7d: number;
  earliestSummary: string | null;
  latestSummary: string | null;
  coverageDays: number;
}

export interface SummaryStore {
  append(ownerKey: string, text: string, timestamp?: Date): SummaryRecord;
  /** Most recent records, newest first */
  recent(ownerKey: string, limit: number): SummaryRecord[];
  /** All records, newest first, loaded lazily */
  newestFirst(ownerKey: string): Iterable<SummaryRecord>;
  /** Records at or after the cutoff, oldest first */
  since(ownerKey: string, cutoff: Date): SummaryRecord[];
  hasOwner(ownerKey: string): boolean;
  statistics(ownerKey: string, now?: Date): SummaryStatistics;
}

interface SummaryRow {
  id: number;
  owner_key: string;
  timestamp: string;
  text: string;
  token_count: number;
}

interface RangeRow {
  total: number;
  earliest: string | null;
  latest: string | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function toRecord(row: SummaryRow): SummaryRecord {
  return {
    id: row.id,
    ownerKey: row.owner_key,
    timestamp: row.timestamp,
    text: row.text,
    tokenCount: row.token_count
  };
}

export class SqliteSummaryStore implements SummaryStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly tokenCounter: TokenCounter
  ) {}

  append(ownerKey: string, text: string, timestamp: Date = new Date()): SummaryRecord {
    // Same counter as the budget checks, floored at 1 for the table constraint
    const tokenCount = Math.max(1, this.tokenCounter.countText(text));
    const iso = timestamp.toISOString();

    return withStorage('append summary', () => {
      const info = this.db
        .prepare<[string, string, string, number]>(
          'INSERT INTO summaries (owner_key, timestamp, text, token_count) VALUES (?, ?, ?, ?)'
        )
        .run(ownerKey, iso, text, tokenCount);

      return { id: Number(info.lastInsertRowid), ownerKey, timestamp: iso, text, tokenCount };
    });
  }

  recent(ownerKey: string, limit: number): SummaryRecord[] {
    return withStorage('read recent summaries', () =>
      this.db
        .prepare<[string, number], SummaryRow>(
          'SELECT id, owner_key, timestamp, text, token_count FROM summaries WHERE owner_key = ? ORDER BY id DESC LIMIT ?'
        )
        .all(ownerKey, limit)
        .map(toRecord)
    );
  }

  *newestFirst(ownerKey: string): Iterable<SummaryRecord> {
    const rows = withStorage('iterate summaries', () =>
      this.db
        .prepare<[string], SummaryRow>(
          'SELECT id, owner_key, timestamp, text, token_count FROM summaries WHERE owner_key = ? ORDER BY id DESC'
        )
        .iterate(ownerKey)
    );

    for (const row of rows) {
      yield toRecord(row);
    }
  }

  since(ownerKey: string, cutoff: Date): SummaryRecord[] {
    return withStorage('read summaries by timeframe', () =>
      this.db
        .prepare<[string, string], SummaryRow>(
          'SELECT id, owner_key, timestamp, text, token_count FROM summaries WHERE owner_key = ? AND timestamp >= ? ORDER BY id ASC'
        )
        .all(ownerKey, cutoff.toISOString())
        .map(toRecord)
    );
  }

  hasOwner(ownerKey: string): boolean {
    return withStorage('check owner', () =>
      this.db
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM summaries WHERE owner_key = ? LIMIT 1')
        .get(ownerKey) !== undefined
    );
  }

  statistics(ownerKey: string, now: Date = new Date()): SummaryStatistics {
    return withStorage('summary statistics', () => {
      const range = this.db
        .prepare<[string], RangeRow>(
          'SELECT COUNT(*) AS total, MIN(timestamp) AS earliest, MAX(timestamp) AS latest FROM summaries WHERE owner_key = ?'
        )
        .get(ownerKey);

      const weekAgo = new Date(now.getTime() - 7 * DAY_MS).toISOString();
      const recentRow = this.db
        .prepare<[string, string], { total: number }>(
          'SELECT COUNT(*) AS total FROM summaries WHERE owner_key = ? AND timestamp >= ?'
        )
        .get(ownerKey, weekAgo);

      const earliest = range?.earliest ?? null;
      return {
        ownerKey,
        totalSummaries: range?.total ?? 0,
        recentSummaries7d: recentRow?.total ?? 0,
        earliestSummary: earliest,
        latestSummary: range?.latest ?? null,
        coverageDays: earliest ? Math.floor((now.getTime() - Date.parse(earliest)) / DAY_MS) : 0
      };
    });
  }
}
