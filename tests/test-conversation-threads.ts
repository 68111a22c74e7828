import { beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_TEMPORAL_DECAY, HistoryConfig } from '../src/config.js';
import { ConversationThreadManager } from '../src/services/conversation-threads.js';
import { openDatabase } from '../src/services/storage.js';
import { SqliteSummaryStore, SummaryStore } from '../src/services/summary-store.js';
import { SummaryRecord } from '../src/types/index.js';
import { StorageError } from '../src/utils/errors.js';
import { silentLogger } from '../src/utils/logger.js';
import { estimateCounter, minutesAfter } from './helpers/fakes.js';

const history: HistoryConfig = {
  conversationWeight: 0.3,
  recentResponseLimit: 5,
  threadThreshold: 0.3,
  temporalDecay: DEFAULT_TEMPORAL_DECAY,
  temporalFloor: 0.1
};

const OWNER = 'island';
const start = new Date('2025-03-01T12:00:00.000Z');

/** 160 characters, 40 estimated tokens */
const fortyTokens = (label: string) => label.padEnd(160, '.');

function record(id: number, text: string, timestamp: Date, ownerKey = OWNER): SummaryRecord {
  return { id, ownerKey, timestamp: timestamp.toISOString(), text, tokenCount: 10 };
}

describe('ConversationThreadManager', () => {
  let store: SqliteSummaryStore;
  let manager: ConversationThreadManager;

  beforeEach(() => {
    store = new SqliteSummaryStore(openDatabase(':memory:'), estimateCounter());
    manager = new ConversationThreadManager(store, history, silentLogger);
  });

  describe('getContextualHistory', () => {
    it('keeps only the newest responses that fit the conversation budget', () => {
      const narrow = new ConversationThreadManager(store, { ...history, conversationWeight: 0.5 }, silentLogger);
      store.append(OWNER, fortyTokens('first'), minutesAfter(start, 0));
      store.append(OWNER, fortyTokens('second'), minutesAfter(start, 1));
      store.append(OWNER, fortyTokens('third'), minutesAfter(start, 2));

      // 100 tokens for each portion: two 40-token records fit, the third does not
      const result = narrow.getContextualHistory(OWNER, 200);

      expect(result.status).toBe('success');
      expect(result.value).toEqual([fortyTokens('second'), fortyTokens('third')]);
    });

    it('lets the historical portion pick up what the conversation portion left out', () => {
      store.append(OWNER, fortyTokens('first'), minutesAfter(start, 0));
      store.append(OWNER, fortyTokens('second'), minutesAfter(start, 1));
      store.append(OWNER, fortyTokens('third'), minutesAfter(start, 2));

      // conversation budget floor(334 * 0.3) = 100, historical budget 234
      const result = manager.getContextualHistory(OWNER, 334);

      expect(result.value).toEqual([fortyTokens('first'), fortyTokens('second'), fortyTokens('third')]);
    });

    it('never repeats a conversation text in the historical portion', () => {
      store.append(OWNER, fortyTokens('same'), minutesAfter(start, 0));
      store.append(OWNER, fortyTokens('other'), minutesAfter(start, 1));
      store.append(OWNER, fortyTokens('same'), minutesAfter(start, 2));

      const lastOnly = new ConversationThreadManager(store, { ...history, recentResponseLimit: 1 }, silentLogger);
      const result = lastOnly.getContextualHistory(OWNER, 1000);

      expect(result.value).toEqual([fortyTokens('other'), fortyTokens('same')]);
    });

    it('selects nothing when the budget is not a finite number', () => {
      store.append(OWNER, fortyTokens('first'), minutesAfter(start, 0));
      store.append(OWNER, fortyTokens('second'), minutesAfter(start, 1));

      expect(manager.getContextualHistory(OWNER, Number.NaN)).toEqual({ status: 'empty', value: [] });
      expect(manager.getContextualHistory(OWNER, Number.NaN, { includeConversationFlow: false })).toEqual({
        status: 'empty',
        value: []
      });
    });

    it('returns an empty result for an owner without history', () => {
      const result = manager.getContextualHistory('nobody', 500);
      expect(result).toEqual({ status: 'empty', value: [] });
    });

    it('uses plain newest-first selection without the conversation flow', () => {
      store.append(OWNER, fortyTokens('first'), minutesAfter(start, 0));
      store.append(OWNER, fortyTokens('second'), minutesAfter(start, 1));
      store.append(OWNER, fortyTokens('third'), minutesAfter(start, 2));

      const result = manager.getContextualHistory(OWNER, 80, { includeConversationFlow: false });

      expect(result.value).toEqual([fortyTokens('second'), fortyTokens('third')]);
    });

    it('degrades instead of throwing when one portion cannot be read', () => {
      const records = [record(1, 'older note', start), record(2, 'newer note', minutesAfter(start, 1))];
      const failing: SummaryStore = {
        append: () => {
          throw new StorageError('append summary');
        },
        recent: () => {
          throw new StorageError('read recent summaries', { cause: new Error('disk I/O error') });
        },
        newestFirst: () => [...records].reverse(),
        since: () => [],
        hasOwner: () => true,
        statistics: () => store.statistics(OWNER)
      };
      const degradedManager = new ConversationThreadManager(failing, history, silentLogger);

      const result = degradedManager.getContextualHistory(OWNER, 1000);

      expect(result.status).toBe('degraded');
      expect(result.value).toEqual(['older note', 'newer note']);
      if (result.status === 'degraded') {
        expect(result.error).toBe('conversation: Storage operation "read recent summaries" failed: disk I/O error');
      }
    });
  });

  describe('relatedness', () => {
    it('scores close records about the same names as fully related', () => {
      const a = record(1, 'Sletty tamed a Rex near the river', start);
      const b = record(2, 'Sletty tamed another Rex by the river', minutesAfter(start, 2));
      expect(manager.relatedness(a, b)).toBe(1);
    });

    it('scores distant records with nothing in common low', () => {
      const a = record(1, 'wild dodo stampede at dawn', start, 'island');
      const b = record(2, 'server restart scheduled tonight', minutesAfter(start, 24 * 60), 'ragnarok');
      expect(manager.relatedness(a, b)).toBeCloseTo(0.14, 10);
    });

    it('stays within [0, 1]', () => {
      const samples = [
        record(1, 'Alpha Bravo Charlie Delta Echo Foxtrot', start),
        record(2, 'Alpha Bravo Charlie Delta Echo Foxtrot', start),
        record(3, '', minutesAfter(start, 10_000), 'elsewhere')
      ];
      for (const a of samples) {
        for (const b of samples) {
          const score = manager.relatedness(a, b);
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(1);
        }
      }
    });

    it('follows the temporal decay steps', () => {
      expect(manager.temporalScore(0)).toBe(1);
      expect(manager.temporalScore(5)).toBe(1);
      expect(manager.temporalScore(10)).toBe(0.8);
      expect(manager.temporalScore(45)).toBe(0.6);
      expect(manager.temporalScore(240)).toBe(0.3);
      expect(manager.temporalScore(241)).toBe(0.1);
    });
  });

  describe('thread grouping', () => {
    it('starts a new thread when relatedness drops below the threshold', () => {
      const strict = new ConversationThreadManager(store, { ...history, threadThreshold: 0.5 }, silentLogger);
      const records = [
        record(1, 'Sletty tamed a Rex', start),
        record(2, 'Sletty tamed a Raptor', minutesAfter(start, 2)),
        record(3, 'server restart scheduled tonight', minutesAfter(start, 24 * 60))
      ];

      const threads = strict.groupIntoThreads(records);

      expect(threads).toHaveLength(2);
      expect(threads[0].records.map(r => r.id)).toEqual([1, 2]);
      expect(threads[0].cohesion).toBeCloseTo(0.95, 10);
      expect(threads[0].startedAt).toBe(start.toISOString());
      expect(threads[0].endedAt).toBe(minutesAfter(start, 2).toISOString());
      expect(threads[1].records.map(r => r.id)).toEqual([3]);
      expect(threads[1].cohesion).toBe(1);
    });

    it('groups stored records chronologically', () => {
      store.append(OWNER, 'Sletty tamed a Rex', start);
      store.append(OWNER, 'Sletty tamed a Raptor', minutesAfter(start, 3));

      const result = manager.getConversationThreads(OWNER);

      expect(result.status).toBe('success');
      expect(result.value).toHaveLength(1);
      expect(result.value[0].records.map(r => r.text)).toEqual(['Sletty tamed a Rex', 'Sletty tamed a Raptor']);
    });
  });

  describe('timeframes and statistics', () => {
    const now = new Date('2025-03-11T12:00:00.000Z');

    beforeEach(() => {
      store.append(OWNER, 'ten days ago', new Date('2025-03-01T12:00:00.000Z'));
      store.append(OWNER, 'two days ago', new Date('2025-03-09T12:00:00.000Z'));
      store.append(OWNER, 'an hour ago', new Date('2025-03-11T11:00:00.000Z'));
    });

    it('returns summaries inside the window, oldest first, with their age', () => {
      const result = manager.getSummariesByTimeframe(OWNER, 7, now);
      expect(result.value.map(s => [s.text, s.ageDays])).toEqual([
        ['two days ago', 2],
        ['an hour ago', 0]
      ]);
    });

    it('summarizes the stream', () => {
      expect(manager.getContextStatistics(OWNER, now)).toEqual({
        ownerKey: OWNER,
        totalSummaries: 3,
        recentSummaries7d: 2,
        earliestSummary: '2025-03-01T12:00:00.000Z',
        latestSummary: '2025-03-11T11:00:00.000Z',
        coverageDays: 10
      });
    });

    it('reads back the most recent responses in order', () => {
      expect(manager.getConversationThread(OWNER, 2).map(r => r.text)).toEqual(['two days ago', 'an hour ago']);
    });
  });
});
