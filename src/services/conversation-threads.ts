/**
 * Conversation Thread Manager
 * Bounds recent history by token budget and groups it into threads
 */

import { HistoryConfig } from '../config.js';
import { ConversationThread, SummaryRecord, TierResult } from '../types/index.js';
import { Logger, createLogger, describeError } from '../utils/logger.js';
import { TextProcessor } from '../utils/text-processing.js';
import { degraded, fromList } from '../utils/tier-result.js';
import { SummaryStatistics, SummaryStore } from './summary-store.js';

export interface ContextualHistoryOptions {
  /** When false, the whole budget goes to plain newest-first selection */
  includeConversationFlow?: boolean;
}

export interface TimeframeSummary extends SummaryRecord {
  ageDays: number;
}

const RELATEDNESS_WEIGHTS = {
  temporal: 0.4,
  sameOwner: 0.3,
  differentOwner: 0.1,
  content: 0.3,
  sharedName: 0.1
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;

export class ConversationThreadManager {
  constructor(
    private readonly store: SummaryStore,
    private readonly config: HistoryConfig,
    private readonly logger: Logger = createLogger('conversation-threads')
  ) {}

  /**
   * Historical context followed by the freshest exchange, oldest to newest.
   *
   * The budget is split by `conversationWeight`: the conversation share goes
   * to the last few responses, the rest to a separate newest-first walk over
   * the whole stream. Texts already picked for the conversation share are
   * removed from the historical share.
   */
  getContextualHistory(
    ownerKey: string,
    totalTokenBudget: number,
    options: ContextualHistoryOptions = {}
  ): TierResult<string[]> {
    const budget = Number.isFinite(totalTokenBudget) ? Math.max(0, Math.floor(totalTokenBudget)) : 0;
    const failures: string[] = [];

    if (options.includeConversationFlow === false) {
      try {
        return fromList(this.selectWithinBudget(ownerKey, budget).map(record => record.text));
      } catch (error) {
        this.logger.warn(`Failed to read history for ${ownerKey}: ${describeError(error)}`);
        return degraded([], error);
      }
    }

    const conversationBudget = Math.floor(budget * this.config.conversationWeight);
    const historicalBudget = budget - conversationBudget;

    let conversation: SummaryRecord[] = [];
    try {
      conversation = this.selectConversation(ownerKey, conversationBudget);
    } catch (error) {
      this.logger.warn(`Failed to get conversation thread for ${ownerKey}: ${describeError(error)}`);
      failures.push(`conversation: ${describeError(error)}`);
    }

    let historical: SummaryRecord[] = [];
    try {
      historical = this.selectWithinBudget(ownerKey, historicalBudget);
    } catch (error) {
      this.logger.warn(`Failed to get historical summaries for ${ownerKey}: ${describeError(error)}`);
      failures.push(`historical: ${describeError(error)}`);
    }

    const conversationTexts = new Set(conversation.map(record => record.text));
    const texts = [
      ...historical.filter(record => !conversationTexts.has(record.text)).map(record => record.text),
      ...conversation.map(record => record.text)
    ];

    this.logger.debug(
      `History for ${ownerKey}: ${conversation.length} conversation (budget ${conversationBudget}), ` +
      `${texts.length - conversation.length} historical (budget ${historicalBudget})`
    );

    return failures.length > 0 ? degraded(texts, failures.join('; ')) : fromList(texts);
  }

  /**
   * Most recent responses in chronological order
   */
  getConversationThread(ownerKey: string, maxResponses: number = this.config.recentResponseLimit): SummaryRecord[] {
    return this.store.recent(ownerKey, maxResponses).reverse();
  }

  /**
   * Group the latest `limit` records into threads. A record joins the current
   * thread while its relatedness to the previous record stays at or above the
   * threshold.
   */
  getConversationThreads(ownerKey: string, limit: number = 50): TierResult<ConversationThread[]> {
    try {
      return fromList(this.groupIntoThreads(this.store.recent(ownerKey, limit).reverse()));
    } catch (error) {
      this.logger.warn(`Failed to build conversation threads for ${ownerKey}: ${describeError(error)}`);
      return degraded([], error);
    }
  }

  groupIntoThreads(records: readonly SummaryRecord[]): ConversationThread[] {
    const threads: ConversationThread[] = [];
    let current: SummaryRecord[] = [];
    let scores: number[] = [];

    const close = () => {
      if (current.length === 0) return;
      threads.push({
        records: current,
        startedAt: current[0].timestamp,
        endedAt: current[current.length - 1].timestamp,
        cohesion: scores.length === 0 ? 1 : scores.reduce((sum, s) => sum + s, 0) / scores.length
      });
    };

    for (const record of records) {
      if (current.length > 0) {
        const score = this.relatedness(current[current.length - 1], record);
        if (score < this.config.threadThreshold) {
          close();
          current = [];
          scores = [];
        } else {
          scores.push(score);
        }
      }
      current.push(record);
    }
    close();

    return threads;
  }

  /**
   * Relatedness of two records in [0, 1]: temporal proximity, owner match,
   * keyword overlap and shared capitalized names
   */
  relatedness(a: SummaryRecord, b: SummaryRecord): number {
    let score = 0;

    const timeA = Date.parse(a.timestamp);
    const timeB = Date.parse(b.timestamp);
    if (!Number.isNaN(timeA) && !Number.isNaN(timeB)) {
      const minutes = Math.abs(timeA - timeB) / 60000;
      score += this.temporalScore(minutes) * RELATEDNESS_WEIGHTS.temporal;
    }

    score += a.ownerKey === b.ownerKey ? RELATEDNESS_WEIGHTS.sameOwner : RELATEDNESS_WEIGHTS.differentOwner;
    score += TextProcessor.jaccardSimilarity(a.text, b.text) * RELATEDNESS_WEIGHTS.content;

    const namesA = TextProcessor.capitalizedTokens(a.text);
    let sharedNames = 0;
    for (const name of TextProcessor.capitalizedTokens(b.text)) {
      if (namesA.has(name)) sharedNames++;
    }
    score += sharedNames * RELATEDNESS_WEIGHTS.sharedName;

    return Math.min(Math.max(score, 0), 1);
  }

  temporalScore(minutesApart: number): number {
    for (const step of this.config.temporalDecay) {
      if (minutesApart <= step.withinMinutes) return step.score;
    }
    return this.config.temporalFloor;
  }

  /**
   * Summaries from the last `days` days, oldest first
   */
  getSummariesByTimeframe(ownerKey: string, days: number = 7, now: Date = new Date()): TierResult<TimeframeSummary[]> {
    const cutoff = new Date(now.getTime() - days * DAY_MS);
    try {
      const records = this.store.since(ownerKey, cutoff).map(record => ({
        ...record,
        ageDays: Math.floor((now.getTime() - Date.parse(record.timestamp)) / DAY_MS)
      }));
      return fromList(records);
    } catch (error) {
      this.logger.error(`Failed to get summaries by timeframe for ${ownerKey}: ${describeError(error)}`);
      return degraded([], error);
    }
  }

  getContextStatistics(ownerKey: string, now?: Date): SummaryStatistics {
    return this.store.statistics(ownerKey, now);
  }

  private selectConversation(ownerKey: string, budget: number): SummaryRecord[] {
    const accepted: SummaryRecord[] = [];
    let used = 0;

    for (const record of this.store.recent(ownerKey, this.config.recentResponseLimit)) {
      if (used + record.tokenCount > budget) break;
      accepted.push(record);
      used += record.tokenCount;
    }

    return accepted.reverse();
  }

  private selectWithinBudget(ownerKey: string, budget: number): SummaryRecord[] {
    const accepted: SummaryRecord[] = [];
    let used = 0;

    for (const record of this.store.newestFirst(ownerKey)) {
      if (used + record.tokenCount > budget) break;
      accepted.push(record);
      used += record.tokenCount;
    }

    return accepted.reverse();
  }
}
