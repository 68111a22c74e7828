/**
 * Context Assembler
 * Builds the generator prompt from history, semantic memories and entity
 * profiles, then sizes the output budget for it
 */

import { AssemblerConfig } from '../config.js';
import { AssembledContext, AssemblyStage, TierResult } from '../types/index.js';
import { AssemblyCancelledError, AssemblyError, TierTimeoutError } from '../utils/errors.js';
import { Logger, createLogger, describeError } from '../utils/logger.js';
import { degraded, empty, fromList, success } from '../utils/tier-result.js';
import { ConversationThreadManager } from './conversation-threads.js';
import { EntityProfileStore } from './entity-profiles.js';
import { SemanticMemoryStore } from './semantic-memory.js';
import { SummaryStore } from './summary-store.js';
import { TokenBudgetAllocator } from './token-budget.js';

export interface AssembleOptions {
  /** Total prompt token budget; defaults to the configured budget */
  totalTokenBudget?: number;
  signal?: AbortSignal;
}

export interface PromptSections {
  history: readonly string[];
  memories: readonly string[];
  entityContext: string;
  eventLines: readonly string[];
}

export const PROMPT_HEADINGS = {
  history: 'RECENT RESPONSES CONTEXT (do not repeat this content):',
  memories: 'RELEVANT PAST RESPONSES (similar situations, do not repeat):',
  entities: 'PLAYER CONTEXT (for personalized commentary):',
  instruction:
    'Please create fresh commentary that acknowledges player personalities while avoiding repetition from the above context.',
  eventsStart: '=== NEW EVENTS ===',
  eventsEnd: '=== END OF EVENTS ==='
} as const;

/**
 * Prompt layout: history, relevant past responses, entity context, the
 * non-repetition instruction, then the delimited new event lines
 */
export function buildPrompt(sections: PromptSections): string {
  const parts: string[] = [];

  if (sections.history.length > 0) {
    parts.push(`${PROMPT_HEADINGS.history}\n${sections.history.join('\n')}`);
  }
  if (sections.memories.length > 0) {
    parts.push(`${PROMPT_HEADINGS.memories}\n${sections.memories.join('\n')}`);
  }
  if (sections.entityContext !== '') {
    parts.push(`${PROMPT_HEADINGS.entities}\n${sections.entityContext}`);
  }
  if (parts.length > 0) {
    parts.push(PROMPT_HEADINGS.instruction);
  }

  const events = sections.eventLines.length > 0 ? sections.eventLines.join('\n') : '(no new events)';
  parts.push(`${PROMPT_HEADINGS.eventsStart}\n${events}\n${PROMPT_HEADINGS.eventsEnd}`);

  return parts.join('\n\n');
}

function cancellable<T>(promise: Promise<T>, ownerKey: string, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AssemblyCancelledError(ownerKey));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AssemblyCancelledError(ownerKey));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class ContextAssembler {
  constructor(
    private readonly summaries: SummaryStore,
    private readonly threads: ConversationThreadManager,
    private readonly memories: SemanticMemoryStore,
    private readonly profiles: EntityProfileStore,
    private readonly allocator: TokenBudgetAllocator,
    private readonly config: AssemblerConfig,
    private readonly logger: Logger = createLogger('context-assembler')
  ) {}

  /**
   * Assemble the prompt for a batch of new event lines.
   *
   * Tier failures and timeouts leave their section empty. Profile updates
   * from the new lines are kept even when the assembly is cancelled.
   *
   * @throws AssemblyError when no prompt can be built
   * @throws AssemblyCancelledError when the signal aborts before the prompt is ready
   */
  async assemble(ownerKey: string, newEventLines: readonly string[], options: AssembleOptions = {}): Promise<AssembledContext> {
    const { signal } = options;
    const totalTokenBudget = options.totalTokenBudget ?? this.config.promptTokenBudget;
    const stage = (next: AssemblyStage) => this.logger.debug(`[${ownerKey}] ${next}`);

    if (ownerKey.trim() === '') {
      throw new AssemblyError('Owner key must not be blank');
    }
    const lines = newEventLines.filter(line => line.trim() !== '');
    if (lines.length === 0 && !this.hasHistory(ownerKey)) {
      throw new AssemblyError(`No history and no new event lines for "${ownerKey}"`);
    }
    if (signal?.aborted) throw new AssemblyCancelledError(ownerKey);

    stage('extracting');
    const profiles = this.updateProfiles(ownerKey, lines);
    const entities = profiles.value;

    stage('retrieving');
    const historyBudget = Math.floor(totalTokenBudget * this.config.historyShare);
    const [history, memories, entityContext] = await cancellable(
      Promise.all([
        this.runTier<string[]>('history', [], () => this.threads.getContextualHistory(ownerKey, historyBudget)),
        this.runTier<string[]>('memories', [], async () => {
          if (lines.length === 0) return empty<string[]>([]);
          const result = await this.memories.searchDetailed(lines.join('\n'), ownerKey);
          const texts = result.value.map(memory => memory.responseText);
          return result.status === 'degraded' ? { ...result, value: texts } : fromList(texts);
        }),
        this.runTier<string>('entity-context', '', () => {
          if (entities.length === 0) return empty('');
          return success(this.profiles.getContextualSummaries(entities));
        })
      ]),
      ownerKey,
      signal
    );

    stage('merging');
    const prompt = buildPrompt({
      history: history.value,
      memories: memories.value,
      entityContext: entityContext.value,
      eventLines: lines
    });

    stage('budget-computed');
    const allocation = this.allocator.allocate(prompt);
    if (allocation.headroom === 'limited') {
      this.logger.warn(
        `Limited context space for ${ownerKey}: prompt=${allocation.promptTokens}, ` +
        `available=${allocation.available}, using num_predict=${allocation.numPredict}`
      );
    }

    stage('ready');
    this.logger.debug(
      `Assembled context for ${ownerKey}: history=${history.status}, memories=${memories.status}, ` +
      `entities=${entityContext.status}, prompt=${allocation.promptTokens} tokens, num_predict=${allocation.numPredict}`
    );

    return {
      prompt,
      entities,
      numPredict: allocation.numPredict,
      allocation,
      tiers: { profiles, history, memories, entityContext }
    };
  }

  private hasHistory(ownerKey: string): boolean {
    try {
      return this.summaries.hasOwner(ownerKey);
    } catch (error) {
      this.logger.warn(`Could not check history for ${ownerKey}: ${describeError(error)}`);
      return false;
    }
  }

  private updateProfiles(ownerKey: string, lines: readonly string[]): TierResult<string[]> {
    try {
      return this.profiles.processBatch(lines, ownerKey);
    } catch (error) {
      this.logger.warn(`Profile update failed for ${ownerKey}: ${describeError(error)}`);
      return degraded([], error);
    }
  }

  /**
   * Run one retrieval tier under the configured timeout. Never rejects: a
   * thrown error or a timeout becomes a degraded result holding `fallback`.
   */
  private async runTier<T>(
    tier: string,
    fallback: T,
    work: () => TierResult<T> | Promise<TierResult<T>>
  ): Promise<TierResult<T>> {
    const timeoutMs = this.config.tierTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TierTimeoutError(tier, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([Promise.resolve().then(work), timeout]);
    } catch (error) {
      this.logger.warn(`Tier ${tier} failed: ${describeError(error)}`);
      return degraded(fallback, error);
    } finally {
      clearTimeout(timer);
    }
  }
}
