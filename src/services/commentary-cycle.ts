/**
 * Commentary Cycle
 * One round of assemble, generate, persist and deliver for an owner's new
 * event lines. Rounds for the same owner run one at a time, in order.
 */

import { AssembledContext, SummaryRecord } from '../types/index.js';
import { Logger, createLogger, describeError } from '../utils/logger.js';
import { ContextAssembler } from './context-assembler.js';
import { GenerationClient } from './generation.js';
import { SemanticMemoryStore } from './semantic-memory.js';
import { SummaryStore } from './summary-store.js';

export interface DeliveryChannel {
  deliver(ownerKey: string, text: string): Promise<void>;
}

export type CycleOutcome =
  | { status: 'skipped'; ownerKey: string; reason: string }
  | { status: 'generation-failed'; ownerKey: string; error: string; context: AssembledContext }
  | {
      status: 'completed';
      ownerKey: string;
      text: string;
      summary: SummaryRecord;
      memoryStored: boolean;
      delivered: boolean;
      context: AssembledContext;
    };

export interface CycleOptions {
  minEventLines: number;
}

export function deliveryHeader(ownerKey: string): string {
  return `=== ${ownerKey} Summary ===`;
}

export class CommentaryCycle {
  private queues = new Map<string, Promise<void>>();

  constructor(
    private readonly assembler: ContextAssembler,
    private readonly generator: GenerationClient,
    private readonly summaries: SummaryStore,
    private readonly memories: SemanticMemoryStore,
    private readonly delivery: DeliveryChannel,
    private readonly options: CycleOptions,
    private readonly logger: Logger = createLogger('commentary-cycle')
  ) {}

  /**
   * Queue a cycle behind any pending cycle for the same owner
   */
  run(ownerKey: string, lines: readonly string[], signal?: AbortSignal): Promise<CycleOutcome> {
    const previous = this.queues.get(ownerKey) ?? Promise.resolve();
    const result = previous.then(() => this.execute(ownerKey, lines, signal));

    const settled = result.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(ownerKey, settled);
    void settled.then(() => {
      if (this.queues.get(ownerKey) === settled) this.queues.delete(ownerKey);
    });

    return result;
  }

  /** Owners with a cycle queued or running */
  get pendingOwners(): string[] {
    return [...this.queues.keys()];
  }

  private async execute(ownerKey: string, lines: readonly string[], signal?: AbortSignal): Promise<CycleOutcome> {
    const eventLines = lines.filter(line => line.trim() !== '');
    if (eventLines.length < this.options.minEventLines) {
      this.logger.info(`Not enough event lines to summarize for ${ownerKey} (${eventLines.length}). Skipping.`);
      return { status: 'skipped', ownerKey, reason: `only ${eventLines.length} event lines` };
    }

    const context = await this.assembler.assemble(ownerKey, eventLines, { signal });

    const generation = await this.generator.generate(context.prompt, context.numPredict, ownerKey);
    if (!generation.ok) {
      this.logger.error(`Generation failed for ${ownerKey}: ${generation.error}`);
      return { status: 'generation-failed', ownerKey, error: generation.error, context };
    }

    const summary = this.summaries.append(ownerKey, generation.text);
    const memoryStored = await this.memories.store(ownerKey, generation.text, eventLines.join('\n'), {
      entities: context.entities
    });

    let delivered = true;
    try {
      await this.delivery.deliver(ownerKey, `${deliveryHeader(ownerKey)}\n${generation.text}`);
    } catch (error) {
      delivered = false;
      this.logger.error(`Failed to deliver commentary for ${ownerKey}: ${describeError(error)}`);
    }

    this.logger.info(`Completed cycle for ${ownerKey}: ${eventLines.length} lines, ${summary.tokenCount} tokens written`);
    return { status: 'completed', ownerKey, text: generation.text, summary, memoryStored, delivered, context };
  }
}
