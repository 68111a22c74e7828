/**
 * Token Budget Allocator
 * Decides how many output tokens the generator may use once the prompt is known
 */

import { BudgetConfig } from '../config.js';
import { BudgetAllocation } from '../types/index.js';
import { TokenCounter } from '../utils/token-counter.js';

/**
 * Pure allocation over already-counted prompt tokens.
 *
 * With enough room the generator gets everything left after the prompt and
 * safety buffer, capped at `maxOutputTokens`. Without it, a conservative
 * floor of `max(8, min(minOutputTokens, contextWindow / 8))` is used instead,
 * still capped at `maxOutputTokens`.
 */
export function computeNumPredict(promptTokens: number, budget: BudgetConfig): BudgetAllocation {
  const { contextWindow, safetyBuffer, minOutputTokens, maxOutputTokens } = budget;
  const available = contextWindow - promptTokens - safetyBuffer;

  if (available >= minOutputTokens) {
    return {
      promptTokens,
      available,
      numPredict: Math.min(available, maxOutputTokens),
      headroom: 'ok'
    };
  }

  const floor = Math.max(8, Math.min(minOutputTokens, Math.floor(contextWindow / 8)));
  return {
    promptTokens,
    available,
    numPredict: Math.min(floor, maxOutputTokens),
    headroom: 'limited'
  };
}

export class TokenBudgetAllocator {
  constructor(
    private readonly budget: BudgetConfig,
    private readonly tokenCounter: TokenCounter
  ) {}

  get contextWindow(): number {
    return this.budget.contextWindow;
  }

  /**
   * Count the assembled prompt and compute `num_predict` for it
   */
  allocate(prompt: string): BudgetAllocation {
    return computeNumPredict(this.tokenCounter.countText(prompt), this.budget);
  }
}
