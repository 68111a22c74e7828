import { describe, expect, it } from 'vitest';
import { BudgetConfig } from '../src/config.js';
import { TokenBudgetAllocator, computeNumPredict } from '../src/services/token-budget.js';
import { TokenCounter } from '../src/utils/token-counter.js';
import { estimateCounter, spyLogger } from './helpers/fakes.js';

const budget: BudgetConfig = {
  contextWindow: 1000,
  safetyBuffer: 48,
  minOutputTokens: 64,
  maxOutputTokens: 512
};

describe('TokenCounter', () => {
  it('estimates zero tokens for empty text and at least one otherwise', () => {
    expect(TokenCounter.estimate('')).toBe(0);
    expect(TokenCounter.estimate('abc')).toBe(1);
    expect(TokenCounter.estimate('abcdefgh')).toBe(2);
    expect(TokenCounter.estimate('x'.repeat(401))).toBe(100);
  });

  it('never decreases as text grows', () => {
    let previous = 0;
    for (let length = 0; length <= 64; length++) {
      const count = TokenCounter.estimate('y'.repeat(length));
      expect(count).toBeGreaterThanOrEqual(previous);
      previous = count;
    }
  });

  it('uses the encoder when one is available', () => {
    const counter = new TokenCounter({ encode: text => text.split(' ').map((_, i) => i) }, spyLogger());
    expect(counter.isExact).toBe(true);
    expect(counter.countText('one two three')).toBe(3);
    expect(counter.countText('')).toBe(0);
    expect(counter.countTexts(['a b', 'c'])).toBe(3);
  });

  it('falls back to the estimate and logs once when encoding throws', () => {
    const logger = spyLogger();
    const counter = new TokenCounter(
      {
        encode: () => {
          throw new Error('bad merge table');
        }
      },
      logger
    );

    expect(counter.countText('x'.repeat(40))).toBe(10);
    expect(counter.countText('x'.repeat(8))).toBe(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('reports at least one token for non-empty text the encoder maps to nothing', () => {
    const counter = new TokenCounter({ encode: () => [] }, spyLogger());
    expect(counter.countText('zzz')).toBe(1);
  });

  it('uses the estimate when the encoding is turned off', () => {
    const counter = TokenCounter.forEncoding('none', spyLogger());
    expect(counter.isExact).toBe(false);
    expect(counter.countText('x'.repeat(12))).toBe(3);
  });
});

describe('computeNumPredict', () => {
  it('gives the remaining space, capped at the maximum, when there is room', () => {
    expect(computeNumPredict(300, budget)).toEqual({
      promptTokens: 300,
      available: 652,
      numPredict: 512,
      headroom: 'ok'
    });
  });

  it('uses the remaining space when it is below the maximum', () => {
    expect(computeNumPredict(700, budget)).toEqual({
      promptTokens: 700,
      available: 252,
      numPredict: 252,
      headroom: 'ok'
    });
  });

  it('treats exactly the minimum as enough room', () => {
    const allocation = computeNumPredict(888, budget);
    expect(allocation.available).toBe(64);
    expect(allocation.numPredict).toBe(64);
    expect(allocation.headroom).toBe('ok');
  });

  it('falls back to a conservative floor when the prompt leaves too little room', () => {
    expect(computeNumPredict(960, budget)).toEqual({
      promptTokens: 960,
      available: -8,
      numPredict: 64,
      headroom: 'limited'
    });
  });

  it('never goes below eight tokens for tiny windows', () => {
    const tiny: BudgetConfig = { contextWindow: 40, safetyBuffer: 4, minOutputTokens: 10, maxOutputTokens: 512 };
    const allocation = computeNumPredict(30, tiny);
    expect(allocation.headroom).toBe('limited');
    expect(allocation.numPredict).toBe(8);
  });

  it('never exceeds the maximum, even in the fallback', () => {
    const narrow: BudgetConfig = { contextWindow: 4096, safetyBuffer: 48, minOutputTokens: 16, maxOutputTokens: 16 };
    for (const prompt of [0, 1000, 4040, 5000]) {
      const { numPredict } = computeNumPredict(prompt, narrow);
      expect(numPredict).toBeGreaterThan(0);
      expect(numPredict).toBeLessThanOrEqual(16);
    }
  });
});

describe('TokenBudgetAllocator', () => {
  it('counts the prompt before allocating', () => {
    const allocator = new TokenBudgetAllocator(budget, estimateCounter());
    const allocation = allocator.allocate('x'.repeat(1200));

    expect(allocation.promptTokens).toBe(300);
    expect(allocation.numPredict).toBe(512);
    expect(allocator.contextWindow).toBe(1000);
  });
});
