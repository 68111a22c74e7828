/**
 * Token counter utility
 * Uses a BPE encoding when one is available, otherwise the
 * character-based approximation: 1 token ≈ 4 characters
 */

import { getEncoding } from 'js-tiktoken';
import { TokenizerEncoding } from '../config.js';
import { Logger, createLogger, describeError } from './logger.js';

export interface TokenEncoder {
  encode(text: string): number[];
}

export class TokenCounter {
  private static readonly CHARS_PER_TOKEN = 4;

  private encoder: TokenEncoder | null;
  private degradationLogged = false;

  constructor(
    encoder: TokenEncoder | null = null,
    private readonly logger: Logger = createLogger('token-counter')
  ) {
    this.encoder = encoder;
  }

  /**
   * Create a counter backed by the named encoding. Never throws: an encoding
   * that fails to load leaves the counter on the character estimate.
   */
  static forEncoding(encoding: TokenizerEncoding, logger: Logger = createLogger('token-counter')): TokenCounter {
    if (encoding === 'none') {
      return new TokenCounter(null, logger);
    }
    try {
      const counter = new TokenCounter(getEncoding(encoding), logger);
      logger.info(`Using ${encoding} encoding for token counting`);
      return counter;
    } catch (error) {
      logger.warn(`Failed to load ${encoding} encoding, falling back to character estimate: ${describeError(error)}`);
      const counter = new TokenCounter(null, logger);
      counter.degradationLogged = true;
      return counter;
    }
  }

  /**
   * Character-based estimate
   */
  static estimate(text: string): number {
    if (!text) return 0;
    return Math.max(1, Math.floor(text.length / TokenCounter.CHARS_PER_TOKEN));
  }

  get isExact(): boolean {
    return this.encoder !== null;
  }

  /**
   * Count tokens for a text string
   */
  countText(text: string): number {
    if (!text) return 0;

    if (this.encoder) {
      try {
        return Math.max(1, this.encoder.encode(text).length);
      } catch (error) {
        if (!this.degradationLogged) {
          this.logger.warn(`Token encoding failed, falling back to character estimate: ${describeError(error)}`);
          this.degradationLogged = true;
        }
      }
    }

    return TokenCounter.estimate(text);
  }

  /**
   * Count tokens in multiple texts
   */
  countTexts(texts: readonly string[]): number {
    return texts.reduce((total, text) => total + this.countText(text), 0);
  }
}
