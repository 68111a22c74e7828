/**
 * In-process stand-ins for the embedding, generation and delivery backends
 */

import { vi, type Mock } from 'vitest';
import { EngineConfig, loadConfig } from '../../src/config.js';
import { Engine, EngineOverrides, createEngine } from '../../src/engine.js';
import { DeliveryChannel } from '../../src/services/commentary-cycle.js';
import { EmbeddingProvider } from '../../src/services/embeddings.js';
import { GenerationClient } from '../../src/services/generation.js';
import { NoopProfileCache } from '../../src/services/profile-cache.js';
import { openDatabase } from '../../src/services/storage.js';
import { GenerationResult } from '../../src/types/index.js';
import { Logger, silentLogger } from '../../src/utils/logger.js';
import { TokenCounter } from '../../src/utils/token-counter.js';

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embed';
  readonly calls: string[] = [];

  constructor(private readonly vectorFor: (text: string) => number[] | Promise<number[]> = () => [1, 0]) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectorFor(text);
  }
}

export interface GenerationCall {
  prompt: string;
  numPredict: number;
  ownerKey: string;
}

export class FakeGenerator implements GenerationClient {
  readonly calls: GenerationCall[] = [];

  constructor(
    private readonly respond: (call: GenerationCall, index: number) => GenerationResult | Promise<GenerationResult> =
      (_call, index) => ({ ok: true, text: `Commentary ${index + 1}` })
  ) {}

  async generate(prompt: string, numPredict: number, ownerKey: string): Promise<GenerationResult> {
    const call = { prompt, numPredict, ownerKey };
    const index = this.calls.length;
    this.calls.push(call);
    return this.respond(call, index);
  }
}

export class RecordingDelivery implements DeliveryChannel {
  readonly messages: { ownerKey: string; text: string }[] = [];

  async deliver(ownerKey: string, text: string): Promise<void> {
    this.messages.push({ ownerKey, text });
  }
}

export interface SpyLogger extends Logger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function spyLogger(): SpyLogger {
  const logger: SpyLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger
  };
  return logger;
}

/** Character-estimate counter: a text of 4n characters is n tokens */
export function estimateCounter(): TokenCounter {
  return new TokenCounter(null, silentLogger);
}

export function testConfig(env: Record<string, string> = {}): EngineConfig {
  return loadConfig({ DB_PATH: ':memory:', TOKENIZER_ENCODING: 'none', ...env });
}

export function createTestEngine(env: Record<string, string> = {}, overrides: EngineOverrides = {}): Engine {
  return createEngine(testConfig(env), {
    db: openDatabase(':memory:'),
    tokenCounter: estimateCounter(),
    embeddings: new FakeEmbeddingProvider(),
    generator: new FakeGenerator(),
    delivery: new RecordingDelivery(),
    profileCache: new NoopProfileCache(),
    logger: silentLogger,
    ...overrides
  });
}

export function minutesAfter(start: Date, minutes: number): Date {
  return new Date(start.getTime() + minutes * 60_000);
}
