import { afterEach, describe, expect, it } from 'vitest';
import { Engine } from '../src/engine.js';
import { PROMPT_HEADINGS, buildPrompt } from '../src/services/context-assembler.js';
import { AssemblyCancelledError, AssemblyError, EmbeddingUnavailableError } from '../src/utils/errors.js';
import { FakeEmbeddingProvider, createTestEngine, spyLogger } from './helpers/fakes.js';

const OWNER = 'island';
const LINES = ['Sletty tamed a Rex', 'Bob joined the server'];

const hanging = () => new FakeEmbeddingProvider(() => new Promise<number[]>(() => {}));

describe('buildPrompt', () => {
  it('leaves out empty sections and the instruction when there is no context', () => {
    expect(buildPrompt({ history: [], memories: [], entityContext: '', eventLines: ['Bob joined'] })).toBe(
      '=== NEW EVENTS ===\nBob joined\n=== END OF EVENTS ==='
    );
  });

  it('marks a batch without event lines', () => {
    expect(buildPrompt({ history: ['Earlier recap'], memories: [], entityContext: '', eventLines: [] })).toBe(
      [
        `${PROMPT_HEADINGS.history}\nEarlier recap`,
        PROMPT_HEADINGS.instruction,
        '=== NEW EVENTS ===\n(no new events)\n=== END OF EVENTS ==='
      ].join('\n\n')
    );
  });
});

describe('ContextAssembler', () => {
  let engine: Engine | undefined;

  afterEach(() => {
    engine?.close();
    engine = undefined;
  });

  it('rejects a blank owner', async () => {
    engine = createTestEngine();
    await expect(engine.assembler.assemble('  ', LINES)).rejects.toBeInstanceOf(AssemblyError);
  });

  it('rejects an owner with neither history nor new lines', async () => {
    engine = createTestEngine();
    await expect(engine.assembler.assemble(OWNER, ['', '   '])).rejects.toThrow(
      'No history and no new event lines for "island"'
    );
  });

  it('merges every tier into the prompt in order', async () => {
    engine = createTestEngine();
    engine.summaries.append(OWNER, 'Earlier recap', new Date('2025-01-15T12:00:00.000Z'));
    await engine.memories.store(OWNER, 'Old raid recap', 'Bob destroyed a Metal Wall');

    const context = await engine.assembler.assemble(OWNER, LINES);

    expect(context.prompt).toBe(
      [
        'RECENT RESPONSES CONTEXT (do not repeat this content):\nEarlier recap',
        'RELEVANT PAST RESPONSES (similar situations, do not repeat):\nOld raid recap',
        'PLAYER CONTEXT (for personalized commentary):\nSletty is a casual player.\nBob is a casual player.',
        'Please create fresh commentary that acknowledges player personalities while avoiding repetition from the above context.',
        '=== NEW EVENTS ===\nSletty tamed a Rex\nBob joined the server\n=== END OF EVENTS ==='
      ].join('\n\n')
    );
    expect(context.entities).toEqual(['Sletty', 'Bob']);
    expect(context.numPredict).toBe(512);
    expect(context.tiers.history.status).toBe('success');
    expect(context.tiers.memories.status).toBe('success');
    expect(context.tiers.entityContext.status).toBe('success');
  });

  it('builds a prompt from history alone', async () => {
    engine = createTestEngine();
    engine.summaries.append(OWNER, 'Earlier recap');

    const context = await engine.assembler.assemble(OWNER, []);

    expect(context.prompt.endsWith('=== NEW EVENTS ===\n(no new events)\n=== END OF EVENTS ===')).toBe(true);
    expect(context.tiers.memories).toEqual({ status: 'empty', value: [] });
    expect(context.tiers.entityContext).toEqual({ status: 'empty', value: '' });
  });

  it('leaves the memory section out when the embedding backend fails', async () => {
    engine = createTestEngine(
      {},
      {
        embeddings: new FakeEmbeddingProvider(() => {
          throw new EmbeddingUnavailableError('connection refused');
        })
      }
    );

    const context = await engine.assembler.assemble(OWNER, LINES);

    expect(context.tiers.memories).toEqual({ status: 'degraded', value: [], error: 'connection refused' });
    expect(context.prompt).not.toContain(PROMPT_HEADINGS.memories);
    expect(context.prompt).toContain(PROMPT_HEADINGS.entities);
  });

  it('gives up on a tier that does not finish in time', async () => {
    engine = createTestEngine({ TIER_TIMEOUT_MS: '50' }, { embeddings: hanging() });

    const context = await engine.assembler.assemble(OWNER, LINES);

    expect(context.tiers.memories).toEqual({
      status: 'degraded',
      value: [],
      error: 'Tier "memories" did not finish within 50ms'
    });
    expect(context.tiers.entityContext.status).toBe('success');
  });

  it('keeps profile updates when cancelled during retrieval', async () => {
    engine = createTestEngine({ TIER_TIMEOUT_MS: '200' }, { embeddings: hanging() });
    const controller = new AbortController();

    const pending = engine.assembler.assemble(OWNER, LINES, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AssemblyCancelledError);
    expect(engine.profiles.getProfile('Sletty')?.counters).toEqual({ taming: 1 });
  });

  it('does no work for an already cancelled request', async () => {
    engine = createTestEngine();
    const controller = new AbortController();
    controller.abort();

    await expect(engine.assembler.assemble(OWNER, LINES, { signal: controller.signal })).rejects.toThrow(
      'Assembly for "island" was cancelled'
    );
    expect(engine.profiles.getProfile('Sletty')).toBeNull();
  });

  it('falls back to a small output budget when the window is nearly full', async () => {
    const logger = spyLogger();
    engine = createTestEngine({ CONTEXT_WINDOW: '200' }, { embeddings: null, logger });

    // 441 characters of prompt, 110 estimated tokens
    const context = await engine.assembler.assemble(OWNER, ['x'.repeat(400)]);

    expect(context.allocation).toEqual({ promptTokens: 110, available: 42, numPredict: 25, headroom: 'limited' });
    expect(logger.warn).toHaveBeenCalledWith(
      'Limited context space for island: prompt=110, available=42, using num_predict=25'
    );
  });
});
