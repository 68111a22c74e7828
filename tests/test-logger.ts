import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../src/utils/logger.js';
import { createTestEngine, spyLogger } from './helpers/fakes.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes child loggers with the parent scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('recap', 'debug').child('semantic-memory').info('Stored memory');

    expect(log).toHaveBeenCalledWith('[recap:semantic-memory] Stored memory');
  });

  it('keeps the parent level in its children', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const child = createLogger('recap', 'warn').child('entity-profiles');
    child.info('Updated profile');
    child.warn('Profile update failed');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[recap:entity-profiles] Profile update failed');
  });

  it('gives every engine component it builds its own scope', () => {
    const root = spyLogger();
    const child = vi.spyOn(root, 'child');

    createTestEngine({}, { logger: root }).close();

    // The test engine brings its own token counter and generator
    expect(child.mock.calls.map(([scope]) => scope)).toEqual([
      'conversation-threads',
      'semantic-memory',
      'entity-profiles',
      'context-assembler',
      'commentary-cycle'
    ]);
  });
});
