/**
 * Error taxonomy
 *
 * Tier-level errors stay inside their tier and reach the assembler only as
 * degraded results. `AssemblyError` and `AssemblyCancelledError` are the only
 * ones the assembler itself throws.
 */

export type ContextEngineErrorCode =
  | 'EXTRACTION'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMBEDDING_DIMENSION'
  | 'STORAGE'
  | 'TIER_TIMEOUT'
  | 'ASSEMBLY'
  | 'ASSEMBLY_CANCELLED';

export class ContextEngineError extends Error {
  constructor(
    readonly code: ContextEngineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single event line could not be parsed; the batch continues without it */
export class ExtractionError extends ContextEngineError {
  constructor(message: string, readonly line: string) {
    super('EXTRACTION', message);
  }
}

export class EmbeddingUnavailableError extends ContextEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_UNAVAILABLE', message, options);
  }
}

export class EmbeddingDimensionError extends ContextEngineError {
  constructor(readonly expected: number, readonly actual: number) {
    super('EMBEDDING_DIMENSION', `Embedding has ${actual} dimensions, expected ${expected}`);
  }
}

export class StorageError extends ContextEngineError {
  constructor(readonly operation: string, options?: { cause?: unknown }) {
    const cause = options?.cause;
    const reason = cause instanceof Error ? cause.message : cause === undefined ? 'unknown' : String(cause);
    super('STORAGE', `Storage operation "${operation}" failed: ${reason}`, options);
  }
}

export class TierTimeoutError extends ContextEngineError {
  constructor(readonly tier: string, readonly timeoutMs: number) {
    super('TIER_TIMEOUT', `Tier "${tier}" did not finish within ${timeoutMs}ms`);
  }
}

export class AssemblyError extends ContextEngineError {
  constructor(message: string) {
    super('ASSEMBLY', message);
  }
}

export class AssemblyCancelledError extends ContextEngineError {
  constructor(ownerKey: string) {
    super('ASSEMBLY_CANCELLED', `Assembly for "${ownerKey}" was cancelled`);
  }
}
