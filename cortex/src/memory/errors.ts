/**
 * Error types for the memory system
 *
 * Deduplicated inserts are not errors; they come back as a
 * `deduplicated` StoreResult.
 */

export class MemoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MemoryError';
  }
}

/**
 * The structured-extraction capability failed or returned output
 * that did not match the requested schema.
 */
export class ExtractionError extends MemoryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * Summarization gave up after its retry budget. The span it was given
 * has not been persisted or evicted.
 */
export class SummarizationError extends MemoryError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SummarizationError';
    this.attempts = attempts;
  }
}

/**
 * The persistent store is not open.
 */
export class StoreUnavailableError extends MemoryError {
  constructor(message = 'Memory database not initialized. Call init() first.', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
