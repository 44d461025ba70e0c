export class QueryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

export class QueryDeadlineExceededError extends Error {
  constructor(public readonly deadlineMs: number) {
    super(`Query did not complete within ${deadlineMs}ms`);
    this.name = 'QueryDeadlineExceededError';
  }
}

export class EmptyIndexError extends Error {
  constructor() {
    super('Document index is empty');
    this.name = 'EmptyIndexError';
  }
}

export class DimensionMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

export class InvalidChunkError extends Error {
  constructor(reason: string) {
    super(`Invalid chunk: ${reason}`);
    this.name = 'InvalidChunkError';
  }
}

/**
 * Raised by generation providers. `transient` decides whether the client retries.
 */
export class GenerationProviderError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'GenerationProviderError';
  }
}

export type GenerationFailureReason = 'retries_exhausted' | 'non_transient';

export class GenerationUnavailableError extends Error {
  constructor(
    public readonly reason: GenerationFailureReason,
    public readonly attempts: number,
    public readonly lastError?: unknown,
  ) {
    super(
      reason === 'retries_exhausted'
        ? `Generation unavailable after ${attempts} attempts`
        : 'Generation rejected by provider',
    );
    this.name = 'GenerationUnavailableError';
  }
}

export class GenerationAbortedError extends Error {
  constructor(public readonly attempts: number) {
    super(`Generation aborted by caller after ${attempts} attempt(s)`);
    this.name = 'GenerationAbortedError';
  }
}

export class OperationTimeoutError extends Error {
  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export class UnsupportedUploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedUploadError';
  }
}
