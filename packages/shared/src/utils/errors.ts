export type TemporaErrorCode =
  | 'extraction_error'
  | 'embedding_error'
  | 'metadata_transaction_error'
  | 'optimistic_conflict'
  | 'vector_index_error'
  | 'write_conflict_exhausted'
  | 'slot_lock_timeout'
  | 'record_not_found'
  | 'validation_error'
  | 'config_error';

export class TemporaError extends Error {
  readonly code: TemporaErrorCode;

  constructor(message: string, code: TemporaErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TemporaError';
    this.code = code;
  }
}

export class ExtractionError extends TemporaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Fact extraction failed: ${message}`, 'extraction_error', options);
    this.name = 'ExtractionError';
  }
}

export class EmbeddingError extends TemporaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Embedding failed: ${message}`, 'embedding_error', options);
    this.name = 'EmbeddingError';
  }
}

export class MetadataTransactionError extends TemporaError {
  /** A concurrent writer got there first; a fresh read and commit may succeed. */
  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; code?: TemporaErrorCode; retryable?: boolean }) {
    super(message, options?.code ?? 'metadata_transaction_error', options);
    this.name = 'MetadataTransactionError';
    this.retryable = options?.retryable ?? false;
  }
}

export class OptimisticConflictError extends MetadataTransactionError {
  constructor(public readonly memoryId: string) {
    super(`Optimistic conflict on memory ${memoryId}`, { code: 'optimistic_conflict', retryable: true });
    this.name = 'OptimisticConflictError';
  }
}

export class VectorIndexError extends TemporaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Vector index failure: ${message}`, 'vector_index_error', options);
    this.name = 'VectorIndexError';
  }
}

export class WriteConflictExhaustedError extends TemporaError {
  constructor(
    public readonly userId: string,
    public readonly slot: string | null,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Write conflict not resolved after ${attempts} attempts (user=${userId}, slot=${slot ?? '-'})`,
      'write_conflict_exhausted',
      options,
    );
    this.name = 'WriteConflictExhaustedError';
  }
}

export class SlotLockTimeoutError extends TemporaError {
  constructor(
    public readonly userId: string,
    public readonly slot: string,
    public readonly waitedMs: number,
  ) {
    super(`Timed out after ${waitedMs}ms waiting for slot lock (user=${userId}, slot=${slot})`, 'slot_lock_timeout');
    this.name = 'SlotLockTimeoutError';
  }
}

export class RecordNotFoundError extends TemporaError {
  constructor(public readonly memoryId: string) {
    super(`Memory not found: ${memoryId}`, 'record_not_found');
    this.name = 'RecordNotFoundError';
  }
}

export class ValidationError extends TemporaError {
  constructor(message: string) {
    super(`Validation failed: ${message}`, 'validation_error');
    this.name = 'ValidationError';
  }
}

export class ConfigError extends TemporaError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'config_error');
    this.name = 'ConfigError';
  }
}

/** Stable code for any thrown value; non-Tempora errors map to `fallback`. */
export function errorCode(err: unknown, fallback: TemporaErrorCode): TemporaErrorCode {
  return err instanceof TemporaError ? err.code : fallback;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
