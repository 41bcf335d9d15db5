export { generateId } from './id.js';
export { addDays, ageInDays, MS_PER_DAY } from './clock.js';
export {
  TemporaError,
  ExtractionError,
  EmbeddingError,
  MetadataTransactionError,
  OptimisticConflictError,
  VectorIndexError,
  WriteConflictExhaustedError,
  SlotLockTimeoutError,
  RecordNotFoundError,
  ValidationError,
  ConfigError,
  errorCode,
  errorMessage,
} from './errors.js';
export type { TemporaErrorCode } from './errors.js';
