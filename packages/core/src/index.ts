export { TemporalMemory, DEFAULT_SEARCH_LIMIT } from './temporal-memory.js';
export type { TemporalMemoryOptions, SearchOptions, DeleteResult } from './temporal-memory.js';
export { ConflictResolver, resolveConflicts } from './memory/conflict-resolver.js';
export { DecayRanker, rank, rankScored, decayFactor, isExpired } from './memory/decay-ranker.js';
export type { RankOptions } from './memory/decay-ranker.js';
export { WriteCoordinator, toVectorPayload } from './memory/write-coordinator.js';
export type { WriteCoordinatorOptions } from './memory/write-coordinator.js';
export { ReadCoordinator } from './memory/read-coordinator.js';
export type { ReadCoordinatorOptions, SearchFilters } from './memory/read-coordinator.js';
export { ConfigManager, CONFIG_FILE_NAMES } from './config-manager.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
