/**
 * Storage module - Pluggable persistence adapters
 *
 * This module defines storage interfaces and provides a reference implementation.
 * Developers bring their own persistence layer by implementing StorageAdapter.
 */

// Types
export type {
	StoredContract,
	DataFilters,
	QueryOptions,
	QueryResult,
	StorageAdapter,
} from "./types.js";

export { StorageError } from "./types.js";

// Reference implementations
export { MemoryStorageAdapter } from "./memory-adapter.js";
