/**
 * Storage Adapter Types
 *
 * Defines interfaces for pluggable storage backends. Developers bring
 * their own persistence layer (SQLite, IndexedDB, Postgres, etc.)
 * by implementing these interfaces.
 */

import { ContractMetadata } from "../contracts/types.js";

/**
 * Contract data structure for storage.
 */
export interface StoredContract<TData = unknown> {
	/** Contract metadata */
	metadata: ContractMetadata;
	/** Current state of the contract */
	state: string;
	/** Contract-specific data */
	data: TData;
}

/**
 * Equality filters over top-level fields of `StoredContract.data`.
 */
export interface DataFilters {
	/** Every listed field must equal the given value */
	all?: Record<string, string | number>;
	/** At least one listed field must equal the given value */
	any?: Record<string, string | number>;
}

/**
 * Query options for listing contracts.
 */
export interface QueryOptions {
	/** Filter by state(s) */
	state?: string | string[];
	/** Filter by contract type */
	contractType?: string;
	/** Filter contracts created after this timestamp */
	createdAfter?: number;
	/** Filter contracts created before this timestamp */
	createdBefore?: number;
	/** Filter contracts updated after this timestamp */
	updatedAfter?: number;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
	/** Sort field */
	sortBy?: "createdAt" | "updatedAt" | "id";
	/** Sort direction */
	sortOrder?: "asc" | "desc";
	/** Filters on contract data */
	filters?: DataFilters;
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * Storage adapter interface.
 *
 * Implement this interface to provide persistence for contracts.
 * The SDK doesn't care about the underlying storage mechanism -
 * you can use SQLite, PostgreSQL, IndexedDB, in-memory, etc.
 *
 * @example
 * ```typescript
 * class PostgresStorageAdapter implements StorageAdapter<EscrowData> {
 *   constructor(private pool: Pool) {}
 *
 *   async save(id: string, contract: StoredContract<EscrowData>): Promise<void> {
 *     await this.pool.query(
 *       'INSERT INTO contracts (id, data) VALUES ($1, $2) ON CONFLICT (id) DO UPDATE SET data = $2',
 *       [id, JSON.stringify(contract)]
 *     );
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface StorageAdapter<TData = unknown> {
	/**
	 * Save a contract to storage.
	 *
	 * Should create or update the contract. If a contract with the
	 * same ID already exists, it should be replaced.
	 */
	save(id: string, contract: StoredContract<TData>): Promise<void>;

	/**
	 * Load a contract from storage.
	 *
	 * @returns The contract if found, null otherwise
	 */
	load(id: string): Promise<StoredContract<TData> | null>;

	/**
	 * Check if a contract exists.
	 */
	exists(id: string): Promise<boolean>;

	/**
	 * List contracts with pagination info.
	 */
	query(options?: QueryOptions): Promise<QueryResult<StoredContract<TData>>>;

	/**
	 * Count contracts matching query options.
	 */
	count(options?: QueryOptions): Promise<number>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
