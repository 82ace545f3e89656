/**
 * In-Memory Storage Adapter
 *
 * A simple in-memory storage adapter for testing and development.
 * Data is lost when the process exits.
 */

import {
	StorageAdapter,
	StoredContract,
	QueryOptions,
	QueryResult,
	DataFilters,
} from "./types.js";

/**
 * In-memory storage adapter.
 *
 * Useful for:
 * - Unit testing
 * - Development and prototyping
 * - Short-lived applications
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorageAdapter<EscrowData>();
 * const engine = new EscrowEngine({ ledger, clock, storage });
 * ```
 */
export class MemoryStorageAdapter<TData = unknown>
	implements StorageAdapter<TData>
{
	private contracts: Map<string, StoredContract<TData>> = new Map();

	/**
	 * Save a contract to memory.
	 */
	async save(id: string, contract: StoredContract<TData>): Promise<void> {
		// Copies in and out keep callers from mutating stored records
		this.contracts.set(id, structuredClone(contract));
	}

	/**
	 * Load a contract from memory.
	 */
	async load(id: string): Promise<StoredContract<TData> | null> {
		const contract = this.contracts.get(id);
		if (!contract) return null;
		return structuredClone(contract);
	}

	/**
	 * Check if a contract exists.
	 */
	async exists(id: string): Promise<boolean> {
		return this.contracts.has(id);
	}

	/**
	 * Query contracts with pagination.
	 */
	async query(
		options?: QueryOptions,
	): Promise<QueryResult<StoredContract<TData>>> {
		let contracts = Array.from(this.contracts.values());

		if (options?.state) {
			const states = Array.isArray(options.state)
				? options.state
				: [options.state];
			contracts = contracts.filter((c) => states.includes(c.state));
		}

		if (options?.contractType) {
			contracts = contracts.filter(
				(c) => c.metadata.contractType === options.contractType,
			);
		}

		const { createdAfter, createdBefore, updatedAfter, filters } =
			options ?? {};
		if (createdAfter !== undefined) {
			contracts = contracts.filter((c) => c.metadata.createdAt > createdAfter);
		}
		if (createdBefore !== undefined) {
			contracts = contracts.filter((c) => c.metadata.createdAt < createdBefore);
		}
		if (updatedAfter !== undefined) {
			contracts = contracts.filter((c) => c.metadata.updatedAt > updatedAfter);
		}
		if (filters) {
			contracts = contracts.filter((c) => matchesFilters(c.data, filters));
		}

		const total = contracts.length;

		const sortBy = options?.sortBy ?? "createdAt";
		const sortOrder = options?.sortOrder ?? "desc";
		contracts.sort((a, b) => {
			let aVal: string | number;
			let bVal: string | number;

			switch (sortBy) {
				case "id":
					aVal = a.metadata.id;
					bVal = b.metadata.id;
					break;
				case "updatedAt":
					aVal = a.metadata.updatedAt;
					bVal = b.metadata.updatedAt;
					break;
				case "createdAt":
				default:
					aVal = a.metadata.createdAt;
					bVal = b.metadata.createdAt;
					break;
			}

			if (sortOrder === "asc") {
				return aVal < bVal ? -1 : aVal > bVal ? 1 : 0;
			}
			return aVal > bVal ? -1 : aVal < bVal ? 1 : 0;
		});

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? contracts.length;
		const items = contracts
			.slice(offset, offset + limit)
			.map((c) => structuredClone(c));

		return {
			items,
			total,
			hasMore: offset + items.length < total,
		};
	}

	/**
	 * Count contracts matching query options.
	 */
	async count(options?: QueryOptions): Promise<number> {
		const result = await this.query({ ...options, limit: 0 });
		return result.total;
	}

	/**
	 * Clear all contracts from memory.
	 */
	clear(): void {
		this.contracts.clear();
	}

	/**
	 * Get the number of contracts stored.
	 */
	size(): number {
		return this.contracts.size;
	}
}

function fieldOf(data: unknown, key: string): unknown {
	if (typeof data !== "object" || data === null) return undefined;
	return Object.getOwnPropertyDescriptor(data, key)?.value;
}

function matchesFilters(data: unknown, filters: DataFilters): boolean {
	if (filters.all) {
		for (const [key, value] of Object.entries(filters.all)) {
			if (fieldOf(data, key) !== value) return false;
		}
	}
	if (filters.any) {
		const entries = Object.entries(filters.any);
		if (
			entries.length > 0 &&
			!entries.some(([key, value]) => fieldOf(data, key) === value)
		) {
			return false;
		}
	}
	return true;
}
