/**
 * TypeORM Storage Adapter
 *
 * Implements the SDK's StorageAdapter interface on the `escrows` table. This
 * bridges the engine's generic storage abstraction with the application's
 * database.
 */

import { Brackets, type Repository, type SelectQueryBuilder } from "typeorm";
import {
	type EscrowData,
	type QueryOptions,
	type QueryResult,
	type StorageAdapter,
	StorageError,
	type StoredContract,
	isEscrowStatus,
} from "@custody-escrow/sdk";
import { EscrowRecord } from "./escrow.entity";

const CONTRACT_TYPE = "escrow";

/**
 * Data fields that `QueryOptions.filters` may reference, with their column.
 */
const FILTERABLE_COLUMNS: Record<string, keyof EscrowRecord> = {
	initializer: "initializer",
	recipient: "recipient",
	arbiter: "arbiter",
	vault: "vault",
	nonce: "nonce",
	amount: "amount",
	deadline: "deadline",
	resolution: "resolution",
};

const SORT_COLUMNS = {
	createdAt: "createdAt",
	updatedAt: "updatedAt",
	id: "externalId",
} as const;

/**
 * TypeORM-based storage adapter for escrows.
 *
 * @example
 * ```typescript
 * const adapter = new TypeOrmStorageAdapter(escrowRepository);
 * const engine = new EscrowEngine({ ledger, clock, storage: adapter });
 * ```
 */
export class TypeOrmStorageAdapter implements StorageAdapter<EscrowData> {
	constructor(private readonly repository: Repository<EscrowRecord>) {}

	/**
	 * Convert SDK StoredContract to TypeORM entity fields.
	 */
	private toEntityFields(
		contract: StoredContract<EscrowData>,
	): Omit<EscrowRecord, "id"> {
		const { state, metadata, data } = contract;
		if (!isEscrowStatus(state)) {
			throw new StorageError(
				`Cannot store escrow ${metadata.id} in unknown state "${state}"`,
				"INVALID_STATE",
				{ state },
			);
		}
		return {
			externalId: metadata.id,
			status: state,
			initializer: data.initializer,
			recipient: data.recipient,
			arbiter: data.arbiter,
			amount: data.amount,
			deadline: data.deadline,
			vault: data.vault,
			nonce: data.nonce,
			resolution: data.resolution ?? null,
			settledAt: data.settledAt ?? null,
			version: metadata.version,
			createdAt: metadata.createdAt,
			updatedAt: metadata.updatedAt,
		};
	}

	/**
	 * Convert TypeORM entity to SDK StoredContract.
	 */
	private toStoredContract(entity: EscrowRecord): StoredContract<EscrowData> {
		const data: EscrowData = {
			initializer: entity.initializer,
			recipient: entity.recipient,
			arbiter: entity.arbiter,
			amount: entity.amount,
			deadline: entity.deadline,
			vault: entity.vault,
			nonce: entity.nonce,
		};
		if (entity.resolution !== null) data.resolution = entity.resolution;
		if (entity.settledAt !== null) data.settledAt = entity.settledAt;

		return {
			metadata: {
				id: entity.externalId,
				createdAt: entity.createdAt,
				updatedAt: entity.updatedAt,
				version: entity.version,
				contractType: CONTRACT_TYPE,
			},
			state: entity.status,
			data,
		};
	}

	/**
	 * Save an escrow to storage.
	 */
	async save(id: string, contract: StoredContract<EscrowData>): Promise<void> {
		const fields = this.toEntityFields(contract);
		try {
			const existing = await this.repository.findOne({
				where: { externalId: id },
			});

			if (existing) {
				await this.repository.update({ externalId: id }, fields);
			} else {
				await this.repository.save(this.repository.create(fields));
			}
		} catch (error) {
			throw new StorageError(`Failed to save escrow ${id}`, "SAVE_ERROR", {
				error,
			});
		}
	}

	/**
	 * Load an escrow from storage.
	 */
	async load(id: string): Promise<StoredContract<EscrowData> | null> {
		let entity: EscrowRecord | null;
		try {
			entity = await this.repository.findOne({ where: { externalId: id } });
		} catch (error) {
			throw new StorageError(`Failed to load escrow ${id}`, "LOAD_ERROR", {
				error,
			});
		}
		return entity ? this.toStoredContract(entity) : null;
	}

	/**
	 * Check if an escrow exists.
	 */
	async exists(id: string): Promise<boolean> {
		try {
			const count = await this.repository.count({
				where: { externalId: id },
			});
			return count > 0;
		} catch (error) {
			throw new StorageError(
				`Failed to check existence of escrow ${id}`,
				"EXISTS_ERROR",
				{ error },
			);
		}
	}

	/**
	 * Query escrows with pagination.
	 */
	async query(
		options?: QueryOptions,
	): Promise<QueryResult<StoredContract<EscrowData>>> {
		const qb = this.buildQuery(options);
		try {
			const total = await qb.getCount();

			const sortColumn = SORT_COLUMNS[options?.sortBy ?? "createdAt"];
			const sortOrder = options?.sortOrder === "asc" ? "ASC" : "DESC";
			// Ties keep insertion order
			qb.orderBy(`e.${sortColumn}`, sortOrder).addOrderBy("e.id", "ASC");

			const offset = options?.offset ?? 0;
			if (offset > 0) {
				qb.skip(offset);
			}
			if (options?.limit !== undefined) {
				qb.take(options.limit);
			}

			// take(0) would mean "no limit" to TypeORM
			const entities = options?.limit === 0 ? [] : await qb.getMany();
			const items = entities.map((e) => this.toStoredContract(e));
			const hasMore = offset + items.length < total;

			return { items, total, hasMore };
		} catch (error) {
			throw new StorageError("Failed to query escrows", "QUERY_ERROR", {
				error,
			});
		}
	}

	/**
	 * Count escrows matching query options.
	 */
	async count(options?: QueryOptions): Promise<number> {
		try {
			return await this.buildQuery(options).getCount();
		} catch (error) {
			throw new StorageError("Failed to count escrows", "QUERY_ERROR", {
				error,
			});
		}
	}

	private buildQuery(options?: QueryOptions): SelectQueryBuilder<EscrowRecord> {
		const qb = this.repository.createQueryBuilder("e");

		if (options?.contractType && options.contractType !== CONTRACT_TYPE) {
			return qb.where("1 = 0");
		}

		if (options?.state) {
			const statuses = Array.isArray(options.state)
				? options.state
				: [options.state];
			qb.andWhere("e.status IN (:...statuses)", { statuses });
		}

		if (options?.createdAfter !== undefined) {
			qb.andWhere("e.createdAt > :createdAfter", {
				createdAfter: options.createdAfter,
			});
		}
		if (options?.createdBefore !== undefined) {
			qb.andWhere("e.createdAt < :createdBefore", {
				createdBefore: options.createdBefore,
			});
		}
		if (options?.updatedAfter !== undefined) {
			qb.andWhere("e.updatedAt > :updatedAfter", {
				updatedAfter: options.updatedAfter,
			});
		}

		const all = Object.entries(options?.filters?.all ?? {});
		all.forEach(([field, value], i) => {
			qb.andWhere(`e.${columnFor(field)} = :all${i}`, { [`all${i}`]: value });
		});

		const any = Object.entries(options?.filters?.any ?? {});
		if (any.length > 0) {
			qb.andWhere(
				new Brackets((w) => {
					any.forEach(([field, value], i) => {
						w.orWhere(`e.${columnFor(field)} = :any${i}`, {
							[`any${i}`]: value,
						});
					});
				}),
			);
		}

		return qb;
	}
}

function columnFor(field: string): string {
	const column = Object.hasOwn(FILTERABLE_COLUMNS, field)
		? FILTERABLE_COLUMNS[field]
		: undefined;
	if (!column) {
		throw new StorageError(`Cannot filter escrows by "${field}"`, "QUERY_ERROR", {
			field,
		});
	}
	return column;
}
