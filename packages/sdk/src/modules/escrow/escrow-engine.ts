/**
 * Escrow Engine
 *
 * Owns the escrow state machine: validates each request against the stored
 * record, the caller's role and the clock, moves the vault through the
 * ledger, persists the new status and emits one event per accepted request.
 */

import { nanoid } from "nanoid";
import { ContractStateMachine } from "../../contracts/index.js";
import { Clock, SystemClock } from "../../clock/index.js";
import {
	AssetLedger,
	CustodyHandle,
	isValidAmount,
} from "../../ledger/index.js";
import {
	MemoryStorageAdapter,
	QueryOptions,
	QueryResult,
	StorageAdapter,
	StorageError,
	StoredContract,
} from "../../storage/index.js";
import { KeyedMutex } from "../../sync/index.js";
import { EscrowError } from "./errors.js";
import {
	EngineLogger,
	EscrowEventBus,
	EscrowEventInput,
} from "./escrow-events.js";
import { deriveEscrowId, vaultHandleFor } from "./escrow-id.js";
import { assertValidParties, hasRole } from "./escrow-roles.js";
import {
	ESCROW_STATE_MACHINE,
	EscrowTransitionContext,
	getAllowedActions,
	isEscrowStatus,
	isWithinWindow,
} from "./escrow-state-machine.js";
import {
	ACTION_PAYEE,
	ACTION_ROLE,
	ACTION_WINDOW,
	CustodyResolver,
	DEFAULT_ROLE_POLICY,
	Escrow,
	EscrowAction,
	EscrowData,
	EscrowRole,
	EscrowStatus,
	InitializeEscrowParams,
	ResolutionTarget,
	RolePolicy,
} from "./types.js";

const CONTRACT_TYPE = "escrow";

export interface EscrowEngineOptions {
	/** Ledger holding party balances and vaults */
	ledger: AssetLedger;
	/** Defaults to {@link SystemClock} */
	clock?: Clock;
	/** Defaults to {@link MemoryStorageAdapter} */
	storage?: StorageAdapter<EscrowData>;
	/** Defaults to a fresh bus */
	events?: EscrowEventBus;
	/** Overrides for {@link DEFAULT_ROLE_POLICY} */
	rolePolicy?: Partial<RolePolicy>;
	/** Defaults to using the identity itself as custody handle */
	custodyOf?: CustodyResolver;
	/** Nonce source for `initialize` calls that bring none */
	generateNonce?: () => string;
	logger?: EngineLogger;
}

/**
 * Listing filter for {@link EscrowEngine.list}.
 */
export interface EscrowQuery {
	status?: EscrowStatus | EscrowStatus[];
	/** Only escrows where this identity holds a role */
	party?: string;
	/** Narrow `party` to one role */
	role?: EscrowRole;
	limit?: number;
	offset?: number;
	sortOrder?: "asc" | "desc";
}

interface FundsMovement {
	from: CustodyHandle;
	to: CustodyHandle;
	amount: number;
}

/**
 * Escrow Engine
 *
 * Operations on one escrow are serialized by a per-escrow lock held from
 * validation to event emission; operations on different escrows run freely.
 *
 * @example
 * ```typescript
 * const ledger = new MemoryLedger({ alice: 1_000 });
 * const engine = new EscrowEngine({ ledger });
 *
 * const escrow = await engine.initialize({
 *   initializer: "alice",
 *   recipient: "bob",
 *   arbiter: "carol",
 *   amount: 100,
 *   timeout: 24 * 60 * 60 * 1000,
 * });
 *
 * await engine.withdraw(escrow.id, "bob");
 * await ledger.balanceOf("bob"); // 100
 * ```
 */
export class EscrowEngine {
	private readonly ledger: AssetLedger;
	private readonly clock: Clock;
	private readonly storage: StorageAdapter<EscrowData>;
	private readonly events: EscrowEventBus;
	private readonly rolePolicy: RolePolicy;
	private readonly custodyOf: CustodyResolver;
	private readonly generateNonce: () => string;
	private readonly logger?: EngineLogger;
	private readonly locks = new KeyedMutex();

	constructor(options: EscrowEngineOptions) {
		this.ledger = options.ledger;
		this.clock = options.clock ?? new SystemClock();
		this.storage = options.storage ?? new MemoryStorageAdapter<EscrowData>();
		this.logger = options.logger;
		this.events =
			options.events ?? new EscrowEventBus({ logger: options.logger });
		this.rolePolicy = { ...DEFAULT_ROLE_POLICY, ...options.rolePolicy };
		this.custodyOf = options.custodyOf ?? ((identity) => identity);
		this.generateNonce = options.generateNonce ?? (() => nanoid(16));
	}

	/**
	 * The bus every accepted transition is published on.
	 */
	getEvents(): EscrowEventBus {
		return this.events;
	}

	// ==================== Transitions ====================

	/**
	 * Create an escrow and lock `amount` units from the initializer into its vault.
	 *
	 * @throws EscrowError `INVALID_PARTIES`, `INVALID_AMOUNT`, `INVALID_DEADLINE`,
	 * `ESCROW_ALREADY_EXISTS` or `TRANSFER_FAILURE`
	 */
	async initialize(params: InitializeEscrowParams): Promise<Escrow> {
		const parties = {
			initializer: params.initializer,
			recipient: params.recipient,
			arbiter: params.arbiter,
		};
		assertValidParties(parties, this.rolePolicy);

		if (!isValidAmount(params.amount)) {
			throw new EscrowError(
				"INVALID_AMOUNT",
				`Amount must be a positive integer, got ${params.amount}`,
				{ amount: params.amount },
			);
		}

		const nonce = params.nonce ?? this.generateNonce();
		const id = deriveEscrowId(params.initializer, nonce);

		return this.locks.runExclusive(id, async () => {
			const now = this.clock.now();
			const deadline = this.resolveDeadline(params, now);

			if (await this.storage.exists(id)) {
				throw new EscrowError(
					"ESCROW_ALREADY_EXISTS",
					`Escrow ${id} already exists`,
					{ escrowId: id, initializer: params.initializer, nonce },
				);
			}

			const vault = vaultHandleFor(id);
			const funding = await this.moveFunds(
				id,
				this.custodyOf(params.initializer),
				vault,
				params.amount,
			);

			const escrow: Escrow = {
				id,
				status: ESCROW_STATE_MACHINE.initialState,
				...parties,
				amount: params.amount,
				deadline,
				vault,
				nonce,
				createdAt: now,
				updatedAt: now,
				version: 1,
			};
			await this.persist(escrow, funding);

			this.logger?.log(
				`Escrow ${id} initialized: ${params.amount} from ${params.initializer} to ${params.recipient}`,
			);
			this.events.publish(
				{
					type: "escrow.initialized",
					escrowId: id,
					initializer: escrow.initializer,
					recipient: escrow.recipient,
					arbiter: escrow.arbiter,
					amount: escrow.amount,
					deadline: escrow.deadline,
					vault,
				},
				now,
			);
			return escrow;
		});
	}

	/**
	 * Recipient claims the vault, up to and including the deadline.
	 */
	async withdraw(escrowId: string, caller: string): Promise<Escrow> {
		return this.transition(escrowId, caller, "withdraw");
	}

	/**
	 * Initializer reclaims the vault once the deadline has passed.
	 */
	async refund(escrowId: string, caller: string): Promise<Escrow> {
		return this.transition(escrowId, caller, "refund");
	}

	/**
	 * Initializer calls the escrow off, up to and including the deadline.
	 */
	async cancel(escrowId: string, caller: string): Promise<Escrow> {
		return this.transition(escrowId, caller, "cancel");
	}

	/**
	 * Arbiter sends the vault to the recipient (`release`) or back to the
	 * initializer, regardless of the deadline.
	 */
	async resolveByArbiter(
		escrowId: string,
		caller: string,
		release: boolean,
	): Promise<Escrow> {
		return this.transition(
			escrowId,
			caller,
			release ? "resolve-release" : "resolve-refund",
		);
	}

	// ==================== Queries ====================

	/**
	 * Load an escrow.
	 *
	 * @throws EscrowError `ESCROW_NOT_FOUND`
	 */
	async get(escrowId: string): Promise<Escrow> {
		const escrow = await this.find(escrowId);
		if (!escrow) {
			throw new EscrowError(
				"ESCROW_NOT_FOUND",
				`Escrow ${escrowId} not found`,
				{ escrowId },
			);
		}
		return escrow;
	}

	/**
	 * Load an escrow, or `null` when it doesn't exist.
	 */
	async find(escrowId: string): Promise<Escrow | null> {
		const stored = await this.storage.load(escrowId);
		return stored ? toEscrow(stored) : null;
	}

	/**
	 * List escrows, newest first unless told otherwise.
	 */
	async list(query: EscrowQuery = {}): Promise<QueryResult<Escrow>> {
		const options: QueryOptions = {
			contractType: CONTRACT_TYPE,
			state: query.status,
			limit: query.limit,
			offset: query.offset,
			sortOrder: query.sortOrder,
		};
		if (query.party !== undefined) {
			options.filters = query.role
				? { all: { [query.role]: query.party } }
				: {
						any: {
							initializer: query.party,
							recipient: query.party,
							arbiter: query.party,
						},
					};
		}
		const result = await this.storage.query(options);
		return { ...result, items: result.items.map(toEscrow) };
	}

	/**
	 * Actions `caller` could successfully request right now.
	 */
	async getAllowedActions(
		escrowId: string,
		caller: string,
	): Promise<EscrowAction[]> {
		const escrow = await this.get(escrowId);
		return allowedActionsFor(escrow, caller, this.clock.now());
	}

	// ==================== Internals ====================

	private resolveDeadline(params: InitializeEscrowParams, now: number): number {
		let deadline = Number.NaN;
		if (params.deadline !== undefined) {
			deadline = params.deadline;
		} else if (params.timeout !== undefined) {
			deadline = now + params.timeout;
		}
		if (!Number.isSafeInteger(deadline) || deadline <= now) {
			throw new EscrowError(
				"INVALID_DEADLINE",
				"Deadline must be an integer timestamp in the future",
				{ deadline, timeout: params.timeout, now },
			);
		}
		return deadline;
	}

	private async transition(
		escrowId: string,
		caller: string,
		action: EscrowAction,
	): Promise<Escrow> {
		return this.locks.runExclusive(escrowId, async () => {
			const escrow = await this.get(escrowId);

			const role = ACTION_ROLE[action];
			if (!hasRole(escrow, caller, role)) {
				throw new EscrowError(
					"UNAUTHORIZED",
					`Only the ${role} can ${describeAction(action)} escrow ${escrowId}`,
					{ escrowId, action, requiredRole: role },
				);
			}

			const machine = new ContractStateMachine(
				ESCROW_STATE_MACHINE,
				escrow.status,
			);
			if (!machine.canPerform(action)) {
				throw new EscrowError(
					"INVALID_STATE",
					`Escrow ${escrowId} is ${escrow.status}, cannot ${describeAction(action)}`,
					{ escrowId, action, status: escrow.status },
				);
			}

			const now = this.clock.now();
			const payouts: FundsMovement[] = [];
			const context: EscrowTransitionContext = {
				escrow,
				now,
				moveFunds: async (payee) => {
					payouts.push(await this.payOut(escrow, payee));
				},
			};
			const result = await machine.perform(action, context);

			const resolution: ResolutionTarget | undefined =
				action === "resolve-release" || action === "resolve-refund"
					? ACTION_PAYEE[action]
					: undefined;
			const updated: Escrow = {
				...escrow,
				status: result.newState,
				resolution,
				settledAt: machine.isFinal() ? now : undefined,
				updatedAt: now,
				version: escrow.version + 1,
			};
			const payout = payouts.length > 0 ? payouts[0] : undefined;
			await this.persist(updated, payout);

			this.logger?.log(
				`Escrow ${escrowId} ${result.previousState} -> ${result.newState} by ${caller}`,
			);
			this.events.publish(
				settlementEvent(updated, action, payout?.amount ?? escrow.amount),
				now,
			);
			return updated;
		});
	}

	/**
	 * Empty the vault into the payee's custody.
	 */
	private async payOut(
		escrow: Escrow,
		payee: ResolutionTarget,
	): Promise<FundsMovement> {
		const balance = await this.ledger.balanceOf(escrow.vault);
		if (balance < escrow.amount) {
			throw new EscrowError(
				"TRANSFER_FAILURE",
				`Vault of escrow ${escrow.id} holds ${balance}, expected ${escrow.amount}`,
				{ escrowId: escrow.id, balance, amount: escrow.amount },
			);
		}
		return this.moveFunds(
			escrow.id,
			escrow.vault,
			this.custodyOf(escrow[payee]),
			balance,
		);
	}

	private async moveFunds(
		escrowId: string,
		from: CustodyHandle,
		to: CustodyHandle,
		amount: number,
	): Promise<FundsMovement> {
		try {
			await this.ledger.transfer(from, to, amount);
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			throw new EscrowError(
				"TRANSFER_FAILURE",
				`Transfer of ${amount} from ${from} to ${to} failed: ${reason}`,
				{ escrowId, from, to, amount },
				{ cause: err },
			);
		}
		return { from, to, amount };
	}

	/**
	 * Save the record. If that fails, put the funds that already moved back
	 * where they came from before rethrowing.
	 */
	private async persist(escrow: Escrow, movement?: FundsMovement): Promise<void> {
		try {
			await this.storage.save(escrow.id, toStoredContract(escrow));
		} catch (err) {
			if (movement) {
				await this.revert(escrow.id, movement);
			}
			throw err;
		}
	}

	private async revert(escrowId: string, movement: FundsMovement): Promise<void> {
		try {
			await this.ledger.transfer(movement.to, movement.from, movement.amount);
			this.logger?.warn(
				`Escrow ${escrowId}: save failed, returned ${movement.amount} from ${movement.to} to ${movement.from}`,
			);
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			this.logger?.error(
				`Escrow ${escrowId}: save failed and ${movement.amount} could not be returned from ${movement.to} to ${movement.from}: ${reason}`,
				err instanceof Error ? err.stack : undefined,
			);
		}
	}
}

/**
 * Actions `caller` could request on `escrow` at time `now`.
 */
export function allowedActionsFor(
	escrow: Escrow,
	caller: string,
	now: number,
): EscrowAction[] {
	return getAllowedActions(escrow.status).filter(
		(action) =>
			hasRole(escrow, caller, ACTION_ROLE[action]) &&
			isWithinWindow(ACTION_WINDOW[action], now, escrow.deadline),
	);
}

function describeAction(action: EscrowAction): string {
	switch (action) {
		case "resolve-release":
		case "resolve-refund":
			return "resolve";
		default:
			return action;
	}
}

function settlementEvent(
	escrow: Escrow,
	action: EscrowAction,
	amount: number,
): EscrowEventInput {
	switch (action) {
		case "withdraw":
			return {
				type: "escrow.withdrawn",
				escrowId: escrow.id,
				recipient: escrow.recipient,
				amount,
			};
		case "refund":
			return {
				type: "escrow.refunded",
				escrowId: escrow.id,
				initializer: escrow.initializer,
				amount,
			};
		case "cancel":
			return {
				type: "escrow.cancelled",
				escrowId: escrow.id,
				initializer: escrow.initializer,
				amount,
			};
		case "resolve-release":
		case "resolve-refund":
			return {
				type: "escrow.resolved",
				escrowId: escrow.id,
				arbiter: escrow.arbiter,
				amount,
				releasedTo: ACTION_PAYEE[action],
			};
	}
}

function toStoredContract(escrow: Escrow): StoredContract<EscrowData> {
	const { id, status, createdAt, updatedAt, version, ...data } = escrow;
	return {
		metadata: {
			id,
			createdAt,
			updatedAt,
			version,
			contractType: CONTRACT_TYPE,
		},
		state: status,
		data,
	};
}

function toEscrow(stored: StoredContract<EscrowData>): Escrow {
	if (!isEscrowStatus(stored.state)) {
		throw new StorageError(
			`Escrow ${stored.metadata.id} has unknown state "${stored.state}"`,
			"CORRUPT_RECORD",
			{ id: stored.metadata.id, state: stored.state },
		);
	}
	return {
		...stored.data,
		id: stored.metadata.id,
		status: stored.state,
		createdAt: stored.metadata.createdAt,
		updatedAt: stored.metadata.updatedAt,
		version: stored.metadata.version,
	};
}
