/**
 * Custody Escrow SDK
 *
 * Time-bounded three-party escrow over a pluggable asset ledger.
 *
 * @example
 * ```typescript
 * import { EscrowEngine, MemoryLedger, ManualClock } from "@custody-escrow/sdk";
 *
 * const ledger = new MemoryLedger({ alice: 1_000 });
 * const clock = new ManualClock(Date.now());
 * const engine = new EscrowEngine({ ledger, clock });
 *
 * const escrow = await engine.initialize({
 *   initializer: "alice",
 *   recipient: "bob",
 *   arbiter: "carol",
 *   amount: 250,
 *   timeout: 60_000,
 * });
 *
 * clock.advance(120_000);
 * await engine.refund(escrow.id, "alice");
 * ```
 */

// Contracts - State machines and lifecycle
export {
	// Types
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type ContractMetadata,
	type ActionResult,
	// Classes
	ContractStateMachine,
	ContractError,
	// Utilities
	createState,
	createTransition,
} from "./contracts/index.js";

// Storage - Persistence adapters
export {
	// Types
	type StoredContract,
	type DataFilters,
	type QueryOptions,
	type QueryResult,
	type StorageAdapter,
	// Classes
	MemoryStorageAdapter,
	StorageError,
} from "./storage/index.js";

// Ledger - Asset custody
export {
	type CustodyHandle,
	type AssetLedger,
	type TransferErrorCode,
	TransferError,
	MemoryLedger,
	isValidHandle,
	isValidAmount,
} from "./ledger/index.js";

// Clock
export { type Clock, SystemClock, ManualClock } from "./clock/index.js";

// Sync
export { KeyedMutex } from "./sync/index.js";

// Utils
export {
	bytesToBase58,
	stringToBytes,
	concatBytes,
} from "./utils/index.js";

// Escrow module
export {
	type EscrowRole,
	type EscrowStatus,
	type EscrowAction,
	type DeadlineWindow,
	type ResolutionTarget,
	type EscrowData,
	type Escrow,
	type InitializeEscrowParams,
	type RolePolicy,
	type CustodyResolver,
	type EscrowErrorCode,
	type EscrowTransitionContext,
	type EscrowInitializedEvent,
	type EscrowWithdrawnEvent,
	type EscrowRefundedEvent,
	type EscrowCancelledEvent,
	type EscrowResolvedEvent,
	type EscrowEvent,
	type EscrowEventType,
	type EscrowEventOfType,
	type EscrowEventInput,
	type EscrowEventListener,
	type EngineLogger,
	type EscrowEngineOptions,
	type EscrowQuery,
	ACTION_ROLE,
	ACTION_WINDOW,
	ACTION_PAYEE,
	DEFAULT_ROLE_POLICY,
	EscrowError,
	isEscrowError,
	deriveEscrowId,
	vaultHandleFor,
	hasRole,
	assertValidParties,
	ESCROW_STATE_MACHINE,
	isWithinWindow,
	isEscrowStatus,
	getAllowedActions as getEscrowAllowedActions,
	EscrowEventBus,
	isEventOfType,
	EscrowEngine,
	allowedActionsFor,
} from "./modules/escrow/index.js";
