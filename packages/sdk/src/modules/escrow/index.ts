/**
 * Escrow Module
 *
 * Three-party escrow over an asset ledger: the initializer locks funds in a
 * vault, the recipient withdraws before the deadline, the initializer gets
 * them back by cancelling before or refunding after it, and the arbiter can
 * settle either way at any time.
 */

// Types
export type {
	EscrowRole,
	EscrowStatus,
	EscrowAction,
	DeadlineWindow,
	ResolutionTarget,
	EscrowData,
	Escrow,
	InitializeEscrowParams,
	RolePolicy,
	CustodyResolver,
} from "./types.js";

export {
	ACTION_ROLE,
	ACTION_WINDOW,
	ACTION_PAYEE,
	DEFAULT_ROLE_POLICY,
} from "./types.js";

// Errors
export { type EscrowErrorCode, EscrowError, isEscrowError } from "./errors.js";

// Addressing
export { deriveEscrowId, vaultHandleFor } from "./escrow-id.js";

// Roles
export { hasRole, assertValidParties } from "./escrow-roles.js";

// State machine
export {
	type EscrowTransitionContext,
	ESCROW_STATE_MACHINE,
	isWithinWindow,
	isEscrowStatus,
	getAllowedActions,
} from "./escrow-state-machine.js";

// Events
export {
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
	EscrowEventBus,
	isEventOfType,
} from "./escrow-events.js";

// Engine
export {
	type EscrowEngineOptions,
	type EscrowQuery,
	EscrowEngine,
	allowedActionsFor,
} from "./escrow-engine.js";
