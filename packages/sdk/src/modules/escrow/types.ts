/**
 * Escrow Module Types
 *
 * Types specific to the escrow module.
 */

import { CustodyHandle } from "../../ledger/types.js";

/**
 * Escrow roles. One identity may hold several roles only when the
 * {@link RolePolicy} allows it.
 */
export type EscrowRole = "initializer" | "recipient" | "arbiter";

/**
 * Escrow states.
 *
 * Lifecycle:
 * - initialized: Vault funded, waiting for one of the four outcomes
 * - withdrawn: Paid out to the recipient (by the recipient or the arbiter)
 * - refunded: Paid back to the initializer after the deadline or by the arbiter
 * - cancelled: Paid back to the initializer before the deadline
 */
export type EscrowStatus = "initialized" | "withdrawn" | "refunded" | "cancelled";

/**
 * Escrow actions. Arbiter resolution is split in two so that each action
 * maps to exactly one target state.
 */
export type EscrowAction =
	| "withdraw" // Recipient claims the vault before the deadline
	| "refund" // Initializer reclaims the vault after the deadline
	| "cancel" // Initializer reclaims the vault before the deadline
	| "resolve-release" // Arbiter pays the recipient
	| "resolve-refund"; // Arbiter pays the initializer

/**
 * When an action may be taken relative to the escrow deadline.
 */
export type DeadlineWindow = "until-deadline" | "after-deadline" | "any-time";

/**
 * Who receives the vault when the arbiter resolves an escrow.
 */
export type ResolutionTarget = "recipient" | "initializer";

/**
 * Persisted escrow data.
 */
export interface EscrowData {
	/** Depositing party */
	initializer: string;
	/** Beneficiary */
	recipient: string;
	/** Neutral party with override authority */
	arbiter: string;
	/** Escrowed asset units, immutable */
	amount: number;
	/** Absolute deadline (Unix timestamp ms), immutable */
	deadline: number;
	/** Custody handle holding `amount` while initialized */
	vault: CustodyHandle;
	/** Nonce the id was derived from */
	nonce: string;
	/** Set when the arbiter resolved the escrow */
	resolution?: ResolutionTarget;
	/** When the escrow reached its terminal state (Unix timestamp ms) */
	settledAt?: number;
}

/**
 * An escrow as returned by the engine.
 */
export interface Escrow extends EscrowData {
	id: string;
	status: EscrowStatus;
	createdAt: number;
	updatedAt: number;
	version: number;
}

/**
 * Parameters of `initialize`. Either an absolute `deadline` or a relative
 * `timeout` (milliseconds from now) must be given.
 */
export type InitializeEscrowParams = {
	initializer: string;
	recipient: string;
	arbiter: string;
	amount: number;
	/** Defaults to a random 16-character nanoid */
	nonce?: string;
} & ({ deadline: number; timeout?: never } | { timeout: number; deadline?: never });

/**
 * Which identities may hold more than one role in the same escrow.
 */
export interface RolePolicy {
	/** Allow `recipient === initializer` */
	allowRecipientAsInitializer: boolean;
	/** Allow the arbiter to also be the initializer or the recipient */
	allowArbiterAsParty: boolean;
}

export const DEFAULT_ROLE_POLICY: RolePolicy = {
	allowRecipientAsInitializer: false,
	allowArbiterAsParty: false,
};

/**
 * Maps a party identity to the ledger handle its funds come from and go to.
 */
export type CustodyResolver = (identity: string) => CustodyHandle;

/**
 * Role required for each action.
 */
export const ACTION_ROLE: Record<EscrowAction, EscrowRole> = {
	withdraw: "recipient",
	refund: "initializer",
	cancel: "initializer",
	"resolve-release": "arbiter",
	"resolve-refund": "arbiter",
};

/**
 * Deadline window for each action.
 */
export const ACTION_WINDOW: Record<EscrowAction, DeadlineWindow> = {
	withdraw: "until-deadline",
	refund: "after-deadline",
	cancel: "until-deadline",
	"resolve-release": "any-time",
	"resolve-refund": "any-time",
};

/**
 * Party that receives the vault for each action.
 */
export const ACTION_PAYEE: Record<EscrowAction, ResolutionTarget> = {
	withdraw: "recipient",
	refund: "initializer",
	cancel: "initializer",
	"resolve-release": "recipient",
	"resolve-refund": "initializer",
};
