import type {
	EscrowCancelledEvent,
	EscrowInitializedEvent,
	EscrowRefundedEvent,
	EscrowResolvedEvent,
	EscrowWithdrawnEvent,
} from "@custody-escrow/sdk";

export type EscrowId = string;

export const ESCROW_INITIALIZED_ID = "escrow.initialized";
export type EscrowInitialized = EscrowInitializedEvent;

export const ESCROW_WITHDRAWN_ID = "escrow.withdrawn";
export type EscrowWithdrawn = EscrowWithdrawnEvent;

export const ESCROW_REFUNDED_ID = "escrow.refunded";
export type EscrowRefunded = EscrowRefundedEvent;

export const ESCROW_CANCELLED_ID = "escrow.cancelled";
export type EscrowCancelled = EscrowCancelledEvent;

export const ESCROW_RESOLVED_ID = "escrow.resolved";
export type EscrowResolved = EscrowResolvedEvent;
