import { ContractError } from "../../contracts/types.js";

export type EscrowErrorCode =
	| "UNAUTHORIZED"
	| "INVALID_STATE"
	| "DEADLINE_NOT_REACHED"
	| "DEADLINE_PASSED"
	| "INVALID_AMOUNT"
	| "INVALID_DEADLINE"
	| "INVALID_PARTIES"
	| "TRANSFER_FAILURE"
	| "ESCROW_NOT_FOUND"
	| "ESCROW_ALREADY_EXISTS";

/**
 * Error thrown when an escrow request is rejected.
 *
 * A rejected request never leaves a trace: no funds moved, no state changed,
 * no event emitted. Retrying only makes sense once the precondition that
 * failed has changed.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.withdraw(escrowId, caller);
 * } catch (err) {
 *   if (err instanceof EscrowError && err.code === "DEADLINE_PASSED") {
 *     // only refund or arbitration remain
 *   }
 * }
 * ```
 */
export class EscrowError extends ContractError {
	declare readonly code: EscrowErrorCode;

	constructor(
		code: EscrowErrorCode,
		message: string,
		details?: unknown,
		options?: { cause?: unknown },
	) {
		super(message, code, details, options);
		this.name = "EscrowError";
	}
}

export function isEscrowError(
	err: unknown,
	code?: EscrowErrorCode,
): err is EscrowError {
	return err instanceof EscrowError && (code === undefined || err.code === code);
}
