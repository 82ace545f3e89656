/**
 * Custody Ledger Types
 *
 * The ledger is the external system that actually stores and moves asset
 * units. The SDK only ever asks it to move a whole amount from one custody
 * handle to another, atomically.
 */

/**
 * Opaque address of a balance on the ledger (a party account or a vault).
 */
export type CustodyHandle = string;

/**
 * Asset custody ledger.
 *
 * Implementations must be atomic (the full amount moves or nothing does)
 * and fail closed: an insufficient balance, an unknown source or a malformed
 * handle rejects with a {@link TransferError} and leaves every balance as it was.
 *
 * @example
 * ```typescript
 * class PostgresLedger implements AssetLedger {
 *   async transfer(from, to, amount) {
 *     await this.pool.query("BEGIN");
 *     // debit `from` with a balance check, credit `to`, COMMIT
 *   }
 *   // ...
 * }
 * ```
 */
export interface AssetLedger {
	/**
	 * Move `amount` units from `from` to `to`.
	 */
	transfer(from: CustodyHandle, to: CustodyHandle, amount: number): Promise<void>;

	/**
	 * Current balance held under a handle (0 for unknown handles).
	 */
	balanceOf(handle: CustodyHandle): Promise<number>;
}

export type TransferErrorCode =
	| "INSUFFICIENT_BALANCE"
	| "INVALID_HANDLE"
	| "INVALID_AMOUNT";

/**
 * Error thrown by ledger transfers.
 */
export class TransferError extends Error {
	constructor(
		message: string,
		public readonly code: TransferErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "TransferError";
	}
}

/**
 * Check that a value can be used as a custody handle.
 */
export function isValidHandle(handle: unknown): handle is CustodyHandle {
	return typeof handle === "string" && handle.trim().length > 0;
}

/**
 * Check that a value is a transferable amount of asset units.
 */
export function isValidAmount(amount: unknown): amount is number {
	return typeof amount === "number" && Number.isSafeInteger(amount) && amount > 0;
}
