/**
 * In-Memory Ledger
 *
 * Reference {@link AssetLedger} for tests and development. Balances live in a
 * map and are lost when the process exits.
 */

import {
	AssetLedger,
	CustodyHandle,
	TransferError,
	isValidAmount,
	isValidHandle,
} from "./types.js";

export class MemoryLedger implements AssetLedger {
	private balances: Map<CustodyHandle, number> = new Map();

	constructor(initialBalances?: Record<CustodyHandle, number>) {
		for (const [handle, amount] of Object.entries(initialBalances ?? {})) {
			this.credit(handle, amount);
		}
	}

	async transfer(
		from: CustodyHandle,
		to: CustodyHandle,
		amount: number,
	): Promise<void> {
		if (!isValidHandle(from) || !isValidHandle(to)) {
			throw new TransferError("Invalid custody handle", "INVALID_HANDLE", {
				from,
				to,
			});
		}
		if (!isValidAmount(amount)) {
			throw new TransferError(
				`Invalid transfer amount: ${amount}`,
				"INVALID_AMOUNT",
				{ amount },
			);
		}
		const available = this.balances.get(from) ?? 0;
		if (available < amount) {
			throw new TransferError(
				`Insufficient balance in ${from}: ${available} < ${amount}`,
				"INSUFFICIENT_BALANCE",
				{ from, available, amount },
			);
		}
		// Both writes happen in the same tick, nothing can observe a half transfer
		this.balances.set(from, available - amount);
		this.balances.set(to, (this.balances.get(to) ?? 0) + amount);
	}

	async balanceOf(handle: CustodyHandle): Promise<number> {
		return this.balances.get(handle) ?? 0;
	}

	/**
	 * Mint units into a handle. Test and development funding only.
	 */
	credit(handle: CustodyHandle, amount: number): void {
		if (!isValidHandle(handle)) {
			throw new TransferError("Invalid custody handle", "INVALID_HANDLE", {
				handle,
			});
		}
		if (!isValidAmount(amount)) {
			throw new TransferError(
				`Invalid credit amount: ${amount}`,
				"INVALID_AMOUNT",
				{ amount },
			);
		}
		this.balances.set(handle, (this.balances.get(handle) ?? 0) + amount);
	}

	/**
	 * Sum of all balances; constant across transfers.
	 */
	totalSupply(): number {
		let total = 0;
		for (const value of this.balances.values()) total += value;
		return total;
	}
}
