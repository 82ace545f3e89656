/**
 * TypeORM Ledger
 *
 * Implements the SDK's AssetLedger on the `ledger_accounts` table. Each
 * transfer debits and credits inside one database transaction.
 */

import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import {
	type AssetLedger,
	type CustodyHandle,
	KeyedMutex,
	TransferError,
	isValidAmount,
	isValidHandle,
} from "@custody-escrow/sdk";
import type { EntityManager, Repository } from "typeorm";
import { LedgerAccount } from "./ledger-account.entity";

// SQLite runs one transaction per connection at a time
const LEDGER_LOCK = "ledger";

@Injectable()
export class TypeOrmLedger implements AssetLedger {
	private readonly logger = new Logger(TypeOrmLedger.name);
	private readonly lock = new KeyedMutex();

	constructor(
		@InjectRepository(LedgerAccount)
		private readonly accounts: Repository<LedgerAccount>,
	) {}

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

		await this.lock.runExclusive(LEDGER_LOCK, () =>
			this.accounts.manager.transaction(async (manager) => {
				const source = await this.findAccount(manager, from);
				const available = source?.balance ?? 0;
				if (!source || available < amount) {
					throw new TransferError(
						`Insufficient balance in ${from}: ${available} < ${amount}`,
						"INSUFFICIENT_BALANCE",
						{ from, available, amount },
					);
				}
				source.balance = available - amount;
				await manager.save(source);

				const target =
					(await this.findAccount(manager, to)) ??
					manager.create(LedgerAccount, { handle: to, balance: 0 });
				target.balance += amount;
				await manager.save(target);
			}),
		);
		this.logger.debug(`Transferred ${amount} from ${from} to ${to}`);
	}

	async balanceOf(handle: CustodyHandle): Promise<number> {
		const account = await this.accounts.findOne({ where: { handle } });
		return account?.balance ?? 0;
	}

	/**
	 * Credit units to a handle out of thin air. Development funding only.
	 *
	 * @returns The new balance
	 */
	async deposit(handle: CustodyHandle, amount: number): Promise<number> {
		if (!isValidHandle(handle)) {
			throw new TransferError("Invalid custody handle", "INVALID_HANDLE", {
				handle,
			});
		}
		if (!isValidAmount(amount)) {
			throw new TransferError(
				`Invalid deposit amount: ${amount}`,
				"INVALID_AMOUNT",
				{ amount },
			);
		}
		return this.lock.runExclusive(LEDGER_LOCK, () =>
			this.accounts.manager.transaction(async (manager) => {
				const account =
					(await this.findAccount(manager, handle)) ??
					manager.create(LedgerAccount, { handle, balance: 0 });
				account.balance += amount;
				await manager.save(account);
				return account.balance;
			}),
		);
	}

	private findAccount(
		manager: EntityManager,
		handle: CustodyHandle,
	): Promise<LedgerAccount | null> {
		return manager.findOne(LedgerAccount, { where: { handle } });
	}
}
