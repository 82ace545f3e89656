import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";

@Entity("ledger_accounts")
export class LedgerAccount {
	@PrimaryGeneratedColumn()
	id!: number;

	/** Custody handle: a party identity or an escrow vault */
	@Index({ unique: true })
	@Column({ type: "text" })
	handle!: string;

	@Column({ type: "integer", default: 0 })
	balance!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
