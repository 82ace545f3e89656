import { Column, Entity, Index, PrimaryGeneratedColumn } from "typeorm";
import type { EscrowStatus, ResolutionTarget } from "@custody-escrow/sdk";

export const ESCROW_STATUS: EscrowStatus[] = [
	// vault funded, waiting for an outcome
	"initialized",
	// paid to the recipient, by withdrawal or arbitration
	"withdrawn",
	// paid back to the initializer after the deadline or by arbitration
	"refunded",
	// called off by the initializer before the deadline
	"cancelled",
];

/**
 * Timestamps are stored as Unix epoch milliseconds from the engine's clock,
 * not from the database.
 */
@Entity("escrows")
export class EscrowRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text", enum: ESCROW_STATUS })
	status!: EscrowStatus;

	@Index()
	@Column({ type: "text" })
	initializer!: string;

	@Index()
	@Column({ type: "text" })
	recipient!: string;

	@Index()
	@Column({ type: "text" })
	arbiter!: string;

	@Column({ type: "integer" })
	amount!: number;

	@Column({ type: "integer" })
	deadline!: number;

	@Column({ type: "text" })
	vault!: string;

	@Column({ type: "text" })
	nonce!: string;

	@Column({ type: "text", nullable: true })
	resolution!: ResolutionTarget | null;

	@Column({ type: "integer", nullable: true })
	settledAt!: number | null;

	@Column({ type: "integer" })
	version!: number;

	@Index()
	@Column({ type: "integer" })
	createdAt!: number;

	@Column({ type: "integer" })
	updatedAt!: number;
}
