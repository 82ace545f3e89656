import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import type {
	EscrowAction,
	EscrowStatus,
	ResolutionTarget,
} from "@custody-escrow/sdk";
import { ESCROW_STATUS } from "../escrow.entity";

export const ESCROW_ACTIONS: EscrowAction[] = [
	"withdraw",
	"refund",
	"cancel",
	"resolve-release",
	"resolve-refund",
];

export class GetEscrowDto {
	@ApiProperty({ example: "8Z7xq1Wr6Tn2uPcY3k1d9bH5sJv4mFeG2aLoQyNbRtUw" })
	id!: string;

	@ApiProperty({ enum: ESCROW_STATUS, description: "Escrow status" })
	status!: EscrowStatus;

	@ApiProperty({ example: "alice" })
	initializer!: string;

	@ApiProperty({ example: "bob" })
	recipient!: string;

	@ApiProperty({ example: "carol" })
	arbiter!: string;

	@ApiProperty({ description: "Units locked in the vault", example: 100 })
	amount!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	deadline!: number;

	@ApiProperty({ description: "Custody handle of the vault" })
	vault!: string;

	@ApiProperty()
	nonce!: string;

	@ApiPropertyOptional({
		enum: ["recipient", "initializer"],
		description: "Set when the arbiter settled the escrow",
	})
	resolution?: ResolutionTarget;

	@ApiPropertyOptional({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	settledAt?: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	updatedAt!: number;

	@ApiProperty({ example: 1 })
	version!: number;

	@ApiProperty({
		enum: ESCROW_ACTIONS,
		isArray: true,
		description: "Actions the caller can take right now",
	})
	allowedActions!: EscrowAction[];
}
