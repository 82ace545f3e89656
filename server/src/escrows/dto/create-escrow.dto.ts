import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	MaxLength,
	Min,
} from "class-validator";

export class CreateEscrowInDto {
	@ApiProperty({ example: "bob", description: "Beneficiary identity" })
	@IsString()
	@IsNotEmpty()
	recipient!: string;

	@ApiPropertyOptional({
		example: "carol",
		description: "Arbiter identity, defaults to the server's arbiter",
	})
	@IsString()
	@IsOptional()
	arbiter?: string;

	@ApiProperty({
		minimum: 1,
		description: "Units to lock in the vault",
		example: 100,
	})
	@IsInt()
	@Min(1)
	@Max(Number.MAX_SAFE_INTEGER)
	amount!: number;

	@ApiPropertyOptional({
		description:
			"Absolute deadline, Unix epoch in milliseconds. Exclusive with `timeout`",
		example: 1732690234123,
	})
	@IsInt()
	@IsOptional()
	deadline?: number;

	@ApiPropertyOptional({
		description: "Deadline relative to now, in milliseconds. Exclusive with `deadline`",
		example: 86_400_000,
	})
	@IsInt()
	@Min(1)
	@IsOptional()
	timeout?: number;

	@ApiPropertyOptional({
		description: "Makes the escrow id deterministic; random when omitted",
		example: "order-4711",
	})
	@IsString()
	@IsNotEmpty()
	@MaxLength(128)
	@IsOptional()
	nonce?: string;
}
