import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Max, Min } from "class-validator";

export class GetBalanceDto {
	@ApiProperty({ description: "Custody handle", example: "alice" })
	handle!: string;

	@ApiProperty({ description: "Units held under the handle", example: 1000 })
	balance!: number;
}

export class CreateDepositInDto {
	@ApiProperty({ description: "Custody handle to credit", example: "alice" })
	@IsString()
	@IsNotEmpty()
	handle!: string;

	@ApiProperty({ minimum: 1, description: "Units to credit", example: 1000 })
	@IsInt()
	@Min(1)
	@Max(Number.MAX_SAFE_INTEGER)
	amount!: number;
}
