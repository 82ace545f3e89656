import { ApiProperty } from "@nestjs/swagger";
import { IsBoolean } from "class-validator";

export class ResolveEscrowInDto {
	@ApiProperty({
		description:
			"`true` releases the vault to the recipient, `false` refunds the initializer",
		example: true,
	})
	@IsBoolean()
	release!: boolean;
}
