import { Body, Controller, Get, Logger, Post, UseGuards } from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { CreateDepositInDto, GetBalanceDto } from "./dto/ledger.dto";
import { TypeOrmLedger } from "./typeorm-ledger";

@ApiTags("2 - Ledger")
@ApiExtraModels(GetBalanceDto)
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(private readonly ledger: TypeOrmLedger) {}

	@Get("balance")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Get the authenticated caller's custody balance" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetBalanceDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getBalance(@Caller() caller: string): Promise<ApiEnvelope<GetBalanceDto>> {
		const balance = await this.ledger.balanceOf(caller);
		return envelope({ handle: caller, balance });
	}
}

@ApiTags("3 - Admin")
@ApiExtraModels(GetBalanceDto)
@Controller("api/v1/admin/ledger")
export class AdminLedgerController {
	private readonly logger = new Logger(AdminLedgerController.name);

	constructor(private readonly ledger: TypeOrmLedger) {}

	@Post("deposits")
	@ApiBasicAuth()
	@ApiOperation({ summary: "Credit units to a custody handle" })
	@ApiBody({ type: CreateDepositInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetBalanceDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid credentials" })
	async deposit(
		@Body() dto: CreateDepositInDto,
	): Promise<ApiEnvelope<GetBalanceDto>> {
		const balance = await this.ledger.deposit(dto.handle, dto.amount);
		this.logger.log(`Deposited ${dto.amount} to ${dto.handle}`);
		return envelope({ handle: dto.handle, balance });
	}
}
