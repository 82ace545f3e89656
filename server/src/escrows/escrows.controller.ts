import {
	BadRequestException,
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import {
	type EscrowRole,
	type EscrowStatus,
	isEscrowStatus,
} from "@custody-escrow/sdk";
import { map, type Observable } from "rxjs";
import { AuthGuard } from "../auth/auth.guard";
import { Caller } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	offsetMeta,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import {
	ServerSentEventsService,
	type SseEvent,
} from "../common/server-sent-events.service";
import { CreateEscrowInDto } from "./dto/create-escrow.dto";
import { GetEscrowDto } from "./dto/get-escrow.dto";
import { ResolveEscrowInDto } from "./dto/resolve-escrow.dto";
import { ESCROW_STATUS } from "./escrow.entity";
import { EscrowsService } from "./escrows.service";

const ESCROW_ROLES: EscrowRole[] = ["initializer", "recipient", "arbiter"];

function isEscrowRole(value: string): value is EscrowRole {
	return ESCROW_ROLES.some((role) => role === value);
}

@ApiTags("1 - Escrows")
@ApiExtraModels(GetEscrowDto, CreateEscrowInDto, ResolveEscrowInDto)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly service: EscrowsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({
		summary: "Initialize an escrow funded from the caller's balance",
	})
	@ApiBody({ type: CreateEscrowInDto })
	@ApiCreatedResponse({
		description: "Escrow initialized",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiConflictResponse({ description: "An escrow with this nonce exists" })
	@ApiUnprocessableEntityResponse({ description: "Insufficient balance" })
	async create(
		@Body() dto: CreateEscrowInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.create(caller, dto);
		return envelope(this.service.toDto(escrow, caller));
	}

	@Get("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Get escrows the caller holds a role in" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "offset",
		required: false,
		schema: { type: "integer", minimum: 0, example: 0 },
	})
	@ApiQuery({
		name: "status",
		required: false,
		description: "Filter by status",
		schema: { type: "string", enum: ESCROW_STATUS },
	})
	@ApiQuery({
		name: "role",
		required: false,
		description: "Filter by the caller's role",
		schema: { type: "string", enum: ESCROW_ROLES },
	})
	@ApiOkResponse({
		description: "A page of the caller's escrows",
		schema: getSchemaPathForPaginatedDto(GetEscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getMine(
		@Caller() caller: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("offset", new DefaultValuePipe(0), ParseIntPipe) offset: number,
		@Query("status") status?: string,
		@Query("role") role?: string,
	): Promise<ApiPaginatedEnvelope<GetEscrowDto[]>> {
		if (limit < 1 || limit > 100) {
			throw new BadRequestException("limit must be between 1 and 100");
		}
		if (offset < 0) {
			throw new BadRequestException("offset must not be negative");
		}
		let statusFilter: EscrowStatus | undefined;
		if (status !== undefined) {
			if (!isEscrowStatus(status)) {
				throw new BadRequestException(`Unknown status: ${status}`);
			}
			statusFilter = status;
		}
		let roleFilter: EscrowRole | undefined;
		if (role !== undefined) {
			if (!isEscrowRole(role)) {
				throw new BadRequestException(`Unknown role: ${role}`);
			}
			roleFilter = role;
		}

		const { items, total } = await this.service.getByParty(caller, {
			status: statusFilter,
			role: roleFilter,
			limit,
			offset,
		});
		return paginatedEnvelope(
			items.map((escrow) => this.service.toDto(escrow, caller)),
			offsetMeta(offset, items.length, total),
		);
	}

	@Sse("events")
	@ApiOperation({ summary: "Subscribe to all escrow events" })
	events(): Observable<SseEvent> {
		return this.sseService
			.escrowEvents()
			.pipe(map((event) => ({ data: event })));
	}

	@Sse(":escrowId/events")
	@ApiOperation({ summary: "Subscribe to the events of one escrow" })
	@ApiParam({ name: "escrowId" })
	escrowEvents(@Param("escrowId") escrowId: string): Observable<SseEvent> {
		return this.sseService
			.escrowEvents(escrowId)
			.pipe(map((event) => ({ data: event })));
	}

	@Get(":escrowId")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Get one escrow with the caller's allowed actions" })
	@ApiParam({ name: "escrowId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async getOne(
		@Param("escrowId") escrowId: string,
		@Caller() caller: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.getOne(escrowId, caller);
		return envelope(this.service.toDto(escrow, caller));
	}

	@Post(":escrowId/withdraw")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Recipient claims the vault before the deadline" })
	@ApiParam({ name: "escrowId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Caller is not the recipient" })
	@ApiConflictResponse({ description: "Escrow already settled" })
	@ApiUnprocessableEntityResponse({ description: "Deadline has passed" })
	async withdraw(
		@Param("escrowId") escrowId: string,
		@Caller() caller: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.withdraw(escrowId, caller);
		return envelope(this.service.toDto(escrow, caller));
	}

	@Post(":escrowId/refund")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Initializer reclaims the vault after the deadline" })
	@ApiParam({ name: "escrowId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Caller is not the initializer" })
	@ApiConflictResponse({ description: "Escrow already settled" })
	@ApiUnprocessableEntityResponse({ description: "Deadline not reached" })
	async refund(
		@Param("escrowId") escrowId: string,
		@Caller() caller: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.refund(escrowId, caller);
		return envelope(this.service.toDto(escrow, caller));
	}

	@Post(":escrowId/cancel")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Initializer calls the escrow off before the deadline" })
	@ApiParam({ name: "escrowId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Caller is not the initializer" })
	@ApiConflictResponse({ description: "Escrow already settled" })
	@ApiUnprocessableEntityResponse({ description: "Deadline has passed" })
	async cancel(
		@Param("escrowId") escrowId: string,
		@Caller() caller: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.cancel(escrowId, caller);
		return envelope(this.service.toDto(escrow, caller));
	}

	@Post(":escrowId/resolve")
	@HttpCode(200)
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Arbiter settles the escrow either way" })
	@ApiParam({ name: "escrowId" })
	@ApiBody({ type: ResolveEscrowInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Caller is not the arbiter" })
	@ApiConflictResponse({ description: "Escrow already settled" })
	async resolve(
		@Param("escrowId") escrowId: string,
		@Body() dto: ResolveEscrowInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.resolve(escrowId, caller, dto.release);
		return envelope(this.service.toDto(escrow, caller));
	}
}
