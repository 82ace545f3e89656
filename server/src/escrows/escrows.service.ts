import {
	BadRequestException,
	Inject,
	Injectable,
	Logger,
	type OnModuleDestroy,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { InjectRepository } from "@nestjs/typeorm";
import {
	type Escrow,
	EscrowEngine,
	type EscrowEvent,
	type EscrowQuery,
	type EscrowRole,
	type EscrowStatus,
	type InitializeEscrowParams,
	type QueryResult,
	type RolePolicy,
	allowedActionsFor,
	hasRole,
	EscrowError,
} from "@custody-escrow/sdk";
import type { Repository } from "typeorm";
import { TypeOrmLedger } from "../ledger/typeorm-ledger";
import type { CreateEscrowInDto } from "./dto/create-escrow.dto";
import type { GetEscrowDto } from "./dto/get-escrow.dto";
import { ESCROW_CLOCK, type EscrowClock } from "./escrow-clock";
import { EscrowRecord } from "./escrow.entity";
import { TypeOrmStorageAdapter } from "./typeorm-storage-adapter";

export type ListEscrowsFilter = {
	status?: EscrowStatus;
	role?: EscrowRole;
	limit: number;
	offset: number;
};

@Injectable()
export class EscrowsService implements OnModuleDestroy {
	private readonly logger = new Logger(EscrowsService.name);
	private readonly engine: EscrowEngine;
	private readonly unsubscribe: () => void;

	constructor(
		@InjectRepository(EscrowRecord)
		repository: Repository<EscrowRecord>,
		ledger: TypeOrmLedger,
		@Inject(ESCROW_CLOCK) private readonly clock: EscrowClock,
		private readonly configService: ConfigService,
		private readonly eventEmitter: EventEmitter2,
	) {
		const rolePolicy: RolePolicy = {
			allowRecipientAsInitializer: this.flag("ESCROW_ALLOW_SELF_RECIPIENT"),
			allowArbiterAsParty: this.flag("ESCROW_ALLOW_ARBITER_AS_PARTY"),
		};
		this.logger.log(
			`Role policy: allowRecipientAsInitializer=${rolePolicy.allowRecipientAsInitializer} allowArbiterAsParty=${rolePolicy.allowArbiterAsParty}`,
		);

		this.engine = new EscrowEngine({
			ledger,
			clock,
			storage: new TypeOrmStorageAdapter(repository),
			rolePolicy,
			logger: this.logger,
		});
		this.unsubscribe = this.engine
			.getEvents()
			.subscribe((event) => this.publish(event));
	}

	onModuleDestroy() {
		this.unsubscribe();
	}

	async create(initializer: string, dto: CreateEscrowInDto): Promise<Escrow> {
		const arbiter =
			dto.arbiter ?? this.configService.get<string>("DEFAULT_ARBITER", "");
		const base = {
			initializer,
			recipient: dto.recipient,
			arbiter,
			amount: dto.amount,
			nonce: dto.nonce,
		};

		let params: InitializeEscrowParams;
		if (dto.deadline !== undefined && dto.timeout === undefined) {
			params = { ...base, deadline: dto.deadline };
		} else if (dto.timeout !== undefined && dto.deadline === undefined) {
			params = { ...base, timeout: dto.timeout };
		} else {
			throw new BadRequestException(
				"Exactly one of `deadline` or `timeout` is required",
			);
		}
		return this.engine.initialize(params);
	}

	withdraw(id: string, caller: string): Promise<Escrow> {
		return this.engine.withdraw(id, caller);
	}

	refund(id: string, caller: string): Promise<Escrow> {
		return this.engine.refund(id, caller);
	}

	cancel(id: string, caller: string): Promise<Escrow> {
		return this.engine.cancel(id, caller);
	}

	resolve(id: string, caller: string, release: boolean): Promise<Escrow> {
		return this.engine.resolveByArbiter(id, caller, release);
	}

	/**
	 * Fetch one escrow the caller holds a role in.
	 *
	 * @throws EscrowError `ESCROW_NOT_FOUND`, also when the caller is not a party
	 */
	async getOne(id: string, caller: string): Promise<Escrow> {
		const escrow = await this.engine.find(id);
		if (
			!escrow ||
			!(["initializer", "recipient", "arbiter"] as const).some((role) =>
				hasRole(escrow, caller, role),
			)
		) {
			throw new EscrowError("ESCROW_NOT_FOUND", `Escrow ${id} not found`, {
				escrowId: id,
			});
		}
		return escrow;
	}

	async getByParty(
		party: string,
		filter: ListEscrowsFilter,
	): Promise<QueryResult<Escrow>> {
		const query: EscrowQuery = {
			party,
			role: filter.role,
			status: filter.status,
			limit: filter.limit,
			offset: filter.offset,
		};
		return this.engine.list(query);
	}

	toDto(escrow: Escrow, caller: string): GetEscrowDto {
		return {
			...escrow,
			allowedActions: allowedActionsFor(escrow, caller, this.clock.now()),
		};
	}

	private publish(event: EscrowEvent) {
		this.logger.debug(`${event.type} #${event.sequence} for ${event.escrowId}`);
		this.eventEmitter.emit(event.type, event);
	}

	private flag(key: string): boolean {
		return this.configService.get<string>(key, "false") === "true";
	}
}
