import { BadRequestException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Test } from "@nestjs/testing";
import { getRepositoryToken } from "@nestjs/typeorm";
import { ManualClock } from "@custody-escrow/sdk";
import { DataSource } from "typeorm";
import { LedgerAccount } from "../ledger/ledger-account.entity";
import { TypeOrmLedger } from "../ledger/typeorm-ledger";
import { ESCROW_CLOCK } from "./escrow-clock";
import { EscrowRecord } from "./escrow.entity";
import { EscrowsService } from "./escrows.service";

const T = 1_700_000_000_000;
const HOUR = 60 * 60 * 1000;

describe("EscrowsService", () => {
	let dataSource: DataSource;
	let ledger: TypeOrmLedger;
	let clock: ManualClock;
	let emitter: EventEmitter2;

	async function createService(
		config: Record<string, string> = {},
	): Promise<EscrowsService> {
		const moduleRef = await Test.createTestingModule({
			providers: [
				EscrowsService,
				{
					provide: getRepositoryToken(EscrowRecord),
					useValue: dataSource.getRepository(EscrowRecord),
				},
				{ provide: TypeOrmLedger, useValue: ledger },
				{ provide: ESCROW_CLOCK, useValue: clock },
				{ provide: ConfigService, useValue: new ConfigService(config) },
				{ provide: EventEmitter2, useValue: emitter },
			],
		}).compile();
		return moduleRef.get(EscrowsService);
	}

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [EscrowRecord, LedgerAccount],
			synchronize: true,
		});
		await dataSource.initialize();
		ledger = new TypeOrmLedger(dataSource.getRepository(LedgerAccount));
		await ledger.deposit("alice", 1_000);
		clock = new ManualClock(T);
		emitter = new EventEmitter2();
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("creates an escrow with a relative deadline", async () => {
		const service = await createService();

		const escrow = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 400,
			timeout: HOUR,
			nonce: "order-1",
		});

		expect(escrow.status).toBe("initialized");
		expect(escrow.deadline).toBe(T + HOUR);
		expect(await ledger.balanceOf("alice")).toBe(600);
		expect(await ledger.balanceOf(escrow.vault)).toBe(400);
	});

	it("takes the arbiter from DEFAULT_ARBITER when none is given", async () => {
		const service = await createService({ DEFAULT_ARBITER: "carol" });

		const escrow = await service.create("alice", {
			recipient: "bob",
			amount: 10,
			deadline: T + HOUR,
		});

		expect(escrow.arbiter).toBe("carol");
	});

	it("requires exactly one of deadline and timeout", async () => {
		const service = await createService();
		const base = { recipient: "bob", arbiter: "carol", amount: 10 };

		await expect(
			service.create("alice", { ...base, deadline: T + HOUR, timeout: HOUR }),
		).rejects.toThrow(BadRequestException);
		await expect(service.create("alice", base)).rejects.toThrow(
			"Exactly one of `deadline` or `timeout` is required",
		);
		expect(await ledger.balanceOf("alice")).toBe(1_000);
	});

	it("reads the role policy from configuration", async () => {
		const strict = await createService();
		await expect(
			strict.create("alice", {
				recipient: "alice",
				arbiter: "carol",
				amount: 10,
				timeout: HOUR,
			}),
		).rejects.toMatchObject({ code: "INVALID_PARTIES" });

		const lenient = await createService({ ESCROW_ALLOW_SELF_RECIPIENT: "true" });
		const escrow = await lenient.create("alice", {
			recipient: "alice",
			arbiter: "carol",
			amount: 10,
			timeout: HOUR,
		});
		expect(escrow.recipient).toBe("alice");
	});

	it("re-emits engine events on the application event emitter", async () => {
		const service = await createService();
		const seen: string[] = [];
		emitter.onAny((event) => {
			seen.push(String(event));
		});

		const escrow = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});
		await service.resolve(escrow.id, "carol", true);

		expect(seen).toEqual(["escrow.initialized", "escrow.resolved"]);
	});

	it("stops forwarding events once the module is destroyed", async () => {
		const service = await createService();
		const listener = jest.fn();
		emitter.on("escrow.initialized", listener);

		service.onModuleDestroy();
		await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});

		expect(listener).not.toHaveBeenCalled();
	});

	it("hides escrows from identities without a role", async () => {
		const service = await createService();
		const escrow = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});

		await expect(service.getOne(escrow.id, "mallory")).rejects.toMatchObject({
			code: "ESCROW_NOT_FOUND",
			message: `Escrow ${escrow.id} not found`,
		});
		expect((await service.getOne(escrow.id, "carol")).id).toBe(escrow.id);
	});

	it("lists escrows by party and role", async () => {
		const service = await createService();
		const first = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});
		clock.advance(1);
		const second = await service.create("alice", {
			recipient: "dave",
			arbiter: "bob",
			amount: 100,
			timeout: HOUR,
		});

		const all = await service.getByParty("bob", { limit: 20, offset: 0 });
		expect(all.items.map((e) => e.id)).toEqual([second.id, first.id]);
		expect(all.total).toBe(2);

		const asArbiter = await service.getByParty("bob", {
			role: "arbiter",
			limit: 20,
			offset: 0,
		});
		expect(asArbiter.items.map((e) => e.id)).toEqual([second.id]);

		await service.withdraw(first.id, "bob");
		const open = await service.getByParty("bob", {
			status: "initialized",
			limit: 20,
			offset: 0,
		});
		expect(open.items.map((e) => e.id)).toEqual([second.id]);
	});

	it("reports the actions the caller can take now", async () => {
		const service = await createService();
		const escrow = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});

		expect(service.toDto(escrow, "alice").allowedActions).toEqual(["cancel"]);
		expect(service.toDto(escrow, "bob").allowedActions).toEqual(["withdraw"]);
		expect(service.toDto(escrow, "carol").allowedActions).toEqual([
			"resolve-release",
			"resolve-refund",
		]);

		clock.advance(HOUR + 1);
		expect(service.toDto(escrow, "alice").allowedActions).toEqual(["refund"]);
		expect(service.toDto(escrow, "bob").allowedActions).toEqual([]);
	});

	it("refunds after the deadline", async () => {
		const service = await createService();
		const escrow = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});

		await expect(service.refund(escrow.id, "alice")).rejects.toMatchObject({
			code: "DEADLINE_NOT_REACHED",
		});
		clock.advance(HOUR + 1);
		const refunded = await service.refund(escrow.id, "alice");

		expect(refunded.status).toBe("refunded");
		expect(refunded.settledAt).toBe(T + HOUR + 1);
		expect(await ledger.balanceOf("alice")).toBe(1_000);
		expect(await ledger.balanceOf(escrow.vault)).toBe(0);
	});

	it("cancels before the deadline", async () => {
		const service = await createService();
		const escrow = await service.create("alice", {
			recipient: "bob",
			arbiter: "carol",
			amount: 100,
			timeout: HOUR,
		});

		const cancelled = await service.cancel(escrow.id, "alice");
		expect(cancelled.status).toBe("cancelled");
		expect(await ledger.balanceOf("alice")).toBe(1_000);
	});
});
