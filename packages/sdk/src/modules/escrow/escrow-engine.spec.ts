import { ManualClock } from "../../clock";
import { MemoryLedger } from "../../ledger";
import { MemoryStorageAdapter, StoredContract } from "../../storage";
import { EscrowEngine } from "./escrow-engine";
import { EscrowEvent } from "./escrow-events";
import { deriveEscrowId, vaultHandleFor } from "./escrow-id";
import { EscrowData } from "./types";

const T = 1_700_000_000_000;

const parties = {
	initializer: "alice",
	recipient: "bob",
	arbiter: "carol",
};

describe("EscrowEngine", () => {
	let ledger: MemoryLedger;
	let clock: ManualClock;
	let engine: EscrowEngine;
	let events: EscrowEvent[];
	let nonces: number;

	beforeEach(() => {
		ledger = new MemoryLedger({ alice: 1_000 });
		clock = new ManualClock(T);
		nonces = 0;
		engine = new EscrowEngine({
			ledger,
			clock,
			generateNonce: () => `nonce-${++nonces}`,
		});
		events = [];
		engine.getEvents().subscribe((e) => events.push(e));
	});

	const open = (overrides: { amount?: number; deadline?: number } = {}) =>
		engine.initialize({
			...parties,
			amount: overrides.amount ?? 100,
			deadline: overrides.deadline ?? T + 10,
		});

	describe("initialize", () => {
		it("locks the amount in a fresh vault", async () => {
			const escrow = await open();

			expect(escrow.id).toBe(deriveEscrowId("alice", "nonce-1"));
			expect(escrow.vault).toBe(vaultHandleFor(escrow.id));
			expect(escrow.status).toBe("initialized");
			expect(escrow.deadline).toBe(T + 10);
			expect(escrow.version).toBe(1);
			expect(await ledger.balanceOf("alice")).toBe(900);
			expect(await ledger.balanceOf(escrow.vault)).toBe(100);
			expect(events).toEqual([
				{
					type: "escrow.initialized",
					escrowId: escrow.id,
					initializer: "alice",
					recipient: "bob",
					arbiter: "carol",
					amount: 100,
					deadline: T + 10,
					vault: escrow.vault,
					sequence: 1,
					occurredAt: T,
				},
			]);
		});

		it("derives the deadline from a timeout", async () => {
			const escrow = await engine.initialize({
				...parties,
				amount: 5,
				timeout: 60_000,
			});
			expect(escrow.deadline).toBe(T + 60_000);
		});

		it.each([0, -1, 1.5, Number.NaN])("rejects amount %p", async (amount) => {
			await expect(open({ amount })).rejects.toMatchObject({
				code: "INVALID_AMOUNT",
			});
			expect(await ledger.balanceOf("alice")).toBe(1_000);
			expect(events).toHaveLength(0);
		});

		it("rejects a deadline that is not strictly in the future", async () => {
			await expect(open({ deadline: T })).rejects.toMatchObject({
				code: "INVALID_DEADLINE",
			});
			await expect(
				engine.initialize({
					...parties,
					amount: 1,
					timeout: Number.MAX_SAFE_INTEGER,
				}),
			).rejects.toMatchObject({ code: "INVALID_DEADLINE" });
		});

		it("rejects a reused nonce", async () => {
			const first = await engine.initialize({ ...parties, amount: 1, timeout: 5, nonce: "n" });
			await expect(
				engine.initialize({ ...parties, amount: 1, timeout: 5, nonce: "n" }),
			).rejects.toMatchObject({
				code: "ESCROW_ALREADY_EXISTS",
				message: `Escrow ${first.id} already exists`,
			});
			expect(await ledger.balanceOf("alice")).toBe(999);
		});

		it("reports an unfunded initializer as a transfer failure", async () => {
			await expect(open({ amount: 5_000 })).rejects.toMatchObject({
				code: "TRANSFER_FAILURE",
			});
			expect(await engine.list()).toEqual({ items: [], total: 0, hasMore: false });
		});
	});

	describe("role policy", () => {
		it("rejects a recipient equal to the initializer by default", async () => {
			await expect(
				engine.initialize({ ...parties, recipient: "alice", amount: 1, timeout: 5 }),
			).rejects.toMatchObject({
				code: "INVALID_PARTIES",
				message: "Recipient must differ from the initializer",
			});
		});

		it("rejects an arbiter who is also a party by default", async () => {
			await expect(
				engine.initialize({ ...parties, arbiter: "bob", amount: 1, timeout: 5 }),
			).rejects.toMatchObject({
				code: "INVALID_PARTIES",
				message: "Arbiter must differ from the initializer and the recipient",
			});
		});

		it("rejects a blank identity", async () => {
			await expect(
				engine.initialize({ ...parties, arbiter: " ", amount: 1, timeout: 5 }),
			).rejects.toMatchObject({ message: "Missing arbiter identity" });
		});

		it("allows overlapping roles when configured", async () => {
			const relaxed = new EscrowEngine({
				ledger,
				clock,
				rolePolicy: { allowArbiterAsParty: true },
			});
			const escrow = await relaxed.initialize({
				...parties,
				arbiter: "alice",
				amount: 10,
				timeout: 5,
			});
			const resolved = await relaxed.resolveByArbiter(escrow.id, "alice", false);
			expect(resolved.status).toBe("refunded");
			expect(await ledger.balanceOf("alice")).toBe(1_000);
		});
	});

	describe("withdraw", () => {
		it("pays the recipient before the deadline", async () => {
			const escrow = await open();
			clock.set(T + 5);

			const withdrawn = await engine.withdraw(escrow.id, "bob");

			expect(withdrawn.status).toBe("withdrawn");
			expect(withdrawn.settledAt).toBe(T + 5);
			expect(withdrawn.version).toBe(2);
			expect(await ledger.balanceOf("bob")).toBe(100);
			expect(await ledger.balanceOf(escrow.vault)).toBe(0);
			expect(events[1]).toEqual({
				type: "escrow.withdrawn",
				escrowId: escrow.id,
				recipient: "bob",
				amount: 100,
				sequence: 2,
				occurredAt: T + 5,
			});
		});

		it("is still allowed exactly at the deadline", async () => {
			const escrow = await open();
			clock.set(T + 10);
			await expect(engine.withdraw(escrow.id, "bob")).resolves.toMatchObject({
				status: "withdrawn",
			});
		});

		it("fails after the deadline", async () => {
			const escrow = await open();
			clock.set(T + 11);
			await expect(engine.withdraw(escrow.id, "bob")).rejects.toMatchObject({
				code: "DEADLINE_PASSED",
				message: `Escrow ${escrow.id} deadline has passed, withdraw is no longer possible`,
			});
			expect((await engine.get(escrow.id)).status).toBe("initialized");
			expect(await ledger.balanceOf(escrow.vault)).toBe(100);
		});

		it("is reserved for the recipient", async () => {
			const escrow = await open();
			await expect(engine.withdraw(escrow.id, "alice")).rejects.toMatchObject({
				code: "UNAUTHORIZED",
				message: `Only the recipient can withdraw escrow ${escrow.id}`,
			});
		});
	});

	describe("refund", () => {
		it("pays the initializer back after the deadline", async () => {
			const escrow = await open();
			clock.set(T + 11);

			const refunded = await engine.refund(escrow.id, "alice");

			expect(refunded.status).toBe("refunded");
			expect(await ledger.balanceOf("alice")).toBe(1_000);
			expect(events.map((e) => e.type)).toEqual([
				"escrow.initialized",
				"escrow.refunded",
			]);
		});

		it("is refused at the deadline", async () => {
			const escrow = await open();
			clock.set(T + 10);
			await expect(engine.refund(escrow.id, "alice")).rejects.toMatchObject({
				code: "DEADLINE_NOT_REACHED",
				message: `Escrow ${escrow.id} cannot be refunded before its deadline`,
			});
		});

		it("is reserved for the initializer", async () => {
			const escrow = await open();
			clock.set(T + 11);
			await expect(engine.refund(escrow.id, "bob")).rejects.toMatchObject({
				code: "UNAUTHORIZED",
				message: `Only the initializer can refund escrow ${escrow.id}`,
			});
			expect(await ledger.balanceOf(escrow.vault)).toBe(100);
			expect(await ledger.balanceOf("bob")).toBe(0);
			expect(events).toHaveLength(1);
		});
	});

	describe("cancel", () => {
		it("returns the funds before the deadline", async () => {
			const escrow = await open();
			const cancelled = await engine.cancel(escrow.id, "alice");
			expect(cancelled.status).toBe("cancelled");
			expect(await ledger.balanceOf("alice")).toBe(1_000);
			expect(events[1]).toMatchObject({
				type: "escrow.cancelled",
				initializer: "alice",
				amount: 100,
			});
		});

		it("fails after the deadline", async () => {
			const escrow = await open();
			clock.set(T + 11);
			await expect(engine.cancel(escrow.id, "alice")).rejects.toMatchObject({
				code: "DEADLINE_PASSED",
			});
		});

		it("is reserved for the initializer", async () => {
			const escrow = await open();
			await expect(engine.cancel(escrow.id, "bob")).rejects.toMatchObject({
				code: "UNAUTHORIZED",
				message: `Only the initializer can cancel escrow ${escrow.id}`,
			});
			expect((await engine.get(escrow.id)).status).toBe("initialized");
			expect(await ledger.balanceOf(escrow.vault)).toBe(100);
			expect(events).toHaveLength(1);
		});
	});

	describe("resolveByArbiter", () => {
		it("releases to the recipient regardless of the deadline", async () => {
			const escrow = await open();
			clock.set(T + 1_000);

			const resolved = await engine.resolveByArbiter(escrow.id, "carol", true);

			expect(resolved.status).toBe("withdrawn");
			expect(resolved.resolution).toBe("recipient");
			expect(await ledger.balanceOf("bob")).toBe(100);
			expect(events[1]).toEqual({
				type: "escrow.resolved",
				escrowId: escrow.id,
				arbiter: "carol",
				amount: 100,
				releasedTo: "recipient",
				sequence: 2,
				occurredAt: T + 1_000,
			});
		});

		it("refunds the initializer when not releasing", async () => {
			const escrow = await open();
			const resolved = await engine.resolveByArbiter(escrow.id, "carol", false);
			expect(resolved.status).toBe("refunded");
			expect(resolved.resolution).toBe("initializer");
			expect(await ledger.balanceOf("alice")).toBe(1_000);
		});

		it("refuses a second resolution", async () => {
			const escrow = await open();
			await engine.resolveByArbiter(escrow.id, "carol", true);
			await expect(
				engine.resolveByArbiter(escrow.id, "carol", false),
			).rejects.toMatchObject({
				code: "INVALID_STATE",
				message: `Escrow ${escrow.id} is withdrawn, cannot resolve`,
			});
			await expect(engine.cancel(escrow.id, "alice")).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
			expect(await ledger.balanceOf("bob")).toBe(100);
		});

		it("is reserved for the arbiter", async () => {
			const escrow = await open();
			await expect(
				engine.resolveByArbiter(escrow.id, "bob", true),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});
	});

	describe("terminality", () => {
		it("keeps a refunded escrow closed to every later request", async () => {
			const escrow = await open();
			const stillOpen = await open({ amount: 50 });
			clock.set(T + 11);
			await engine.refund(escrow.id, "alice");

			await expect(engine.withdraw(escrow.id, "bob")).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
			await expect(engine.refund(escrow.id, "alice")).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
			await expect(engine.withdraw(stillOpen.id, "bob")).rejects.toMatchObject({
				code: "DEADLINE_PASSED",
			});

			expect((await engine.get(escrow.id)).version).toBe(2);
			expect(await ledger.balanceOf("bob")).toBe(0);
			expect(events).toHaveLength(3);
		});

		it("checks the caller before the status", async () => {
			const escrow = await open();
			await engine.withdraw(escrow.id, "bob");
			await expect(engine.withdraw(escrow.id, "mallory")).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});

		it("reports unknown escrows", async () => {
			await expect(engine.withdraw("missing", "bob")).rejects.toMatchObject({
				code: "ESCROW_NOT_FOUND",
				message: "Escrow missing not found",
			});
			expect(await engine.find("missing")).toBeNull();
		});
	});

	describe("concurrency", () => {
		it("lets exactly one of withdraw and cancel win", async () => {
			const escrow = await open();

			const results = await Promise.allSettled([
				engine.withdraw(escrow.id, "bob"),
				engine.cancel(escrow.id, "alice"),
			]);

			expect(results[0].status).toBe("fulfilled");
			expect(results[1]).toMatchObject({
				status: "rejected",
				reason: { code: "INVALID_STATE" },
			});
			expect(await ledger.balanceOf("bob")).toBe(100);
			expect(await ledger.balanceOf("alice")).toBe(900);
			expect(ledger.totalSupply()).toBe(1_000);
		});

		it("lets only one of two initializations with the same nonce through", async () => {
			const request = { ...parties, amount: 250, timeout: 60_000, nonce: "n" };

			const results = await Promise.allSettled([
				engine.initialize(request),
				engine.initialize(request),
			]);

			expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
			expect(results.filter((r) => r.status === "rejected")).toEqual([
				expect.objectContaining({
					reason: expect.objectContaining({ code: "ESCROW_ALREADY_EXISTS" }),
				}),
			]);
			expect(await ledger.balanceOf("alice")).toBe(750);
			expect(await ledger.balanceOf(vaultHandleFor(deriveEscrowId("alice", "n")))).toBe(250);
			expect(events.map((e) => e.type)).toEqual(["escrow.initialized"]);
		});

		it("numbers events in commit order", async () => {
			const a = await open();
			const b = await open({ amount: 20 });
			await Promise.all([
				engine.cancel(b.id, "alice"),
				engine.withdraw(a.id, "bob"),
			]);
			expect(events.map((e) => e.sequence)).toEqual([1, 2, 3, 4]);
			expect(engine.getEvents().history({ escrowId: b.id }).map((e) => e.type)).toEqual([
				"escrow.initialized",
				"escrow.cancelled",
			]);
		});
	});

	describe("compensation", () => {
		class FlakyStorage extends MemoryStorageAdapter<EscrowData> {
			failNextSave = false;

			async save(id: string, contract: StoredContract<EscrowData>): Promise<void> {
				if (this.failNextSave) {
					this.failNextSave = false;
					throw new Error("disk full");
				}
				return super.save(id, contract);
			}
		}

		it("returns the vault when the settlement cannot be saved", async () => {
			const storage = new FlakyStorage();
			const flaky = new EscrowEngine({ ledger, clock, storage });
			const escrow = await flaky.initialize({ ...parties, amount: 100, timeout: 10 });

			storage.failNextSave = true;
			await expect(flaky.withdraw(escrow.id, "bob")).rejects.toThrow("disk full");

			expect(await ledger.balanceOf("bob")).toBe(0);
			expect(await ledger.balanceOf(escrow.vault)).toBe(100);
			expect((await flaky.get(escrow.id)).status).toBe("initialized");
			expect(flaky.getEvents().lastSequence()).toBe(1);
		});

		it("returns the deposit when a new escrow cannot be saved", async () => {
			const storage = new FlakyStorage();
			const flaky = new EscrowEngine({ ledger, clock, storage });
			storage.failNextSave = true;

			await expect(
				flaky.initialize({ ...parties, amount: 100, timeout: 10 }),
			).rejects.toThrow("disk full");

			expect(await ledger.balanceOf("alice")).toBe(1_000);
			expect(storage.size()).toBe(0);
		});

		it("refuses to settle a vault that lost funds", async () => {
			const escrow = await open();
			await ledger.transfer(escrow.vault, "mallory", 1);
			await expect(engine.withdraw(escrow.id, "bob")).rejects.toMatchObject({
				code: "TRANSFER_FAILURE",
				message: `Vault of escrow ${escrow.id} holds 99, expected 100`,
			});
			expect((await engine.get(escrow.id)).status).toBe("initialized");
		});
	});

	describe("custody", () => {
		it("moves funds through resolved custody handles", async () => {
			const custodial = new EscrowEngine({
				ledger,
				clock,
				custodyOf: (identity) => `acct:${identity}`,
			});
			ledger.credit("acct:dave", 30);
			const escrow = await custodial.initialize({
				initializer: "dave",
				recipient: "erin",
				arbiter: "carol",
				amount: 30,
				timeout: 10,
			});
			await custodial.withdraw(escrow.id, "erin");
			expect(await ledger.balanceOf("acct:erin")).toBe(30);
			expect(await ledger.balanceOf("erin")).toBe(0);
		});
	});

	describe("queries", () => {
		it("lists escrows by party and role", async () => {
			const first = await open();
			await ledger.transfer("alice", "bob", 200);
			const second = await engine.initialize({
				initializer: "bob",
				recipient: "alice",
				arbiter: "carol",
				amount: 50,
				timeout: 10,
			});

			const asRecipient = await engine.list({ party: "alice", role: "recipient" });
			expect(asRecipient.items.map((e) => e.id)).toEqual([second.id]);

			const asAnyRole = await engine.list({ party: "alice", sortOrder: "asc" });
			expect(asAnyRole.items.map((e) => e.id)).toEqual([first.id, second.id]);

			await engine.cancel(first.id, "alice");
			const pending = await engine.list({ status: "initialized" });
			expect(pending.items.map((e) => e.id)).toEqual([second.id]);
		});

		it("computes the actions a caller can take now", async () => {
			const escrow = await open();
			expect(await engine.getAllowedActions(escrow.id, "alice")).toEqual(["cancel"]);
			expect(await engine.getAllowedActions(escrow.id, "bob")).toEqual(["withdraw"]);
			expect(await engine.getAllowedActions(escrow.id, "carol")).toEqual([
				"resolve-release",
				"resolve-refund",
			]);

			clock.set(T + 11);
			expect(await engine.getAllowedActions(escrow.id, "alice")).toEqual(["refund"]);
			expect(await engine.getAllowedActions(escrow.id, "bob")).toEqual([]);
		});
	});
});
