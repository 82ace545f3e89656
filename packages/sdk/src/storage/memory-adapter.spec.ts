import { MemoryStorageAdapter } from "./memory-adapter";
import { StoredContract } from "./types";

interface Deal {
	buyer: string;
	seller: string;
}

const stored = (
	id: string,
	createdAt: number,
	state: string,
	data: Deal,
): StoredContract<Deal> => ({
	metadata: {
		id,
		createdAt,
		updatedAt: createdAt,
		version: 1,
		contractType: "deal",
	},
	state,
	data,
});

describe("MemoryStorageAdapter", () => {
	let storage: MemoryStorageAdapter<Deal>;

	beforeEach(async () => {
		storage = new MemoryStorageAdapter<Deal>();
		await storage.save("a", stored("a", 1, "open", { buyer: "ann", seller: "sam" }));
		await storage.save("b", stored("b", 2, "done", { buyer: "bob", seller: "ann" }));
		await storage.save("c", stored("c", 3, "open", { buyer: "cat", seller: "sam" }));
	});

	it("returns copies of stored records", async () => {
		const loaded = await storage.load("a");
		expect(loaded?.data.buyer).toBe("ann");
		if (loaded) loaded.data.buyer = "mallory";
		expect((await storage.load("a"))?.data.buyer).toBe("ann");
	});

	it("returns null for unknown ids", async () => {
		expect(await storage.load("zz")).toBeNull();
		expect(await storage.exists("zz")).toBe(false);
		expect(await storage.exists("b")).toBe(true);
	});

	it("sorts newest first by default", async () => {
		const result = await storage.query();
		expect(result.items.map((c) => c.metadata.id)).toEqual(["c", "b", "a"]);
		expect(result.total).toBe(3);
		expect(result.hasMore).toBe(false);
	});

	it("filters by state and paginates", async () => {
		const result = await storage.query({ state: "open", limit: 1 });
		expect(result.items.map((c) => c.metadata.id)).toEqual(["c"]);
		expect(result.total).toBe(2);
		expect(result.hasMore).toBe(true);
	});

	it("matches all data filters", async () => {
		const result = await storage.query({
			filters: { all: { seller: "sam", buyer: "cat" } },
		});
		expect(result.items.map((c) => c.metadata.id)).toEqual(["c"]);
	});

	it("matches any data filter", async () => {
		const result = await storage.query({
			filters: { any: { buyer: "ann", seller: "ann" } },
			sortOrder: "asc",
		});
		expect(result.items.map((c) => c.metadata.id)).toEqual(["a", "b"]);
	});

	it("counts without paginating", async () => {
		expect(await storage.count({ state: "open" })).toBe(2);
		expect(storage.size()).toBe(3);
		storage.clear();
		expect(storage.size()).toBe(0);
	});
});
