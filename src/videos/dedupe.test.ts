import { describe, expect, it } from "vitest";
import { Deduplicator, dedupe } from "./dedupe.js";

describe("dedupe", () => {
	it("keeps the first occurrence of each id in input order", () => {
		const items = [
			{ id: "a", n: 1 },
			{ id: "b", n: 2 },
			{ id: "a", n: 3 },
			{ id: "c", n: 4 },
			{ id: "b", n: 5 },
		];
		expect(dedupe(items)).toEqual([
			{ id: "a", n: 1 },
			{ id: "b", n: 2 },
			{ id: "c", n: 4 },
		]);
	});

	it("returns an empty list for empty input", () => {
		expect(dedupe([])).toEqual([]);
	});
});

describe("Deduplicator", () => {
	it("remembers keys across calls", () => {
		const filter = new Deduplicator<string>((value) => value.toLowerCase());
		expect(filter.filter(["a", "B"])).toEqual(["a", "B"]);
		expect(filter.filter(["b", "A", "c"])).toEqual(["c"]);
		expect(filter.size).toBe(3);
	});
});
