import { describe, expect, it } from "vitest";
import { estimateApiCalls } from "./estimate.js";

describe("estimateApiCalls", () => {
	it("counts one listing and one detail call per page of 50", () => {
		expect(estimateApiCalls(120, 1)).toEqual({
			videoCount: 120,
			lookupCalls: 1,
			listingCalls: 3,
			detailCalls: 3,
			total: 7,
		});
	});

	it("doubles the paging cost for the combined strategy", () => {
		expect(estimateApiCalls(120, 1, 2).total).toBe(13);
	});

	it("still needs one listing call for an empty channel", () => {
		expect(estimateApiCalls(0)).toEqual({
			videoCount: 0,
			lookupCalls: 0,
			listingCalls: 1,
			detailCalls: 0,
			total: 1,
		});
	});
});
