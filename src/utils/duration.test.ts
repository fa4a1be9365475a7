import { describe, expect, it } from "vitest";
import { parseIsoDuration } from "./duration.js";

describe("parseIsoDuration", () => {
	it.each([
		["PT1H2M3S", 3723],
		["PT15M", 900],
		["PT45S", 45],
		["P1DT1S", 86_401],
		["P0D", 0],
	])("%s is %i seconds", (value, seconds) => {
		expect(parseIsoDuration(value)).toBe(seconds);
	});

	it("returns 0 for missing or malformed values", () => {
		expect(parseIsoDuration(undefined)).toBe(0);
		expect(parseIsoDuration("")).toBe(0);
		expect(parseIsoDuration("1:02:03")).toBe(0);
	});
});
