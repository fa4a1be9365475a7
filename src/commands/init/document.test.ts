import { describe, expect, it } from "vitest";
import { parseConfig } from "../../config.js";
import { buildConfigDocument, parseNumberAnswer } from "./document.js";

describe("buildConfigDocument", () => {
	it("writes a document the config loader reads back", () => {
		const text = buildConfigDocument({
			apiKey: "env.YOUTUBE_API_KEY",
			strategy: "combined",
			halfLifeDays: 45,
			likeWeight: 2,
			viewWeight: 0.05,
		});
		expect(parseConfig(text)).toEqual({
			apiKey: "env.YOUTUBE_API_KEY",
			strategy: "combined",
			ranking: { likeWeight: 2, viewWeight: 0.05, halfLifeDays: 45 },
			fetch: { retryDelayMs: 1000, requestTimeoutMs: 30_000, maxPages: 100 },
		});
	});

	it("leaves the key out when none was given", () => {
		const text = buildConfigDocument({
			strategy: "uploads-playlist",
			halfLifeDays: 90,
			likeWeight: 1,
			viewWeight: 0.1,
		});
		expect(text.split("\n")[0]).toBe("strategy: uploads-playlist");
		expect(parseConfig(text).apiKey).toBeUndefined();
	});
});

describe("parseNumberAnswer", () => {
	it("accepts positive numbers", () => {
		expect(parseNumberAnswer(" 1.5 ")).toBe(1.5);
	});

	it("accepts zero only when allowed", () => {
		expect(parseNumberAnswer("0")).toBeUndefined();
		expect(parseNumberAnswer("0", { allowZero: true })).toBe(0);
	});

	it("rejects blanks, negatives and text", () => {
		expect(parseNumberAnswer("")).toBeUndefined();
		expect(parseNumberAnswer("-2", { allowZero: true })).toBeUndefined();
		expect(parseNumberAnswer("ten")).toBeUndefined();
	});
});
