import { describe, expect, it } from "vitest";
import { InvalidIdentifierError } from "../errors.js";
import { YouTubeClient } from "../youtube/client.js";
import {
	chooseStrategy,
	isLikelyIncomplete,
	requestsFor,
	resolveTarget,
} from "./targets.js";

const offline: typeof fetch = async () => {
	throw new Error("no requests expected");
};

describe("chooseStrategy", () => {
	it("uses the flag over everything", () => {
		expect(
			chooseStrategy(
				"https://www.youtube.com/playlist?list=PLx",
				"standard-search",
				"uploads-playlist",
			),
		).toBe("standard-search");
	});

	it("treats a playlist URL as an explicit playlist", () => {
		expect(
			chooseStrategy(
				"https://www.youtube.com/playlist?list=PLx",
				undefined,
				"uploads-playlist",
			),
		).toBe("explicit-playlist");
	});

	it.each([
		"PLtestplaylist000000001",
		"UUtestchannel0000000001",
		"OLtestalbum000000000000001",
	])("treats the playlist id %s as an explicit playlist", (target) => {
		expect(chooseStrategy(target, undefined, "uploads-playlist")).toBe(
			"explicit-playlist",
		);
	});

	it("searches a short name that happens to start like a playlist id", () => {
		expect(chooseStrategy("PLanet", undefined, "uploads-playlist")).toBe(
			"uploads-playlist",
		);
	});

	it("falls back to the configured strategy", () => {
		expect(chooseStrategy("@someone", undefined, "combined")).toBe("combined");
	});
});

describe("requestsFor", () => {
	it("runs search before the uploads playlist when combined", () => {
		expect(requestsFor("combined", "UCabc")).toEqual([
			{ strategy: "standard-search", channelId: "UCabc" },
			{ strategy: "uploads-playlist", channelId: "UCabc" },
		]);
	});

	it("issues a single request otherwise", () => {
		expect(requestsFor("uploads-playlist", "UCabc")).toEqual([
			{ strategy: "uploads-playlist", channelId: "UCabc" },
		]);
	});
});

describe("resolveTarget", () => {
	const client = new YouTubeClient({ apiKey: "test-secret", fetch: offline });

	it("needs no lookup for an explicit playlist", async () => {
		await expect(
			resolveTarget(
				client,
				"https://www.youtube.com/playlist?list=PLx1",
				"explicit-playlist",
			),
		).resolves.toEqual({
			label: "PLx1",
			requests: [
				{
					strategy: "explicit-playlist",
					playlist: "https://www.youtube.com/playlist?list=PLx1",
				},
			],
		});
		expect(client.callCount).toBe(0);
	});

	it("rejects a malformed playlist before any request", async () => {
		await expect(
			resolveTarget(client, "not a playlist", "explicit-playlist"),
		).rejects.toBeInstanceOf(InvalidIdentifierError);
		expect(client.callCount).toBe(0);
	});
});

describe("isLikelyIncomplete", () => {
	it("flags fetches under 90% of the reported count", () => {
		expect(isLikelyIncomplete(89, 100)).toBe(true);
		expect(isLikelyIncomplete(90, 100)).toBe(false);
		expect(isLikelyIncomplete(3, undefined)).toBe(false);
	});
});
