import { describe, expect, it } from "vitest";
import { InvalidIdentifierError } from "../errors.js";
import { YouTubeClient } from "./client.js";
import { lookupChannel, parseChannelInput, pickSearchHit } from "./lookup.js";

const CHANNEL_ID = "UCaaaaaaaaaaaaaaaaaaaaaa";

describe("parseChannelInput", () => {
	it.each([
		[CHANNEL_ID, { kind: "id", value: CHANNEL_ID }],
		["@synthnerd", { kind: "handle", value: "@synthnerd" }],
		["https://www.youtube.com/@synthnerd/videos", { kind: "handle", value: "@synthnerd" }],
		[`https://www.youtube.com/channel/${CHANNEL_ID}`, { kind: "id", value: CHANNEL_ID }],
		["youtube.com/c/Synth%20Nerd", { kind: "name", value: "Synth Nerd" }],
		["https://youtube.com/user/synthnerd", { kind: "name", value: "synthnerd" }],
		["Synth Nerd", { kind: "name", value: "Synth Nerd" }],
		["UCshort", { kind: "name", value: "UCshort" }],
	])("classifies %s", (input, expected) => {
		expect(parseChannelInput(input)).toEqual(expected);
	});

	it("rejects empty input", () => {
		expect(() => parseChannelInput("   ")).toThrow(InvalidIdentifierError);
	});

	it("rejects a YouTube URL that names no channel", () => {
		expect(() => parseChannelInput("https://www.youtube.com/")).toThrow(
			"URL names no channel",
		);
	});
});

describe("pickSearchHit", () => {
	const hits = [
		{ channelId: "UC1", title: "Synth Nerd Clips" },
		{ channelId: "UC2", title: "synth nerd" },
		{ channelId: "UC3", title: "Other" },
	];

	it("prefers an exact title match", () => {
		expect(pickSearchHit(hits, "Synth Nerd")?.channelId).toBe("UC2");
	});

	it("falls back to a title containing the term, then the top hit", () => {
		expect(pickSearchHit(hits, "clips")?.channelId).toBe("UC1");
		expect(pickSearchHit(hits, "zzz")?.channelId).toBe("UC1");
		expect(pickSearchHit([], "zzz")).toBeUndefined();
	});
});

describe("lookupChannel", () => {
	function clientFor(responses: Record<string, unknown>) {
		const endpoints: string[] = [];
		const fetchStub: typeof fetch = async (input) => {
			const url = new URL(input instanceof Request ? input.url : input);
			const endpoint = url.pathname.split("/").at(-1) ?? "";
			const key = url.searchParams.has("forUsername")
				? "channels?forUsername"
				: endpoint;
			endpoints.push(key);
			return new Response(JSON.stringify(responses[key] ?? { items: [] }));
		};
		return {
			client: new YouTubeClient({ apiKey: "test-secret", fetch: fetchStub }),
			endpoints,
		};
	}

	const channel = {
		id: CHANNEL_ID,
		snippet: { title: "Synth Nerd" },
		contentDetails: { relatedPlaylists: { uploads: "UUaaaaaaaaaaaaaaaaaaaaaa" } },
		statistics: { videoCount: "321" },
	};

	it("looks up a channel id directly", async () => {
		const { client, endpoints } = clientFor({ channels: { items: [channel] } });

		await expect(lookupChannel(client, CHANNEL_ID)).resolves.toEqual({
			channelId: CHANNEL_ID,
			title: "Synth Nerd",
			uploadsPlaylistId: "UUaaaaaaaaaaaaaaaaaaaaaa",
			videoCount: 321,
			calls: 1,
		});
		expect(endpoints).toEqual(["channels"]);
	});

	it("falls back from username to channel search for a plain name", async () => {
		const { client, endpoints } = clientFor({
			"channels?forUsername": { items: [] },
			search: {
				items: [
					{ id: { channelId: "UCzzz" }, snippet: { title: "Synth Nerd Fans" } },
					{ id: { channelId: CHANNEL_ID }, snippet: { title: "Synth Nerd" } },
				],
			},
			channels: { items: [channel] },
		});

		const info = await lookupChannel(client, "synth nerd");

		expect(info.channelId).toBe(CHANNEL_ID);
		expect(info.calls).toBe(3);
		expect(endpoints).toEqual(["channels?forUsername", "search", "channels"]);
	});

	it("fails with a hint when nothing matches", async () => {
		const { client } = clientFor({});

		await expect(lookupChannel(client, "@ghost")).rejects.toThrow(
			"Invalid identifier '@ghost': channel not found, try the channel id or URL instead",
		);
	});
});
