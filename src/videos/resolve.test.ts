import { describe, expect, it } from "vitest";
import { InvalidIdentifierError } from "../errors.js";
import {
	assertChannelId,
	deriveUploadsPlaylistId,
	isPlaylistUrl,
	parsePlaylistTarget,
	resolveCollection,
} from "./resolve.js";

describe("deriveUploadsPlaylistId", () => {
	it("swaps the UC prefix for UU", () => {
		expect(deriveUploadsPlaylistId("UCabc123")).toBe("UUabc123");
		expect(deriveUploadsPlaylistId("UCtest_channel-0001")).toBe(
			"UUtest_channel-0001",
		);
	});

	it("accepts the bare prefix", () => {
		expect(deriveUploadsPlaylistId("UC")).toBe("UU");
	});

	it.each(["", "U", "abc", "PLabc", "UCab c"])(
		"rejects %j",
		(input) => {
			expect(() => deriveUploadsPlaylistId(input)).toThrow(
				InvalidIdentifierError,
			);
		},
	);

	it("names the input in the error", () => {
		expect(() => assertChannelId("abc")).toThrow(
			"Invalid identifier 'abc': channel ids start with 'UC'",
		);
	});
});

describe("parsePlaylistTarget", () => {
	it("accepts a bare id", () => {
		expect(parsePlaylistTarget("PLtestPlaylist01")).toBe("PLtestPlaylist01");
		expect(parsePlaylistTarget("  PLabc  ")).toBe("PLabc");
	});

	it("reads the list parameter of a playlist URL", () => {
		expect(
			parsePlaylistTarget("https://www.youtube.com/playlist?list=PL123abc"),
		).toBe("PL123abc");
		expect(
			parsePlaylistTarget(
				"https://www.youtube.com/watch?v=vid00000001&list=PLq-9_x&index=2",
			),
		).toBe("PLq-9_x");
	});

	it("accepts a URL without a scheme", () => {
		expect(parsePlaylistTarget("youtube.com/playlist?list=PLq")).toBe("PLq");
	});

	it("rejects a URL without a list parameter", () => {
		expect(() =>
			parsePlaylistTarget("https://www.youtube.com/watch?v=vid00000001"),
		).toThrow("URL has no 'list' parameter");
	});

	it("rejects a list parameter with bad characters", () => {
		expect(() =>
			parsePlaylistTarget("https://www.youtube.com/playlist?list=bad%20id"),
		).toThrow("bad playlist id 'bad id'");
	});

	it("rejects text that is neither an id nor a URL", () => {
		expect(() => parsePlaylistTarget("my favourite songs")).toThrow(
			"not a playlist id or URL",
		);
	});
});

describe("isPlaylistUrl", () => {
	it("detects a list parameter on a YouTube URL", () => {
		expect(isPlaylistUrl("https://www.youtube.com/watch?v=x&list=PLa")).toBe(
			true,
		);
		expect(isPlaylistUrl("youtube.com/playlist?list=PLa")).toBe(true);
	});

	it("is false for ids and channel URLs", () => {
		expect(isPlaylistUrl("PLa")).toBe(false);
		expect(isPlaylistUrl("https://www.youtube.com/@somebody")).toBe(false);
	});
});

describe("resolveCollection", () => {
	it("pages the channel itself for standard search", () => {
		expect(
			resolveCollection({ strategy: "standard-search", channelId: "UCabc" }),
		).toEqual({ kind: "channel", channelId: "UCabc" });
	});

	it("pages the uploads playlist for uploads-playlist", () => {
		expect(
			resolveCollection({ strategy: "uploads-playlist", channelId: "UCabc" }),
		).toEqual({ kind: "playlist", playlistId: "UUabc" });
	});

	it("pages the given playlist for explicit-playlist", () => {
		expect(
			resolveCollection({
				strategy: "explicit-playlist",
				playlist: "https://www.youtube.com/playlist?list=PLxyz",
			}),
		).toEqual({ kind: "playlist", playlistId: "PLxyz" });
	});

	it("rejects a channel id that is not UC-prefixed", () => {
		expect(() =>
			resolveCollection({ strategy: "standard-search", channelId: "HCabc" }),
		).toThrow(InvalidIdentifierError);
	});
});
