import { describe, expect, it } from "vitest";
import { parseUntilFlag } from "../commands/flags.js";
import { filterVideos } from "./filter.js";
import type { VideoRecord } from "./types.js";

function video(id: string, title: string, publishedAt: string): VideoRecord {
	return {
		id,
		title,
		publishedAt: new Date(publishedAt),
		viewCount: 0,
		likeCount: 0,
		commentCount: 0,
		durationSeconds: 0,
		url: `https://www.youtube.com/watch?v=${id}`,
	};
}

const videos = [
	video("a", "Building a Synth", "2024-03-10T00:00:00Z"),
	video("b", "Live Q&A", "2024-01-05T00:00:00Z"),
	video("c", "synth repair", "2023-12-31T00:00:00Z"),
	video("d", "Studio tour", "2024-06-01T00:00:00Z"),
];

describe("filterVideos", () => {
	it("returns everything when no filter is set", () => {
		expect(filterVideos(videos, {})).toEqual(videos);
	});

	it("keeps dates inside inclusive bounds", () => {
		const result = filterVideos(videos, {
			since: new Date("2024-01-05T00:00:00Z"),
			until: new Date("2024-03-10T00:00:00Z"),
		});
		expect(result.map((v) => v.id)).toEqual(["a", "b"]);
	});

	it("keeps videos from later in the day of a bare --until date", () => {
		const sameDay = [
			video("noon", "Afternoon upload", "2024-03-10T15:00:00Z"),
			video("next", "Next day", "2024-03-11T00:00:00Z"),
		];
		const result = filterVideos(sameDay, { until: parseUntilFlag("2024-03-10") });
		expect(result.map((v) => v.id)).toEqual(["noon"]);
	});

	it("matches titles case-insensitively", () => {
		expect(filterVideos(videos, { search: "SYNTH" }).map((v) => v.id)).toEqual([
			"a",
			"c",
		]);
	});

	it("limits after filtering and keeps order", () => {
		expect(
			filterVideos(videos, { search: "s", limit: 2 }).map((v) => v.id),
		).toEqual(["a", "c"]);
	});
});
