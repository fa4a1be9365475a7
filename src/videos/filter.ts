import type { VideoRecord } from "./types.js";

export type VideoFilter = {
	/** Inclusive lower bound on the publish time. */
	since?: Date;
	/** Inclusive upper bound on the publish time. */
	until?: Date;
	/** Case-insensitive substring of the title. */
	search?: string;
	limit?: number;
};

/** Narrows an already ranked list; relative order is kept. */
export function filterVideos<T extends VideoRecord>(
	videos: readonly T[],
	filter: VideoFilter,
): T[] {
	const needle = filter.search?.trim().toLowerCase();
	const since = filter.since?.getTime();
	const until = filter.until?.getTime();

	const matched = videos.filter((video) => {
		const published = video.publishedAt.getTime();
		if (since !== undefined && published < since) return false;
		if (until !== undefined && published > until) return false;
		if (needle && !video.title.toLowerCase().includes(needle)) return false;
		return true;
	});

	return filter.limit !== undefined ? matched.slice(0, filter.limit) : matched;
}
