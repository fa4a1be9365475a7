import { FetchError, type RankingField } from "../errors.js";
import { parseIsoDuration } from "../utils/duration.js";
import { Deduplicator } from "./dedupe.js";
import { type PageCall, type RetryEvent, paginate } from "./paginate.js";
import { describeRequest, resolveCollection } from "./resolve.js";
import type {
	CollectionRef,
	FetchRequest,
	RawVideoEntry,
	VideoRecord,
	VideoSource,
} from "./types.js";

export type PageEvent = {
	request: FetchRequest;
	page: number;
	received: number;
	added: number;
	total: number;
};

export type FetcherHooks = {
	onStart?: (request: FetchRequest) => void;
	onComplete?: (request: FetchRequest, total: number) => void;
	onPage?: (event: PageEvent) => void;
	onRetry?: (event: RetryEvent & { request: FetchRequest }) => void;
	onLimitReached?: (event: { request: FetchRequest; maxPages: number }) => void;
	onRepeatedCursor?: (event: { request: FetchRequest; cursor: string }) => void;
};

export type FetcherOptions = {
	retryDelayMs?: number;
	maxPages?: number;
	signal?: AbortSignal;
	hooks?: FetcherHooks;
};

export class VideoFetcher {
	private readonly source: VideoSource;
	private readonly options: FetcherOptions;

	constructor(source: VideoSource, options: FetcherOptions = {}) {
		this.source = source;
		this.options = options;
	}

	fetch(request: FetchRequest): Promise<VideoRecord[]> {
		return this.fetchAll([request]);
	}

	/**
	 * Runs the requests one after another through a single deduplicator, so
	 * a video reachable from several collections is returned once, in the
	 * position it was first seen.
	 */
	async fetchAll(requests: FetchRequest[]): Promise<VideoRecord[]> {
		// Resolve everything up front: a bad identifier fails before any call.
		const targets = requests.map((request) => ({
			request,
			collection: resolveCollection(request),
		}));

		const dedupe = new Deduplicator<RawVideoEntry>((entry) => entry.id);
		const records: VideoRecord[] = [];
		const { hooks, signal } = this.options;

		for (const { request, collection } of targets) {
			let page = 0;
			const pages = paginate(this.pageCall(collection), {
				retryDelayMs: this.options.retryDelayMs,
				maxPages: this.options.maxPages,
				signal,
				onRetry: (event) => hooks?.onRetry?.({ ...event, request }),
				onLimitReached: ({ maxPages }) =>
					hooks?.onLimitReached?.({ request, maxPages }),
				onRepeatedCursor: (cursor) =>
					hooks?.onRepeatedCursor?.({ request, cursor }),
			});

			hooks?.onStart?.(request);
			try {
				for await (const items of pages) {
					page++;
					const fresh = dedupe.filter(items);
					records.push(...fresh.map(toVideoRecord));
					hooks?.onPage?.({
						request,
						page,
						received: items.length,
						added: fresh.length,
						total: records.length,
					});
				}
			} catch (error) {
				if (error instanceof FetchError) {
					throw new FetchError<VideoRecord>(
						`Fetching ${request.strategy} for '${describeRequest(request)}' stopped after ${page} page(s): ${error.message}`,
						{ partial: [...records], cursor: error.cursor, cause: error },
					);
				}
				throw error;
			}
			hooks?.onComplete?.(request, records.length);
		}

		return records;
	}

	private pageCall(collection: CollectionRef): PageCall<RawVideoEntry> {
		switch (collection.kind) {
			case "channel":
				return (cursor, signal) =>
					this.source.listChannelVideos(collection.channelId, cursor, signal);
			case "playlist":
				return (cursor, signal) =>
					this.source.listPlaylistVideos(collection.playlistId, cursor, signal);
		}
	}
}

export function toVideoRecord(entry: RawVideoEntry): VideoRecord {
	const publishedAt = new Date(entry.publishedAt ?? Number.NaN);
	const viewCount = parseCount(entry.viewCount);
	const likeCount = parseCount(entry.likeCount);

	const unreadable: Partial<Record<RankingField, string>> = {};
	if (Number.isNaN(viewCount)) unreadable.viewCount = String(entry.viewCount);
	if (Number.isNaN(likeCount)) unreadable.likeCount = String(entry.likeCount);
	if (entry.publishedAt !== undefined && Number.isNaN(publishedAt.getTime())) {
		unreadable.publishedAt = entry.publishedAt;
	}

	return {
		id: entry.id,
		title: entry.title?.trim() || entry.id,
		publishedAt,
		viewCount,
		likeCount,
		commentCount: parseCount(entry.commentCount),
		durationSeconds: parseIsoDuration(entry.duration),
		url: buildVideoUrl(entry.id),
		...(entry.thumbnailUrl ? { thumbnailUrl: entry.thumbnailUrl } : {}),
		...(Object.keys(unreadable).length > 0 ? { unreadable } : {}),
	};
}

/**
 * Absent counts become 0. A count that is present but not a number is
 * kept as NaN so ranking can report the record instead of scoring it.
 */
export function parseCount(value: string | number | undefined): number {
	if (value === undefined) return 0;
	if (typeof value === "number") return value;
	const trimmed = value.trim();
	if (!trimmed) return 0;
	return /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export function buildVideoUrl(videoId: string): string {
	return `https://www.youtube.com/watch?v=${videoId}`;
}
