import { FetchError } from "../errors.js";
import { type FetcherOptions, VideoFetcher } from "./fetch.js";
import { type RankingResult, rankVideos } from "./rank.js";
import type {
	FetchRequest,
	RankingWeights,
	VideoRecord,
	VideoSource,
} from "./types.js";

export type FetchAndRankArgs = {
	source: VideoSource;
	requests: FetchRequest[];
	weights: RankingWeights;
	/** Reference time for video age; defaults to now. */
	asOf?: Date;
	fetchOptions?: FetcherOptions;
	/** Rank whatever was collected when paging fails instead of throwing. */
	allowPartial?: boolean;
};

export type FetchAndRankResult = RankingResult & {
	fetched: VideoRecord[];
	/** Set when `allowPartial` kept a fetch that did not finish. */
	incomplete?: FetchError<VideoRecord>;
};

/**
 * Caller-facing entry point: collects the requested collections, then
 * ranks them. Identifier and quota errors always propagate.
 */
export async function fetchAndRank(
	args: FetchAndRankArgs,
): Promise<FetchAndRankResult> {
	const fetcher = new VideoFetcher(args.source, args.fetchOptions);
	const asOf = args.asOf ?? new Date();

	let fetched: VideoRecord[];
	let incomplete: FetchError<VideoRecord> | undefined;
	try {
		fetched = await fetcher.fetchAll(args.requests);
	} catch (error) {
		if (!args.allowPartial || !isVideoFetchError(error)) throw error;
		fetched = error.partial;
		incomplete = error;
	}

	const result = rankVideos(fetched, asOf, args.weights);
	return incomplete
		? { ...result, fetched, incomplete }
		: { ...result, fetched };
}

function isVideoFetchError(error: unknown): error is FetchError<VideoRecord> {
	return error instanceof FetchError;
}

export { Deduplicator, dedupe } from "./dedupe.js";
export { VideoFetcher, toVideoRecord } from "./fetch.js";
export type { FetcherHooks, FetcherOptions, PageEvent } from "./fetch.js";
export { filterVideos } from "./filter.js";
export type { VideoFilter } from "./filter.js";
export { paginate } from "./paginate.js";
export {
	DEFAULT_WEIGHTS,
	decayFactor,
	decayRateFromHalfLife,
	rankVideos,
} from "./rank.js";
export type { RankingResult } from "./rank.js";
export {
	deriveUploadsPlaylistId,
	parsePlaylistTarget,
	resolveCollection,
} from "./resolve.js";
export type * from "./types.js";
