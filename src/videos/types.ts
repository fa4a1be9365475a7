import type { RankingField } from "../errors.js";

export type VideoRecord = {
	id: string;
	title: string;
	publishedAt: Date;
	viewCount: number;
	likeCount: number;
	commentCount: number;
	durationSeconds: number;
	url: string;
	thumbnailUrl?: string;
	/** Upstream text of fields that could not be read. */
	unreadable?: Partial<Record<RankingField, string>>;
	/** Set by the ranking engine only. */
	score?: number;
};

export type RankedVideo = VideoRecord & { score: number };

/**
 * One entry as the upstream listing returns it. Counts arrive as strings
 * and are missing when the owner hides them.
 */
export type RawVideoEntry = {
	id: string;
	title?: string;
	publishedAt?: string;
	viewCount?: string | number;
	likeCount?: string | number;
	commentCount?: string | number;
	duration?: string;
	thumbnailUrl?: string;
};

export type Page<T> = {
	items: T[];
	nextCursor?: string;
};

export type Strategy =
	| "standard-search"
	| "uploads-playlist"
	| "explicit-playlist";

export type FetchRequest =
	| { strategy: "standard-search"; channelId: string }
	| { strategy: "uploads-playlist"; channelId: string }
	| { strategy: "explicit-playlist"; playlist: string };

export type CollectionRef =
	| { kind: "channel"; channelId: string }
	| { kind: "playlist"; playlistId: string };

export type RankingWeights = {
	likeWeight: number;
	viewWeight: number;
	/** Per day. */
	decayRate: number;
};

/** Upstream collaborator the fetcher pages through. */
export interface VideoSource {
	listChannelVideos(
		channelId: string,
		cursor?: string,
		signal?: AbortSignal,
	): Promise<Page<RawVideoEntry>>;
	listPlaylistVideos(
		playlistId: string,
		cursor?: string,
		signal?: AbortSignal,
	): Promise<Page<RawVideoEntry>>;
}
