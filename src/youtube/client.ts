import type { z } from "zod";
import {
	ConfigError,
	errorMessage,
	InvalidIdentifierError,
	UpstreamError,
	UpstreamQuotaError,
} from "../errors.js";
import type { Page, RawVideoEntry, VideoSource } from "../videos/types.js";
import {
	apiErrorSchema,
	type ChannelResource,
	channelsListSchema,
	playlistItemsSchema,
	type PlaylistResource,
	playlistsListSchema,
	searchListSchema,
	type VideoResource,
	videosListSchema,
} from "./schemas.js";

export const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3";
/** Largest page the Data API hands out. */
export const PAGE_SIZE = 50;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const QUOTA_REASONS = new Set([
	"quotaExceeded",
	"dailyLimitExceeded",
	"keyInvalid",
	"keyExpired",
	"accessNotConfigured",
	"ipRefererBlocked",
	"forbidden",
]);

const TRANSIENT_REASONS = new Set([
	"rateLimitExceeded",
	"userRateLimitExceeded",
	"backendError",
	"internalError",
]);

const NOT_FOUND_REASONS = new Set([
	"playlistNotFound",
	"channelNotFound",
	"notFound",
]);

type QueryParams = Record<string, string | undefined>;

export type YouTubeClientOptions = {
	apiKey: string;
	requestTimeoutMs?: number;
	baseUrl?: string;
	fetch?: typeof fetch;
};

export type ChannelQuery =
	| { id: string }
	| { forHandle: string }
	| { forUsername: string };

export type ChannelSearchHit = {
	channelId: string;
	title: string;
};

export class YouTubeClient implements VideoSource {
	private readonly apiKey: string;
	private readonly requestTimeoutMs: number;
	private readonly baseUrl: string;
	private readonly fetchImpl: typeof fetch;
	private calls = 0;

	constructor(options: YouTubeClientOptions) {
		if (!options.apiKey) {
			throw new ConfigError(
				"no YouTube API key configured (set YOUTUBE_API_KEY or pass --apiKey)",
			);
		}
		this.apiKey = options.apiKey;
		this.requestTimeoutMs =
			options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.baseUrl = options.baseUrl ?? YOUTUBE_API_BASE;
		this.fetchImpl = options.fetch ?? fetch;
	}

	/** Requests issued so far, retries included. */
	get callCount(): number {
		return this.calls;
	}

	async listChannelVideos(
		channelId: string,
		cursor?: string,
		signal?: AbortSignal,
	): Promise<Page<RawVideoEntry>> {
		const data = await this.get(
			"search",
			{
				part: "snippet",
				channelId,
				type: "video",
				order: "date",
				maxResults: String(PAGE_SIZE),
				pageToken: cursor,
			},
			searchListSchema,
			{ subject: channelId, signal },
		);

		const ids = data.items.flatMap((item) =>
			item.id.videoId ? [item.id.videoId] : [],
		);
		return {
			items: await this.getVideoEntries(ids, signal),
			nextCursor: data.nextPageToken || undefined,
		};
	}

	async listPlaylistVideos(
		playlistId: string,
		cursor?: string,
		signal?: AbortSignal,
	): Promise<Page<RawVideoEntry>> {
		const data = await this.get(
			"playlistItems",
			{
				part: "contentDetails,snippet",
				playlistId,
				maxResults: String(PAGE_SIZE),
				pageToken: cursor,
			},
			playlistItemsSchema,
			{ subject: playlistId, signal },
		);

		const ids = data.items.flatMap((item) => {
			const videoId =
				item.contentDetails?.videoId ?? item.snippet?.resourceId?.videoId;
			return videoId ? [videoId] : [];
		});
		return {
			items: await this.getVideoEntries(ids, signal),
			nextCursor: data.nextPageToken || undefined,
		};
	}

	/**
	 * Listing endpoints carry no statistics, so each page is followed by a
	 * `videos` call. Ids upstream no longer serves (private, deleted) drop out.
	 */
	async getVideoEntries(
		videoIds: string[],
		signal?: AbortSignal,
	): Promise<RawVideoEntry[]> {
		const byId = new Map<string, RawVideoEntry>();

		for (let i = 0; i < videoIds.length; i += PAGE_SIZE) {
			const chunk = videoIds.slice(i, i + PAGE_SIZE);
			const data = await this.get(
				"videos",
				{
					part: "snippet,statistics,contentDetails",
					id: chunk.join(","),
					maxResults: String(PAGE_SIZE),
				},
				videosListSchema,
				{ signal },
			);
			for (const item of data.items) {
				byId.set(item.id, toRawEntry(item));
			}
		}

		return videoIds.flatMap((id) => {
			const entry = byId.get(id);
			return entry ? [entry] : [];
		});
	}

	async getChannel(
		query: ChannelQuery,
		signal?: AbortSignal,
	): Promise<ChannelResource | null> {
		const subject = Object.values(query).join("");
		const data = await this.get(
			"channels",
			{ part: "snippet,contentDetails,statistics", ...query },
			channelsListSchema,
			{ subject, signal },
		);
		return data.items[0] ?? null;
	}

	async getPlaylist(
		playlistId: string,
		signal?: AbortSignal,
	): Promise<PlaylistResource | null> {
		const data = await this.get(
			"playlists",
			{ part: "snippet,contentDetails", id: playlistId },
			playlistsListSchema,
			{ subject: playlistId, signal },
		);
		return data.items[0] ?? null;
	}

	async searchChannels(
		query: string,
		maxResults = 5,
		signal?: AbortSignal,
	): Promise<ChannelSearchHit[]> {
		const data = await this.get(
			"search",
			{
				part: "snippet",
				q: query,
				type: "channel",
				maxResults: String(maxResults),
			},
			searchListSchema,
			{ subject: query, signal },
		);

		return data.items.flatMap((item) => {
			const channelId = item.snippet?.channelId ?? item.id.channelId;
			if (!channelId) return [];
			return [{ channelId, title: item.snippet?.title ?? channelId }];
		});
	}

	private async get<S extends z.ZodTypeAny>(
		endpoint: string,
		params: QueryParams,
		schema: S,
		options: { subject?: string; signal?: AbortSignal },
	): Promise<z.infer<S>> {
		const url = new URL(`${this.baseUrl}/${endpoint}`);
		for (const [key, value] of Object.entries(params)) {
			if (value !== undefined && value !== "") {
				url.searchParams.set(key, value);
			}
		}
		url.searchParams.set("key", this.apiKey);

		const { signal, subject } = options;
		const timeout = AbortSignal.timeout(this.requestTimeoutMs);
		const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

		this.calls++;
		let response: Response;
		let text: string;
		try {
			response = await this.fetchImpl(url, {
				headers: { Accept: "application/json" },
				signal: requestSignal,
			});
			text = await response.text();
		} catch (error) {
			if (signal?.aborted) throw error;
			throw new UpstreamError({
				status: 0,
				reason: timeout.aborted ? "timeout" : "network",
				transient: true,
				message: `${endpoint}: ${errorMessage(error)}`,
				cause: error,
			});
		}

		const body = parseJson(text);
		if (!response.ok) {
			throw toUpstreamError(response.status, body, subject);
		}

		const parsed = schema.safeParse(body);
		if (!parsed.success) {
			throw new UpstreamError({
				status: response.status,
				reason: "malformedResponse",
				transient: false,
				message: `${endpoint}: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`,
			});
		}
		return parsed.data;
	}
}

/** Maps an API error response onto the error kinds callers act on. */
export function toUpstreamError(
	status: number,
	body: unknown,
	subject?: string,
): Error {
	const parsed = apiErrorSchema.safeParse(body);
	const detail = parsed.success ? parsed.data.error : undefined;
	const reason = detail?.errors?.[0]?.reason ?? `http${status}`;
	const message = detail?.message;

	if (TRANSIENT_REASONS.has(reason)) {
		return new UpstreamError({ status, reason, transient: true, message });
	}
	if (
		status === 401 ||
		QUOTA_REASONS.has(reason) ||
		(status === 400 && /api key/i.test(message ?? ""))
	) {
		return new UpstreamQuotaError(status, reason, message);
	}
	if (NOT_FOUND_REASONS.has(reason) || status === 404) {
		return new InvalidIdentifierError(
			subject ?? "(unknown)",
			message ?? "not found upstream",
		);
	}
	return new UpstreamError({
		status,
		reason,
		transient: status === 429 || status >= 500,
		message,
	});
}

function toRawEntry(item: VideoResource): RawVideoEntry {
	const thumbnails = item.snippet?.thumbnails;
	return {
		id: item.id,
		title: item.snippet?.title,
		publishedAt: item.snippet?.publishedAt,
		viewCount: item.statistics?.viewCount,
		likeCount: item.statistics?.likeCount,
		commentCount: item.statistics?.commentCount,
		duration: item.contentDetails?.duration,
		thumbnailUrl:
			thumbnails?.high?.url ?? thumbnails?.medium?.url ?? thumbnails?.default?.url,
	};
}

function parseJson(text: string): unknown {
	if (!text) return null;
	try {
		return JSON.parse(text);
	} catch {
		return text;
	}
}
