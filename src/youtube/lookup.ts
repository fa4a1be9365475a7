import { InvalidIdentifierError } from "../errors.js";
import { isChannelId } from "../videos/resolve.js";
import type { ChannelQuery, ChannelSearchHit, YouTubeClient } from "./client.js";
import type { ChannelResource } from "./schemas.js";

export type ChannelInput =
	| { kind: "id"; value: string }
	| { kind: "handle"; value: string }
	| { kind: "name"; value: string };

export type ChannelInfo = {
	channelId: string;
	title: string;
	uploadsPlaylistId?: string;
	videoCount?: number;
	/** API calls spent on the lookup. */
	calls: number;
};

/**
 * Classifies what a user typed: a `UC…` id, a channel URL, an `@handle`,
 * a `/c/` or `/user/` URL, or a plain name.
 */
export function parseChannelInput(input: string): ChannelInput {
	const trimmed = input.trim();
	if (!trimmed) {
		throw new InvalidIdentifierError(input, "empty channel");
	}

	if (/youtube\.com\//i.test(trimmed)) {
		let url: URL;
		try {
			url = new URL(
				/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`,
			);
		} catch (error) {
			throw new InvalidIdentifierError(input, "malformed channel URL", {
				cause: error,
			});
		}
		const segments = url.pathname.split("/").filter(Boolean);
		const [first, second] = segments;

		if (first?.startsWith("@")) return { kind: "handle", value: first };
		if (first === "channel" && second && isChannelId(second)) {
			return { kind: "id", value: second };
		}
		if ((first === "c" || first === "user") && second) {
			return { kind: "name", value: decodeURIComponent(second) };
		}
		const last = segments.at(-1);
		if (!last) {
			throw new InvalidIdentifierError(input, "URL names no channel");
		}
		return { kind: "name", value: decodeURIComponent(last) };
	}

	if (trimmed.startsWith("@")) return { kind: "handle", value: trimmed };
	if (isChannelId(trimmed) && trimmed.length === 24) {
		return { kind: "id", value: trimmed };
	}
	return { kind: "name", value: trimmed };
}

export async function lookupChannel(
	client: YouTubeClient,
	input: string,
	signal?: AbortSignal,
): Promise<ChannelInfo> {
	const parsed = parseChannelInput(input);
	const startCalls = client.callCount;

	const found = await findChannel(client, parsed, signal);
	if (!found) {
		throw new InvalidIdentifierError(
			input,
			"channel not found, try the channel id or URL instead",
		);
	}
	return toChannelInfo(found, client.callCount - startCalls);
}

async function findChannel(
	client: YouTubeClient,
	input: ChannelInput,
	signal?: AbortSignal,
): Promise<ChannelResource | null> {
	switch (input.kind) {
		case "id":
			return client.getChannel({ id: input.value }, signal);
		case "handle":
			return client.getChannel({ forHandle: input.value }, signal);
		case "name": {
			const byUsername = await client.getChannel(
				{ forUsername: input.value },
				signal,
			);
			if (byUsername) return byUsername;

			const hits = await client.searchChannels(input.value, 5, signal);
			const match = pickSearchHit(hits, input.value);
			if (!match) return null;
			const query: ChannelQuery = { id: match.channelId };
			return client.getChannel(query, signal);
		}
	}
}

/** Exact title match first, then a title containing the term, else the top hit. */
export function pickSearchHit(
	hits: ChannelSearchHit[],
	term: string,
): ChannelSearchHit | undefined {
	const needle = term.toLowerCase();
	return (
		hits.find((hit) => hit.title.toLowerCase() === needle) ??
		hits.find((hit) => hit.title.toLowerCase().includes(needle)) ??
		hits[0]
	);
}

function toChannelInfo(channel: ChannelResource, calls: number): ChannelInfo {
	const videoCount = Number(channel.statistics?.videoCount);
	return {
		channelId: channel.id,
		title: channel.snippet?.title ?? channel.id,
		uploadsPlaylistId: channel.contentDetails?.relatedPlaylists?.uploads,
		videoCount: Number.isFinite(videoCount) ? videoCount : undefined,
		calls,
	};
}
