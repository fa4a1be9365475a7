import { InvalidIdentifierError } from "../errors.js";
import type { CollectionRef, FetchRequest } from "./types.js";

const CHANNEL_ID_PATTERN = /^UC[A-Za-z0-9_-]*$/;
const PLAYLIST_ID_PATTERN = /^[A-Za-z0-9_-]{2,}$/;
/** Ids of user, uploads and album playlists; a shorter word is a name. */
const KNOWN_PLAYLIST_ID = /^(PL|UU|OL)[A-Za-z0-9_-]{16,}$/;

export function isChannelId(input: string): boolean {
	return CHANNEL_ID_PATTERN.test(input);
}

export function assertChannelId(input: string): string {
	if (input.length < 2 || !input.startsWith("UC")) {
		throw new InvalidIdentifierError(input, "channel ids start with 'UC'");
	}
	if (!CHANNEL_ID_PATTERN.test(input)) {
		throw new InvalidIdentifierError(
			input,
			"channel ids contain only letters, digits, '-' and '_'",
		);
	}
	return input;
}

/**
 * Every channel `UC…` owns an uploads playlist `UU…` with the same suffix.
 * Paging through it enumerates uploads more reliably than channel search.
 */
export function deriveUploadsPlaylistId(channelId: string): string {
	assertChannelId(channelId);
	return `${channelId[0]}U${channelId.slice(2)}`;
}

/** Accepts a bare playlist id or a `.../playlist?list=<id>` URL. */
export function parsePlaylistTarget(input: string): string {
	const trimmed = input.trim();
	if (PLAYLIST_ID_PATTERN.test(trimmed)) {
		return trimmed;
	}

	if (!looksLikeUrl(trimmed)) {
		throw new InvalidIdentifierError(input, "not a playlist id or URL");
	}

	let url: URL;
	try {
		url = new URL(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
	} catch (error) {
		throw new InvalidIdentifierError(input, "malformed playlist URL", {
			cause: error,
		});
	}

	const list = url.searchParams.get("list");
	if (!list) {
		throw new InvalidIdentifierError(input, "URL has no 'list' parameter");
	}
	if (!PLAYLIST_ID_PATTERN.test(list)) {
		throw new InvalidIdentifierError(input, `bad playlist id '${list}'`);
	}
	return list;
}

export function isPlaylistUrl(input: string): boolean {
	return looksLikeUrl(input.trim()) && /[?&]list=/.test(input);
}

export function isPlaylistId(input: string): boolean {
	return KNOWN_PLAYLIST_ID.test(input.trim());
}

export function resolveCollection(request: FetchRequest): CollectionRef {
	switch (request.strategy) {
		case "standard-search":
			return { kind: "channel", channelId: assertChannelId(request.channelId) };
		case "uploads-playlist":
			return {
				kind: "playlist",
				playlistId: deriveUploadsPlaylistId(request.channelId),
			};
		case "explicit-playlist":
			return { kind: "playlist", playlistId: parsePlaylistTarget(request.playlist) };
	}
}

export function describeRequest(request: FetchRequest): string {
	return request.strategy === "explicit-playlist"
		? request.playlist
		: request.channelId;
}

function looksLikeUrl(input: string): boolean {
	return /^https?:\/\//i.test(input) || /^(www\.|m\.)?youtube\.com\//i.test(input);
}
