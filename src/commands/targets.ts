import type { StrategyOption } from "../config.js";
import { log } from "../ui/logger.js";
import {
	deriveUploadsPlaylistId,
	isPlaylistId,
	isPlaylistUrl,
	parsePlaylistTarget,
} from "../videos/resolve.js";
import type { FetchRequest } from "../videos/types.js";
import type { YouTubeClient } from "../youtube/client.js";
import { type ChannelInfo, lookupChannel } from "../youtube/lookup.js";

export type ResolvedTarget = {
	label: string;
	requests: FetchRequest[];
	/** Known for channel targets; drives the completeness warning. */
	channel?: ChannelInfo;
};

/**
 * A playlist URL or id always means the playlist, whatever the configured
 * default; it would otherwise be searched for as a channel name.
 */
export function chooseStrategy(
	target: string,
	flag: StrategyOption | undefined,
	configured: StrategyOption,
): StrategyOption {
	if (flag) return flag;
	return isPlaylistUrl(target) || isPlaylistId(target)
		? "explicit-playlist"
		: configured;
}

export async function resolveTarget(
	client: YouTubeClient,
	target: string,
	strategy: StrategyOption,
	signal?: AbortSignal,
): Promise<ResolvedTarget> {
	if (strategy === "explicit-playlist") {
		const playlistId = parsePlaylistTarget(target);
		return {
			label: playlistId,
			requests: [{ strategy: "explicit-playlist", playlist: target }],
		};
	}

	const channel = await lookupChannel(client, target, signal);
	const { channelId } = channel;
	log.info(`Resolved channel '${channel.title}'`, { strategy: "lookup", target }, {
		id: channelId,
		videos: channel.videoCount ?? "unknown",
	});

	if (
		channel.uploadsPlaylistId &&
		channel.uploadsPlaylistId !== deriveUploadsPlaylistId(channelId)
	) {
		log.debug("Uploads playlist differs from the derived id", {
			strategy: "lookup",
			target,
		}, { reported: channel.uploadsPlaylistId });
	}

	return {
		label: channel.title,
		requests: requestsFor(strategy, channelId),
		channel,
	};
}

export function requestsFor(
	strategy: Exclude<StrategyOption, "explicit-playlist">,
	channelId: string,
): FetchRequest[] {
	switch (strategy) {
		case "standard-search":
			return [{ strategy: "standard-search", channelId }];
		case "uploads-playlist":
			return [{ strategy: "uploads-playlist", channelId }];
		case "combined":
			return [
				{ strategy: "standard-search", channelId },
				{ strategy: "uploads-playlist", channelId },
			];
	}
}

/** The API counts private and deleted videos, so a small gap is expected. */
export function isLikelyIncomplete(fetched: number, reported?: number): boolean {
	return reported !== undefined && fetched < reported * 0.9;
}
