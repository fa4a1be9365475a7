import path from "node:path";
import {
	CONFIG_FILE_NAME,
	loadConfig,
	resolveApiKey,
	type StrategyOption,
} from "../../config.js";
import type { LocalContext } from "../../context.js";
import { InvalidIdentifierError } from "../../errors.js";
import { parseCount } from "../../videos/fetch.js";
import { parsePlaylistTarget } from "../../videos/resolve.js";
import { YouTubeClient } from "../../youtube/client.js";
import { type ApiCallEstimate, estimateApiCalls } from "../../youtube/estimate.js";
import { lookupChannel } from "../../youtube/lookup.js";
import { reportFailure } from "../failure.js";
import { chooseStrategy } from "../targets.js";

export interface EstimateCommandFlags {
	strategy?: StrategyOption;
	apiKey?: string;
	config?: string;
}

export async function estimate(
	this: LocalContext,
	flags: EstimateCommandFlags,
	target: string,
): Promise<void> {
	try {
		const config = await loadConfig(
			path.resolve(flags.config ?? CONFIG_FILE_NAME),
			{ required: flags.config !== undefined },
		);
		const client = new YouTubeClient({
			apiKey: resolveApiKey(flags.apiKey, config, this.process.env) ?? "",
			requestTimeoutMs: config.fetch.requestTimeoutMs,
		});

		const strategy = chooseStrategy(target, flags.strategy, config.strategy);
		const { label, result } = await estimateFor(client, target, strategy);
		this.process.stdout.write(`${formatEstimate(label, strategy, result)}\n`);
	} catch (error) {
		this.process.exitCode = reportFailure(error);
	}
}

async function estimateFor(
	client: YouTubeClient,
	target: string,
	strategy: StrategyOption,
): Promise<{ label: string; result: ApiCallEstimate }> {
	if (strategy === "explicit-playlist") {
		const playlistId = parsePlaylistTarget(target);
		const playlist = await client.getPlaylist(playlistId);
		if (!playlist) {
			throw new InvalidIdentifierError(target, "playlist not found");
		}
		return {
			label: playlist.snippet?.title ?? playlistId,
			result: estimateApiCalls(
				parseCount(playlist.contentDetails?.itemCount) || 0,
				client.callCount,
			),
		};
	}

	const channel = await lookupChannel(client, target);
	return {
		label: channel.title,
		result: estimateApiCalls(
			channel.videoCount ?? 0,
			channel.calls,
			strategy === "combined" ? 2 : 1,
		),
	};
}

export function formatEstimate(
	label: string,
	strategy: StrategyOption,
	estimate: ApiCallEstimate,
): string {
	return [
		`${label} (${strategy})`,
		`  videos:        ${estimate.videoCount}`,
		`  lookup calls:  ${estimate.lookupCalls}`,
		`  listing calls: ${estimate.listingCalls}`,
		`  detail calls:  ${estimate.detailCalls}`,
		`  total:         ${estimate.total}`,
	].join("\n");
}
