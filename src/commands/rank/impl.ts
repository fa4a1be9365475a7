import path from "node:path";
import pc from "picocolors";
import {
	CONFIG_FILE_NAME,
	loadConfig,
	resolveApiKey,
	resolveWeights,
	type StrategyOption,
} from "../../config.js";
import type { LocalContext } from "../../context.js";
import { ConfigError, type RankingInputError } from "../../errors.js";
import { renderRankedTable, renderTotals } from "../../ui/format.js";
import {
	log,
	logApiCalls,
	logCollectionCompleted,
	logCollectionStarted,
	logPageFetched,
	logPageLimitReached,
	logRepeatedCursor,
	logRetry,
} from "../../ui/logger.js";
import { statusBar } from "../../ui/status-bar.js";
import { fetchAndRank, filterVideos } from "../../videos/index.js";
import type { RankedVideo, RankingWeights } from "../../videos/types.js";
import { YouTubeClient } from "../../youtube/client.js";
import { reportFailure } from "../failure.js";
import { chooseStrategy, isLikelyIncomplete, resolveTarget } from "../targets.js";

export interface RankCommandFlags {
	strategy?: StrategyOption;
	likeWeight?: number;
	viewWeight?: number;
	halfLife?: number;
	decayRate?: number;
	limit?: number;
	since?: Date;
	until?: Date;
	search?: string;
	json?: boolean;
	allowPartial?: boolean;
	apiKey?: string;
	config?: string;
}

export async function rank(
	this: LocalContext,
	flags: RankCommandFlags,
	target: string,
): Promise<void> {
	if (!flags.json) statusBar.start();
	try {
		if (
			flags.limit !== undefined &&
			(!Number.isInteger(flags.limit) || flags.limit < 1)
		) {
			throw new ConfigError(`--limit must be a positive integer, got ${flags.limit}`);
		}

		const configPath = path.resolve(flags.config ?? CONFIG_FILE_NAME);
		const config = await loadConfig(configPath, {
			required: flags.config !== undefined,
		});
		const weights = resolveWeights(config.ranking, flags);
		const apiKey = resolveApiKey(flags.apiKey, config, this.process.env);
		const client = new YouTubeClient({
			apiKey: apiKey ?? "",
			requestTimeoutMs: config.fetch.requestTimeoutMs,
		});

		const strategy = chooseStrategy(target, flags.strategy, config.strategy);
		const resolved = await resolveTarget(client, target, strategy);
		logApiCalls(client.callCount);

		const asOf = this.now();
		const result = await fetchAndRank({
			source: client,
			requests: resolved.requests,
			weights,
			asOf,
			allowPartial: flags.allowPartial,
			fetchOptions: {
				retryDelayMs: config.fetch.retryDelayMs,
				maxPages: config.fetch.maxPages,
				hooks: {
					onStart: logCollectionStarted,
					onPage: (event) => {
						logPageFetched(event);
						logApiCalls(client.callCount);
					},
					onRetry: logRetry,
					onLimitReached: logPageLimitReached,
					onRepeatedCursor: logRepeatedCursor,
					onComplete: logCollectionCompleted,
				},
			},
		});
		logApiCalls(client.callCount);

		if (result.incomplete) {
			log.warn(
				`Ranking a partial result: ${result.incomplete.message}`,
				undefined,
				{ videos: result.fetched.length },
			);
		}

		const reported = resolved.channel?.videoCount;
		if (
			(strategy === "uploads-playlist" || strategy === "combined") &&
			isLikelyIncomplete(result.fetched.length, reported)
		) {
			log.warn(
				`Fetched ${result.fetched.length} of the ${reported} videos the channel reports; some may be private or missing`,
				{ target: resolved.label },
			);
		}

		for (const diagnostic of result.diagnostics) {
			log.warn(diagnostic.message);
		}

		const shown = filterVideos(result.ranked, {
			since: flags.since,
			until: flags.until,
			search: flags.search,
			limit: flags.limit,
		});

		log.info(`Ranked ${result.ranked.length} videos`, undefined, {
			shown: shown.length,
			apiCalls: client.callCount,
		});
		statusBar.stop();

		const output = flags.json
			? JSON.stringify(
					toJsonReport({
						asOf,
						weights,
						videos: shown,
						diagnostics: result.diagnostics,
						incomplete: result.incomplete !== undefined,
					}),
					null,
					2,
				)
			: renderReport(resolved.label, shown, asOf, this.process.stdout.isTTY === true);
		this.process.stdout.write(`${output}\n`);
	} catch (error) {
		this.process.exitCode = reportFailure(error);
	} finally {
		statusBar.stop();
	}
}

function renderReport(
	label: string,
	videos: RankedVideo[],
	asOf: Date,
	color: boolean,
): string {
	const paint = color ? pc : pc.createColors(false);
	if (videos.length === 0) {
		return paint.yellow(`No videos to rank for '${label}'`);
	}
	return [
		paint.bold(label),
		renderRankedTable(videos, asOf, { color }),
		paint.dim(renderTotals(videos)),
	].join("\n");
}

export function toJsonReport(report: {
	asOf: Date;
	weights: RankingWeights;
	videos: RankedVideo[];
	diagnostics: RankingInputError[];
	incomplete: boolean;
}) {
	return {
		asOf: report.asOf.toISOString(),
		weights: report.weights,
		incomplete: report.incomplete,
		videos: report.videos.map((video) => ({
			id: video.id,
			title: video.title,
			url: video.url,
			publishedAt: video.publishedAt.toISOString(),
			viewCount: video.viewCount,
			likeCount: video.likeCount,
			commentCount: video.commentCount,
			durationSeconds: video.durationSeconds,
			score: video.score,
		})),
		diagnostics: report.diagnostics.map((diagnostic) => ({
			videoId: diagnostic.videoId,
			field: diagnostic.field,
			value: String(diagnostic.value),
		})),
	};
}
