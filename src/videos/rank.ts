import { ConfigError, RankingInputError } from "../errors.js";
import type { RankedVideo, RankingWeights, VideoRecord } from "./types.js";

export const MS_PER_DAY = 86_400_000;
export const DEFAULT_HALF_LIFE_DAYS = 90;

export function decayRateFromHalfLife(halfLifeDays: number): number {
	if (!Number.isFinite(halfLifeDays) || halfLifeDays <= 0) {
		throw new ConfigError(`halfLifeDays must be positive, got ${halfLifeDays}`);
	}
	return Math.LN2 / halfLifeDays;
}

export const DEFAULT_WEIGHTS: RankingWeights = {
	likeWeight: 1,
	viewWeight: 0.1,
	decayRate: decayRateFromHalfLife(DEFAULT_HALF_LIFE_DAYS),
};

/** 1 at age 0, strictly decreasing towards 0 for a positive rate. */
export function decayFactor(ageDays: number, decayRate: number): number {
	return Math.exp(-decayRate * Math.max(0, ageDays));
}

export function ageInDays(publishedAt: Date, asOf: Date): number {
	return Math.max(0, asOf.getTime() - publishedAt.getTime()) / MS_PER_DAY;
}

export function scoreVideo(
	video: Pick<VideoRecord, "likeCount" | "viewCount" | "publishedAt">,
	asOf: Date,
	weights: RankingWeights,
): number {
	const popularity =
		video.likeCount * weights.likeWeight + video.viewCount * weights.viewWeight;
	return (
		popularity * decayFactor(ageInDays(video.publishedAt, asOf), weights.decayRate)
	);
}

export type RankingResult = {
	ranked: RankedVideo[];
	/** Records left out of `ranked` and why. */
	diagnostics: RankingInputError[];
};

/**
 * Scores every valid record and orders them by score, then by newest
 * first, then by id. Records with unusable counts or dates are reported
 * in `diagnostics` and skipped. The input records are left untouched.
 */
export function rankVideos(
	videos: readonly VideoRecord[],
	asOf: Date,
	weights: RankingWeights,
): RankingResult {
	assertWeights(weights);
	if (Number.isNaN(asOf.getTime())) {
		throw new ConfigError("ranking reference time is not a valid date");
	}

	const ranked: RankedVideo[] = [];
	const diagnostics: RankingInputError[] = [];

	for (const video of videos) {
		const problem = validateRecord(video);
		if (problem) {
			diagnostics.push(problem);
			continue;
		}
		ranked.push({ ...video, score: scoreVideo(video, asOf, weights) });
	}

	ranked.sort(compareRanked);
	return { ranked, diagnostics };
}

export function compareRanked(a: RankedVideo, b: RankedVideo): number {
	if (a.score !== b.score) return b.score - a.score;
	const published = b.publishedAt.getTime() - a.publishedAt.getTime();
	if (published !== 0) return published;
	if (a.id === b.id) return 0;
	return a.id < b.id ? -1 : 1;
}

function validateRecord(video: VideoRecord): RankingInputError | null {
	const raw = video.unreadable ?? {};
	if (!isValidCount(video.viewCount)) {
		return new RankingInputError(
			video.id,
			"viewCount",
			raw.viewCount ?? video.viewCount,
		);
	}
	if (!isValidCount(video.likeCount)) {
		return new RankingInputError(
			video.id,
			"likeCount",
			raw.likeCount ?? video.likeCount,
		);
	}
	if (Number.isNaN(video.publishedAt.getTime())) {
		return new RankingInputError(
			video.id,
			"publishedAt",
			raw.publishedAt ?? video.publishedAt,
		);
	}
	return null;
}

function isValidCount(value: unknown): value is number {
	return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function assertWeights(weights: RankingWeights): void {
	for (const name of ["likeWeight", "viewWeight"] as const) {
		const value = weights[name];
		if (!Number.isFinite(value) || value < 0) {
			throw new ConfigError(`${name} must be a non-negative number, got ${value}`);
		}
	}
	// A zero rate would stop older videos from scoring lower.
	if (!Number.isFinite(weights.decayRate) || weights.decayRate <= 0) {
		throw new ConfigError(
			`decayRate must be a positive number, got ${weights.decayRate}`,
		);
	}
}
