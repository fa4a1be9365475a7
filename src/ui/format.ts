import pc from "picocolors";
import { MS_PER_DAY } from "../videos/rank.js";
import type { RankedVideo } from "../videos/types.js";

/** 1234 → "1.2K", 3400000 → "3.4M". */
export function formatNumber(num: number): string {
	if (num >= 1_000_000_000) return `${(num / 1_000_000_000).toFixed(1)}B`;
	if (num >= 1_000_000) return `${(num / 1_000_000).toFixed(1)}M`;
	if (num >= 1_000) return `${(num / 1_000).toFixed(1)}K`;
	return String(num);
}

/** 3723 → "1:02:03", 185 → "3:05". */
export function formatDuration(totalSeconds: number): string {
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;
	const ss = String(seconds).padStart(2, "0");
	if (hours > 0) {
		return `${hours}:${String(minutes).padStart(2, "0")}:${ss}`;
	}
	return `${minutes}:${ss}`;
}

export function formatAge(publishedAt: Date, asOf: Date): string {
	const days = Math.floor((asOf.getTime() - publishedAt.getTime()) / MS_PER_DAY);
	if (days < 1) return "today";
	if (days < 60) return `${days}d`;
	if (days < 730) return `${Math.floor(days / 30)}mo`;
	return `${Math.floor(days / 365)}y`;
}

export function truncateTitle(title: string, max = 60): string {
	const cleaned = title.trim().replace(/\s+/g, " ");
	if (!cleaned) return "(untitled)";
	return cleaned.length > max ? `${cleaned.slice(0, max - 3)}...` : cleaned;
}

export function formatScore(score: number): string {
	return score >= 100 ? score.toFixed(0) : score.toFixed(2);
}

export function renderRankedTable(
	videos: RankedVideo[],
	asOf: Date,
	options: { color?: boolean; titleWidth?: number } = {},
): string {
	const paint = options.color ? pc : pc.createColors(false);
	const titleWidth = options.titleWidth ?? 60;

	const header = [
		"#".padStart(4),
		"score".padStart(9),
		"views".padStart(7),
		"likes".padStart(7),
		"age".padStart(5),
		"length".padStart(8),
		"title",
	].join("  ");

	const rows = videos.map((video, index) =>
		[
			String(index + 1).padStart(4),
			paint.bold(formatScore(video.score).padStart(9)),
			formatNumber(video.viewCount).padStart(7),
			formatNumber(video.likeCount).padStart(7),
			formatAge(video.publishedAt, asOf).padStart(5),
			formatDuration(video.durationSeconds).padStart(8),
			`${truncateTitle(video.title, titleWidth)} ${paint.dim(video.url)}`,
		].join("  "),
	);

	return [paint.dim(header), ...rows].join("\n");
}

export function renderTotals(videos: RankedVideo[]): string {
	const views = videos.reduce((sum, video) => sum + video.viewCount, 0);
	const likes = videos.reduce((sum, video) => sum + video.likeCount, 0);
	return `${videos.length} videos, ${formatNumber(views)} views, ${formatNumber(likes)} likes`;
}
