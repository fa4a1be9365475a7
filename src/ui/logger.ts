import pc from "picocolors";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { PageEvent } from "../videos/fetch.js";
import type { RetryEvent } from "../videos/paginate.js";
import { describeRequest } from "../videos/resolve.js";
import type { FetchRequest, Strategy } from "../videos/types.js";
import { statusBar } from "./status-bar.js";

// ── Types ──────────────────────────────────────────────────────────────

/** Which collection a line is about; both parts are optional. */
export type LogContext = {
	strategy?: Strategy | "lookup";
	target?: string;
};

export type LogParams = Record<string, string | number>;

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

// ── Levels ─────────────────────────────────────────────────────────────

const LEVELS: Record<LogLevel, { rank: number; paint: (s: string) => string }> =
	{
		debug: { rank: 0, paint: pc.dim },
		info: { rank: 1, paint: pc.gray },
		warn: { rank: 2, paint: pc.yellow },
		error: { rank: 3, paint: pc.red },
	};

let threshold: LogLevel = logLevelSchema
	.catch("info")
	.parse(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

// ── Line layout ────────────────────────────────────────────────────────

const STRATEGY_WIDTH = 19;
const TARGET_WIDTH = 26;

function clock(): string {
	const now = new Date();
	const hh = String(now.getHours()).padStart(2, "0");
	const mm = String(now.getMinutes()).padStart(2, "0");
	const ss = String(now.getSeconds()).padStart(2, "0");
	return pc.dim(`${hh}:${mm}:${ss}`);
}

function column(text: string | undefined, width: number): string {
	if (!text) return " ".repeat(width);
	return text.length > width
		? `${text.slice(0, width - 1)}…`
		: text.padEnd(width);
}

function renderParams(params: LogParams | undefined): string | undefined {
	const entries = Object.entries(params ?? {});
	if (entries.length === 0) return undefined;
	return pc.dim(
		`{ ${entries.map(([key, value]) => `${key}=${pc.cyan(String(value))}`).join(", ")} }`,
	);
}

export function formatLogLine(
	level: LogLevel,
	message: string,
	context: LogContext = {},
	params?: LogParams,
): string {
	const strategy = context.strategy ? `[${context.strategy}]` : undefined;
	const fields = [
		clock(),
		LEVELS[level].paint(level.toUpperCase().padEnd(5)),
		pc.cyan(column(strategy, STRATEGY_WIDTH)),
		pc.magenta(column(context.target, TARGET_WIDTH)),
		message,
		renderParams(params),
	];
	return fields.filter((field) => field !== undefined).join(" ");
}

// ── Public API ─────────────────────────────────────────────────────────

type LogFn = (message: string, context?: LogContext, params?: LogParams) => void;

function emitter(level: LogLevel): LogFn {
	return (message, context, params) => {
		if (LEVELS[level].rank < LEVELS[threshold].rank) return;
		statusBar.log(formatLogLine(level, message, context, params));
	};
}

export const log: Record<LogLevel, LogFn> = {
	debug: emitter("debug"),
	info: emitter("info"),
	warn: emitter("warn"),
	error: emitter("error"),
};

export function requestContext(request: FetchRequest): LogContext {
	return { strategy: request.strategy, target: describeRequest(request) };
}

// ── Status-bar integration (fetch hooks) ───────────────────────────────

export function logCollectionStarted(request: FetchRequest): void {
	statusBar.startCollection(describeRequest(request));
	log.debug("Paging started", requestContext(request));
}

export function logPageFetched(event: PageEvent): void {
	statusBar.updateCollection({ pages: event.page, videos: event.total });
	log.debug(`Page ${event.page}`, requestContext(event.request), {
		received: event.received,
		new: event.added,
		total: event.total,
	});
}

export function logRetry(event: RetryEvent & { request: FetchRequest }): void {
	statusBar.markRetry();
	log.warn(
		`Retrying page in ${event.delayMs}ms (${errorMessage(event.error)})`,
		requestContext(event.request),
		event.cursor ? { cursor: event.cursor } : undefined,
	);
}

export function logPageLimitReached(event: {
	request: FetchRequest;
	maxPages: number;
}): void {
	log.warn(
		`Stopped after ${event.maxPages} pages, some videos may be missing`,
		requestContext(event.request),
	);
}

export function logRepeatedCursor(event: {
	request: FetchRequest;
	cursor: string;
}): void {
	log.warn("Upstream repeated a page cursor, stopping", requestContext(event.request), {
		cursor: event.cursor,
	});
}

export function logCollectionCompleted(
	request: FetchRequest,
	total: number,
): void {
	statusBar.completeCollection();
	log.info(`Collected ${total} unique videos so far`, requestContext(request));
}

export function logApiCalls(count: number): void {
	statusBar.setApiCalls(count);
}
