import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage, FetchError, UpstreamError } from "../errors.js";
import type { Page } from "./types.js";

export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_MAX_PAGES = 100;

export type PageCall<T> = (
	cursor: string | undefined,
	signal?: AbortSignal,
) => Promise<Page<T>>;

export type RetryEvent = {
	cursor?: string;
	error: unknown;
	delayMs: number;
};

export type PaginateOptions = {
	retryDelayMs?: number;
	/** Safety limit against upstreams that never stop handing out cursors. */
	maxPages?: number;
	signal?: AbortSignal;
	onRetry?: (event: RetryEvent) => void;
	onLimitReached?: (event: { maxPages: number; cursor: string }) => void;
	onRepeatedCursor?: (cursor: string) => void;
};

export function isTransientError(error: unknown): boolean {
	return error instanceof UpstreamError && error.transient;
}

/**
 * Walks a cursor-paged listing from the first page until upstream stops
 * returning a next cursor, yielding each page's items in upstream order.
 *
 * A transient failure is retried once on the same cursor after a fixed
 * delay. A second failure ends the walk with a {@link FetchError} whose
 * `partial` holds every item yielded so far. Other errors propagate as is.
 *
 * The generator is single-use; start a new one for every fetch.
 */
export async function* paginate<T>(
	call: PageCall<T>,
	options: PaginateOptions = {},
): AsyncGenerator<T[], void, undefined> {
	const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
	const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
	const collected: T[] = [];
	const visited = new Set<string>();
	let cursor: string | undefined;
	let pages = 0;

	while (true) {
		const page = await callWithRetry(call, cursor, {
			...options,
			retryDelayMs,
			collected,
		});
		pages++;
		collected.push(...page.items);
		yield page.items;

		const next = page.nextCursor;
		if (!next) return;

		if (visited.has(next)) {
			options.onRepeatedCursor?.(next);
			return;
		}
		if (pages >= maxPages) {
			options.onLimitReached?.({ maxPages, cursor: next });
			return;
		}

		visited.add(next);
		cursor = next;
	}
}

async function callWithRetry<T>(
	call: PageCall<T>,
	cursor: string | undefined,
	args: PaginateOptions & { retryDelayMs: number; collected: T[] },
): Promise<Page<T>> {
	const { signal, retryDelayMs, collected } = args;

	try {
		return await call(cursor, signal);
	} catch (error) {
		if (!isTransientError(error)) throw error;
		args.onRetry?.({ cursor, error, delayMs: retryDelayMs });
	}

	await sleep(retryDelayMs, undefined, { signal });

	try {
		return await call(cursor, signal);
	} catch (error) {
		if (!isTransientError(error)) throw error;
		throw new FetchError<T>(
			`Page ${cursor ? `'${cursor}'` : "1"} failed twice: ${errorMessage(error)}`,
			{ partial: [...collected], cursor, cause: error },
		);
	}
}
