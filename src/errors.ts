export class VidrankError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Malformed channel id, playlist id or playlist URL. Never retried. */
export class InvalidIdentifierError extends VidrankError {
	readonly input: string;

	constructor(input: string, reason: string, options?: { cause?: unknown }) {
		super(`Invalid identifier '${input}': ${reason}`, options);
		this.input = input;
	}
}

/**
 * Upstream call failed after the retry was spent. Carries whatever was
 * collected before the failure so the caller can decide to keep it.
 */
export class FetchError<T> extends VidrankError {
	readonly partial: T[];
	readonly cursor?: string;

	constructor(
		message: string,
		args: { partial: T[]; cursor?: string; cause?: unknown },
	) {
		super(message, { cause: args.cause });
		this.partial = args.partial;
		this.cursor = args.cursor;
	}
}

/** Quota exhausted or the API key was rejected. Never retried. */
export class UpstreamQuotaError extends VidrankError {
	readonly status: number;
	readonly reason: string;

	constructor(status: number, reason: string, message?: string) {
		super(
			`YouTube API refused the request (${status} ${reason})${message ? `: ${message}` : ""}`,
		);
		this.status = status;
		this.reason = reason;
	}
}

export class UpstreamError extends VidrankError {
	readonly status: number;
	readonly reason: string;
	readonly transient: boolean;

	constructor(args: {
		status: number;
		reason: string;
		transient: boolean;
		message?: string;
		cause?: unknown;
	}) {
		super(
			`YouTube API error (${args.status} ${args.reason})${args.message ? `: ${args.message}` : ""}`,
			{ cause: args.cause },
		);
		this.status = args.status;
		this.reason = args.reason;
		this.transient = args.transient;
	}
}

export type RankingField = "viewCount" | "likeCount" | "publishedAt";

/** A single record that could not be scored. Reported, not thrown. */
export class RankingInputError extends VidrankError {
	readonly videoId: string;
	readonly field: RankingField;
	readonly value: unknown;

	constructor(videoId: string, field: RankingField, value: unknown) {
		super(`Video '${videoId}' has an invalid ${field}: ${String(value)}`);
		this.videoId = videoId;
		this.field = field;
		this.value = value;
	}
}

export class ConfigError extends VidrankError {
	readonly path?: string;

	constructor(message: string, path?: string) {
		super(path ? `${path}: ${message}` : message);
		this.path = path;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
