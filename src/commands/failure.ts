import {
	ConfigError,
	errorMessage,
	FetchError,
	InvalidIdentifierError,
	UpstreamQuotaError,
} from "../errors.js";
import { log } from "../ui/logger.js";

export const EXIT_CODES = {
	failure: 1,
	invalidIdentifier: 2,
	quota: 3,
	fetch: 4,
	config: 5,
} as const;

export function exitCodeFor(error: unknown): number {
	if (error instanceof InvalidIdentifierError) return EXIT_CODES.invalidIdentifier;
	if (error instanceof UpstreamQuotaError) return EXIT_CODES.quota;
	if (error instanceof FetchError) return EXIT_CODES.fetch;
	if (error instanceof ConfigError) return EXIT_CODES.config;
	return EXIT_CODES.failure;
}

export function describeFailure(error: unknown): string {
	if (error instanceof UpstreamQuotaError) {
		return `${error.message}. Check the API key and its daily quota.`;
	}
	if (error instanceof FetchError) {
		return `${error.message} (${error.partial.length} videos were collected; rerun with --allowPartial to rank them)`;
	}
	return errorMessage(error);
}

/** Logs the failure and returns the exit code for it. */
export function reportFailure(error: unknown): number {
	log.error(describeFailure(error));
	return exitCodeFor(error);
}
