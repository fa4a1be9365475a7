import { describe, expect, it } from "vitest";
import {
	ConfigError,
	FetchError,
	InvalidIdentifierError,
	UpstreamError,
	UpstreamQuotaError,
} from "../errors.js";
import { EXIT_CODES, describeFailure, exitCodeFor } from "./failure.js";

describe("exitCodeFor", () => {
	it("gives every error kind its own code", () => {
		expect(exitCodeFor(new InvalidIdentifierError("x", "bad"))).toBe(
			EXIT_CODES.invalidIdentifier,
		);
		expect(exitCodeFor(new UpstreamQuotaError(403, "quotaExceeded"))).toBe(
			EXIT_CODES.quota,
		);
		expect(exitCodeFor(new FetchError("stopped", { partial: [] }))).toBe(
			EXIT_CODES.fetch,
		);
		expect(exitCodeFor(new ConfigError("broken"))).toBe(EXIT_CODES.config);
		expect(
			exitCodeFor(new UpstreamError({ status: 400, reason: "x", transient: false })),
		).toBe(EXIT_CODES.failure);
		expect(exitCodeFor("boom")).toBe(EXIT_CODES.failure);
	});
});

describe("describeFailure", () => {
	it("points at the key and quota for refused requests", () => {
		expect(describeFailure(new UpstreamQuotaError(403, "quotaExceeded"))).toBe(
			"YouTube API refused the request (403 quotaExceeded). Check the API key and its daily quota.",
		);
	});

	it("mentions how many videos a failed fetch collected", () => {
		expect(
			describeFailure(new FetchError("Page 'p2' failed twice", { partial: [1, 2] })),
		).toBe(
			"Page 'p2' failed twice (2 videos were collected; rerun with --allowPartial to rank them)",
		);
	});

	it("uses the plain message otherwise", () => {
		expect(describeFailure(new Error("nope"))).toBe("nope");
		expect(describeFailure(42)).toBe("42");
	});
});
