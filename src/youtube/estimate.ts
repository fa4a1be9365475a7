import { PAGE_SIZE } from "./client.js";

export type ApiCallEstimate = {
	videoCount: number;
	lookupCalls: number;
	listingCalls: number;
	detailCalls: number;
	total: number;
};

/**
 * Every listing page of up to 50 videos costs one listing call and one
 * `videos` call for its statistics. Retries are not counted.
 */
export function estimateApiCalls(
	videoCount: number,
	lookupCalls = 0,
	strategies = 1,
): ApiCallEstimate {
	const pages = Math.max(1, Math.ceil(Math.max(0, videoCount) / PAGE_SIZE));
	const listingCalls = pages * strategies;
	const detailCalls = videoCount > 0 ? pages * strategies : 0;
	return {
		videoCount,
		lookupCalls,
		listingCalls,
		detailCalls,
		total: lookupCalls + listingCalls + detailCalls,
	};
}
