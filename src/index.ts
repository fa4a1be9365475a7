export {
	API_KEY_ENV,
	CONFIG_FILE_NAME,
	loadConfig,
	parseConfig,
	resolveApiKey,
	resolveWeights,
} from "./config.js";
export type { Config, StrategyOption, WeightOverrides } from "./config.js";
export {
	ConfigError,
	FetchError,
	InvalidIdentifierError,
	RankingInputError,
	UpstreamError,
	UpstreamQuotaError,
	VidrankError,
} from "./errors.js";
export * from "./videos/index.js";
export { YouTubeClient, toUpstreamError } from "./youtube/client.js";
export type { ChannelQuery, YouTubeClientOptions } from "./youtube/client.js";
export { estimateApiCalls } from "./youtube/estimate.js";
export type { ApiCallEstimate } from "./youtube/estimate.js";
export { lookupChannel, parseChannelInput } from "./youtube/lookup.js";
export type { ChannelInfo, ChannelInput } from "./youtube/lookup.js";
