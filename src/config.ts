import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import {
	DEFAULT_HALF_LIFE_DAYS,
	decayRateFromHalfLife,
} from "./videos/rank.js";
import type { RankingWeights } from "./videos/types.js";

export const CONFIG_FILE_NAME = "vidrank.yaml";
export const API_KEY_ENV = "YOUTUBE_API_KEY";

export const strategyOptionSchema = z.enum([
	"uploads-playlist",
	"standard-search",
	"explicit-playlist",
	"combined",
]);
export type StrategyOption = z.infer<typeof strategyOptionSchema>;

const rankingConfigSchema = z
	.object({
		likeWeight: z.coerce.number().nonnegative().optional().default(1),
		viewWeight: z.coerce.number().nonnegative().optional().default(0.1),
		/** Days after which a video's score is halved. */
		halfLifeDays: z.coerce.number().positive().optional(),
		/** Per-day exponential decay; wins over halfLifeDays when both are set. */
		decayRate: z.coerce.number().positive().optional(),
	})
	.strict();

export type RankingConfig = z.infer<typeof rankingConfigSchema>;

const fetchConfigSchema = z
	.object({
		retryDelayMs: z.coerce
			.number()
			.int()
			.nonnegative()
			.optional()
			.default(1000),
		requestTimeoutMs: z.coerce
			.number()
			.int()
			.positive()
			.optional()
			.default(30_000),
		maxPages: z.coerce.number().int().positive().optional().default(100),
	})
	.strict();

export type FetchConfig = z.infer<typeof fetchConfigSchema>;

const configSchema = z
	.object({
		/** A literal key, or `env.NAME` to read it from the environment. */
		apiKey: z.string().optional(),
		strategy: strategyOptionSchema.optional().default("uploads-playlist"),
		ranking: rankingConfigSchema.optional().default({}),
		fetch: fetchConfigSchema.optional().default({}),
	})
	.strict();

export type Config = z.infer<typeof configSchema>;

/**
 * Reads and validates a config file. A missing file yields the defaults
 * unless `required` is set, which is the case for an explicit `--config`.
 */
export async function loadConfig(
	configPath: string,
	options: { required?: boolean } = {},
): Promise<Config> {
	if (!existsSync(configPath)) {
		if (options.required) {
			throw new ConfigError("config file not found", configPath);
		}
		return configSchema.parse({});
	}

	const rawText = await readFile(configPath, "utf8");
	return parseConfig(rawText, configPath);
}

export function parseConfig(rawText: string, configPath?: string): Config {
	const clean = rawText.replace(/^\uFEFF/, "");

	let parsed: unknown;
	try {
		parsed = parse(clean) ?? {};
	} catch (error) {
		throw new ConfigError(`invalid YAML: ${errorMessage(error)}`, configPath);
	}

	const result = configSchema.safeParse(parsed);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(details, configPath);
	}
	return result.data;
}

/** `env.NAME` → value of `NAME`; anything else is returned as is. */
export function resolveEnvValue(
	value: string | undefined,
	env: NodeJS.ProcessEnv = process.env,
): string | undefined {
	if (value?.startsWith("env.")) {
		return env[value.slice(4)] || undefined;
	}
	return value || undefined;
}

export function resolveApiKey(
	flag: string | undefined,
	config: Config,
	env: NodeJS.ProcessEnv = process.env,
): string | undefined {
	return (
		resolveEnvValue(flag, env) ??
		resolveEnvValue(config.apiKey, env) ??
		(env[API_KEY_ENV] || undefined)
	);
}

export type WeightOverrides = {
	likeWeight?: number;
	viewWeight?: number;
	halfLife?: number;
	decayRate?: number;
};

/** Flags win over the file; an explicit rate wins over a half-life. */
export function resolveWeights(
	ranking: RankingConfig,
	overrides: WeightOverrides = {},
): RankingWeights {
	const decayRate =
		overrides.decayRate ??
		(overrides.halfLife !== undefined
			? decayRateFromHalfLife(overrides.halfLife)
			: undefined) ??
		ranking.decayRate ??
		decayRateFromHalfLife(ranking.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS);

	return {
		likeWeight: overrides.likeWeight ?? ranking.likeWeight,
		viewWeight: overrides.viewWeight ?? ranking.viewWeight,
		decayRate,
	};
}
