import { stringify } from "yaml";
import type { StrategyOption } from "../../config.js";

export type InitAnswers = {
	/** `env.NAME` reference or a literal key; omitted when empty. */
	apiKey?: string;
	strategy: StrategyOption;
	halfLifeDays: number;
	likeWeight: number;
	viewWeight: number;
};

/** YAML text of a vidrank.yaml that `loadConfig` reads back unchanged. */
export function buildConfigDocument(answers: InitAnswers): string {
	const document = {
		...(answers.apiKey ? { apiKey: answers.apiKey } : {}),
		strategy: answers.strategy,
		ranking: {
			likeWeight: answers.likeWeight,
			viewWeight: answers.viewWeight,
			halfLifeDays: answers.halfLifeDays,
		},
		fetch: {
			retryDelayMs: 1000,
			requestTimeoutMs: 30_000,
			maxPages: 100,
		},
	};
	return stringify(document);
}

/** Number typed at a prompt; `undefined` when it is not a valid answer. */
export function parseNumberAnswer(
	value: string,
	options: { allowZero?: boolean } = {},
): number | undefined {
	const trimmed = value.trim();
	if (trimmed === "") return undefined;
	const parsed = Number(trimmed);
	if (!Number.isFinite(parsed)) return undefined;
	if (parsed < 0 || (parsed === 0 && !options.allowZero)) return undefined;
	return parsed;
}
