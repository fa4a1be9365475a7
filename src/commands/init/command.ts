import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import {
	cancel,
	confirm,
	intro,
	isCancel,
	log,
	outro,
	select,
	spinner,
	text,
} from "@clack/prompts";
import { buildCommand } from "@stricli/core";
import {
	API_KEY_ENV,
	CONFIG_FILE_NAME,
	parseConfig,
	type StrategyOption,
} from "../../config.js";
import type { LocalContext } from "../../context.js";
import { errorMessage } from "../../errors.js";
import { EXIT_CODES } from "../failure.js";
import { buildConfigDocument, parseNumberAnswer } from "./document.js";

function numberPrompt(
	message: string,
	initialValue: string,
	allowZero: boolean,
) {
	return text({
		message,
		initialValue,
		validate: (value) =>
			parseNumberAnswer(value, { allowZero }) === undefined
				? allowZero
					? "Enter a number of zero or more"
					: "Enter a number greater than zero"
				: undefined,
	});
}

async function runInit(this: LocalContext): Promise<void> {
	intro("vidrank init");

	const configPath = path.resolve(CONFIG_FILE_NAME);
	const s = spinner();

	try {
		if (existsSync(configPath)) {
			const overwrite = await confirm({
				message: `${CONFIG_FILE_NAME} already exists. Overwrite it?`,
				initialValue: false,
			});
			if (isCancel(overwrite) || !overwrite) {
				cancel("Kept the existing configuration");
				return;
			}
		}

		const apiKey = await text({
			message: "Where should the YouTube API key come from?",
			placeholder: `env.${API_KEY_ENV}`,
			initialValue: `env.${API_KEY_ENV}`,
		});
		if (isCancel(apiKey)) {
			cancel("Cancelled");
			return;
		}

		const strategy = await select<StrategyOption>({
			message: "Default strategy:",
			options: [
				{
					value: "uploads-playlist",
					label: "Uploads playlist",
					hint: "every public upload, cheapest",
				},
				{
					value: "standard-search",
					label: "Channel search",
					hint: "search endpoint, may miss older videos",
				},
				{
					value: "combined",
					label: "Combined",
					hint: "search plus uploads, deduplicated",
				},
			],
			initialValue: "uploads-playlist",
		});
		if (isCancel(strategy)) {
			cancel("Cancelled");
			return;
		}

		const halfLife = await numberPrompt(
			"Half-life of a score, in days:",
			"90",
			false,
		);
		if (isCancel(halfLife)) {
			cancel("Cancelled");
			return;
		}

		const likeWeight = await numberPrompt("Weight of one like:", "1", true);
		if (isCancel(likeWeight)) {
			cancel("Cancelled");
			return;
		}

		const viewWeight = await numberPrompt("Weight of one view:", "0.1", true);
		if (isCancel(viewWeight)) {
			cancel("Cancelled");
			return;
		}

		s.start(`Writing ${CONFIG_FILE_NAME}...`);
		const document = buildConfigDocument({
			apiKey: apiKey.trim() || undefined,
			strategy,
			halfLifeDays: parseNumberAnswer(halfLife) ?? 90,
			likeWeight: parseNumberAnswer(likeWeight, { allowZero: true }) ?? 1,
			viewWeight: parseNumberAnswer(viewWeight, { allowZero: true }) ?? 0.1,
		});
		parseConfig(document, configPath);
		await writeFile(configPath, document, "utf8");
		s.stop(`Wrote ${configPath}`);

		outro("Run `vidrank rank <channel>` to rank a channel");
	} catch (error) {
		s.stop("Error");
		log.error(`Failed to write configuration: ${errorMessage(error)}`);
		cancel("Init failed");
		this.process.exitCode = EXIT_CODES.failure;
	}
}

export const initCommand = buildCommand({
	func: runInit,
	parameters: {
		flags: {},
		positional: { kind: "tuple", parameters: [] },
	},
	docs: {
		brief: "Create a vidrank.yaml in the current directory",
	},
});
