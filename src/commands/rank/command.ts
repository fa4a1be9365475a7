import { buildCommand, numberParser } from "@stricli/core";
import { strategyOptionSchema } from "../../config.js";
import { parseDateFlag, parseUntilFlag } from "../flags.js";

export const rankCommand = buildCommand({
	loader: async () => {
		const { rank } = await import("./impl.js");
		return rank;
	},
	parameters: {
		positional: {
			kind: "tuple",
			parameters: [
				{
					brief:
						"Channel id, @handle, channel URL or name; or a playlist id or URL",
					parse: String,
					placeholder: "target",
				},
			],
		},
		flags: {
			strategy: {
				kind: "enum",
				values: strategyOptionSchema.options,
				optional: true,
				brief:
					"How to enumerate videos (default from config, else uploads-playlist)",
			},
			likeWeight: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Weight of one like in the popularity score",
			},
			viewWeight: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Weight of one view in the popularity score",
			},
			halfLife: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Days after which a score is halved",
			},
			decayRate: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Per-day exponential decay rate (overrides --halfLife)",
			},
			limit: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Show only the top N videos",
			},
			since: {
				kind: "parsed",
				parse: parseDateFlag,
				optional: true,
				brief: "Only videos published on or after this date",
			},
			until: {
				kind: "parsed",
				parse: parseUntilFlag,
				optional: true,
				brief: "Only videos published on or before this date",
			},
			search: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only videos whose title contains this text",
			},
			json: {
				kind: "boolean",
				optional: true,
				brief: "Print the ranking as JSON",
			},
			allowPartial: {
				kind: "boolean",
				optional: true,
				brief: "Rank what was collected when paging fails midway",
			},
			apiKey: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "YouTube Data API key (or env.NAME)",
			},
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Path to a vidrank.yaml file",
			},
		},
		aliases: {
			s: "strategy",
			n: "limit",
		},
	},
	docs: {
		brief: "Fetch every video of a channel or playlist and rank it",
		fullDescription:
			"Collects the complete set of videos, scores each one as (likes * likeWeight + views * viewWeight) * exp(-decayRate * ageDays) and prints them best first. Use --strategy combined to merge channel search with the uploads playlist.",
	},
});
