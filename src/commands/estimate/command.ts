import { buildCommand } from "@stricli/core";
import { strategyOptionSchema } from "../../config.js";

export const estimateCommand = buildCommand({
	loader: async () => {
		const { estimate } = await import("./impl.js");
		return estimate;
	},
	parameters: {
		positional: {
			kind: "tuple",
			parameters: [
				{
					brief: "Channel id, @handle, channel URL or name; or a playlist URL",
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
				brief: "Strategy the estimate is for",
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
		},
	},
	docs: {
		brief: "Estimate how many API calls a ranking run would take",
	},
});
