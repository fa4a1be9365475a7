#!/usr/bin/env node
import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { estimateCommand } from "./commands/estimate/command.js";
import { initCommand } from "./commands/init/command.js";
import { rankCommand } from "./commands/rank/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		rank: rankCommand,
		estimate: estimateCommand,
		init: initCommand,
	},
	docs: {
		brief: "Fetch every video of a YouTube channel or playlist and rank it by recency-weighted popularity.",
	},
});

export const app = buildApplication(routes, {
	name: "vidrank",
	versionInfo: {
		currentVersion: "0.1.0",
	},
});

await run(app, process.argv.slice(2), buildContext(process));
