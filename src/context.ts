import type { CommandContext } from "@stricli/core";

export interface LocalContext extends CommandContext {
	readonly process: NodeJS.Process;
	/** Reference time for video ages. */
	now(): Date;
}

export function buildContext(process: NodeJS.Process): LocalContext {
	return { process, now: () => new Date() };
}
