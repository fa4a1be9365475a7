import { stripVTControlCharacters } from "node:util";
import pc from "picocolors";
import { formatNumber } from "./format.js";

const SPINNER = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const FRAME_MS = 80;

type CollectionProgress = {
	label: string;
	pages: number;
	videos: number;
	retries: number;
};

type RunTotals = {
	apiCalls: number;
	videos: number;
	collections: number;
};

function plural(count: number, noun: string): string {
	return `${pc.green(String(count))} ${pc.dim(count === 1 ? noun : `${noun}s`)}`;
}

/**
 * Two-line footer on stderr: the collection being paged, and the run's
 * totals. Log lines are printed above it through {@link StatusBar.log}.
 * Does nothing unless the stream is a terminal.
 */
export class StatusBar {
	private current: CollectionProgress | undefined;
	private readonly totals: RunTotals = { apiCalls: 0, videos: 0, collections: 0 };
	private timer: ReturnType<typeof setInterval> | undefined;
	private tick = 0;
	private drawnLines = 0;

	constructor(private readonly stream: NodeJS.WriteStream = process.stderr) {}

	get active(): boolean {
		return this.timer !== undefined;
	}

	start(): void {
		if (this.active || !this.stream.isTTY) return;
		this.timer = setInterval(() => this.draw(), FRAME_MS);
	}

	stop(): void {
		if (!this.timer) return;
		this.erase();
		clearInterval(this.timer);
		this.timer = undefined;
	}

	startCollection(label: string): void {
		this.current = { label, pages: 0, videos: 0, retries: 0 };
		this.draw();
	}

	updateCollection(update: { pages: number; videos: number }): void {
		this.totals.videos = update.videos;
		if (this.current) {
			this.current.pages = update.pages;
			this.current.videos = update.videos;
		}
		this.draw();
	}

	markRetry(): void {
		if (this.current) this.current.retries += 1;
		this.draw();
	}

	completeCollection(): void {
		this.current = undefined;
		this.totals.collections += 1;
		this.draw();
	}

	setApiCalls(count: number): void {
		this.totals.apiCalls = count;
		this.draw();
	}

	log(line: string): void {
		this.erase();
		this.stream.write(line.endsWith("\n") ? line : `${line}\n`);
		this.draw();
	}

	private draw(): void {
		if (!this.active) return;
		const width = this.stream.columns || 80;
		const lines = [this.totalsLine(width)];
		if (this.current) lines.unshift(this.progressLine(this.current, width));

		this.erase();
		this.stream.write(lines.join("\n"));
		this.drawnLines = lines.length;
	}

	private erase(): void {
		if (!this.active || this.drawnLines === 0) return;
		if (this.drawnLines > 1) {
			this.stream.write(`\x1b[${this.drawnLines - 1}A`);
		}
		this.stream.write("\r\x1b[J");
		this.drawnLines = 0;
	}

	private progressLine(progress: CollectionProgress, width: number): string {
		this.tick = (this.tick + 1) % SPINNER.length;
		const retried =
			progress.retries > 0
				? `, ${pc.yellow(String(progress.retries))} ${pc.dim("retried")}`
				: "";
		const line = `${pc.cyan(SPINNER[this.tick] ?? "")} ${pc.cyan("fetching")} ${pc.bold(progress.label)} ${pc.dim("(")}${plural(progress.pages, "page")}, ${plural(progress.videos, "video")}${retried}${pc.dim(")")}`;
		return stripVTControlCharacters(line).length > width
			? stripVTControlCharacters(line).slice(0, width - 1)
			: line;
	}

	private totalsLine(width: number): string {
		const text = [
			`${pc.dim("Videos:")} ${pc.green(formatNumber(this.totals.videos))}`,
			`${pc.dim("API calls:")} ${pc.blue(formatNumber(this.totals.apiCalls))}`,
			`${pc.dim("Collections:")} ${String(this.totals.collections)}`,
		].join("  ");
		const visible = stripVTControlCharacters(text).length;
		return " ".repeat(Math.max(0, width - visible)) + text;
	}
}

export const statusBar = new StatusBar();
