import { MS_PER_DAY } from "../videos/rank.js";

const BARE_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** `2024-01-31` or any string `Date` understands. */
export function parseDateFlag(input: string): Date {
	const date = new Date(input);
	if (Number.isNaN(date.getTime())) {
		throw new SyntaxError(`Cannot parse '${input}' as a date`);
	}
	return date;
}

/**
 * Upper bound for `--until`. A bare `YYYY-MM-DD` covers that whole UTC day,
 * so it becomes the day's last millisecond.
 */
export function parseUntilFlag(input: string): Date {
	const date = parseDateFlag(input);
	if (!BARE_DATE.test(input.trim())) return date;
	return new Date(date.getTime() + MS_PER_DAY - 1);
}
