const ISO_DURATION =
	/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/** `PT1H2M3S` → 3723. Unknown or malformed input yields 0. */
export function parseIsoDuration(value: string | undefined): number {
	if (!value) return 0;
	const match = ISO_DURATION.exec(value.trim());
	if (!match) return 0;

	const [, days, hours, minutes, seconds] = match;
	return Math.round(
		Number(days ?? 0) * 86_400 +
			Number(hours ?? 0) * 3_600 +
			Number(minutes ?? 0) * 60 +
			Number(seconds ?? 0),
	);
}
