/**
 * Running filter that lets through the first entry seen for each key.
 * One instance can be fed page after page, or the output of several
 * strategies, and keeps its seen set across calls.
 */
export class Deduplicator<T> {
	private readonly seen = new Set<string>();

	constructor(private readonly keyOf: (item: T) => string) {}

	filter(items: Iterable<T>): T[] {
		const fresh: T[] = [];
		for (const item of items) {
			const key = this.keyOf(item);
			if (this.seen.has(key)) continue;
			this.seen.add(key);
			fresh.push(item);
		}
		return fresh;
	}

	get size(): number {
		return this.seen.size;
	}
}

export function dedupe<T extends { id: string }>(items: Iterable<T>): T[] {
	return new Deduplicator<T>((item) => item.id).filter(items);
}
