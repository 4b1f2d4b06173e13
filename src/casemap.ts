/**
 * tally-connector — case-insensitive map
 *
 * Tally compares master names without regard to case, so the collections a
 * report exposes do too: `units.get('nos')` finds the unit stored as
 * `Nos`. Iteration yields keys as they were last set, in first-insertion
 * order.
 */
export class CaseInsensitiveMap<V> implements Iterable<[string, V]> {
	private readonly store = new Map<string, [string, V]>();

	constructor(entries?: Iterable<readonly [string, V]>) {
		if (entries) {
			for (const [key, value] of entries) this.set(key, value);
		}
	}

	get size(): number {
		return this.store.size;
	}

	get(key: string): V | undefined {
		return this.store.get(key.toLowerCase())?.[1];
	}

	has(key: string): boolean {
		return this.store.has(key.toLowerCase());
	}

	set(key: string, value: V): this {
		this.store.set(key.toLowerCase(), [key, value]);
		return this;
	}

	delete(key: string): boolean {
		return this.store.delete(key.toLowerCase());
	}

	*keys(): IterableIterator<string> {
		for (const [key] of this.store.values()) yield key;
	}

	*values(): IterableIterator<V> {
		for (const [, value] of this.store.values()) yield value;
	}

	*entries(): IterableIterator<[string, V]> {
		for (const [key, value] of this.store.values()) yield [key, value];
	}

	[Symbol.iterator](): IterableIterator<[string, V]> {
		return this.entries();
	}

	forEach(fn: (value: V, key: string) => void): void {
		for (const [key, value] of this.store.values()) fn(value, key);
	}
}
