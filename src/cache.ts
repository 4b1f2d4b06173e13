/**
 * tally-connector — raw response cache
 *
 * Every successful exchange stores the response bytes under
 * `<cacheKey>.xml`; when Tally is unreachable a report reads them back.
 * Writes happen only after a fresh response, reads only after a failed
 * exchange. Concurrent writers to one key are not coordinated.
 */

import { mkdir, open } from 'node:fs/promises';
import path from 'node:path';
import type { TallyConfig } from './config.ts';
import { TallyConnectorError } from './errors.ts';

/** A byte store addressed by file name. */
export interface CacheStore {
	/** Rejects when there is no entry named `name`. */
	read(name: string): Promise<Uint8Array>;
	write(name: string, data: Uint8Array): Promise<void>;
	/** Where the store lives, for log messages. */
	describe(): string;
}

/** File name of the cache entry for a cache key. */
export function cacheFileName(cacheKey: string): string {
	return `${cacheKey}.xml`;
}

/** One file per entry in a directory, created on first write. */
export class FileCacheStore implements CacheStore {
	readonly directory: string;

	constructor(directory: string) {
		this.directory = path.resolve(directory);
	}

	async read(name: string): Promise<Uint8Array> {
		const handle = await open(this.resolve(name), 'r');
		try {
			return await handle.readFile();
		} finally {
			await handle.close();
		}
	}

	async write(name: string, data: Uint8Array): Promise<void> {
		const file = this.resolve(name);
		await mkdir(this.directory, { recursive: true });
		const handle = await open(file, 'w');
		try {
			await handle.writeFile(data);
		} finally {
			await handle.close();
		}
	}

	describe(): string {
		return this.directory;
	}

	/** Entries live directly in the directory; anything else is refused. */
	private resolve(name: string): string {
		if (name === '' || name === '.' || name === '..' || name.includes('/') || name.includes('\\') || path.basename(name) !== name) {
			throw new TallyConnectorError(`Invalid cache entry name ${JSON.stringify(name)}`);
		}
		return path.join(this.directory, name);
	}
}

/** The configured store, or `null` when caching is off. */
export function createCacheStore(config: Pick<TallyConfig, 'cacheDir'>): CacheStore | null {
	return config.cacheDir === null ? null : new FileCacheStore(config.cacheDir);
}
