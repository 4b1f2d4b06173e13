/**
 * tally-connector — HTTP transport
 *
 * Tally serves its XML interface over plain HTTP: one POST per request, the
 * envelope as the body, the response document as the reply.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { Document } from './types.ts';
import { parseBytes } from './parser.ts';
import { serialize } from './serialize.ts';
import { buildEnvelope } from './envelope.ts';
import type { TallyQuery } from './envelope.ts';
import { cacheFileName, createCacheStore } from './cache.ts';
import type { CacheStore } from './cache.ts';
import { getConfig, tallyUrl } from './config.ts';
import type { TallyConfig } from './config.ts';
import { TallyResponseError, TallyUnavailableError } from './errors.ts';
import { createChildLogger } from './logger.ts';
import type { Logger } from './logger.ts';

export interface ExecuteOptions {
	/** Store the raw response under this key when set. */
	readonly cacheKey?: string | null;
}

/** Performs one request/response exchange with Tally. */
export interface Transport {
	/**
	 * @throws {TallyUnavailableError} when no response could be obtained.
	 * @throws {TallyResponseError} when Tally answered with an HTTP error.
	 */
	execute(query: TallyQuery, options?: ExecuteOptions): Promise<Document>;
}

export interface HttpTransportOptions {
	readonly host: string;
	readonly port: number;
	readonly timeoutMs?: number;
	/** Where raw responses go; `null` or absent disables writing them. */
	readonly cache?: CacheStore | null;
	readonly logger?: Logger;
	/** Replaces axios' own HTTP adapter. */
	readonly adapter?: AxiosAdapter;
}

/**
 * Whether `err` means the exchange never produced a response: connection
 * refused or reset, name resolution failure, timeout.
 */
export function isUnreachable(err: unknown): boolean {
	return axios.isAxiosError(err) && err.response === undefined;
}

function toBytes(data: unknown): Uint8Array {
	if (data instanceof Uint8Array) return data;
	if (data instanceof ArrayBuffer) return new Uint8Array(data);
	if (typeof data === 'string') return Buffer.from(data, 'utf-8');
	throw new TypeError(`Unexpected response body of type ${typeof data}`);
}

export class HttpTransport implements Transport {
	readonly url: string;
	private readonly client: AxiosInstance;
	private readonly cache: CacheStore | null;
	private readonly log: Logger;

	constructor(options: HttpTransportOptions) {
		this.url = tallyUrl(options);
		this.cache = options.cache ?? null;
		this.log = options.logger ?? createChildLogger({ component: 'transport' });
		this.client = axios.create({
			baseURL: this.url,
			timeout: options.timeoutMs ?? 30000,
			headers: { 'Content-Type': 'application/xml' },
			responseType: 'arraybuffer',
			...(options.adapter && { adapter: options.adapter }),
		});
	}

	async execute(query: TallyQuery, options: ExecuteOptions = {}): Promise<Document> {
		const body = serialize(buildEnvelope(query));
		this.log.debug({ url: this.url, bytes: body.length }, 'Sending Tally request');

		let data: unknown;
		try {
			const response = await this.client.post<ArrayBuffer>('/', body);
			data = response.data;
		} catch (err) {
			if (isUnreachable(err)) {
				this.log.warn({ url: this.url, err }, 'Tally is not reachable');
				throw new TallyUnavailableError(this.url, { cause: err });
			}
			if (axios.isAxiosError(err) && err.response !== undefined) {
				throw new TallyResponseError(err.response.status, err.message);
			}
			throw err;
		}

		const bytes = toBytes(data);
		if (this.cache !== null && options.cacheKey) {
			await this.store(options.cacheKey, bytes);
		}
		return parseBytes(bytes);
	}

	private async store(cacheKey: string, bytes: Uint8Array): Promise<void> {
		const name = cacheFileName(cacheKey);
		try {
			await this.cache?.write(name, bytes);
			this.log.debug({ name, bytes: bytes.length }, 'Cached Tally response');
		} catch (err) {
			// The live response is still good; only the fallback copy is lost
			this.log.warn({ name, err }, 'Could not cache Tally response');
		}
	}
}

/** Transport for the process configuration, writing to the configured cache. */
export function createTransport(config: TallyConfig = getConfig(), cache: CacheStore | null = createCacheStore(config)): HttpTransport {
	return new HttpTransport({ host: config.host, port: config.port, timeoutMs: config.timeoutMs, cache });
}
