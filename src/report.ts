/**
 * tally-connector — report documents
 *
 * A `ReportDocument` is one request to Tally and the typed views over its
 * response. Subclasses say what to ask for (`buildRequestBody()`), how to
 * label the request (`header`), where the response keeps its records
 * (`container`), whether to cache it (`cacheNamespace`), and which named
 * collections to expose:
 *
 * ```ts
 * class Units extends ReportDocument {
 *   protected override readonly container = 'REQUESTDATA';
 *   protected override readonly cacheNamespace = 'units';
 *   readonly units = this.declareCollection('units', collection('UNIT', unitSchema, (u) => u.name));
 *
 *   override buildRequestBody(): Element { … }
 * }
 *
 * const report = new Units('Acme Traders');
 * const nos = (await report.units.get()).get('NOS');
 * ```
 *
 * The response is fetched once, on first use. When Tally is unreachable
 * and the report has a cache key, the last cached response is used instead.
 */

import type { Document, Element } from './types.ts';
import { descendant, descendants } from './query.ts';
import { parseBytes } from './parser.ts';
import { element } from './serialize.ts';
import { buildHeader, dateVariables, fetchList, staticVariables } from './envelope.ts';
import type { HeaderSpec, TallyQuery } from './envelope.ts';
import { getDateRange } from './dates.ts';
import { extractElement } from './extractor.ts';
import type { ElementSchema, ExtractionContext } from './schema.ts';
import { CaseInsensitiveMap } from './casemap.ts';
import { cacheFileName, createCacheStore } from './cache.ts';
import type { CacheStore } from './cache.ts';
import { createTransport } from './transport.ts';
import type { Transport } from './transport.ts';
import { getConfig } from './config.ts';
import { AttributeNotFoundError, TallyUnavailableError, UnsupportedOperationError } from './errors.ts';
import { createChildLogger } from './logger.ts';
import type { Logger } from './logger.ts';

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

/** Which response elements make up a collection, and how to key them. */
export interface CollectionSpec<T> {
	/** Element name of one record, e.g. `UNIT`. */
	readonly tag: string;
	readonly schema: ElementSchema<T>;
	/** The record's natural name. */
	keyOf(item: T): string;
}

export function collection<T>(tag: string, schema: ElementSchema<T>, keyOf: (item: T) => string): CollectionSpec<T> {
	return { tag, schema, keyOf };
}

/**
 * One named collection of a report. Built on first `get()`; every later
 * call returns the same map.
 */
export class ReportCollection<T> {
	readonly name: string;
	private readonly load: () => Promise<CaseInsensitiveMap<T>>;
	private value: CaseInsensitiveMap<T> | null = null;
	private pending: Promise<CaseInsensitiveMap<T>> | null = null;

	constructor(name: string, load: () => Promise<CaseInsensitiveMap<T>>) {
		this.name = name;
		this.load = load;
	}

	/** Whether the collection has been built. */
	get computed(): boolean {
		return this.value !== null;
	}

	async get(): Promise<CaseInsensitiveMap<T>> {
		if (this.value !== null) return this.value;
		this.pending ??= this.load();
		try {
			const value = await this.pending;
			this.value ??= value;
			return this.value;
		} finally {
			this.pending = null;
		}
	}
}

// ---------------------------------------------------------------------------
// Report document
// ---------------------------------------------------------------------------

export interface ReportDependencies {
	/** Defaults to HTTP against the configured host and port. */
	readonly transport?: Transport;
	/** Defaults to the configured cache directory; `null` turns caching off. */
	readonly cache?: CacheStore | null;
	readonly logger?: Logger;
}

/**
 * `Acme Traders Pvt. Ltd.` → `Acme_Traders_Pvt_Ltd`: spaces become
 * underscores, dots and hyphens are dropped. Path separators are
 * percent-encoded (`M/s Sharma` → `M%2Fs_Sharma`) so the key stays one
 * file name.
 */
export function normalizeCompanyName(companyName: string): string {
	return companyName
		.replace(/%/g, '%25')
		.replace(/\//g, '%2F')
		.replace(/\\/g, '%5C')
		.replace(/ /g, '_')
		.replace(/[.-]/g, '');
}

export class ReportDocument implements ExtractionContext {
	/** `TALLYREQUEST` text, or a structured header. */
	protected readonly header: HeaderSpec = 'Export Data';
	/** Element the collections are looked for in; the whole document when `null`. */
	protected readonly container: string | null = null;
	/** Prefix of the cache key; `null` means responses are never cached. */
	protected readonly cacheNamespace: string | null = null;

	readonly companyName: string | null;
	protected readonly transport: Transport;
	protected readonly cache: CacheStore | null;
	protected readonly log: Logger;

	private root: Document | null = null;
	private pending: Promise<Document> | null = null;
	private readonly registry = new Map<string, ReportCollection<unknown>>();

	constructor(companyName: string | null, deps: ReportDependencies = {}) {
		this.companyName = companyName;
		this.cache = deps.cache === undefined ? createCacheStore(getConfig()) : deps.cache;
		this.transport = deps.transport ?? createTransport(getConfig(), this.cache);
		this.log = createChildLogger({ component: 'report', report: new.target.name, company: companyName }, deps.logger);
	}

	// -------------------------------------------------------------------------
	// Request
	// -------------------------------------------------------------------------

	/** The query placed inside `BODY`. Every concrete report defines it. */
	buildRequestBody(): Element {
		throw new UnsupportedOperationError(`${this.constructor.name} does not define a request body`);
	}

	buildRequestHeader(): Element {
		return buildHeader(this.header);
	}

	/** `<namespace>.<company>`, or `null` when the report is not cached. */
	get cacheKey(): string | null {
		if (!this.cacheNamespace) return null;
		if (!this.companyName) return this.cacheNamespace;
		return `${this.cacheNamespace}.${normalizeCompanyName(this.companyName)}`;
	}

	/** `STATICVARIABLES` with the export format, encoding and company. */
	protected staticVariables(extra: ReadonlyArray<Element> = []): Element {
		return element('STATICVARIABLES', {}, [...staticVariables(this.companyName), ...extra]);
	}

	/** Period variables; see `getDateRange()` for the defaults. */
	protected dateVariables(start?: Date | null, end?: Date | null): Element[] {
		return dateVariables(getDateRange(start, end));
	}

	protected fetchList(items: ReadonlyArray<string>): Element[] {
		return fetchList(items);
	}

	// -------------------------------------------------------------------------
	// Response
	// -------------------------------------------------------------------------

	/**
	 * The parsed response, fetched on first call and kept for the life of
	 * the report. Concurrent first calls share one exchange.
	 *
	 * @throws {TallyUnavailableError} when Tally is unreachable and no cached
	 *   response can stand in.
	 */
	async document(): Promise<Document> {
		if (this.root !== null) return this.root;
		this.pending ??= this.acquire();
		try {
			const root = await this.pending;
			this.root ??= root;
			return this.root;
		} finally {
			this.pending = null;
		}
	}

	private async acquire(): Promise<Document> {
		const query: TallyQuery = { header: this.buildRequestHeader(), body: this.buildRequestBody() };
		const cacheKey = this.cacheKey;
		try {
			return await this.transport.execute(query, { cacheKey });
		} catch (err) {
			if (!(err instanceof TallyUnavailableError) || cacheKey === null || this.cache === null) {
				throw err;
			}
			this.log.warn({ cacheKey, store: this.cache.describe() }, 'Tally unavailable, trying cached response');
			return this.readCached(this.cache, cacheKey, err);
		}
	}

	private async readCached(cache: CacheStore, cacheKey: string, unavailable: TallyUnavailableError): Promise<Document> {
		try {
			return parseBytes(await cache.read(cacheFileName(cacheKey)));
		} catch (cause) {
			this.log.warn({ cacheKey, err: cause }, 'No usable cached response');
			throw new TallyUnavailableError(unavailable.url, { cause });
		}
	}

	// -------------------------------------------------------------------------
	// Collections
	// -------------------------------------------------------------------------

	/**
	 * Registers a named collection. Call from a field initializer so the
	 * collection is both a typed property and reachable by name.
	 */
	protected declareCollection<T>(name: string, spec: CollectionSpec<T>): ReportCollection<T> {
		const declared = new ReportCollection(name, () => this.buildCollection(spec));
		this.registry.set(name, declared);
		return declared;
	}

	/** Names of the declared collections. */
	collectionNames(): string[] {
		return [...this.registry.keys()];
	}

	/**
	 * A declared collection by name.
	 *
	 * @throws {AttributeNotFoundError} when no collection has that name.
	 */
	async collection(name: string): Promise<CaseInsensitiveMap<unknown>> {
		const declared = this.registry.get(name);
		if (declared === undefined) {
			throw new AttributeNotFoundError(this.constructor.name, name);
		}
		return declared.get();
	}

	private async buildCollection<T>(spec: CollectionSpec<T>): Promise<CaseInsensitiveMap<T>> {
		const doc = await this.document();
		let scope: Document | Element = doc;
		if (this.container !== null) {
			const container = descendant(doc, this.container);
			if (container === undefined) {
				this.log.warn({ container: this.container, tag: spec.tag }, 'Response has no container element');
				return new CaseInsensitiveMap<T>();
			}
			scope = container;
		}

		const items = new CaseInsensitiveMap<T>();
		for (const node of descendants(scope, spec.tag)) {
			const item = extractElement(spec.schema, node, this);
			items.set(spec.keyOf(item), item);
		}
		return items;
	}
}
