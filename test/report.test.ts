/**
 * ReportDocument: request assembly, memoization, collections and the cache
 * fallback, with an in-process transport and cache.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
	AttributeNotFoundError,
	ReportDocument,
	TallyResponseError,
	TallyUnavailableError,
	UnsupportedOperationError,
	collection,
	defineElement,
	element,
	field,
	normalizeCompanyName,
	parse,
	serialize,
	textElement,
	value,
} from '../src/index.ts';
import type { CacheStore, Document, Element, ReportDependencies, Transport } from '../src/index.ts';
import { FakeTransport, MemoryCacheStore, silentLogger, unreachableTransport } from './helpers.ts';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const unitSchema = defineElement('Unit', {
	elements: {
		name: field('NAME', value.string, true),
		decimalPlaces: field('DECIMALPLACES', value.int, true),
	},
});

class UnitList extends ReportDocument {
	protected override readonly container = 'DATA';
	protected override readonly cacheNamespace = 'units';

	readonly units = this.declareCollection('units', collection('UNIT', unitSchema, (u) => u.name));

	override buildRequestBody(): Element {
		return element('EXPORTDATA', {}, [
			element('REQUESTDESC', {}, [textElement('REPORTNAME', 'Units'), this.staticVariables(this.dateVariables(new Date(2024, 3, 1), new Date(2024, 5, 30)))]),
		]);
	}
}

/** Not cached: no namespace. */
class Uncached extends ReportDocument {
	readonly units = this.declareCollection('units', collection('UNIT', unitSchema, (u) => u.name));

	override buildRequestBody(): Element {
		return element('EXPORTDATA');
	}
}

const UNITS_XML = `<ENVELOPE>
 <HEADER><UNIT><NAME>Outside</NAME><DECIMALPLACES>0</DECIMALPLACES></UNIT></HEADER>
 <BODY>
  <DATA>
   <UNIT><NAME>Nos</NAME><DECIMALPLACES>0</DECIMALPLACES></UNIT>
   <UNIT><NAME>Kgs</NAME><DECIMALPLACES>3</DECIMALPLACES></UNIT>
  </DATA>
 </BODY>
</ENVELOPE>`;

function deps(transport: Transport, cache: CacheStore | null = null): ReportDependencies {
	return { transport, cache, logger: silentLogger };
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

describe('ReportDocument — request', () => {
	it('sends the header and body with the cache key', async () => {
		const transport = new FakeTransport(() => UNITS_XML);
		await new UnitList('Acme', deps(transport)).document();

		assert.equal(transport.calls.length, 1);
		const [call] = transport.calls;
		assert.ok(call !== undefined);
		assert.equal(serialize(call.query.header), '<HEADER><TALLYREQUEST>Export Data</TALLYREQUEST></HEADER>');
		assert.equal(
			serialize(call.query.body),
			'<EXPORTDATA><REQUESTDESC><REPORTNAME>Units</REPORTNAME><STATICVARIABLES>' +
				'<SVEXPORTFORMAT>$$SysName:XML</SVEXPORTFORMAT><ENCODINGTYPE>UNICODE</ENCODINGTYPE>' +
				'<SVCURRENTCOMPANY TYPE="String">Acme</SVCURRENTCOMPANY>' +
				'<SVFROMDATE TYPE="Date">01-04-2024</SVFROMDATE><SVTODATE TYPE="Date">30-06-2024</SVTODATE><SVCURRENTDATE TYPE="Date">30-06-2024</SVCURRENTDATE>' +
				'</STATICVARIABLES></REQUESTDESC></EXPORTDATA>',
		);
		assert.deepEqual(call.options, { cacheKey: 'units.Acme' });
	});

	it('refuses to run without a request body', async () => {
		const report = new ReportDocument(null, deps(new FakeTransport(() => UNITS_XML)));
		await assert.rejects(report.document(), (err: unknown) => {
			assert.ok(err instanceof UnsupportedOperationError);
			assert.equal(err.message, 'ReportDocument does not define a request body');
			return true;
		});
	});
});

describe('ReportDocument — cache key', () => {
	const transport = new FakeTransport(() => UNITS_XML);

	it('normalizes the company name', () => {
		assert.equal(new UnitList('Acme Traders Pvt. Ltd.', deps(transport)).cacheKey, 'units.Acme_Traders_Pvt_Ltd');
		assert.equal(normalizeCompanyName('Sharma-Sons & Co.'), 'SharmaSons_&_Co');
	});

	it('encodes path separators so every company keeps its own entry', () => {
		assert.equal(normalizeCompanyName('M/s Sharma'), 'M%2Fs_Sharma');
		assert.equal(normalizeCompanyName('North\\Traders'), 'North%5CTraders');
		assert.equal(normalizeCompanyName('100% Pure'), '100%25_Pure');
		assert.notEqual(new UnitList('North/Traders', deps(transport)).cacheKey, new UnitList('South/Traders', deps(transport)).cacheKey);
		assert.equal(new UnitList('North/Traders', deps(transport)).cacheKey, 'units.North%2FTraders');
	});

	it('uses the namespace alone without a company', () => {
		assert.equal(new UnitList(null, deps(transport)).cacheKey, 'units');
	});

	it('is null without a namespace', () => {
		assert.equal(new Uncached('Acme', deps(transport)).cacheKey, null);
	});
});

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

describe('ReportDocument — collections', () => {
	it('extracts the records inside the container, keyed case-insensitively', async () => {
		const report = new UnitList('Acme', deps(new FakeTransport(() => UNITS_XML)));
		const units = await report.units.get();
		assert.deepEqual([...units.keys()], ['Nos', 'Kgs']);
		assert.deepEqual(units.get('KGS'), { name: 'Kgs', decimalPlaces: 3 });
		assert.equal(units.has('outside'), false);
	});

	it('fetches once for any number of concurrent readers', async () => {
		const transport = new FakeTransport(() => UNITS_XML);
		const report = new UnitList('Acme', deps(transport));
		assert.equal(report.units.computed, false);

		const [a, b, doc1, doc2] = await Promise.all([report.units.get(), report.units.get(), report.document(), report.document()]);

		assert.equal(transport.calls.length, 1);
		assert.equal(a, b);
		assert.equal(doc1, doc2);
		assert.equal(report.units.computed, true);
		assert.equal(await report.units.get(), a);
	});

	it('keeps records in document order', async () => {
		const xml =
			'<ENVELOPE><BODY><DATA>' +
			'<UNIT><NAME>Crate</NAME><DECIMALPLACES>0</DECIMALPLACES></UNIT>' +
			'<UNIT><NAME>Aana</NAME><DECIMALPLACES>0</DECIMALPLACES></UNIT>' +
			'<UNIT><NAME>Bag</NAME><DECIMALPLACES>0</DECIMALPLACES></UNIT>' +
			'</DATA></BODY></ENVELOPE>';
		const units = await new UnitList('Acme', deps(new FakeTransport(() => xml))).units.get();
		assert.deepEqual([...units.keys()], ['Crate', 'Aana', 'Bag']);
	});

	it('keeps its first result when the document changes afterwards', async () => {
		const roots: Element[] = [...parse(UNITS_XML).children];
		const live: Document = { type: 'document', children: roots };
		const transport: Transport = { execute: async () => live };
		const report = new UnitList('Acme', deps(transport));

		const first = await report.units.get();
		const replacement = parse('<ENVELOPE><BODY><DATA><UNIT><NAME>Box</NAME><DECIMALPLACES>1</DECIMALPLACES></UNIT></DATA></BODY></ENVELOPE>');
		roots.splice(0, roots.length, ...replacement.children);

		assert.equal(await report.document(), live);
		const second = await report.units.get();
		assert.equal(second, first);
		assert.deepEqual([...second.keys()], ['Nos', 'Kgs']);
		assert.equal(second.has('box'), false);
	});

	it('looks collections up by name', async () => {
		const report = new UnitList('Acme', deps(new FakeTransport(() => UNITS_XML)));
		assert.deepEqual(report.collectionNames(), ['units']);
		assert.equal(await report.collection('units'), await report.units.get());
	});

	it('rejects an undeclared collection name', async () => {
		const report = new UnitList('Acme', deps(new FakeTransport(() => UNITS_XML)));
		await assert.rejects(report.collection('ledgers'), (err: unknown) => {
			assert.ok(err instanceof AttributeNotFoundError);
			assert.equal(err.message, 'UnitList has no collection named "ledgers"');
			return true;
		});
	});

	it('gives an empty collection when the container is missing', async () => {
		const report = new UnitList('Acme', deps(new FakeTransport(() => '<ENVELOPE><BODY/></ENVELOPE>')));
		assert.equal((await report.units.get()).size, 0);
	});

	it('searches the whole document without a container', async () => {
		const report = new Uncached('Acme', deps(new FakeTransport(() => UNITS_XML)));
		assert.deepEqual([...(await report.units.get()).keys()], ['Outside', 'Nos', 'Kgs']);
	});
});

// ---------------------------------------------------------------------------
// Failure and the cache fallback
// ---------------------------------------------------------------------------

describe('ReportDocument — cache fallback', () => {
	it('reads the last cached response when Tally is unavailable', async () => {
		const cache = new MemoryCacheStore();
		await new UnitList('Acme Traders', deps(new FakeTransport(() => UNITS_XML, cache), cache)).document();
		assert.deepEqual([...cache.entries.keys()], ['units.Acme_Traders.xml']);

		const offline = unreachableTransport();
		const report = new UnitList('Acme Traders', deps(offline, cache));
		const units = await report.units.get();
		assert.equal(offline.calls.length, 1);
		assert.deepEqual([...units.keys()], ['Nos', 'Kgs']);
	});

	it('raises TallyUnavailableError when there is no cached response', async () => {
		const report = new UnitList('Acme', deps(unreachableTransport(), new MemoryCacheStore()));
		await assert.rejects(report.document(), (err: unknown) => {
			assert.ok(err instanceof TallyUnavailableError);
			assert.equal(err.url, 'http://localhost:9002');
			assert.ok(err.cause instanceof Error);
			assert.equal(err.cause.message, 'no cache entry units.Acme.xml');
			return true;
		});
	});

	it('raises TallyUnavailableError when the cached response is not XML', async () => {
		const cache = new MemoryCacheStore();
		await cache.write('units.Acme.xml', Buffer.from('not xml'));
		const report = new UnitList('Acme', deps(unreachableTransport(), cache));
		await assert.rejects(report.document(), TallyUnavailableError);
	});

	it('does not fall back without a cache or a cache key', async () => {
		await assert.rejects(new UnitList('Acme', deps(unreachableTransport(), null)).document(), TallyUnavailableError);
		await assert.rejects(new Uncached('Acme', deps(unreachableTransport(), new MemoryCacheStore())).document(), TallyUnavailableError);
	});

	it('does not fall back for other failures', async () => {
		const cache = new MemoryCacheStore();
		await cache.write('units.Acme.xml', Buffer.from(UNITS_XML));
		const failing = new FakeTransport(() => {
			throw new TallyResponseError(500, 'Internal Server Error');
		});
		await assert.rejects(new UnitList('Acme', deps(failing, cache)).document(), TallyResponseError);
	});

	it('tries again after a failed fetch', async () => {
		let attempts = 0;
		const flaky = new FakeTransport(() => {
			attempts += 1;
			if (attempts === 1) throw new TallyResponseError(500, 'Internal Server Error');
			return UNITS_XML;
		});
		const report = new UnitList('Acme', deps(flaky));
		await assert.rejects(report.units.get(), TallyResponseError);
		assert.equal((await report.units.get()).size, 2);
		assert.equal(flaky.calls.length, 2);
	});
});
