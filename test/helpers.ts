/**
 * Test helpers: a stricter `rootElement`, in-process stand-ins for the
 * transport and the cache, and a logger that writes nothing.
 */
import pino from 'pino';
import { rootElement as _rootElement, parse, TallyUnavailableError } from '../src/index.ts';
import type { CacheStore, Document, Element, ExecuteOptions, Logger, TallyQuery, Transport } from '../src/index.ts';

/** Returns the root element, throwing if absent. */
export function rootElement(doc: Document): Element {
	const el = _rootElement(doc);
	if (el === undefined) throw new Error('Document has no root element');
	return el;
}

/** Parses `xml` and returns its root element. */
export function parseRoot(xml: string): Element {
	return rootElement(parse(xml));
}

export const silentLogger: Logger = pino({ level: 'silent' });

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export class MemoryCacheStore implements CacheStore {
	readonly entries = new Map<string, Uint8Array>();

	async read(name: string): Promise<Uint8Array> {
		const data = this.entries.get(name);
		if (data === undefined) throw new Error(`no cache entry ${name}`);
		return data;
	}

	async write(name: string, data: Uint8Array): Promise<void> {
		this.entries.set(name, data);
	}

	describe(): string {
		return 'memory';
	}
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface RecordedCall {
	readonly query: TallyQuery;
	readonly options: ExecuteOptions;
}

/**
 * Answers every request by calling `respond`. Writes the response to
 * `cache` under the request's cache key, as the HTTP transport does.
 */
export class FakeTransport implements Transport {
	readonly calls: RecordedCall[] = [];
	private readonly respond: (query: TallyQuery) => string;
	private readonly cache: CacheStore | null;

	constructor(respond: (query: TallyQuery) => string, cache: CacheStore | null = null) {
		this.respond = respond;
		this.cache = cache;
	}

	async execute(query: TallyQuery, options: ExecuteOptions = {}): Promise<Document> {
		this.calls.push({ query, options });
		// Let concurrent callers pile up before answering
		await new Promise((resolve) => setImmediate(resolve));
		const xml = this.respond(query);
		if (this.cache !== null && options.cacheKey) {
			await this.cache.write(`${options.cacheKey}.xml`, Buffer.from(xml, 'utf-8'));
		}
		return parse(xml);
	}
}

/** A transport for a Tally that is switched off. */
export function unreachableTransport(): FakeTransport {
	return new FakeTransport(() => {
		throw new TallyUnavailableError('http://localhost:9002');
	});
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** A `List of Accounts` response with two units, two ledgers and a stock group. */
export const MASTERS_XML = `<ENVELOPE>
 <HEADER><VERSION>1</VERSION><STATUS>1</STATUS></HEADER>
 <BODY>
  <IMPORTDATA>
   <REQUESTDESC><REPORTNAME>All Masters</REPORTNAME></REQUESTDESC>
   <REQUESTDATA>
    <TALLYMESSAGE>
     <UNIT NAME="Nos" RESERVEDNAME="">
      <NAME>Nos</NAME>
      <ORIGINALNAME>Numbers</ORIGINALNAME>
      <ISSIMPLEUNIT>Yes</ISSIMPLEUNIT>
      <DECIMALPLACES> 0</DECIMALPLACES>
     </UNIT>
    </TALLYMESSAGE>
    <TALLYMESSAGE>
     <UNIT NAME="Box of 12">
      <NAME>Box of 12</NAME>
      <ISSIMPLEUNIT>No</ISSIMPLEUNIT>
      <DECIMALPLACES>2</DECIMALPLACES>
      <ADDITIONALUNITS>Nos</ADDITIONALUNITS>
      <CONVERSION>12 Nos</CONVERSION>
     </UNIT>
    </TALLYMESSAGE>
    <TALLYMESSAGE>
     <LEDGER NAME="Sharma &amp; Sons">
      <PARENT>Sundry Debtors</PARENT>
      <CURRENCYNAME>₹</CURRENCYNAME>
      <OPENINGBALANCE>-1,25,000.50</OPENINGBALANCE>
      <CLOSINGBALANCE></CLOSINGBALANCE>
      <ISBILLWISEON>Yes</ISBILLWISEON>
      <ADDRESS.LIST TYPE="String">
       <ADDRESS>12 MG Road</ADDRESS>
       <ADDRESS> Pune </ADDRESS>
      </ADDRESS.LIST>
      <LEDGSTREGDETAILS.LIST>
       <PARTYGSTIN>27ABCDE1234F1Z5</PARTYGSTIN>
      </LEDGSTREGDETAILS.LIST>
      <LANGUAGENAME.LIST>
       <NAME.LIST TYPE="String">
        <NAME>Sharma &amp; Sons</NAME>
        <NAME>Sharma Traders</NAME>
       </NAME.LIST>
       <LANGUAGEID> 1033</LANGUAGEID>
      </LANGUAGENAME.LIST>
     </LEDGER>
    </TALLYMESSAGE>
    <TALLYMESSAGE>
     <LEDGER NAME="Cash">
      <PARENT>Cash-in-Hand</PARENT>
     </LEDGER>
    </TALLYMESSAGE>
    <TALLYMESSAGE>
     <STOCKGROUP NAME="Fasteners">
      <PARENT></PARENT>
      <BASEUNITS>Nos</BASEUNITS>
      <ISADDABLE>No</ISADDABLE>
     </STOCKGROUP>
    </TALLYMESSAGE>
   </REQUESTDATA>
  </IMPORTDATA>
 </BODY>
</ENVELOPE>`;
