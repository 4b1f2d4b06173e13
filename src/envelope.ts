/**
 * tally-connector — request envelopes
 *
 * Every request Tally accepts has the same frame:
 *
 * ```xml
 * <ENVELOPE>
 *   <HEADER><TALLYREQUEST>Export Data</TALLYREQUEST></HEADER>
 *   <BODY>
 *     <EXPORTDATA>
 *       <REQUESTDESC>
 *         <REPORTNAME>List of Accounts</REPORTNAME>
 *         <STATICVARIABLES>
 *           <SVEXPORTFORMAT>$$SysName:XML</SVEXPORTFORMAT>
 *           <ENCODINGTYPE>UNICODE</ENCODINGTYPE>
 *           <SVCURRENTCOMPANY TYPE="String">Acme Traders</SVCURRENTCOMPANY>
 *         </STATICVARIABLES>
 *       </REQUESTDESC>
 *     </EXPORTDATA>
 *   </BODY>
 * </ENVELOPE>
 * ```
 *
 * The header is either a single `TALLYREQUEST` or the structured form with
 * `VERSION`, `TALLYREQUEST`, `TYPE` and `ID` used for collection and object
 * requests. Reports supply the body; the helpers here build its common
 * parts.
 */

import type { Element } from './types.ts';
import { element, textElement } from './serialize.ts';
import { formatTallyDate } from './dates.ts';
import type { DateRange } from './dates.ts';

/** Structured request header. */
export interface RequestHeader {
	readonly version: number | string;
	readonly tallyRequest: string;
	readonly type: string;
	readonly id: string;
}

/** `'Export Data'` and the like, or a structured header. */
export type HeaderSpec = string | RequestHeader;

/** The two parts a report contributes to an envelope. */
export interface TallyQuery {
	readonly header: Element;
	readonly body: Element;
}

export function buildHeader(spec: HeaderSpec): Element {
	if (typeof spec === 'string') {
		return element('HEADER', {}, [textElement('TALLYREQUEST', spec)]);
	}
	return element('HEADER', {}, [
		textElement('VERSION', String(spec.version)),
		textElement('TALLYREQUEST', spec.tallyRequest),
		textElement('TYPE', spec.type),
		textElement('ID', spec.id),
	]);
}

/** `ENVELOPE` holding the header, then `BODY` wrapping the body. */
export function buildEnvelope(query: TallyQuery): Element {
	return element('ENVELOPE', {}, [query.header, element('BODY', {}, [query.body])]);
}

/**
 * Export format, encoding and, when there is one, the company the request
 * is scoped to. Place inside `STATICVARIABLES`.
 */
export function staticVariables(companyName: string | null): Element[] {
	const vars = [textElement('SVEXPORTFORMAT', '$$SysName:XML'), textElement('ENCODINGTYPE', 'UNICODE')];
	if (companyName) {
		vars.push(textElement('SVCURRENTCOMPANY', companyName, { TYPE: 'String' }));
	}
	return vars;
}

/** `SVFROMDATE`, `SVTODATE` and `SVCURRENTDATE` for a report period. */
export function dateVariables(range: DateRange): Element[] {
	return [
		textElement('SVFROMDATE', formatTallyDate(range.start), { TYPE: 'Date' }),
		textElement('SVTODATE', formatTallyDate(range.end), { TYPE: 'Date' }),
		textElement('SVCURRENTDATE', formatTallyDate(range.current), { TYPE: 'Date' }),
	];
}

/** One `FETCH` element per field a collection request should return. */
export function fetchList(items: ReadonlyArray<string>): Element[] {
	return items.map((item) => textElement('FETCH', item));
}
