/**
 * tally-connector — company masters
 *
 * The `List of Accounts` export with account type `All Masters` returns
 * every master of a company under `REQUESTDATA`, one `TALLYMESSAGE` per
 * record:
 *
 * ```xml
 * <TALLYMESSAGE>
 *   <UNIT NAME="Nos">
 *     <NAME>Nos</NAME>
 *     <ORIGINALNAME>Numbers</ORIGINALNAME>
 *     <ISSIMPLEUNIT>Yes</ISSIMPLEUNIT>
 *     <DECIMALPLACES> 0</DECIMALPLACES>
 *   </UNIT>
 * </TALLYMESSAGE>
 * ```
 */

import type { Element } from './types.ts';
import { element, textElement } from './serialize.ts';
import { defineElement, field, list, mapElement } from './schema.ts';
import type { InferElement } from './schema.ts';
import * as value from './values.ts';
import { ReportDocument, collection } from './report.ts';
import type { ReportDependencies } from './report.ts';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const unitSchema = defineElement('Unit', {
	elements: {
		name: field('NAME', value.string, true),
		originalName: field('ORIGINALNAME', value.string),
		decimalPlaces: field('DECIMALPLACES', value.int, true),
		isSimpleUnit: field('ISSIMPLEUNIT', value.yesOrNo, true),
		additionalUnits: field('ADDITIONALUNITS', value.string),
		conversion: field('CONVERSION', value.float),
	},
});

export type Unit = InferElement<typeof unitSchema>;

/** The names a master is known by, in one language. */
export const languageNameSchema = defineElement('LanguageName', {
	elements: {
		languageId: field('LANGUAGEID', value.int),
	},
	multilines: {
		names: field('NAME', value.string),
	},
});

const ledgerFields = defineElement('Ledger', {
	attrs: {
		name: field('NAME', value.string, true),
	},
	elements: {
		parent: field('PARENT', value.string),
		currency: field('CURRENCYNAME', value.string),
		openingBalance: field('OPENINGBALANCE', value.decimal),
		closingBalance: field('CLOSINGBALANCE', value.decimal),
		isBillWise: field('ISBILLWISEON', value.yesOrNo),
	},
	lists: {
		languageNames: list('LANGUAGENAME', languageNameSchema),
	},
	multilines: {
		address: field('ADDRESS', value.string),
	},
	descendantElements: {
		gstin: field('PARTYGSTIN', value.string),
	},
});

/** A ledger, with its aliases and the company it was read from. */
export const ledgerSchema = mapElement(ledgerFields, (ledger, context) => {
	const names = ledger.languageNames.flatMap((l) => (l.names ?? '').split('\n'));
	return {
		...ledger,
		aliases: names.filter((n) => n !== '' && n !== ledger.name),
		companyName: context?.companyName ?? null,
	};
});

export type Ledger = InferElement<typeof ledgerSchema>;

export const stockGroupSchema = defineElement('StockGroup', {
	attrs: {
		name: field('NAME', value.string, true),
	},
	elements: {
		parent: field('PARENT', value.string),
		baseUnits: field('BASEUNITS', value.string),
		isAddable: field('ISADDABLE', value.yesOrNo),
	},
});

export type StockGroup = InferElement<typeof stockGroupSchema>;

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

/** All masters of one company. Cached under `masters.<company>`. */
export class CompanyMasters extends ReportDocument {
	protected override readonly container = 'REQUESTDATA';
	protected override readonly cacheNamespace = 'masters';

	readonly units = this.declareCollection('units', collection('UNIT', unitSchema, (u) => u.name));
	readonly ledgers = this.declareCollection('ledgers', collection('LEDGER', ledgerSchema, (l) => l.name));
	readonly stockGroups = this.declareCollection('stockGroups', collection('STOCKGROUP', stockGroupSchema, (g) => g.name));

	override buildRequestBody(): Element {
		return element('EXPORTDATA', {}, [
			element('REQUESTDESC', {}, [
				textElement('REPORTNAME', 'List of Accounts'),
				this.staticVariables([textElement('ACCOUNTTYPE', 'All Masters')]),
			]),
		]);
	}
}

const mastersByCompany = new Map<string, CompanyMasters>();

/**
 * The masters report for a company, created on first request and shared
 * afterwards so the company's masters are fetched once per process.
 * `deps` only applies when the report is created.
 */
export function getCompanyMasters(companyName: string, deps?: ReportDependencies): CompanyMasters {
	let masters = mastersByCompany.get(companyName);
	if (masters === undefined) {
		masters = new CompanyMasters(companyName, deps);
		mastersByCompany.set(companyName, masters);
	}
	return masters;
}

/** Forgets every shared masters report. */
export function clearCompanyMasters(): void {
	mastersByCompany.clear();
}
