/**
 * tally-connector
 *
 * Talks to Tally's XML interface and turns its responses into typed
 * objects.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { getCompanyMasters } from 'tally-connector';
 *
 * const masters = getCompanyMasters('Acme Traders');
 * const units = await masters.units.get();
 * units.get('nos')?.decimalPlaces; // 0
 * ```
 *
 * Custom records are described with field tables:
 *
 * ```ts
 * import { defineElement, field, value, extractElement } from 'tally-connector';
 *
 * const godown = defineElement('Godown', {
 *   attrs: { name: field('NAME', value.string, true) },
 *   elements: { parent: field('PARENT', value.string) },
 * });
 * ```
 */

// XML
export { parse, parseBytes, decodeXml, detectEncoding, ParseError } from './parser.ts';
export type { NodeType, Node, Attribute, Text, CData, Element, ChildNode, Document, AnyNode } from './types.ts';
export { isDocument, isElement, isText, isCData } from './types.ts';
export { serialize, element, textElement } from './serialize.ts';
export type { AttributeMap } from './serialize.ts';
export { textContent, rootElement, child, children, childElements, descendant, descendants, listContainers, attr, hasAttr, sameName, LIST_SUFFIX } from './query.ts';

// Field extraction
export * as value from './values.ts';
export type { Coercion, JoiningCoercion } from './values.ts';
export { defineElement, mapElement, field, list, isElementSchema, SECTION_ORDER } from './schema.ts';
export type { ElementSchema, ExtractionContext, FieldRule, FieldSpecTable, FieldValues, InferElement, InferFields, ListRule, SectionName, ValueType } from './schema.ts';
export { extractElement } from './extractor.ts';
export type { FieldResult } from './extractor.ts';

// Requests
export { buildEnvelope, buildHeader, staticVariables, dateVariables, fetchList } from './envelope.ts';
export type { HeaderSpec, RequestHeader, TallyQuery } from './envelope.ts';
export { getDateRange, financialYearStart, formatTallyDate } from './dates.ts';
export type { DateRange } from './dates.ts';

// Reports
export { ReportDocument, ReportCollection, collection, normalizeCompanyName } from './report.ts';
export type { CollectionSpec, ReportDependencies } from './report.ts';
export { CaseInsensitiveMap } from './casemap.ts';
export { CompanyMasters, getCompanyMasters, clearCompanyMasters, unitSchema, ledgerSchema, languageNameSchema, stockGroupSchema } from './masters.ts';
export type { Unit, Ledger, StockGroup } from './masters.ts';

// Transport and cache
export { HttpTransport, createTransport, isUnreachable } from './transport.ts';
export type { Transport, ExecuteOptions, HttpTransportOptions } from './transport.ts';
export { FileCacheStore, createCacheStore, cacheFileName } from './cache.ts';
export type { CacheStore } from './cache.ts';

// Configuration, logging, errors
export { loadConfig, getConfig, tallyUrl } from './config.ts';
export type { TallyConfig, LogLevel } from './config.ts';
export { createLogger, getLogger, createChildLogger } from './logger.ts';
export type { Logger } from './logger.ts';
export {
	TallyConnectorError,
	TallyUnavailableError,
	TallyResponseError,
	CoercionError,
	ValueValidationError,
	RequiredFieldError,
	AmbiguousMatchError,
	UnsupportedOperationError,
	AttributeNotFoundError,
	ConfigError,
} from './errors.ts';
