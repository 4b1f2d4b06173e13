/**
 * tally-connector — field extraction
 *
 * `extractElement()` walks a schema's field table and reads each field from
 * a source node. Every field step produces a `FieldResult`:
 *
 * • `ok`     — the value.
 * • `absent` — nothing usable: no candidate node, a missing attribute, or
 *              text that failed coercion. Optional fields become `null`;
 *              required fields raise `RequiredFieldError`.
 * • `fatal`  — raised whatever the field's `required` flag says:
 *              `AmbiguousMatchError`, `ValueValidationError`, and anything
 *              unexpected.
 *
 * Fields are independent; the first field that raises aborts the element
 * and no partial value escapes.
 */

import type { Element } from './types.ts';
import { attr, children, descendants, listContainers, textContent } from './query.ts';
import { isElementSchema, SECTION_ORDER } from './schema.ts';
import type { ElementSchema, ExtractionContext, FieldRule, FieldSpecTable, ListRule, SectionName, ValueType } from './schema.ts';
import { decimal, isJoiningCoercion } from './values.ts';
import type { Coercion } from './values.ts';
import { AmbiguousMatchError, CoercionError, RequiredFieldError } from './errors.ts';

// ---------------------------------------------------------------------------
// Field results
// ---------------------------------------------------------------------------

export type FieldResult<T> =
	| { readonly status: 'ok'; readonly value: T }
	| { readonly status: 'absent'; readonly reason: string; readonly candidates: number; readonly cause?: unknown }
	| { readonly status: 'fatal'; readonly error: unknown };

function ok<T>(value: T): FieldResult<T> {
	return { status: 'ok', value };
}

function absent(reason: string, candidates: number, cause?: unknown): FieldResult<never> {
	return { status: 'absent', reason, candidates, cause };
}

function fatal(error: unknown): FieldResult<never> {
	return { status: 'fatal', error };
}

/** Where a field step is running; used to label errors. */
interface FieldSite {
	readonly schema: string;
	readonly key: string;
	readonly source: string;
}

// ---------------------------------------------------------------------------
// Reading values
// ---------------------------------------------------------------------------

function coerceText<T>(type: Coercion<T>, text: string, candidates: number): FieldResult<T> {
	try {
		return ok(type.coerce(text));
	} catch (err) {
		if (err instanceof CoercionError) return absent(err.message, candidates, err);
		return fatal(err);
	}
}

function readNested<T>(schema: ElementSchema<T>, node: Element, context: ExtractionContext | null): FieldResult<T> {
	try {
		return ok(extractElement(schema, node, context));
	} catch (err) {
		// A nested element missing a required field is itself missing
		if (err instanceof RequiredFieldError) return absent(err.message, 1, err);
		return fatal(err);
	}
}

/** Reads one candidate node as a value of `type`. */
function readNode<T>(type: ValueType<T>, node: Element, context: ExtractionContext | null): T {
	return isElementSchema(type) ? extractElement(type, node, context) : type.coerce(textContent(node));
}

// ---------------------------------------------------------------------------
// Field steps
// ---------------------------------------------------------------------------

function readAttribute(node: Element, rule: FieldRule<Coercion<unknown>, boolean>): FieldResult<unknown> {
	const text = attr(node, rule.source);
	if (text === undefined) return absent(`attribute ${rule.source} is missing`, 0);
	return coerceText(rule.type, text, 1);
}

/**
 * Reads a single-valued element rule from the given candidates. The
 * `string` type instead joins the text of every candidate with `:`.
 */
function readCandidates(site: FieldSite, rule: FieldRule<ValueType<unknown>, boolean>, candidates: ReadonlyArray<Element>, context: ExtractionContext | null): FieldResult<unknown> {
	const type = rule.type;

	if (!isElementSchema(type) && isJoiningCoercion(type)) {
		return ok(candidates.map((c) => textContent(c)).join(':'));
	}
	if (candidates.length > 1) {
		return fatal(new AmbiguousMatchError(site.schema, site.key, site.source, candidates.length));
	}

	const [candidate] = candidates;
	if (candidate === undefined) return absent('is not present', 0);

	if (isElementSchema(type)) return readNested(type, candidate, context);

	const text = textContent(candidate);
	if (type === decimal && text.trim() === '') return ok(0);
	return coerceText(type, text, 1);
}

function readList(rule: ListRule<ValueType<unknown>>, node: Element, context: ExtractionContext | null): unknown[] {
	return listContainers(node, rule.source).map((c) => readNode(rule.type, c, context));
}

/**
 * Reads the lines of the single `<source>.LIST` container: `""` for no
 * container or no lines, the line itself for one, newline-joined for more.
 */
function readMultiline(site: FieldSite, rule: FieldRule<Coercion<string>, boolean>, node: Element): FieldResult<string> {
	const containers = listContainers(node, rule.source);
	if (containers.length > 1) {
		return fatal(new AmbiguousMatchError(site.schema, site.key, `${rule.source}.LIST`, containers.length));
	}
	const [container] = containers;
	if (container === undefined) return ok('');

	const lines: string[] = [];
	for (const line of descendants(container, rule.source)) {
		const result = coerceText(rule.type, textContent(line).trim(), 1);
		if (result.status !== 'ok') return result;
		lines.push(result.value);
	}
	return ok(lines.join('\n'));
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

function settle(site: FieldSite, required: boolean, result: FieldResult<unknown>): unknown {
	switch (result.status) {
		case 'ok':
			return result.value;
		case 'absent':
			if (!required) return null;
			throw new RequiredFieldError(site.schema, site.key, site.source, result.candidates, result.reason, { cause: result.cause });
		case 'fatal':
			throw result.error;
	}
}

function runSection(section: SectionName, fields: FieldSpecTable, schema: string, node: Element, context: ExtractionContext | null, into: Record<string, unknown>): void {
	switch (section) {
		case 'attrs':
			for (const [key, rule] of Object.entries(fields.attrs ?? {})) {
				into[key] = settle({ schema, key, source: rule.source }, rule.required, readAttribute(node, rule));
			}
			return;
		case 'elements':
			for (const [key, rule] of Object.entries(fields.elements ?? {})) {
				const site = { schema, key, source: rule.source };
				into[key] = settle(site, rule.required, readCandidates(site, rule, children(node, rule.source), context));
			}
			return;
		case 'lists':
			for (const [key, rule] of Object.entries(fields.lists ?? {})) {
				into[key] = readList(rule, node, context);
			}
			return;
		case 'multilines':
			for (const [key, rule] of Object.entries(fields.multilines ?? {})) {
				const site = { schema, key, source: rule.source };
				into[key] = settle(site, rule.required, readMultiline(site, rule, node));
			}
			return;
		case 'descendantElements':
			for (const [key, rule] of Object.entries(fields.descendantElements ?? {})) {
				const site = { schema, key, source: rule.source };
				into[key] = settle(site, rule.required, readCandidates(site, rule, descendants(node, rule.source), context));
			}
			return;
	}
}

/**
 * Builds the typed element described by `schema` from `node`. Sections run
 * in the order `attrs`, `elements`, `lists`, `multilines`,
 * `descendantElements`; `context` is handed to nested elements and to the
 * schema's constructor.
 *
 * @throws {RequiredFieldError} a required field had no usable value.
 * @throws {AmbiguousMatchError} a single-valued rule matched several nodes.
 * @throws {ValueValidationError} a value type rejected a present value.
 */
export function extractElement<T>(schema: ElementSchema<T>, node: Element, context: ExtractionContext | null = null): T {
	const values: Record<string, unknown> = {};
	for (const section of SECTION_ORDER) {
		runSection(section, schema.fields, schema.name, node, context, values);
	}
	return schema.construct(values, context);
}
