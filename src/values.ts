/**
 * tally-connector — value types
 *
 * A value type turns the text of a node into a typed value. Two failure
 * modes are kept apart:
 *
 * • `CoercionError` — the text is not of the type at all ("abc" as an int).
 *   Field tables treat it like a missing node.
 * • `ValueValidationError` — the text has the right shape but names an
 *   invalid value ("Maybe" as yes/no, 31 February). Always raised.
 */

import { CoercionError, ValueValidationError } from './errors.ts';

/** Converts node text into a value of type `T`. */
export interface Coercion<T> {
	readonly kind: 'coercion';
	/** Shown in error messages. */
	readonly name: string;
	readonly coerce: (text: string) => T;
}

/** The `string` value type. Element rules with it join every match. */
export interface JoiningCoercion extends Coercion<string> {
	readonly joinsCandidates: true;
}

export function isJoiningCoercion(type: Coercion<unknown>): type is JoiningCoercion {
	return 'joinsCandidates' in type && type.joinsCandidates === true;
}

/** Defines a value type. `coerce` signals failures with the errors above. */
export function coercion<T>(name: string, coerce: (text: string) => T): Coercion<T> {
	return { kind: 'coercion', name, coerce };
}

// ---------------------------------------------------------------------------
// Built-in value types
// ---------------------------------------------------------------------------

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const LEADING_FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const TALLY_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Text as-is. Element rules with this type join every matching node's text
 * with `:` instead of demanding a single node.
 */
export const string: JoiningCoercion = { ...coercion('string', (text) => text), joinsCandidates: true };

/** A whole number, surrounding whitespace allowed. */
export const int: Coercion<number> = coercion('int', (text) => {
	const trimmed = text.trim();
	if (!INTEGER.test(trimmed)) throw new CoercionError('int', text);
	return Number.parseInt(trimmed, 10);
});

/**
 * A floating-point number. Tally appends units to some quantities
 * (`"12.5 nos"`), so the leading numeric part is read and the rest ignored.
 */
export const float: Coercion<number> = coercion('float', (text) => {
	const match = LEADING_FLOAT.exec(text.trim());
	if (match === null) throw new CoercionError('float', text);
	return Number.parseFloat(match[0]);
});

/**
 * A Tally amount: `1,23,456.78`, `-500`, `.5`. Thousands separators are
 * dropped. An empty single-node element field reads as `0` without
 * reaching this coercion.
 */
export const decimal: Coercion<number> = coercion('decimal', (text) => {
	const cleaned = text.trim().replace(/,/g, '');
	if (!DECIMAL.test(cleaned)) throw new CoercionError('decimal', text);
	return Number(cleaned);
});

/** Tally's boolean: `Yes` or `No`, any case. */
export const yesOrNo: Coercion<boolean> = coercion('yesOrNo', (text) => {
	const normalized = text.trim().toLowerCase();
	if (normalized === 'yes') return true;
	if (normalized === 'no') return false;
	throw new ValueValidationError('yesOrNo', text, 'expected Yes or No');
});

/** A Tally date, `YYYYMMDD`, as local midnight. */
export const date: Coercion<Date> = coercion('date', (text) => {
	const match = TALLY_DATE.exec(text.trim());
	if (match === null) throw new CoercionError('date', text, 'expected YYYYMMDD');
	const [, y, m, d] = match;
	const year = Number(y);
	const month = Number(m);
	const day = Number(d);
	const value = new Date(year, month - 1, day);
	if (value.getFullYear() !== year || value.getMonth() !== month - 1 || value.getDate() !== day) {
		throw new ValueValidationError('date', text, 'no such calendar date');
	}
	return value;
});
