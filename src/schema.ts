/**
 * tally-connector — field specification tables
 *
 * A `FieldSpecTable` says, for each output attribute of a typed element,
 * where in the source node its value comes from and how to read it. The
 * table is plain data; `extractElement()` in extractor.ts interprets it.
 *
 * ```ts
 * const unit = defineElement('Unit', {
 *   elements: {
 *     name: field('NAME', value.string, true),
 *     decimalPlaces: field('DECIMALPLACES', value.int, true),
 *     conversion: field('CONVERSION', value.float),
 *   },
 * });
 * // ElementSchema<{ name: string; decimalPlaces: number; conversion: number | null }>
 * ```
 *
 * Sections, interpreted in this order:
 *
 * | section              | looks at                                        | rule      |
 * | -------------------- | ----------------------------------------------- | --------- |
 * | `attrs`              | the node's own attributes                       | `field()` |
 * | `elements`           | direct children                                 | `field()` |
 * | `lists`              | every `<source>.LIST` below the node            | `list()`  |
 * | `multilines`         | lines inside the single `<source>.LIST`         | `field()` |
 * | `descendantElements` | all descendants                                 | `field()` |
 */

import type { Coercion, JoiningCoercion } from './values.ts';

// ---------------------------------------------------------------------------
// Value types
// ---------------------------------------------------------------------------

/**
 * Passed down through nested extraction. Reports supply themselves, so a
 * typed element can see which company it was read for.
 */
export interface ExtractionContext {
	readonly companyName: string | null;
}

/** Raw field values as assembled by the extractor, keyed by attribute name. */
export type FieldValues = Readonly<Record<string, unknown>>;

/** A nested typed element: a field table plus the function producing `T`. */
export interface ElementSchema<T> {
	readonly kind: 'schema';
	readonly name: string;
	readonly fields: FieldSpecTable;
	readonly construct: (values: FieldValues, context: ExtractionContext | null) => T;
}

/** What a field reads its source as: a scalar coercion or a nested element. */
export type ValueType<T> = Coercion<T> | ElementSchema<T>;

export function isElementSchema<T>(type: ValueType<T>): type is ElementSchema<T> {
	return type.kind === 'schema';
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/** A single-valued rule: one source, one value type, optional or required. */
export interface FieldRule<V extends ValueType<unknown>, R extends boolean> {
	readonly kind: 'field';
	readonly source: string;
	readonly type: V;
	readonly required: R;
}

/** A repeated-value rule: one output element per `<source>.LIST` node. */
export interface ListRule<V extends ValueType<unknown>> {
	readonly kind: 'list';
	readonly source: string;
	readonly type: V;
}

export function field<V extends ValueType<unknown>>(source: string, type: V): FieldRule<V, false>;
export function field<V extends ValueType<unknown>, R extends boolean>(source: string, type: V, required: R): FieldRule<V, R>;
export function field<V extends ValueType<unknown>>(source: string, type: V, required = false): FieldRule<V, boolean> {
	return { kind: 'field', source, type, required };
}

export function list<V extends ValueType<unknown>>(source: string, type: V): ListRule<V> {
	return { kind: 'list', source, type };
}

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

type AnyFieldRule = FieldRule<ValueType<unknown>, boolean>;

export interface FieldSpecTable {
	readonly attrs?: Readonly<Record<string, FieldRule<Coercion<unknown>, boolean>>>;
	readonly elements?: Readonly<Record<string, AnyFieldRule>>;
	readonly lists?: Readonly<Record<string, ListRule<ValueType<unknown>>>>;
	readonly multilines?: Readonly<Record<string, FieldRule<Coercion<string>, boolean>>>;
	readonly descendantElements?: Readonly<Record<string, AnyFieldRule>>;
}

/** Section names in the order the extractor runs them. */
export const SECTION_ORDER = ['attrs', 'elements', 'lists', 'multilines', 'descendantElements'] as const;

export type SectionName = (typeof SECTION_ORDER)[number];

// ---------------------------------------------------------------------------
// Output type inference
// ---------------------------------------------------------------------------

type ValueOf<V> = V extends ElementSchema<infer T> ? T : V extends Coercion<infer T> ? T : never;

type Nullable<T, R> = R extends true ? T : T | null;

type ElementOut<F> = F extends FieldRule<infer V, infer R> ? (V extends JoiningCoercion ? string : Nullable<ValueOf<V>, R>) : never;

type AttrOut<F> = F extends FieldRule<infer V, infer R> ? Nullable<ValueOf<V>, R> : never;

type ListOut<F> = F extends ListRule<infer V> ? ValueOf<V>[] : never;

type MultilineOut<F> = F extends FieldRule<ValueType<unknown>, infer R> ? Nullable<string, R> : never;

type Section<Tb, K extends SectionName> = Tb extends { readonly [P in K]: infer S } ? S : Record<never, never>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

/** The plain object a table produces. */
export type InferFields<Tb extends FieldSpecTable> = Simplify<
	{ [K in keyof Section<Tb, 'attrs'>]: AttrOut<Section<Tb, 'attrs'>[K]> } & { [K in keyof Section<Tb, 'elements'>]: ElementOut<Section<Tb, 'elements'>[K]> } & {
		[K in keyof Section<Tb, 'lists'>]: ListOut<Section<Tb, 'lists'>[K]>;
	} & { [K in keyof Section<Tb, 'multilines'>]: MultilineOut<Section<Tb, 'multilines'>[K]> } & {
		[K in keyof Section<Tb, 'descendantElements'>]: ElementOut<Section<Tb, 'descendantElements'>[K]>;
	}
>;

/** The value type an element schema produces. */
export type InferElement<S> = S extends ElementSchema<infer T> ? T : never;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** Declares a typed element whose value is the plain object of its fields. */
export function defineElement<Tb extends FieldSpecTable>(name: string, fields: Tb): ElementSchema<InferFields<Tb>> {
	return {
		kind: 'schema',
		name,
		fields,
		// The extractor assigns exactly the keys of `fields`, each read with its declared type
		construct: (values) => values as unknown as InferFields<Tb>,
	};
}

/**
 * Derives a schema that post-processes another schema's value, e.g. to add
 * properties computed from the fields or the extraction context.
 */
export function mapElement<T, U>(schema: ElementSchema<T>, fn: (value: T, context: ExtractionContext | null) => U, name: string = schema.name): ElementSchema<U> {
	return {
		kind: 'schema',
		name,
		fields: schema.fields,
		construct: (values, context) => fn(schema.construct(values, context), context),
	};
}
