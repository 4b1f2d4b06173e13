/**
 * tally-connector — XML node model
 *
 * The tree produced by `parse()` and consumed by the query helpers and the
 * field extractor. Nodes are plain JS objects.
 *
 *   Node
 *   ├── Document
 *   ├── Element
 *   ├── Text
 *   └── CData
 *
 * Tally's export protocol declares no namespaces, so a prefix such as `UDF:`
 * stays part of the element name. Names keep the case they were written in;
 * lookups in query.ts compare them case-insensitively.
 */

// ---------------------------------------------------------------------------
// Discriminant
// ---------------------------------------------------------------------------

/** All legal values of `node.type`. */
export type NodeType = 'document' | 'element' | 'text' | 'cdata';

/** Common root of every XML node. */
export interface Node {
	readonly type: NodeType;
}

// ---------------------------------------------------------------------------
// Concrete node types
// ---------------------------------------------------------------------------

/** A single attribute on an element, in document order. */
export interface Attribute {
	/** Attribute name as written, including any prefix. */
	readonly name: string;
	/** Decoded attribute value (entity references have been expanded). */
	readonly value: string;
}

/** A run of character data between element tags. */
export interface Text extends Node {
	readonly type: 'text';
	/** Decoded text content. */
	readonly value: string;
}

/** A CDATA section; its content is kept verbatim. */
export interface CData extends Node {
	readonly type: 'cdata';
	readonly value: string;
}

/** An element: `<NAME attr="val">…</NAME>`. */
export interface Element extends Node {
	readonly type: 'element';
	/** Tag name as written, e.g. `UNIT`, `LEDGER.LIST` or `UDF:GSTIN`. */
	readonly name: string;
	readonly attributes: ReadonlyArray<Attribute>;
	/** Child nodes in document order. */
	readonly children: ReadonlyArray<ChildNode>;
}

/** All node types that may appear as children of an `Element`. */
export type ChildNode = Element | Text | CData;

/**
 * The root document node. Comments, processing instructions, the XML
 * declaration and any DOCTYPE are dropped while parsing, so only elements
 * remain at the top level.
 */
export interface Document extends Node {
	readonly type: 'document';
	readonly children: ReadonlyArray<Element>;
}

/** Union of every node type. */
export type AnyNode = Document | Element | Text | CData;

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isDocument(node: Node): node is Document {
	return node.type === 'document';
}

export function isElement(node: Node): node is Element {
	return node.type === 'element';
}

export function isText(node: Node): node is Text {
	return node.type === 'text';
}

export function isCData(node: Node): node is CData {
	return node.type === 'cdata';
}
