/**
 * tally-connector — Tree-query helpers
 *
 * Every name comparison here is case-insensitive: Tally writes `UNIT`, a
 * field table may say `unit`, and both must meet. Attribute names are
 * matched the same way.
 *
 * The protocol's one structural convention also lives here: repeated values
 * of a field `X` are wrapped in elements named `X.LIST`, which
 * `listContainers` finds.
 */

import { isElement, isText, isCData, isDocument } from './types.ts';
import type { AnyNode, Document, Element } from './types.ts';

/** Suffix Tally appends to the name of a repeated-value container. */
export const LIST_SUFFIX = '.list';

/** Case-insensitive name equality. */
export function sameName(a: string, b: string): boolean {
	return a.length === b.length && a.toLowerCase() === b.toLowerCase();
}

/**
 * Concatenated text content of a node, like the DOM's `textContent`.
 * Non-text nodes contribute nothing; `null` / `undefined` gives `""`.
 */
export function textContent(node: AnyNode | null | undefined): string {
	if (node == null) return '';
	if (isText(node) || isCData(node)) return node.value;
	if (isElement(node) || isDocument(node)) {
		let out = '';
		for (const c of node.children) out += textContent(c);
		return out;
	}
	return '';
}

/** The first top-level element of a document, or `undefined`. */
export function rootElement(doc: Document): Element | undefined {
	return doc.children[0];
}

/** All direct child elements of `node`. */
export function childElements(node: Document | Element): Element[] {
	const out: Element[] = [];
	for (const c of node.children) {
		if (isElement(c)) out.push(c);
	}
	return out;
}

/** First direct child element named `name`, or `undefined`. */
export function child(node: Document | Element, name: string): Element | undefined {
	return childElements(node).find((c) => sameName(c.name, name));
}

/** All direct child elements named `name`, in document order. */
export function children(node: Document | Element, name: string): Element[] {
	return childElements(node).filter((c) => sameName(c.name, name));
}

/**
 * All elements named `name` anywhere below `node` (not `node` itself).
 * Depth-first, pre-order, so results follow document order.
 */
export function descendants(node: Document | Element, name: string): Element[] {
	const results: Element[] = [];
	collect(node, name, results);
	return results;
}

function collect(node: Document | Element, name: string, into: Element[]): void {
	for (const c of node.children) {
		if (!isElement(c)) continue;
		if (sameName(c.name, name)) into.push(c);
		collect(c, name, into);
	}
}

/** First element named `name` anywhere below `node`, or `undefined`. */
export function descendant(node: Document | Element, name: string): Element | undefined {
	for (const c of node.children) {
		if (!isElement(c)) continue;
		if (sameName(c.name, name)) return c;
		const found = descendant(c, name);
		if (found !== undefined) return found;
	}
	return undefined;
}

/** Every `<field>.LIST` container below `node`, in document order. */
export function listContainers(node: Document | Element, field: string): Element[] {
	return descendants(node, field + LIST_SUFFIX);
}

/** The value of the attribute named `name`, or `undefined`. */
export function attr(el: Element, name: string): string | undefined {
	return el.attributes.find((a) => sameName(a.name, name))?.value;
}

/** Whether `el` carries an attribute named `name`. */
export function hasAttr(el: Element, name: string): boolean {
	return el.attributes.some((a) => sameName(a.name, name));
}
