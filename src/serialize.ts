/**
 * tally-connector — element builders and XML serializer
 *
 * Request envelopes are assembled as plain `Element` trees with the
 * builders below and rendered with `serialize()`. Output has no XML
 * declaration and no indentation; Tally accepts it as sent.
 */

import type { AnyNode, Attribute, ChildNode, Element } from './types.ts';

// ---------------------------------------------------------------------------
// Escaping helpers
// ---------------------------------------------------------------------------

/** Escape characters that are special in XML text content. */
function escapeText(s: string): string {
	return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Escape characters that are special inside a double-quoted attribute value. */
function escapeAttr(s: string): string {
	return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/"/g, '&quot;');
}

/** Split a CDATA value wherever it contains the `]]>` end-marker. */
function escapeCData(value: string): string {
	return value.split(']]>').join(']]]><![CDATA[]>');
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/** Attributes as accepted by the builders: a name → value record. */
export type AttributeMap = Readonly<Record<string, string>>;

function toAttributes(attrs: AttributeMap | undefined): Attribute[] {
	if (attrs === undefined) return [];
	return Object.entries(attrs).map(([name, value]) => ({ name, value }));
}

/**
 * Builds an element. Strings among `content` become text nodes.
 *
 * ```ts
 * element('DESC', {}, [element('STATICVARIABLES', {}, [textElement('SVEXPORTFORMAT', '$$SysName:XML')])]);
 * ```
 */
export function element(name: string, attrs?: AttributeMap, content: ReadonlyArray<ChildNode | string> = []): Element {
	const children = content.map((c): ChildNode => (typeof c === 'string' ? { type: 'text', value: c } : c));
	return { type: 'element', name, attributes: toAttributes(attrs), children };
}

/** Builds an element holding a single run of text. */
export function textElement(name: string, text: string, attrs?: AttributeMap): Element {
	return element(name, attrs, [text]);
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function serializeAttr(a: Attribute): string {
	return `${a.name}="${escapeAttr(a.value)}"`;
}

/**
 * Serialize a node (or complete document) to an XML string.
 *
 * - `Document` → its elements concatenated.
 * - `Element`  → `<TAG attrs>…</TAG>`, or `<TAG attrs/>` when childless.
 * - `Text`     → character-escaped text.
 * - `CData`    → `<![CDATA[…]]>`, splitting on embedded `]]>`.
 */
export function serialize(node: AnyNode): string {
	switch (node.type) {
		case 'document':
			return node.children.map(serialize).join('');

		case 'text':
			return escapeText(node.value);

		case 'cdata':
			return `<![CDATA[${escapeCData(node.value)}]]>`;

		case 'element': {
			const attrStr = node.attributes.length > 0 ? ` ${node.attributes.map(serializeAttr).join(' ')}` : '';
			if (node.children.length === 0) return `<${node.name}${attrStr}/>`;
			return `<${node.name}${attrStr}>${node.children.map(serialize).join('')}</${node.name}>`;
		}
	}
}
