/**
 * tally-connector — Recursive-descent XML parser
 *
 * Design goals
 * ─────────────
 * • Parse what Tally actually sends: upper-case tag names with dots and
 *   `UDF:` prefixes, undeclared entities, UTF-16 payloads, and the odd
 *   unbalanced closing tag from a truncated export.
 * • Small documents, no streaming. Plain-object output.
 * • Only elements, text and CDATA are kept; comments, processing
 *   instructions, the XML declaration and DOCTYPE are consumed and dropped.
 *
 * Tolerance specifics
 * ────────────────────
 * • Unknown named entity references (e.g. `&nbsp;`) are left verbatim.
 * • Character references are expanded even when they denote control
 *   characters (Tally writes `&#4;` in some names).
 * • A closing tag that matches an ancestor closes every element in between.
 *   A closing tag that matches nothing open is skipped.
 * • End of input closes every open element.
 * • Attribute values may use either quote style, or none; a bare attribute
 *   name has the value `""`.
 * • The BOM (U+FEFF) at the start of the stream is skipped.
 */

import { TextDecoder } from 'node:util';
import type { Attribute, ChildNode, Document, Element, Text, CData } from './types.ts';
import { isXmlWhitespace, isNameStartChar, isNameChar, isHexDigit, isDecimalDigit } from './chars.ts';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** The five predefined XML entities. Unknown entities are left verbatim. */
const PREDEFINED_ENTITIES: Readonly<Record<string, string>> = {
	amp: '&',
	lt: '<',
	gt: '>',
	apos: "'",
	quot: '"',
};

// ---------------------------------------------------------------------------
// Public error type
// ---------------------------------------------------------------------------

/**
 * Thrown when the input cannot produce a tree at all, which in practice
 * means there is no element in it (Tally answers some bad requests with a
 * bare line of text).
 */
export class ParseError extends Error {
	/** Offset in the source string where the problem was detected. */
	readonly position: number;
	/** 1-based line number. */
	readonly line: number;
	/** 1-based column number. */
	readonly column: number;

	constructor(message: string, position: number, line: number, column: number) {
		super(`${message} (line ${line}, col ${column})`);
		this.name = 'XmlParseError';
		this.position = position;
		this.line = line;
		this.column = column;
	}
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class XmlParser {
	private readonly src: string;
	private pos = 0;

	/** Lower-cased names of the elements currently open, outermost first. */
	private readonly open: string[] = [];

	constructor(src: string) {
		this.src = src;
	}

	// -------------------------------------------------------------------------
	// Public entry point
	// -------------------------------------------------------------------------

	parse(): Document {
		if (this.src.charCodeAt(0) === 0xfeff) this.pos = 1;

		const children: Element[] = [];

		while (this.pos < this.src.length) {
			this.skipWhitespace();
			if (this.pos >= this.src.length) break;

			if (this.skipMarkup()) continue;

			if (this.current() === '<' && isNameStartChar(this.src.charCodeAt(this.pos + 1))) {
				children.push(this.parseElement());
			} else if (this.startsWith('</')) {
				// Closing tag with nothing open
				this.skipPast('>');
			} else if (children.length === 0) {
				throw this.error('No root element found');
			} else {
				// Trailing garbage after the root
				this.skipToNext('<');
			}
		}

		if (children.length === 0) {
			throw this.error('No root element found');
		}

		return { type: 'document', children };
	}

	// -------------------------------------------------------------------------
	// Markup that produces no node
	// -------------------------------------------------------------------------

	/**
	 * Consumes a comment, processing instruction / XML declaration, or
	 * DOCTYPE at the cursor. Returns `false` when none is there.
	 */
	private skipMarkup(): boolean {
		if (this.startsWith('<!--')) {
			this.skipPast('-->');
			return true;
		}
		if (this.startsWith('<?')) {
			this.skipPast('?>');
			return true;
		}
		if (this.startsWithIgnoreCase('<!DOCTYPE')) {
			this.skipDoctype();
			return true;
		}
		return false;
	}

	private skipDoctype(): void {
		this.advanceBy('<!DOCTYPE'.length);
		while (this.pos < this.src.length && this.current() !== '>') {
			if (this.current() === '[') {
				// Internal subset: scan for the matching ']', respecting quoted strings
				this.advance();
				while (this.pos < this.src.length && this.current() !== ']') {
					const q = this.current();
					this.advance();
					if (q === '"' || q === "'") this.skipPast(q);
				}
			}
			this.advance();
		}
		if (this.current() === '>') this.advance();
	}

	// -------------------------------------------------------------------------
	// Element
	// -------------------------------------------------------------------------

	private parseElement(): Element {
		this.expect('<');
		const name = this.parseName();
		this.skipWhitespace();

		const attributes: Attribute[] = [];

		while (this.pos < this.src.length && this.current() !== '>' && !this.startsWith('/>')) {
			if (!isNameStartChar(this.src.charCodeAt(this.pos))) {
				// Garbage character inside the tag
				this.advance();
				continue;
			}

			const attrName = this.parseName();
			this.skipWhitespace();
			let value = '';
			if (this.current() === '=') {
				this.advance();
				this.skipWhitespace();
				value = this.parseAttributeValue();
				this.skipWhitespace();
			}
			attributes.push({ name: attrName, value });
		}

		const children: ChildNode[] = [];

		if (this.startsWith('/>')) {
			this.advanceBy(2);
		} else if (this.current() === '>') {
			this.advance();
			this.open.push(name.toLowerCase());
			this.parseChildren(children);
			this.open.pop();
		}
		// Otherwise input ended inside the tag: an empty element

		return { type: 'element', name, attributes, children };
	}

	/**
	 * Reads child nodes until the closing tag of the innermost open element,
	 * or until a closing tag for one of its ancestors, which is left in place
	 * for that ancestor to consume.
	 */
	private parseChildren(into: ChildNode[]): void {
		while (this.pos < this.src.length) {
			if (this.startsWith('</')) {
				const start = this.pos;
				this.advanceBy(2);
				const closing = (this.tryParseName() ?? '').toLowerCase();
				this.skipPast('>');

				const depth = this.open.lastIndexOf(closing);
				if (depth === this.open.length - 1) return;
				if (depth !== -1) {
					// Closes an ancestor: end this element without consuming the tag
					this.pos = start;
					return;
				}
				// Matches nothing open: drop it
				continue;
			}

			if (this.startsWith('<![CDATA[')) {
				into.push(this.parseCData());
			} else if (this.skipMarkup()) {
				continue;
			} else if (this.current() === '<' && isNameStartChar(this.src.charCodeAt(this.pos + 1))) {
				into.push(this.parseElement());
			} else {
				const text = this.parseText();
				if (text.value.length > 0) into.push(text);
			}
		}
	}

	// -------------------------------------------------------------------------
	// Leaf nodes
	// -------------------------------------------------------------------------

	private parseCData(): CData {
		this.expect('<![CDATA[');
		const start = this.pos;
		const end = this.src.indexOf(']]>', this.pos);
		if (end === -1) {
			this.pos = this.src.length;
			return { type: 'cdata', value: this.src.slice(start) };
		}
		this.pos = end + 3;
		return { type: 'cdata', value: this.src.slice(start, end) };
	}

	/**
	 * Reads text up to the next tag. A `<` that cannot open a tag is kept as
	 * text.
	 */
	private parseText(): Text {
		const parts: string[] = [];

		if (this.current() === '<') {
			parts.push('<');
			this.advance();
		}

		while (this.pos < this.src.length && this.current() !== '<') {
			if (this.current() === '&') {
				parts.push(this.parseEntityRef());
				continue;
			}
			const next = this.nextSpecialInText();
			const end = next === -1 ? this.src.length : next;
			parts.push(this.src.slice(this.pos, end));
			this.pos = end;
		}

		return { type: 'text', value: parts.join('') };
	}

	/** Returns the position of the next `<` or `&` at or after `this.pos`. */
	private nextSpecialInText(): number {
		const lt = this.src.indexOf('<', this.pos);
		const amp = this.src.indexOf('&', this.pos);
		if (lt === -1) return amp;
		if (amp === -1) return lt;
		return Math.min(lt, amp);
	}

	// -------------------------------------------------------------------------
	// Entity references
	// -------------------------------------------------------------------------

	private parseEntityRef(): string {
		this.advance(); // skip &

		if (this.current() === '#') {
			this.advance();
			return this.parseCharRef();
		}

		const start = this.pos;
		while (this.pos < this.src.length && /[A-Za-z0-9]/.test(this.current())) {
			this.pos++;
		}
		const name = this.src.slice(start, this.pos);
		const terminated = this.current() === ';';
		if (terminated) this.advance();

		const resolved = PREDEFINED_ENTITIES[name];
		if (resolved !== undefined) return resolved;

		// Bare & — preserve literally
		if (name.length === 0) return '&';

		return terminated ? `&${name};` : `&${name}`;
	}

	private parseCharRef(): string {
		let digits = '';
		let radix = 10;

		if (this.current() === 'x' || this.current() === 'X') {
			this.advance();
			radix = 16;
			while (this.pos < this.src.length && isHexDigit(this.src.charCodeAt(this.pos))) {
				digits += this.src[this.pos++];
			}
		} else {
			while (this.pos < this.src.length && isDecimalDigit(this.src.charCodeAt(this.pos))) {
				digits += this.src[this.pos++];
			}
		}

		if (this.current() === ';') this.advance();

		const codePoint = digits.length > 0 ? parseInt(digits, radix) : 0;
		if (codePoint === 0 || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
			return '\ufffd';
		}
		return String.fromCodePoint(codePoint);
	}

	// -------------------------------------------------------------------------
	// Attribute values
	// -------------------------------------------------------------------------

	private parseAttributeValue(): string {
		const quote = this.current();
		if (quote !== '"' && quote !== "'") {
			// Bare value — read until whitespace, > or />
			const start = this.pos;
			while (this.pos < this.src.length && !isXmlWhitespace(this.src.charCodeAt(this.pos)) && this.current() !== '>' && !this.startsWith('/>')) {
				this.pos++;
			}
			return this.src.slice(start, this.pos);
		}

		this.advance();
		const parts: string[] = [];
		while (this.pos < this.src.length && this.current() !== quote) {
			if (this.current() === '&') {
				parts.push(this.parseEntityRef());
				continue;
			}
			const close = this.src.indexOf(quote, this.pos);
			const amp = this.src.indexOf('&', this.pos);
			let end = close === -1 ? this.src.length : close;
			if (amp !== -1 && amp < end) end = amp;
			parts.push(this.src.slice(this.pos, end));
			this.pos = end;
		}
		if (this.pos < this.src.length) this.advance(); // closing quote
		return parts.join('');
	}

	// -------------------------------------------------------------------------
	// Names
	// -------------------------------------------------------------------------

	private parseName(): string {
		const name = this.tryParseName();
		if (name === null) {
			throw this.error(`Expected a name, got ${JSON.stringify(this.current())}`);
		}
		return name;
	}

	private tryParseName(): string | null {
		if (!isNameStartChar(this.src.charCodeAt(this.pos))) return null;
		const start = this.pos;
		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
		return this.src.slice(start, this.pos);
	}

	// -------------------------------------------------------------------------
	// Low-level cursor helpers
	// -------------------------------------------------------------------------

	private current(): string {
		return this.src[this.pos] ?? '';
	}

	private advance(): void {
		this.pos++;
	}

	private advanceBy(n: number): void {
		this.pos += n;
	}

	private startsWith(str: string): boolean {
		return this.src.startsWith(str, this.pos);
	}

	private startsWithIgnoreCase(str: string): boolean {
		return this.src.slice(this.pos, this.pos + str.length).toUpperCase() === str;
	}

	private expect(str: string): void {
		if (!this.src.startsWith(str, this.pos)) {
			throw this.error(`Expected ${JSON.stringify(str)}, got ${JSON.stringify(this.src.slice(this.pos, this.pos + str.length))}`);
		}
		this.pos += str.length;
	}

	private skipWhitespace(): void {
		while (this.pos < this.src.length && isXmlWhitespace(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
	}

	/** Moves the cursor to the given string, or to the end of input. */
	private skipToNext(str: string): void {
		const idx = this.src.indexOf(str, this.pos);
		this.pos = idx === -1 ? this.src.length : idx;
	}

	/** Moves the cursor just past the given string, or to the end of input. */
	private skipPast(str: string): void {
		const idx = this.src.indexOf(str, this.pos);
		this.pos = idx === -1 ? this.src.length : idx + str.length;
	}

	// -------------------------------------------------------------------------
	// Error helper
	// -------------------------------------------------------------------------

	private error(message: string): ParseError {
		let line = 1;
		let col = 1;
		for (let i = 0; i < this.pos && i < this.src.length; i++) {
			if (this.src.charCodeAt(i) === 0x0a) {
				line++;
				col = 1;
			} else {
				col++;
			}
		}
		return new ParseError(message, this.pos, line, col);
	}
}

// ---------------------------------------------------------------------------
// Byte decoding
// ---------------------------------------------------------------------------

/**
 * Picks the text encoding of a raw response. Tally answers requests made
 * with `ENCODINGTYPE` `UNICODE` in UTF-16LE, usually but not always behind a
 * BOM; everything else is treated as UTF-8.
 */
export function detectEncoding(bytes: Uint8Array): 'utf-8' | 'utf-16le' | 'utf-16be' {
	const [b0, b1] = bytes;
	if (b0 === 0xff && b1 === 0xfe) return 'utf-16le';
	if (b0 === 0xfe && b1 === 0xff) return 'utf-16be';
	if (b0 !== undefined && b0 !== 0 && b1 === 0) return 'utf-16le';
	return 'utf-8';
}

/**
 * Decodes a raw response body. Malformed byte sequences become U+FFFD
 * rather than failing the whole document; a BOM is dropped.
 */
export function decodeXml(bytes: Uint8Array): string {
	return new TextDecoder(detectEncoding(bytes), { fatal: false }).decode(bytes);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses an XML string into a `Document` tree of plain JS objects.
 *
 * @throws {ParseError} when the input contains no element at all.
 */
export function parse(xml: string): Document {
	return new XmlParser(xml).parse();
}

/** Decodes and parses a raw response body. */
export function parseBytes(bytes: Uint8Array): Document {
	return parse(decodeXml(bytes));
}
