/**
 * tally-connector — character classification for the tokenizer
 *
 * Functions take numeric code points (from `charCodeAt`). Tally writes tag
 * names such as `LEDGER.LIST`, `UDF:GSTIN.LIST` and `OLDAUDITENTRYIDS.LIST`,
 * and some exports carry names XML would reject (a leading digit after a
 * prefix, stray punctuation). Names are therefore delimited by the
 * characters that can end them rather than validated against XML's Name
 * production.
 */

/** XML whitespace: space, tab, carriage-return, newline. */
export function isXmlWhitespace(code: number): boolean {
	return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}

/** Characters that always end a tag or attribute name. */
function isNameDelimiter(code: number): boolean {
	switch (code) {
		case 0x3c: // <
		case 0x3e: // >
		case 0x2f: // /
		case 0x3d: // =
		case 0x22: // "
		case 0x27: // '
		case 0x26: // &
			return true;
		default:
			return isXmlWhitespace(code);
	}
}

/**
 * May start a name. Rejects the delimiters plus `!`, `?` and `-`, which
 * introduce comments, declarations and processing instructions.
 */
export function isNameStartChar(code: number): boolean {
	if (Number.isNaN(code)) return false;
	if (code === 0x21 || code === 0x3f || code === 0x2d) return false; // ! ? -
	return !isNameDelimiter(code);
}

/** May continue a name. */
export function isNameChar(code: number): boolean {
	if (Number.isNaN(code)) return false;
	return !isNameDelimiter(code);
}

/** ASCII hex digit [0-9A-Fa-f]. */
export function isHexDigit(code: number): boolean {
	return (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

/** ASCII decimal digit [0-9]. */
export function isDecimalDigit(code: number): boolean {
	return code >= 0x30 && code <= 0x39;
}
