/**
 * tally-connector — error types
 *
 *   TallyConnectorError
 *   ├── TallyUnavailableError      transport could not complete the exchange
 *   ├── TallyResponseError         Tally answered, but not with a usable document
 *   ├── CoercionError              text could not be read as the field's type
 *   ├── ValueValidationError       text was read but the value is invalid
 *   ├── RequiredFieldError         a required field had no usable source data
 *   ├── AmbiguousMatchError        a single-valued rule matched several nodes
 *   ├── UnsupportedOperationError  base-class request body, etc.
 *   │   └── AttributeNotFoundError undeclared collection name
 *   └── ConfigError                invalid environment configuration
 */

/** Root of every error raised by this package. */
export class TallyConnectorError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TallyConnectorError';
	}
}

/**
 * The Tally server could not be reached: connection refused or reset, DNS
 * failure, or timeout. Reports recover from it through their response cache
 * when they have one.
 */
export class TallyUnavailableError extends TallyConnectorError {
	/** `http://host:port` that was tried. */
	readonly url: string;

	constructor(url: string, options?: { cause?: unknown }) {
		super(`Tally is not available at ${url}`, options);
		this.name = 'TallyUnavailableError';
		this.url = url;
	}
}

/** Tally answered with an HTTP error status. */
export class TallyResponseError extends TallyConnectorError {
	readonly status: number;

	constructor(status: number, message: string) {
		super(`Tally responded with HTTP ${status}: ${message}`);
		this.name = 'TallyResponseError';
		this.status = status;
	}
}

/**
 * Text could not be read as the requested type (a number that does not
 * parse, a malformed date). Benign: an optional field reads it as `null`.
 */
export class CoercionError extends TallyConnectorError {
	/** Name of the value type, e.g. `int`. */
	readonly valueType: string;
	readonly text: string;

	constructor(valueType: string, text: string, detail?: string) {
		super(`Cannot read ${JSON.stringify(text)} as ${valueType}${detail ? `: ${detail}` : ''}`);
		this.name = 'CoercionError';
		this.valueType = valueType;
		this.text = text;
	}
}

/**
 * A value is present but not acceptable (a yes/no flag reading `Maybe`).
 * Raised regardless of whether the field is optional.
 */
export class ValueValidationError extends TallyConnectorError {
	readonly valueType: string;
	readonly text: string;

	constructor(valueType: string, text: string, detail: string) {
		super(`Invalid ${valueType} value ${JSON.stringify(text)}: ${detail}`);
		this.name = 'ValueValidationError';
		this.valueType = valueType;
		this.text = text;
	}
}

/** A required field resolved to nothing. */
export class RequiredFieldError extends TallyConnectorError {
	/** Output attribute name. */
	readonly field: string;
	/** Name of the schema being extracted. */
	readonly schema: string;
	/** Source element or attribute name the rule reads. */
	readonly source: string;
	/** How many candidate nodes the rule found. */
	readonly candidates: number;

	constructor(schema: string, field: string, source: string, candidates: number, reason: string, options?: { cause?: unknown }) {
		super(`${schema}.${field}: required field <${source}> ${reason} (${candidates} candidate${candidates === 1 ? '' : 's'})`, options);
		this.name = 'RequiredFieldError';
		this.schema = schema;
		this.field = field;
		this.source = source;
		this.candidates = candidates;
	}
}

/**
 * More than one node matched a rule that expects a single value. The field
 * table and the document disagree, so this is raised even for optional
 * fields.
 */
export class AmbiguousMatchError extends TallyConnectorError {
	readonly field: string;
	readonly schema: string;
	readonly source: string;
	readonly candidates: number;

	constructor(schema: string, field: string, source: string, candidates: number) {
		super(`${schema}.${field}: expected at most one <${source}>, found ${candidates}`);
		this.name = 'AmbiguousMatchError';
		this.schema = schema;
		this.field = field;
		this.source = source;
		this.candidates = candidates;
	}
}

/** An operation the receiver does not implement. */
export class UnsupportedOperationError extends TallyConnectorError {
	constructor(message: string) {
		super(message);
		this.name = 'UnsupportedOperationError';
	}
}

/** A collection was requested by a name the report does not declare. */
export class AttributeNotFoundError extends UnsupportedOperationError {
	readonly attribute: string;

	constructor(owner: string, attribute: string) {
		super(`${owner} has no collection named ${JSON.stringify(attribute)}`);
		this.name = 'AttributeNotFoundError';
		this.attribute = attribute;
	}
}

/** The environment does not describe a usable configuration. */
export class ConfigError extends TallyConnectorError {
	readonly issues: ReadonlyArray<string>;

	constructor(issues: ReadonlyArray<string>) {
		super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}
