import { RE2JS } from "re2js";

import { ConversionError, PatternError } from "./errors.ts";

/**
 * Parses one generic path segment into a typed value.
 *
 * Throws ConversionError for malformed input; the pattern matcher treats that
 * as a non-match. Any other exception propagates.
 */
export interface Converter<T> {
	readonly name: string;
	parse(segment: string): T;
}

const INT_SYNTAX = /^[+-]?\d+$/;
const FLOAT_SYNTAX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

/** Signed decimal integer within the safe-integer range. */
export class IntConverter implements Converter<number> {
	readonly name = "int";

	parse(segment: string): number {
		if (!INT_SYNTAX.test(segment)) throw new ConversionError(this.name, segment);
		const value = Number(segment);
		if (!Number.isSafeInteger(value)) throw new ConversionError(this.name, segment);
		return value;
	}
}

/** Decimal number with optional fraction and exponent, or inf/nan. */
export class FloatConverter implements Converter<number> {
	readonly name = "float";

	parse(segment: string): number {
		if (FLOAT_SYNTAX.test(segment)) return Number(segment);
		const special = FLOAT_SPECIAL.exec(segment);
		if (special === null) throw new ConversionError(this.name, segment);
		if (special[2]?.toLowerCase() === "nan") return Number.NaN;
		return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
	}
}

/** Identity. Accepts any text, including the empty string. */
export class StringConverter implements Converter<string> {
	readonly name = "str";

	parse(segment: string): string {
		return segment;
	}
}

/**
 * Accepts a segment only if an RE2 pattern matches all of it.
 *
 * RE2 runs in linear time; backreferences and lookaround are rejected at
 * construction.
 */
export class RegexConverter implements Converter<string> {
	readonly name: string;
	private readonly compiled: RE2JS;

	constructor(readonly pattern: string) {
		try {
			this.compiled = RE2JS.compile(pattern);
		} catch (e) {
			throw new PatternError(
				`invalid regex pattern "${pattern}": ${e instanceof Error ? e.message : String(e)}`,
			);
		}
		this.name = `regex(${pattern})`;
	}

	parse(segment: string): string {
		if (!this.compiled.matcher(segment).matches()) {
			throw new ConversionError(this.name, segment);
		}
		return segment;
	}
}

export const INT = new IntConverter();
export const FLOAT = new FloatConverter();
export const STR = new StringConverter();

/** Type guard separating converters from literal pattern parts. */
export function isConverter(part: unknown): part is Converter<unknown> {
	return (
		typeof part === "object" &&
		part !== null &&
		"parse" in part &&
		typeof part.parse === "function" &&
		"name" in part &&
		typeof part.name === "string"
	);
}
