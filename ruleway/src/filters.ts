import { type LosslessNumber, isLosslessNumber, stringify } from "lossless-json";
import { RE2JS } from "re2js";

import { PatternError } from "./errors.ts";
import type { ParsedJson } from "./types.ts";

/** Outcome of a filter. `reason` is empty iff `accepted`. */
export interface FilterResult {
	readonly accepted: boolean;
	readonly reason: string;
}

export const ACCEPTED: FilterResult = Object.freeze({ accepted: true, reason: "" });

function reject(reason: string): FilterResult {
	return { accepted: false, reason };
}

/** Kinds a JSON value can have. Numbers split into int and float. */
export type ValueKind = "int" | "float" | "string" | "boolean" | "null" | "array" | "object";

export type NumberKind = "number" | "int" | "float";

const INT_TEXT = /^-?\d+$/;

// ── Leaves ──────────────────────────────────────────────────────────

export interface NumberBounds {
	readonly min?: number | null;
	readonly max?: number | null;
}

/**
 * Number of an exact kind, optionally within [min, max].
 *
 * Parsed numbers are ints iff their source text has no fraction or exponent
 * (`5` vs `5.0`); plain numbers are ints iff Number.isInteger.
 */
export class NumberFilter {
	readonly min: number | null;
	readonly max: number | null;

	constructor(
		readonly kind: NumberKind = "number",
		bounds: NumberBounds = {},
	) {
		this.min = bounds.min ?? null;
		this.max = bounds.max ?? null;
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		if (typeof value !== "number" && typeof value !== "bigint" && !isLosslessNumber(value)) {
			return mismatch(this.kind, value);
		}
		if (this.kind !== "number" && kindOf(value) !== this.kind) {
			return mismatch(this.kind, value);
		}
		if (this.min !== null && compareNumber(value, this.min) < 0) {
			return reject(`expected number >= ${this.min}, found ${numberText(value)}`);
		}
		if (this.max !== null && compareNumber(value, this.max) > 0) {
			return reject(`expected number <= ${this.max}, found ${numberText(value)}`);
		}
		return ACCEPTED;
	}
}

/** String, optionally containing a match for an RE2 pattern. */
export class StringFilter {
	private readonly compiled: RE2JS | null;

	constructor(readonly pattern: string | null = null) {
		if (pattern === null) {
			this.compiled = null;
		} else {
			try {
				this.compiled = RE2JS.compile(pattern);
			} catch (e) {
				throw new PatternError(
					`invalid regex pattern "${pattern}": ${e instanceof Error ? e.message : String(e)}`,
				);
			}
		}
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		if (typeof value !== "string") return mismatch("string", value);
		if (this.compiled !== null && !this.compiled.matcher(value).find()) {
			return reject(`expected string matching /${this.pattern}/, found '${value}'`);
		}
		return ACCEPTED;
	}
}

export class BooleanFilter {
	constructor() {
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		return typeof value === "boolean" ? ACCEPTED : mismatch("boolean", value);
	}
}

export class NullFilter {
	constructor() {
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		return value === null ? ACCEPTED : mismatch("null", value);
	}
}

// ── Composites ──────────────────────────────────────────────────────

/** Every element must pass `items`. Stops at the first failing index. */
export class ArrayFilter {
	constructor(readonly items: Filter) {
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		if (!isJsonArray(value)) return mismatch("array", value);
		for (const [i, element] of value.entries()) {
			const result = this.items.evaluate(element);
			if (!result.accepted) return reject(`${i}: ${result.reason}`);
		}
		return ACCEPTED;
	}
}

/** A declared key of an ObjectFilter. */
export interface ObjectEntry {
	readonly filter: Filter;
	readonly required: boolean;
}

/** Mark an object key as optional. */
export function optional(filter: Filter): ObjectEntry {
	return Object.freeze({ filter, required: false });
}

export interface ObjectFilterOptions {
	/** Accept keys that are not declared. Default false. */
	readonly allowExtra?: boolean;
}

/**
 * Keyed object. Declared keys are checked in declaration order; keys given
 * as a bare filter are required.
 *
 * An undeclared key is reported in property order, where integer-like keys
 * come first: `{"b": 1, "2": 1}` names `'2'`.
 */
export class ObjectFilter {
	readonly entries: ReadonlyMap<string, ObjectEntry>;
	readonly allowExtra: boolean;

	constructor(
		entries: Readonly<Record<string, Filter | ObjectEntry>>,
		options: ObjectFilterOptions = {},
	) {
		const map = new Map<string, ObjectEntry>();
		for (const [key, entry] of Object.entries(entries)) {
			map.set(key, isFilter(entry) ? Object.freeze({ filter: entry, required: true }) : entry);
		}
		this.entries = map;
		this.allowExtra = options.allowExtra ?? false;
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		if (!isJsonObject(value)) return mismatch("object", value);

		const leftover = new Set(Object.keys(value));
		for (const [key, entry] of this.entries) {
			const child = Object.hasOwn(value, key) ? value[key] : undefined;
			if (child === undefined) {
				if (entry.required) return reject(`entry with key '${key}' required`);
				continue;
			}
			const result = entry.filter.evaluate(child);
			if (!result.accepted) return reject(`${key}: ${result.reason}`);
			leftover.delete(key);
		}

		if (!this.allowExtra) {
			const [extra] = leftover;
			if (extra !== undefined) return reject(`unsupported key '${extra}'`);
		}
		return ACCEPTED;
	}
}

/** First alternative that accepts wins; otherwise all reasons are joined. */
export class OptionsFilter {
	readonly options: readonly Filter[];

	constructor(...options: readonly Filter[]) {
		this.options = Object.freeze([...options]);
		Object.freeze(this);
	}

	evaluate(value: ParsedJson): FilterResult {
		const reasons: string[] = [];
		for (const option of this.options) {
			const result = option.evaluate(value);
			if (result.accepted) return ACCEPTED;
			reasons.push(result.reason);
		}
		return reject(`value not allowed (${reasons.join(" or ")})`);
	}
}

/** Discriminated union of all filter types. */
export type Filter =
	| NumberFilter
	| StringFilter
	| BooleanFilter
	| NullFilter
	| ArrayFilter
	| ObjectFilter
	| OptionsFilter;

/** Evaluate any filter variant. */
export function evaluateFilter(filter: Filter, value: ParsedJson): FilterResult {
	return filter.evaluate(value);
}

export function isFilter(value: unknown): value is Filter {
	return (
		value instanceof NumberFilter ||
		value instanceof StringFilter ||
		value instanceof BooleanFilter ||
		value instanceof NullFilter ||
		value instanceof ArrayFilter ||
		value instanceof ObjectFilter ||
		value instanceof OptionsFilter
	);
}

/** Nesting depth of a filter tree. Leaves are 1. */
export function filterDepth(filter: Filter): number {
	if (filter instanceof ArrayFilter) return 1 + filterDepth(filter.items);
	if (filter instanceof ObjectFilter) {
		let max = 0;
		for (const entry of filter.entries.values()) max = Math.max(max, filterDepth(entry.filter));
		return 1 + max;
	}
	if (filter instanceof OptionsFilter) {
		return 1 + filter.options.reduce((max, f) => Math.max(max, filterDepth(f)), 0);
	}
	return 1;
}

// ── Value inspection ────────────────────────────────────────────────

export function kindOf(value: ParsedJson): ValueKind {
	if (value === null) return "null";
	if (typeof value === "string") return "string";
	if (typeof value === "boolean") return "boolean";
	if (typeof value === "number") return Number.isInteger(value) ? "int" : "float";
	if (typeof value === "bigint") return "int";
	if (isLosslessNumber(value)) return INT_TEXT.test(value.value) ? "int" : "float";
	if (isJsonArray(value)) return "array";
	return "object";
}

function isJsonArray(value: ParsedJson): value is readonly ParsedJson[] {
	return Array.isArray(value);
}

function isJsonObject(value: ParsedJson): value is { readonly [key: string]: ParsedJson } {
	return (
		typeof value === "object" && value !== null && !Array.isArray(value) && !isLosslessNumber(value)
	);
}

type NumberValue = number | bigint | LosslessNumber;

function numberText(value: NumberValue): string {
	return isLosslessNumber(value) ? value.value : String(value);
}

/**
 * Sign of `value - bound`. Integers are compared exactly against integral
 * bounds, so values past 2^53 are not rounded onto the bound.
 */
function compareNumber(value: NumberValue, bound: number): number {
	const exact = integerOf(value);
	if (exact !== null && Number.isInteger(bound)) {
		const b = BigInt(bound);
		return exact < b ? -1 : exact > b ? 1 : 0;
	}
	const n = isLosslessNumber(value) ? Number(value.value) : Number(value);
	return n < bound ? -1 : n > bound ? 1 : 0;
}

function integerOf(value: NumberValue): bigint | null {
	if (typeof value === "bigint") return value;
	if (typeof value === "number") return Number.isInteger(value) ? BigInt(value) : null;
	return INT_TEXT.test(value.value) ? BigInt(value.value) : null;
}

/** `'abc'` for strings, JSON text otherwise. */
function valueText(value: ParsedJson): string {
	if (typeof value === "string") return value;
	if (typeof value === "bigint") return String(value);
	return stringify(value) ?? String(value);
}

function mismatch(expected: NumberKind | ValueKind, value: ParsedJson): FilterResult {
	return reject(`expected ${expected}, found '${valueText(value)}' of type ${kindOf(value)}`);
}
