import { isLosslessNumber, parse } from "lossless-json";

import {
	BodyRequiredError,
	MalformedBodyError,
	PayloadTooLargeError,
	ShapeValidationError,
	UnsupportedMediaTypeError,
} from "./errors.ts";
import { type Filter, type FilterResult, evaluateFilter, kindOf } from "./filters.ts";
import { type Logger, noopLogger } from "./logger.ts";
import { mediaTypeTokens } from "./rules.ts";
import type { JsonValue, ParsedJson, RequestDescriptor } from "./types.ts";

/** Default cap on body bytes read by JsonBodyParser (1 MiB). */
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface JsonBodyParserOptions {
	readonly maxBodyBytes?: number;
	readonly logger?: Logger;
}

/** A request body that parsed and, if a filter was given, passed it. */
export interface ParsedBody {
	readonly raw: Uint8Array;
	readonly json: JsonValue;
}

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Parse JSON text, keeping each number's source text.
 *
 * Throws MalformedBodyError for anything that is not a single JSON value.
 */
export function parseJsonText(text: string): ParsedJson {
	let parsed: unknown;
	try {
		parsed = parse(text);
	} catch (e) {
		throw new MalformedBodyError(
			e instanceof SyntaxError ? `Invalid JSON: ${e.message}` : "Invalid JSON",
		);
	}
	return asParsedJson(parsed);
}

/** Run a filter and throw ShapeValidationError on rejection. */
export function validateJson(filter: Filter, value: ParsedJson): void {
	const result: FilterResult = evaluateFilter(filter, value);
	if (!result.accepted) throw new ShapeValidationError(result.reason);
}

/**
 * Replace parsed numbers with plain numbers. Integers outside the safe range
 * become `bigint` so no digits are lost.
 */
export function toPlainJson(value: ParsedJson): JsonValue {
	if (value === null || typeof value !== "object") return value;
	if (isLosslessNumber(value)) {
		const n = Number(value.value);
		if (kindOf(value) === "int" && !Number.isSafeInteger(n)) return BigInt(value.value);
		return n;
	}
	if (isParsedArray(value)) return value.map(toPlainJson);
	const out: Record<string, JsonValue> = {};
	for (const [key, child] of Object.entries(value)) {
		Object.defineProperty(out, key, {
			value: toPlainJson(child),
			enumerable: true,
			writable: true,
			configurable: true,
		});
	}
	return out;
}

/**
 * Reads a request body once, parses it as JSON and runs an optional filter.
 *
 * Holds no per-request state: one instance serves concurrent requests.
 */
export class JsonBodyParser {
	readonly maxBodyBytes: number;
	private readonly logger: Logger;

	constructor(
		readonly filter: Filter | null = null,
		options: JsonBodyParserOptions = {},
	) {
		this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
		this.logger = options.logger ?? noopLogger;
		Object.freeze(this);
	}

	async parse(req: RequestDescriptor): Promise<ParsedBody> {
		const raw = await readBody(req, "json", this.maxBodyBytes);
		const text = decodeUtf8(raw);
		if (text === null) throw new MalformedBodyError("Invalid JSON: body is not UTF-8");

		const parsed = parseJsonText(text);
		if (this.filter !== null) {
			const result = evaluateFilter(this.filter, parsed);
			if (!result.accepted) {
				this.logger.debug("body rejected", { path: req.path, reason: result.reason });
				throw new ShapeValidationError(result.reason);
			}
		}
		return { raw, json: toPlainJson(parsed) };
	}
}

/**
 * Content-type token check, then a single read of at most Content-Length
 * bytes (0 when absent). A declared length over `maxBodyBytes` is refused
 * before anything is read.
 */
export async function readBody(
	req: RequestDescriptor,
	token: string,
	maxBodyBytes: number,
): Promise<Uint8Array> {
	if (req.contentType === null) throw new BodyRequiredError();
	if (!mediaTypeTokens(req.contentType).includes(token)) {
		throw new UnsupportedMediaTypeError(`Only ${token} content is allowed.`);
	}
	if (req.body === null) throw new BodyRequiredError();

	const length = req.contentLength ?? 0;
	if (length > maxBodyBytes) throw new PayloadTooLargeError(length, maxBodyBytes);
	return req.body.read(length);
}

/** Strict UTF-8 decode; null when the bytes are not UTF-8. */
export function decodeUtf8(raw: Uint8Array): string | null {
	try {
		return decoder.decode(raw);
	} catch (e) {
		if (e instanceof TypeError) return null;
		throw e;
	}
}

function isParsedArray(value: ParsedJson): value is readonly ParsedJson[] {
	return Array.isArray(value);
}

/** lossless-json yields only JSON shapes; this narrows its `unknown`. */
function asParsedJson(value: unknown): ParsedJson {
	if (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		isLosslessNumber(value)
	) {
		return value;
	}
	if (Array.isArray(value)) return value.map(asParsedJson);
	if (typeof value === "object") {
		const out: Record<string, ParsedJson> = {};
		for (const [key, child] of Object.entries(value)) {
			Object.defineProperty(out, key, {
				value: asParsedJson(child),
				enumerable: true,
				writable: true,
				configurable: true,
			});
		}
		return out;
	}
	throw new MalformedBodyError();
}
