import {
	type HttpError,
	MethodNotAllowedError,
	RouteNotFoundError,
	UnsupportedMediaTypeError,
} from "./errors.ts";
import type { PathPattern } from "./pattern.ts";
import type { RequestDescriptor } from "./types.ts";

/** Captures of a rule that extracts nothing. */
export const NO_CAPTURES: readonly unknown[] = Object.freeze([]);

/**
 * One matching dimension of the router.
 *
 * `E` is the expected value each route supplies for this dimension. `check`
 * alone decides whether a route stays a candidate. Rules are shared by
 * concurrent requests: anything a match extracts is returned from `capture`,
 * never kept on the rule.
 */
export interface Rule<E> {
	readonly name: string;

	check(req: RequestDescriptor, expected: E): boolean;

	/**
	 * Values extracted from a request that passed `check`, in order.
	 * Rules that extract nothing leave this out.
	 */
	capture?(req: RequestDescriptor, expected: E): readonly unknown[];

	/**
	 * Error raised when this dimension filters out every candidate.
	 * `expected` holds the values of the routes that were still candidates.
	 */
	errorFor(expected: readonly E[]): HttpError;

	/** Stable text for an expected value, used for logs and duplicate detection. */
	describe(expected: E): string;
}

/** Matches the request path against the route's PathPattern. */
export class PathRule implements Rule<PathPattern> {
	readonly name = "path";

	constructor() {
		Object.freeze(this);
	}

	check(req: RequestDescriptor, expected: PathPattern): boolean {
		return expected.match(req.path) !== null;
	}

	capture(req: RequestDescriptor, expected: PathPattern): readonly unknown[] {
		return expected.match(req.path) ?? NO_CAPTURES;
	}

	errorFor(): HttpError {
		return new RouteNotFoundError();
	}

	describe(expected: PathPattern): string {
		return expected.toString();
	}
}

/** Exact, case-sensitive method comparison. */
export class MethodRule implements Rule<string> {
	readonly name = "method";

	constructor() {
		Object.freeze(this);
	}

	check(req: RequestDescriptor, expected: string): boolean {
		return req.method === expected;
	}

	errorFor(expected: readonly string[]): HttpError {
		return new MethodNotAllowedError([...new Set(expected)]);
	}

	describe(expected: string): string {
		return expected;
	}
}

/**
 * Content-type comparison.
 *
 * - `null` matches only a request without a content-type.
 * - A value containing `/` must equal the request content-type.
 * - A bare token matches one of the `+`-separated parts after the `/`:
 *   `json` matches `application/json` and `application/vnd.api+json`.
 */
export class ContentTypeRule implements Rule<string | null> {
	readonly name = "content_type";

	constructor() {
		Object.freeze(this);
	}

	check(req: RequestDescriptor, expected: string | null): boolean {
		const actual = req.contentType;
		if (actual === null) return expected === null;
		if (expected === null) return false;
		if (expected.includes("/")) return expected === actual;
		return mediaTypeTokens(actual).includes(expected);
	}

	errorFor(): HttpError {
		return new UnsupportedMediaTypeError();
	}

	describe(expected: string | null): string {
		return expected ?? "<none>";
	}
}

/** `application/vnd.api+json` → ["vnd.api", "json"]. Empty without a `/`. */
export function mediaTypeTokens(contentType: string): string[] {
	const subtype = contentType.split("/")[1];
	return subtype === undefined ? [] : subtype.split("+");
}

export const METHOD_RULE = new MethodRule();
export const CONTENT_TYPE_RULE = new ContentTypeRule();
