import type { LosslessNumber } from "lossless-json";

/**
 * Plain JSON value, as handed to application code. Integers outside the safe
 * range are `bigint`.
 */
export type JsonValue =
	| string
	| number
	| bigint
	| boolean
	| null
	| readonly JsonValue[]
	| { readonly [key: string]: JsonValue };

/**
 * JSON value as produced by the body parser.
 *
 * Numbers keep their source text so `5` (int) and `5.0` (float) stay apart.
 * Filters accept both this and plain JsonValue.
 */
export type ParsedJson =
	| string
	| number
	| bigint
	| LosslessNumber
	| boolean
	| null
	| readonly ParsedJson[]
	| { readonly [key: string]: ParsedJson };

/**
 * A request body that can be read once, up to a byte limit.
 *
 * A second read throws BodyConsumedError.
 */
export interface BodySource {
	read(limit: number): Promise<Uint8Array>;
}

/** What the router and the body parser need to know about a request. */
export interface RequestDescriptor {
	readonly method: string;
	/** Path without the query string. */
	readonly path: string;
	readonly contentType: string | null;
	readonly contentLength: number | null;
	readonly body: BodySource | null;
}
