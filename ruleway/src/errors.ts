// =====================================================================
// Request errors (carry an HTTP status; rendering is up to the caller)
// =====================================================================

/** A request-level failure with the status code it maps to. */
export class HttpError extends Error {
	readonly status: number;
	readonly headers: Readonly<Record<string, string>>;

	constructor(status: number, message: string, headers: Readonly<Record<string, string>> = {}) {
		super(message);
		this.name = "HttpError";
		this.status = status;
		this.headers = headers;
	}
}

/** No route's path pattern matched. */
export class RouteNotFoundError extends HttpError {
	constructor(message = "Path not found") {
		super(404, message);
		this.name = "RouteNotFoundError";
	}
}

/** A route matched the path, but not the method. */
export class MethodNotAllowedError extends HttpError {
	readonly allowed: readonly string[];

	constructor(allowed: readonly string[] = []) {
		super(405, "Method not allowed", allowed.length > 0 ? { Allow: allowed.join(", ") } : {});
		this.name = "MethodNotAllowedError";
		this.allowed = allowed;
	}
}

/** The request content-type does not fit any remaining route or parser. */
export class UnsupportedMediaTypeError extends HttpError {
	constructor(message = "Unsupported Content-Type") {
		super(415, message);
		this.name = "UnsupportedMediaTypeError";
	}
}

/** A body was expected, but the request declares none. */
export class BodyRequiredError extends HttpError {
	constructor() {
		super(400, "Body required");
		this.name = "BodyRequiredError";
	}
}

/** The declared body length exceeds the parser's limit. */
export class PayloadTooLargeError extends HttpError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(413, `body length ${length} exceeds maximum ${max}`);
		this.name = "PayloadTooLargeError";
		this.length = length;
		this.max = max;
	}
}

/** The body is not valid UTF-8 JSON. */
export class MalformedBodyError extends HttpError {
	constructor(message = "Invalid JSON") {
		super(422, message);
		this.name = "MalformedBodyError";
	}
}

/** The body parsed, but failed the filter tree. `reason` is location-qualified. */
export class ShapeValidationError extends HttpError {
	readonly reason: string;

	constructor(reason: string) {
		super(400, reason);
		this.name = "ShapeValidationError";
		this.reason = reason;
	}
}

// =====================================================================
// Construction and config errors
// =====================================================================

/** Base class for faults in how routers, patterns and filters are built. */
export class RulewayError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RulewayError";
	}
}

/** A path pattern breaks the literal/converter alternation. */
export class PatternError extends RulewayError {
	constructor(message: string) {
		super(message);
		this.name = "PatternError";
	}
}

/**
 * A converter rejected its input segment.
 *
 * Thrown by converters; the pattern matcher turns it into a non-match.
 */
export class ConversionError extends RulewayError {
	readonly converter: string;
	readonly input: string;

	constructor(converter: string, input: string) {
		super(`${converter} cannot parse "${input}"`);
		this.name = "ConversionError";
		this.converter = converter;
		this.input = input;
	}
}

/** Two routes share the same expected value in every dimension. */
export class AmbiguousRouteError extends RulewayError {
	readonly key: string;

	constructor(key: string) {
		super(`route registered twice: ${key}`);
		this.name = "AmbiguousRouteError";
		this.key = key;
	}
}

/** The body source was already read. */
export class BodyConsumedError extends RulewayError {
	constructor() {
		super("request body already consumed");
		this.name = "BodyConsumedError";
	}
}
