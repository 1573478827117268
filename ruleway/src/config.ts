/**
 * Config types for data-driven router and filter construction.
 *
 * The same JSON/YAML shape is accepted whichever loader produced it:
 *   data -> parseRouterConfig() -> RouterConfig -> Registry.loadRouter() -> Router
 *   data -> parseFilterConfig() -> FilterConfig -> Registry.loadFilter() -> Filter
 *
 * | Config type          | Runtime type        |
 * |----------------------|---------------------|
 * | RouterConfig         | Router              |
 * | RouteConfig          | Route               |
 * | PathPartConfig[]     | PathPattern         |
 * | ConverterRef         | Converter           |
 * | FilterConfig         | Filter              |
 */

// =====================================================================
// Router config
// =====================================================================

/** Reference to a registered converter with its configuration. */
export class ConverterRef {
	constructor(
		readonly name: string,
		readonly config: Readonly<Record<string, unknown>> = {},
	) {}
}

export type PathPartConfig = string | ConverterRef;

/** One route: raw expected value per dimension name, plus the action it yields. */
export class RouteConfig {
	constructor(
		readonly match: ReadonlyMap<string, unknown>,
		readonly action: string,
	) {}
}

export const DEFAULT_DIMENSIONS: readonly string[] = Object.freeze(["path", "method", "content_type"]);

export class RouterConfig {
	constructor(
		readonly dimensions: readonly string[],
		readonly routes: readonly RouteConfig[],
	) {}
}

// =====================================================================
// Filter config
// =====================================================================

export type LeafKind = "number" | "int" | "float" | "string" | "boolean" | "null";

const LEAF_KINDS: ReadonlySet<string> = new Set(["number", "int", "float", "string", "boolean", "null"]);

export class LeafFilterConfig {
	constructor(
		readonly kind: LeafKind,
		readonly min: number | null = null,
		readonly max: number | null = null,
		readonly pattern: string | null = null,
	) {}
}

export class ArrayFilterConfig {
	constructor(readonly items: FilterConfig) {}
}

export class ObjectEntryConfig {
	constructor(
		readonly filter: FilterConfig,
		readonly required: boolean,
	) {}
}

export class ObjectFilterConfig {
	constructor(
		readonly entries: ReadonlyMap<string, ObjectEntryConfig>,
		readonly allowExtra: boolean = false,
	) {}
}

export class OptionsFilterConfig {
	constructor(readonly options: readonly FilterConfig[]) {}
}

export type FilterConfig =
	| LeafFilterConfig
	| ArrayFilterConfig
	| ObjectFilterConfig
	| OptionsFilterConfig;

// =====================================================================
// Parsing (unknown -> config types)
// =====================================================================

/** Error parsing raw data into config types. */
export class ConfigParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

type RawObject = Readonly<Record<string, unknown>>;

function isRawObject(data: unknown): data is RawObject {
	return typeof data === "object" && data !== null && !Array.isArray(data);
}

function describeType(data: unknown): string {
	if (data === null) return "null";
	if (Array.isArray(data)) return "array";
	return typeof data;
}

function expectObject(data: unknown, what: string): RawObject {
	if (!isRawObject(data)) {
		throw new ConfigParseError(`${what} must be an object, got ${describeType(data)}`);
	}
	return data;
}

/**
 * Parse raw data into a RouterConfig.
 *
 *   { dimensions: ["path", "method", "content_type"],
 *     routes: [{ match: { path: ["/id/", { converter: "int" }], method: "GET", content_type: null },
 *                action: "get_user" }] }
 *
 * `dimensions` defaults to path, method, content_type.
 */
export function parseRouterConfig(data: unknown): RouterConfig {
	const obj = expectObject(data, "router config");

	let dimensions = DEFAULT_DIMENSIONS;
	if (obj.dimensions !== undefined) {
		const raw = obj.dimensions;
		if (!Array.isArray(raw)) {
			throw new ConfigParseError(`'dimensions' must be an array, got ${describeType(raw)}`);
		}
		dimensions = raw.map((d: unknown, i) => {
			if (typeof d !== "string") {
				throw new ConfigParseError(`dimensions[${i}] must be a string, got ${describeType(d)}`);
			}
			return d;
		});
	}

	const rawRoutes = obj.routes;
	if (rawRoutes === undefined) {
		throw new ConfigParseError("missing required field 'routes'");
	}
	if (!Array.isArray(rawRoutes)) {
		throw new ConfigParseError(`'routes' must be an array, got ${describeType(rawRoutes)}`);
	}

	return new RouterConfig(
		dimensions,
		rawRoutes.map((r: unknown, i) => parseRoute(r, i)),
	);
}

function parseRoute(data: unknown, index: number): RouteConfig {
	const obj = expectObject(data, `routes[${index}]`);
	if (!("match" in obj)) {
		throw new ConfigParseError(`routes[${index}] missing required field 'match'`);
	}
	if (typeof obj.action !== "string") {
		throw new ConfigParseError(`routes[${index}] 'action' must be a string, got ${describeType(obj.action)}`);
	}
	const match = expectObject(obj.match, `routes[${index}].match`);
	return new RouteConfig(new Map(Object.entries(match)), obj.action);
}

/**
 * Parse a path config: a literal string, or an array of literals and
 * `{ converter: name, config?: {...} }` references.
 */
export function parsePathConfig(data: unknown): PathPartConfig[] {
	if (typeof data === "string") return [data];
	if (!Array.isArray(data)) {
		throw new ConfigParseError(`path must be a string or an array, got ${describeType(data)}`);
	}
	return data.map((part: unknown, i): PathPartConfig => {
		if (typeof part === "string") return part;
		const obj = expectObject(part, `path[${i}]`);
		if (typeof obj.converter !== "string") {
			throw new ConfigParseError(`path[${i}] 'converter' must be a string, got ${describeType(obj.converter)}`);
		}
		const config = obj.config === undefined ? {} : expectObject(obj.config, `path[${i}].config`);
		return new ConverterRef(obj.converter, config);
	});
}

/**
 * Parse raw data into a FilterConfig.
 *
 *   { type: "object", allow_extra: false, entries: {
 *       id: { type: "int", min: 0 },
 *       description: { type: "string", optional: true } } }
 */
export function parseFilterConfig(data: unknown): FilterConfig {
	const obj = expectObject(data, "filter");
	const type = obj.type;
	if (type === undefined) {
		throw new ConfigParseError("filter missing required field 'type'");
	}
	if (typeof type !== "string") {
		throw new ConfigParseError(`filter 'type' must be a string, got ${describeType(type)}`);
	}

	switch (type) {
		case "array":
			if (!("items" in obj)) throw new ConfigParseError("array filter missing required field 'items'");
			return new ArrayFilterConfig(parseFilterConfig(obj.items));
		case "object":
			return parseObjectFilter(obj);
		case "options": {
			const raw = obj.options;
			if (!Array.isArray(raw)) {
				throw new ConfigParseError(`options filter 'options' must be an array, got ${describeType(raw)}`);
			}
			return new OptionsFilterConfig(raw.map((o: unknown) => parseFilterConfig(o)));
		}
		default:
			if (isLeafKind(type)) return parseLeaf(type, obj);
			throw new ConfigParseError(`unknown filter type: "${type}"`);
	}
}

function isLeafKind(type: string): type is LeafKind {
	return LEAF_KINDS.has(type);
}

function parseLeaf(kind: LeafKind, obj: RawObject): LeafFilterConfig {
	const numeric = kind === "number" || kind === "int" || kind === "float";
	const min = optionalNumber(obj, "min");
	const max = optionalNumber(obj, "max");
	if (!numeric && (min !== null || max !== null)) {
		throw new ConfigParseError(`${kind} filter does not take 'min' or 'max'`);
	}

	let pattern: string | null = null;
	if (obj.pattern !== undefined) {
		if (kind !== "string") throw new ConfigParseError(`${kind} filter does not take 'pattern'`);
		if (typeof obj.pattern !== "string") {
			throw new ConfigParseError(`'pattern' must be a string, got ${describeType(obj.pattern)}`);
		}
		pattern = obj.pattern;
	}
	return new LeafFilterConfig(kind, min, max, pattern);
}

function optionalNumber(obj: RawObject, key: string): number | null {
	const value = obj[key];
	if (value === undefined || value === null) return null;
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new ConfigParseError(`'${key}' must be a number, got ${describeType(value)}`);
	}
	return value;
}

function parseObjectFilter(obj: RawObject): ObjectFilterConfig {
	const rawEntries = obj.entries === undefined ? {} : expectObject(obj.entries, "object filter 'entries'");

	const entries = new Map<string, ObjectEntryConfig>();
	for (const [key, raw] of Object.entries(rawEntries)) {
		const entry = expectObject(raw, `entry '${key}'`);
		const opt = entry.optional;
		if (opt !== undefined && typeof opt !== "boolean") {
			throw new ConfigParseError(`entry '${key}' 'optional' must be a boolean, got ${describeType(opt)}`);
		}
		entries.set(key, new ObjectEntryConfig(parseFilterConfig(entry), opt !== true));
	}

	const allowExtra = obj.allow_extra;
	if (allowExtra !== undefined && typeof allowExtra !== "boolean") {
		throw new ConfigParseError(`'allow_extra' must be a boolean, got ${describeType(allowExtra)}`);
	}
	return new ObjectFilterConfig(entries, allowExtra ?? false);
}
