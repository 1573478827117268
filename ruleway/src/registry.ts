/**
 * Registry for config-driven router and filter construction.
 *
 * - RegistryBuilder -> .build() -> Registry (immutable)
 * - Converter factories are plain functions: (config) -> Converter
 * - Dimensions pair a Rule with a parser for its raw expected values
 * - loadRouter() / loadFilter() walk the config and build runtime objects
 *
 * Example:
 *
 *   const registry = registerDefaults(new RegistryBuilder())
 *     .converter("slug", () => new RegexConverter("[a-z0-9-]+"))
 *     .build();
 *
 *   const router = registry.loadRouter(parseRouterConfig(jsonData));
 */

import {
	ArrayFilterConfig,
	type ConverterRef,
	type FilterConfig,
	LeafFilterConfig,
	ObjectFilterConfig,
	OptionsFilterConfig,
	type PathPartConfig,
	type RouterConfig,
	parsePathConfig,
} from "./config.ts";
import { type Converter, FLOAT, INT, RegexConverter, STR } from "./converters.ts";
import { RulewayError } from "./errors.ts";
import {
	ArrayFilter,
	BooleanFilter,
	type Filter,
	NullFilter,
	NumberFilter,
	type ObjectEntry,
	ObjectFilter,
	OptionsFilter,
	StringFilter,
	filterDepth,
} from "./filters.ts";
import { PathPattern, type PatternPart } from "./pattern.ts";
import { type Router, RouterBuilder, type RouterOptions } from "./router.ts";
import { CONTENT_TYPE_RULE, METHOD_RULE, PathRule, type Rule } from "./rules.ts";

// =====================================================================
// Limits
// =====================================================================

export const MAX_ROUTES = 256;
export const MAX_OPTIONS = 256;
export const MAX_PATTERN_LENGTH = 8192;
export const MAX_REGEX_PATTERN_LENGTH = 4096;
export const MAX_FILTER_DEPTH = 32;

// =====================================================================
// Error types
// =====================================================================

/** A converter or dimension name was not found in the registry. */
export class UnknownNameError extends RulewayError {
	readonly unknownName: string;
	readonly registry: string;
	readonly available: string[];

	constructor(name: string, registry: string, available: string[]) {
		const sorted = [...available].sort();
		const msg =
			sorted.length > 0
				? `unknown ${registry}: "${name}" (registered: ${sorted.join(", ")})`
				: `unknown ${registry}: "${name}" (no ${registry}s are registered)`;
		super(msg);
		this.name = "UnknownNameError";
		this.unknownName = name;
		this.registry = registry;
		this.available = sorted;
	}
}

/** A config payload was malformed or semantically invalid. */
export class InvalidConfigError extends RulewayError {
	readonly source: string;

	constructor(source: string) {
		super(`invalid config: ${source}`);
		this.name = "InvalidConfigError";
		this.source = source;
	}
}

/** Config has too many routes. */
export class TooManyRoutesError extends RulewayError {
	readonly count: number;
	readonly max: number;

	constructor(count: number, max: number) {
		super(`too many routes: ${count} exceeds maximum ${max}`);
		this.name = "TooManyRoutesError";
		this.count = count;
		this.max = max;
	}
}

/** An options filter has too many alternatives. */
export class TooManyOptionsError extends RulewayError {
	readonly count: number;
	readonly max: number;

	constructor(count: number, max: number) {
		super(`too many options: ${count} exceeds maximum ${max}`);
		this.name = "TooManyOptionsError";
		this.count = count;
		this.max = max;
	}
}

/** A path literal or regex pattern exceeds the length limit. */
export class PatternTooLongError extends RulewayError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(`pattern length ${length} exceeds maximum ${max}`);
		this.name = "PatternTooLongError";
		this.length = length;
		this.max = max;
	}
}

/** A filter tree nests deeper than MAX_FILTER_DEPTH. */
export class FilterTooDeepError extends RulewayError {
	readonly depth: number;
	readonly max: number;

	constructor(depth: number, max: number) {
		super(`filter depth ${depth} exceeds maximum allowed depth ${max}`);
		this.name = "FilterTooDeepError";
		this.depth = depth;
		this.max = max;
	}
}

// =====================================================================
// Factory types
// =====================================================================

type ConverterFactory = (config: Readonly<Record<string, unknown>>) => Converter<unknown>;

/** Parses the raw config value of a dimension into the rule's expected value. */
type ExpectedParser<E> = (raw: unknown, registry: Registry) => E;

interface Dimension {
	readonly rule: Rule<unknown>;
	readonly parse: ExpectedParser<unknown>;
}

// =====================================================================
// Builder
// =====================================================================

/**
 * Builder for constructing a Registry.
 *
 * Register converter factories and dimensions by name, then call build()
 * to produce an immutable Registry.
 */
export class RegistryBuilder {
	private readonly converterFactories = new Map<string, ConverterFactory>();
	private readonly dimensions = new Map<string, Dimension>();

	/** Register a converter factory under a name. */
	converter(name: string, factory: ConverterFactory): this {
		this.converterFactories.set(name, factory);
		return this;
	}

	/** Register a dimension: the rule plus a parser for route config values. */
	dimension<E>(name: string, rule: Rule<E>, parse: ExpectedParser<E>): this {
		this.dimensions.set(name, { rule, parse });
		return this;
	}

	/** Freeze the registry. No further registration is possible. */
	build(): Registry {
		return new Registry(new Map(this.converterFactories), new Map(this.dimensions));
	}
}

/**
 * Register the built-in converters (int, float, str, regex) and dimensions
 * (path, method, content_type).
 */
export function registerDefaults(builder: RegistryBuilder): RegistryBuilder {
	return builder
		.converter("int", () => INT)
		.converter("float", () => FLOAT)
		.converter("str", () => STR)
		.converter("regex", (config) => {
			const pattern = config.pattern;
			if (typeof pattern !== "string") {
				throw new Error("regex converter config requires 'pattern' (string)");
			}
			if (pattern.length > MAX_REGEX_PATTERN_LENGTH) {
				throw new PatternTooLongError(pattern.length, MAX_REGEX_PATTERN_LENGTH);
			}
			return new RegexConverter(pattern);
		})
		.dimension("path", new PathRule(), (raw, registry) => registry.loadPattern(parsePathConfig(raw)))
		.dimension("method", METHOD_RULE, (raw) => {
			if (typeof raw !== "string") throw new Error("method must be a string");
			return raw;
		})
		.dimension("content_type", CONTENT_TYPE_RULE, (raw) => {
			if (raw !== null && typeof raw !== "string") {
				throw new Error("content_type must be a string or null");
			}
			return raw;
		});
}

/** A frozen registry with only the built-ins. */
export function createDefaultRegistry(): Registry {
	return registerDefaults(new RegistryBuilder()).build();
}

// =====================================================================
// Registry
// =====================================================================

/**
 * Immutable registry of converter factories and dimensions.
 *
 * Constructed via RegistryBuilder.
 */
export class Registry {
	private readonly converterFactories: ReadonlyMap<string, ConverterFactory>;
	private readonly dimensions: ReadonlyMap<string, Dimension>;

	constructor(
		converterFactories: Map<string, ConverterFactory>,
		dimensions: Map<string, Dimension>,
	) {
		this.converterFactories = converterFactories;
		this.dimensions = dimensions;
		Object.freeze(this);
	}

	/**
	 * Load a Router from configuration. Handlers are the routes' action names.
	 *
	 * Raw values are parsed by each dimension's parser; failures other than
	 * RulewayError are wrapped in InvalidConfigError.
	 */
	loadRouter(config: RouterConfig, options: RouterOptions = {}): Router<readonly Rule<unknown>[], string> {
		if (config.routes.length > MAX_ROUTES) {
			throw new TooManyRoutesError(config.routes.length, MAX_ROUTES);
		}

		const dims = config.dimensions.map((name) => this.dimension(name));
		const builder = new RouterBuilder<readonly Rule<unknown>[], string>(
			dims.map((d) => d.rule),
			options,
		);

		for (const route of config.routes) {
			for (const name of route.match.keys()) {
				if (!config.dimensions.includes(name)) {
					throw new InvalidConfigError(`route "${route.action}" sets unknown dimension "${name}"`);
				}
			}
			const key = dims.map((dim, i) => {
				const name = config.dimensions[i] ?? "";
				if (!route.match.has(name)) {
					throw new InvalidConfigError(`route "${route.action}" has no value for dimension "${name}"`);
				}
				return this.parseExpected(dim, route.match.get(name), `route "${route.action}" ${name}`);
			});
			builder.route(key, route.action);
		}

		return builder.build();
	}

	/** Build a PathPattern, resolving converter references. */
	loadPattern(parts: readonly PathPartConfig[]): PathPattern {
		const literalLength = parts.reduce((sum, p) => sum + (typeof p === "string" ? p.length : 0), 0);
		if (literalLength > MAX_PATTERN_LENGTH) {
			throw new PatternTooLongError(literalLength, MAX_PATTERN_LENGTH);
		}
		const resolved: PatternPart[] = parts.map((p) => (typeof p === "string" ? p : this.loadConverter(p)));
		return PathPattern.of(...resolved);
	}

	/** Build a Filter tree and check its depth. */
	loadFilter(config: FilterConfig): Filter {
		const filter = this.buildFilter(config);
		const depth = filterDepth(filter);
		if (depth > MAX_FILTER_DEPTH) {
			throw new FilterTooDeepError(depth, MAX_FILTER_DEPTH);
		}
		return filter;
	}

	/** Number of registered converters. */
	get converterCount(): number {
		return this.converterFactories.size;
	}

	/** Number of registered dimensions. */
	get dimensionCount(): number {
		return this.dimensions.size;
	}

	containsConverter(name: string): boolean {
		return this.converterFactories.has(name);
	}

	containsDimension(name: string): boolean {
		return this.dimensions.has(name);
	}

	/** Registered converter names (sorted). */
	converterNames(): string[] {
		return [...this.converterFactories.keys()].sort();
	}

	/** Registered dimension names (sorted). */
	dimensionNames(): string[] {
		return [...this.dimensions.keys()].sort();
	}

	// -- Private loading methods -------------------------------------------

	private dimension(name: string): Dimension {
		const dim = this.dimensions.get(name);
		if (dim === undefined) {
			throw new UnknownNameError(name, "dimension", [...this.dimensions.keys()]);
		}
		return dim;
	}

	private parseExpected(dim: Dimension, raw: unknown, where: string): unknown {
		try {
			return dim.parse(raw, this);
		} catch (e) {
			if (e instanceof RulewayError) throw e;
			throw new InvalidConfigError(`${where}: ${e instanceof Error ? e.message : String(e)}`);
		}
	}

	private loadConverter(ref: ConverterRef): Converter<unknown> {
		const factory = this.converterFactories.get(ref.name);
		if (factory === undefined) {
			throw new UnknownNameError(ref.name, "converter", [...this.converterFactories.keys()]);
		}
		try {
			return factory(ref.config);
		} catch (e) {
			if (e instanceof RulewayError) throw e;
			throw new InvalidConfigError(e instanceof Error ? e.message : String(e));
		}
	}

	private buildFilter(config: FilterConfig): Filter {
		if (config instanceof LeafFilterConfig) {
			switch (config.kind) {
				case "number":
				case "int":
				case "float":
					return new NumberFilter(config.kind, { min: config.min, max: config.max });
				case "string":
					if (config.pattern !== null && config.pattern.length > MAX_REGEX_PATTERN_LENGTH) {
						throw new PatternTooLongError(config.pattern.length, MAX_REGEX_PATTERN_LENGTH);
					}
					return new StringFilter(config.pattern);
				case "boolean":
					return new BooleanFilter();
				case "null":
					return new NullFilter();
			}
		}
		if (config instanceof ArrayFilterConfig) {
			return new ArrayFilter(this.buildFilter(config.items));
		}
		if (config instanceof ObjectFilterConfig) {
			const entries: Record<string, ObjectEntry> = {};
			for (const [key, entry] of config.entries) {
				Object.defineProperty(entries, key, {
					value: Object.freeze({ filter: this.buildFilter(entry.filter), required: entry.required }),
					enumerable: true,
				});
			}
			return new ObjectFilter(entries, { allowExtra: config.allowExtra });
		}
		if (config instanceof OptionsFilterConfig) {
			if (config.options.length > MAX_OPTIONS) {
				throw new TooManyOptionsError(config.options.length, MAX_OPTIONS);
			}
			return new OptionsFilter(...config.options.map((o) => this.buildFilter(o)));
		}
		throw new InvalidConfigError("unknown filter config type");
	}
}
