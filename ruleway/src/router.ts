import { runInContext } from "./context.ts";
import { AmbiguousRouteError, RouteNotFoundError } from "./errors.ts";
import { type Logger, noopLogger } from "./logger.ts";
import { NO_CAPTURES, type Rule } from "./rules.ts";
import type { RequestDescriptor } from "./types.ts";

/** The expected-value type of a rule. */
export type ExpectedOf<R> = R extends Rule<infer E> ? E : never;

/** One expected value per dimension, in dimension order. */
export type RouteKey<Rs extends readonly Rule<unknown>[]> = {
	readonly [K in keyof Rs]: ExpectedOf<Rs[K]>;
} & readonly unknown[];

/**
 * A route: its key plus an opaque handler.
 *
 * The key array is frozen in place, so the route table cannot change after
 * registration.
 */
export class Route<Rs extends readonly Rule<unknown>[], H> {
	readonly key: RouteKey<Rs>;

	constructor(
		key: RouteKey<Rs>,
		readonly handler: H,
	) {
		Object.freeze(key);
		this.key = key;
		Object.freeze(this);
	}
}

/** Result of resolving one request. Created per request, never stored. */
export interface RouteMatch<Rs extends readonly Rule<unknown>[], H> {
	readonly route: Route<Rs, H>;
	readonly handler: H;
	/** Values captured by every capturing dimension, in dimension order. */
	readonly captures: readonly unknown[];
}

export interface RouterOptions {
	readonly logger?: Logger;
}

interface Candidate<Rs extends readonly Rule<unknown>[], H> {
	readonly route: Route<Rs, H>;
	readonly captures: readonly unknown[];
}

/**
 * Builder for a Router. Register routes in priority order, then build().
 *
 * build() rejects two routes whose expected values describe identically in
 * every dimension.
 */
export class RouterBuilder<Rs extends readonly Rule<unknown>[], H> {
	private readonly routes: Route<Rs, H>[] = [];

	constructor(
		private readonly rules: readonly [...Rs],
		private readonly options: RouterOptions = {},
	) {}

	route(key: RouteKey<Rs>, handler: H): this {
		if (key.length !== this.rules.length) {
			throw new RangeError(
				`route key has ${key.length} values, but the router has ${this.rules.length} dimensions`,
			);
		}
		this.routes.push(new Route(key, handler));
		return this;
	}

	/** Freeze the route table. No further registration is possible. */
	build(): Router<Rs, H> {
		const seen = new Set<string>();
		for (const route of this.routes) {
			const text = describeKey(this.rules, route.key);
			if (seen.has(text)) throw new AmbiguousRouteError(text);
			seen.add(text);
		}
		return new Router(this.rules, [...this.routes], this.options.logger ?? noopLogger);
	}
}

/**
 * Build a router from its dimensions and an ordered route table.
 *
 *   const router = createRouter([new PathRule(), METHOD_RULE, CONTENT_TYPE_RULE], [
 *     [[path`/create`, "POST", "json"], createUser],
 *     [[path`/${INT}/options`, "GET", null], userOptions],
 *   ]);
 */
export function createRouter<Rs extends readonly Rule<unknown>[], H>(
	rules: readonly [...Rs],
	routes: readonly (readonly [RouteKey<Rs>, H])[],
	options: RouterOptions = {},
): Router<Rs, H> {
	const builder = new RouterBuilder<Rs, H>(rules, options);
	for (const [key, handler] of routes) builder.route(key, handler);
	return builder.build();
}

/**
 * Narrows the route table one dimension at a time.
 *
 * The first dimension that leaves no candidate decides the error; later
 * dimensions are not evaluated. If several routes survive every dimension the
 * first registered one wins.
 */
export class Router<Rs extends readonly Rule<unknown>[], H> {
	constructor(
		readonly rules: readonly [...Rs],
		readonly routes: readonly Route<Rs, H>[],
		private readonly logger: Logger = noopLogger,
	) {
		Object.freeze(this.routes);
		Object.freeze(this);
	}

	/** Find the route for a request, or throw the first failing dimension's error. */
	resolve(req: RequestDescriptor): RouteMatch<Rs, H> {
		const rules: readonly Rule<unknown>[] = this.rules;
		let candidates: readonly Candidate<Rs, H>[] = this.routes.map((route) => ({
			route,
			captures: NO_CAPTURES,
		}));

		for (const [i, rule] of rules.entries()) {
			const next: Candidate<Rs, H>[] = [];
			for (const c of candidates) {
				const expected = c.route.key[i];
				if (!rule.check(req, expected)) continue;
				const captured = rule.capture?.(req, expected) ?? NO_CAPTURES;
				next.push({
					route: c.route,
					captures: captured.length > 0 ? [...c.captures, ...captured] : c.captures,
				});
			}

			if (next.length === 0) {
				const error = rule.errorFor(candidates.map((c) => c.route.key[i]));
				this.logger.debug("route rejected", {
					method: req.method,
					path: req.path,
					dimension: rule.name,
					status: error.status,
				});
				throw error;
			}
			candidates = next;
		}

		const [first, ...rest] = candidates;
		if (first === undefined) throw new RouteNotFoundError();

		if (rest.length > 0) {
			this.logger.warn("ambiguous routes, using the first registered", {
				method: req.method,
				path: req.path,
				routes: candidates.map((c) => describeKey(rules, c.route.key)),
			});
		}
		this.logger.debug("route resolved", {
			method: req.method,
			path: req.path,
			route: describeKey(rules, first.route.key),
		});

		return { route: first.route, handler: first.route.handler, captures: first.captures };
	}

	/**
	 * Resolve, then call `invoke` with the handler. While `invoke` runs (including
	 * its async continuations) currentCaptures() returns this request's captures.
	 */
	dispatch<R>(req: RequestDescriptor, invoke: (handler: H, match: RouteMatch<Rs, H>) => R): R {
		const match = this.resolve(req);
		return runInContext({ request: req, captures: match.captures }, () =>
			invoke(match.handler, match),
		);
	}
}

function describeKey(rules: readonly Rule<unknown>[], key: readonly unknown[]): string {
	return rules.map((rule, i) => rule.describe(key[i])).join(" | ");
}
