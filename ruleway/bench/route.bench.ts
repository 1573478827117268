/**
 * Routing benchmarks.
 *
 * Measures the hot path: dimension-by-dimension narrowing, capture
 * extraction, early rejection, and scaling with the route count.
 *
 * Run: npx tsx ruleway/bench/route.bench.ts
 */

import { bench, run, summary } from "mitata";

import {
	CONTENT_TYPE_RULE,
	INT,
	METHOD_RULE,
	PathPattern,
	PathRule,
	RegexConverter,
	STR,
	createRouter,
	path,
} from "../src/index.ts";
import { requestOf } from "../src/testing.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const router = createRouter(
	[new PathRule(), METHOD_RULE, CONTENT_TYPE_RULE],
	[
		[[path`/create`, "POST", "json"], "create_user"],
		[[path`/${INT}/options`, "GET", null], "user_options"],
		[[path`/${INT}/options`, "PUT", "json"], "update_options"],
		[[PathPattern.of("/id/", INT, "/name/", STR), "GET", null], "get_user"],
	],
);

function routerWith(n: number) {
	const routes = Array.from(
		{ length: n },
		(_, i) => [[PathPattern.of(`/r${i}/`, INT), "GET", null], `r${i}`] as const,
	);
	return createRouter([new PathRule(), METHOD_RULE, CONTENT_TYPE_RULE], routes);
}

// ── Core scenarios ───────────────────────────────────────────────────────────

summary(() => {
	const hit = requestOf("GET", "/id/42/name/joe");
	const json = requestOf("PUT", "/7/options", "application/json");
	bench("resolve_two_captures", () => router.resolve(hit));
	bench("resolve_content_type", () => router.resolve(json));
});

summary(() => {
	const notFound = requestOf("GET", "/nope");
	const notAllowed = requestOf("DELETE", "/7/options");
	const reject = (req: typeof notFound) => () => {
		try {
			router.resolve(req);
		} catch (e) {
			return e;
		}
		return null;
	};
	bench("reject_404", reject(notFound));
	bench("reject_405", reject(notAllowed));
});

summary(() => {
	const slug = PathPattern.of("/posts/", new RegexConverter("[a-z0-9-]+"), "/comments/", INT);
	bench("pattern_regex_converter", () => slug.match("/posts/hello-world/comments/12"));
});

// ── Scaling ──────────────────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 50, 200]) {
		const r = routerWith(n);
		const last = requestOf("GET", `/r${n - 1}/5`);
		bench(`route_count_${n}_last_match`, () => r.resolve(last));
	}
});

await run();
