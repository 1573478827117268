/**
 * Conformance fixture loader.
 *
 * Loads multi-document YAML fixtures from tests/fixtures/ and builds routers
 * and filters through the config pipeline, so every fixture also exercises
 * parseRouterConfig / parseFilterConfig and the default registry.
 */

import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadAll } from "js-yaml";

import { parseFilterConfig, parseRouterConfig } from "../../src/config.ts";
import type { Filter, FilterResult } from "../../src/filters.ts";
import type { HttpRequest } from "../../src/http/request.ts";
import { createDefaultRegistry } from "../../src/registry.ts";
import type { Router } from "../../src/router.ts";
import type { Rule } from "../../src/rules.ts";
import { requestOf } from "../../src/testing.ts";

const FIXTURE_DIR = fileURLToPath(new URL("../fixtures/", import.meta.url));

// ─── Fixture interfaces ────────────────────────────────────────────

export type RouteExpectation =
	| { readonly kind: "route"; readonly action: string; readonly captures: readonly unknown[] }
	| { readonly kind: "error"; readonly status: number; readonly allow: string | null };

export interface RouteCase {
	fixtureName: string;
	caseName: string;
	router: Router<readonly Rule<unknown>[], string>;
	request: HttpRequest;
	expect: RouteExpectation;
}

export interface FilterCase {
	fixtureName: string;
	caseName: string;
	filter: Filter;
	body: string;
	expect: FilterResult;
}

// ─── YAML narrowing ────────────────────────────────────────────────

type Doc = Readonly<Record<string, unknown>>;

function isDoc(value: unknown): value is Doc {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function doc(value: unknown, where: string): Doc {
	if (!isDoc(value)) throw new Error(`${where}: expected a mapping`);
	return value;
}

function str(value: unknown, where: string): string {
	if (typeof value !== "string") throw new Error(`${where}: expected a string`);
	return value;
}

function list(value: unknown, where: string): readonly unknown[] {
	if (!Array.isArray(value)) throw new Error(`${where}: expected a sequence`);
	return value;
}

function loadDocs(subdir: string): { file: string; doc: Doc }[] {
	const dir = join(FIXTURE_DIR, subdir);
	const files = readdirSync(dir)
		.filter((f) => f.endsWith(".yaml"))
		.sort();

	const out: { file: string; doc: Doc }[] = [];
	for (const file of files) {
		for (const raw of loadAll(readFileSync(join(dir, file), "utf-8"))) {
			if (raw === null || raw === undefined) continue;
			out.push({ file, doc: doc(raw, file) });
		}
	}
	return out;
}

// ─── Routing fixtures ──────────────────────────────────────────────

function parseRouteExpectation(value: unknown, where: string): RouteExpectation {
	const d = doc(value, where);
	if ("status" in d) {
		if (typeof d.status !== "number") throw new Error(`${where}.status: expected a number`);
		return { kind: "error", status: d.status, allow: d.allow === undefined ? null : str(d.allow, `${where}.allow`) };
	}
	return {
		kind: "route",
		action: str(d.action, `${where}.action`),
		captures: d.captures === undefined ? [] : list(d.captures, `${where}.captures`),
	};
}

export function loadRouteFixtures(): RouteCase[] {
	const registry = createDefaultRegistry();
	const cases: RouteCase[] = [];

	for (const { file, doc: d } of loadDocs("routing")) {
		const fixtureName = str(d.name, `${file}: name`);
		const router = registry.loadRouter(parseRouterConfig(d.router));

		for (const [i, raw] of list(d.cases, `${fixtureName}.cases`).entries()) {
			const where = `${fixtureName}.cases[${i}]`;
			const c = doc(raw, where);
			const req = doc(c.request, `${where}.request`);
			const contentType = req.content_type === undefined || req.content_type === null
				? null
				: str(req.content_type, `${where}.request.content_type`);
			cases.push({
				fixtureName,
				caseName: str(c.name, `${where}.name`),
				router,
				request: requestOf(str(req.method, `${where}.request.method`), str(req.path, `${where}.request.path`), contentType),
				expect: parseRouteExpectation(c.expect, `${where}.expect`),
			});
		}
	}
	return cases;
}

// ─── Validation fixtures ───────────────────────────────────────────

export function loadFilterFixtures(): FilterCase[] {
	const registry = createDefaultRegistry();
	const cases: FilterCase[] = [];

	for (const { file, doc: d } of loadDocs("validation")) {
		const fixtureName = str(d.name, `${file}: name`);
		const filter = registry.loadFilter(parseFilterConfig(d.filter));

		for (const [i, raw] of list(d.cases, `${fixtureName}.cases`).entries()) {
			const where = `${fixtureName}.cases[${i}]`;
			const c = doc(raw, where);
			const reason = c.reason === undefined ? "" : str(c.reason, `${where}.reason`);
			cases.push({
				fixtureName,
				caseName: str(c.name, `${where}.name`),
				filter,
				body: str(c.body, `${where}.body`),
				expect: { accepted: reason === "", reason },
			});
		}
	}
	return cases;
}
