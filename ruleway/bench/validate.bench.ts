/**
 * Validation benchmarks: JSON parsing plus filter evaluation.
 *
 * Run: npx tsx ruleway/bench/validate.bench.ts
 */

import { bench, run, summary } from "mitata";

import {
	ArrayFilter,
	JsonBodyParser,
	NullFilter,
	NumberFilter,
	ObjectFilter,
	OptionsFilter,
	StringFilter,
	optional,
	parseJsonText,
} from "../src/index.ts";
import { jsonRequest } from "../src/testing.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const item = new ObjectFilter({
	id: new NumberFilter("int", { min: 0 }),
	name: new StringFilter("^[A-Za-z ]+$"),
	description: optional(new OptionsFilter(new StringFilter(), new NullFilter())),
	tags: optional(new ArrayFilter(new StringFilter())),
});

const items = new ArrayFilter(item);

function itemsText(n: number): string {
	const list = Array.from({ length: n }, (_, i) => ({
		id: i,
		name: "Item Name",
		description: i % 2 === 0 ? null : "odd",
		tags: ["a", "b"],
	}));
	return JSON.stringify(list);
}

// ── Filter evaluation ────────────────────────────────────────────────────────

summary(() => {
	const one = parseJsonText(JSON.stringify({ id: 1, name: "Item Name", tags: ["x"] }));
	const bad = parseJsonText(JSON.stringify({ id: 1, name: "Item Name", extra: true }));
	bench("object_accept", () => item.evaluate(one));
	bench("object_reject_extra", () => item.evaluate(bad));
});

summary(() => {
	for (const n of [10, 100, 1000]) {
		const value = parseJsonText(itemsText(n));
		bench(`array_of_${n}_objects`, () => items.evaluate(value));
	}
});

// ── Full pipeline ────────────────────────────────────────────────────────────

summary(() => {
	const parser = new JsonBodyParser(items);
	const text = itemsText(100);
	bench("parse_and_validate_100", async () => parser.parse(jsonRequest("POST", "/items", text)));
});

await run();
