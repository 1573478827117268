/**
 * Tests for JSON shape filters (ruleway/src/filters.ts).
 *
 * Values come from parseJsonText so number kinds follow the source text.
 */

import { describe, expect, test } from "vitest";
import { parseJsonText } from "../src/body.ts";
import {
	ACCEPTED,
	ArrayFilter,
	BooleanFilter,
	NullFilter,
	NumberFilter,
	ObjectFilter,
	OptionsFilter,
	StringFilter,
	evaluateFilter,
	filterDepth,
	isFilter,
	kindOf,
	optional,
} from "../src/filters.ts";
import { PatternError } from "../src/errors.ts";
import type { ParsedJson } from "../src/types.ts";

const json = parseJsonText;

function rejected(reason: string) {
	return { accepted: false, reason };
}

describe("NumberFilter", () => {
	test("number accepts ints and floats", () => {
		const f = new NumberFilter();
		expect(f.evaluate(json("5"))).toBe(ACCEPTED);
		expect(f.evaluate(json("5.5"))).toBe(ACCEPTED);
		expect(f.evaluate(json("-1e3"))).toBe(ACCEPTED);
	});

	test("int rejects float literals", () => {
		const f = new NumberFilter("int");
		expect(f.evaluate(json("5"))).toBe(ACCEPTED);
		expect(f.evaluate(json("5.0"))).toEqual(rejected("expected int, found '5.0' of type float"));
		expect(f.evaluate(json("1e3"))).toEqual(rejected("expected int, found '1e3' of type float"));
	});

	test("float rejects int literals", () => {
		const f = new NumberFilter("float");
		expect(f.evaluate(json("5.0"))).toBe(ACCEPTED);
		expect(f.evaluate(json("3"))).toEqual(rejected("expected float, found '3' of type int"));
	});

	test("plain numbers are ints iff integral", () => {
		expect(new NumberFilter("int").evaluate(5)).toBe(ACCEPTED);
		expect(new NumberFilter("int").evaluate(5.5)).toEqual(
			rejected("expected int, found '5.5' of type float"),
		);
	});

	test("non-numbers", () => {
		const f = new NumberFilter();
		expect(f.evaluate(json("true"))).toEqual(rejected("expected number, found 'true' of type boolean"));
		expect(f.evaluate(json('"5"'))).toEqual(rejected("expected number, found '5' of type string"));
		expect(f.evaluate(json("null"))).toEqual(rejected("expected number, found 'null' of type null"));
	});

	test("inclusive bounds", () => {
		const f = new NumberFilter("number", { min: 0, max: 10 });
		expect(f.evaluate(json("0"))).toBe(ACCEPTED);
		expect(f.evaluate(json("10"))).toBe(ACCEPTED);
		expect(f.evaluate(json("-0.5"))).toEqual(rejected("expected number >= 0, found -0.5"));
		expect(f.evaluate(json("10.5"))).toEqual(rejected("expected number <= 10, found 10.5"));
	});

	test("kind is checked before bounds", () => {
		const f = new NumberFilter("int", { min: 0 });
		expect(f.evaluate(json("-1.5"))).toEqual(rejected("expected int, found '-1.5' of type float"));
	});

	test("integer bounds are exact past 2^53", () => {
		const atMost = new NumberFilter("int", { max: 9007199254740992 });
		expect(atMost.evaluate(json("9007199254740992"))).toBe(ACCEPTED);
		expect(atMost.evaluate(json("9007199254740993"))).toEqual(
			rejected("expected number <= 9007199254740992, found 9007199254740993"),
		);
		const atLeast = new NumberFilter("int", { min: -9007199254740992 });
		expect(atLeast.evaluate(json("-9007199254740993"))).toEqual(
			rejected("expected number >= -9007199254740992, found -9007199254740993"),
		);
	});

	test("bigint values are ints", () => {
		const f = new NumberFilter("int", { min: 0 });
		expect(f.evaluate(12345678901234567891n)).toBe(ACCEPTED);
		expect(f.evaluate(-1n)).toEqual(rejected("expected number >= 0, found -1"));
		expect(new NumberFilter("float").evaluate(3n)).toEqual(
			rejected("expected float, found '3' of type int"),
		);
	});

	test("null bounds mean unbounded", () => {
		const f = new NumberFilter("int", { min: null, max: null });
		expect(f.min).toBeNull();
		expect(f.max).toBeNull();
		expect(f.evaluate(json("-99999999999999999999"))).toBe(ACCEPTED);
	});
});

describe("StringFilter", () => {
	test("accepts any string without a pattern", () => {
		expect(new StringFilter().evaluate(json('""'))).toBe(ACCEPTED);
		expect(new StringFilter().evaluate(json("1"))).toEqual(
			rejected("expected string, found '1' of type int"),
		);
	});

	test("pattern is searched, not anchored", () => {
		const f = new StringFilter("\\d");
		expect(f.evaluate("ab3")).toBe(ACCEPTED);
		expect(f.evaluate("abc")).toEqual(rejected("expected string matching /\\d/, found 'abc'"));
	});

	test("anchored pattern", () => {
		const f = new StringFilter("^[a-z]+$");
		expect(f.evaluate("abc")).toBe(ACCEPTED);
		expect(f.evaluate("abc1")).toEqual(rejected("expected string matching /^[a-z]+$/, found 'abc1'"));
	});

	test("invalid pattern fails at construction", () => {
		expect(() => new StringFilter("[")).toThrow(PatternError);
	});
});

describe("BooleanFilter and NullFilter", () => {
	test("boolean", () => {
		expect(new BooleanFilter().evaluate(json("false"))).toBe(ACCEPTED);
		expect(new BooleanFilter().evaluate(json("0"))).toEqual(
			rejected("expected boolean, found '0' of type int"),
		);
	});

	test("null", () => {
		expect(new NullFilter().evaluate(json("null"))).toBe(ACCEPTED);
		expect(new NullFilter().evaluate(json('"null"'))).toEqual(
			rejected("expected null, found 'null' of type string"),
		);
	});
});

describe("ArrayFilter", () => {
	const ints = new ArrayFilter(new NumberFilter("int"));

	test("accepts empty and uniform arrays", () => {
		expect(ints.evaluate(json("[]"))).toBe(ACCEPTED);
		expect(ints.evaluate(json("[1, 2, 3]"))).toBe(ACCEPTED);
	});

	test("reports the first failing index", () => {
		expect(ints.evaluate(json('[1, 2, "x"]'))).toEqual(
			rejected("2: expected int, found 'x' of type string"),
		);
		expect(ints.evaluate(json('[1.5, "x"]'))).toEqual(
			rejected("0: expected int, found '1.5' of type float"),
		);
	});

	test("non-arrays", () => {
		expect(ints.evaluate(json('{"a": 1}'))).toEqual(
			rejected("expected array, found '{\"a\":1}' of type object"),
		);
	});
});

describe("ObjectFilter", () => {
	const schema = () =>
		new ObjectFilter({
			id: new NumberFilter("int", { min: 0 }),
			description: optional(new StringFilter()),
		});

	test("accepts required keys without optional ones", () => {
		expect(schema().evaluate(json('{"id": 5}'))).toBe(ACCEPTED);
		expect(schema().evaluate(json('{"id": 5, "description": "five"}'))).toBe(ACCEPTED);
	});

	test("reason names the failing key", () => {
		expect(schema().evaluate(json('{"id": -1}'))).toEqual(
			rejected("id: expected number >= 0, found -1"),
		);
		expect(schema().evaluate(json('{"id": 5, "description": 3}'))).toEqual(
			rejected("description: expected string, found '3' of type int"),
		);
	});

	test("missing required key", () => {
		expect(schema().evaluate(json("{}"))).toEqual(rejected("entry with key 'id' required"));
	});

	test("extra keys are rejected by default", () => {
		expect(schema().evaluate(json('{"id": 5, "extra": 1}'))).toEqual(
			rejected("unsupported key 'extra'"),
		);
	});

	test("first extra key in value order is reported", () => {
		expect(schema().evaluate(json('{"id": 1, "z": 1, "a": 2}'))).toEqual(
			rejected("unsupported key 'z'"),
		);
	});

	test("integer-like extra keys are reported first", () => {
		expect(new ObjectFilter({}).evaluate(json('{"b": 1, "2": 1}'))).toEqual(
			rejected("unsupported key '2'"),
		);
	});

	test("extra keys allowed on request", () => {
		const f = new ObjectFilter(
			{ id: new NumberFilter("int", { min: 0 }) },
			{ allowExtra: true },
		);
		expect(f.evaluate(json('{"id": 5, "extra": 1}'))).toBe(ACCEPTED);
	});

	test("declared keys are checked before extra keys", () => {
		expect(schema().evaluate(json('{"extra": 1, "id": -1}'))).toEqual(
			rejected("id: expected number >= 0, found -1"),
		);
	});

	test("nested location", () => {
		const f = new ObjectFilter({ tags: new ArrayFilter(new StringFilter()) });
		expect(f.evaluate(json('{"tags": ["a", 1]}'))).toEqual(
			rejected("tags: 1: expected string, found '1' of type int"),
		);
	});

	test("non-objects", () => {
		expect(schema().evaluate(json("[]"))).toEqual(rejected("expected object, found '[]' of type array"));
		expect(schema().evaluate(json("null"))).toEqual(
			rejected("expected object, found 'null' of type null"),
		);
	});

	test("entries keep declaration order", () => {
		expect([...schema().entries.keys()]).toEqual(["id", "description"]);
		expect(schema().entries.get("description")?.required).toBe(false);
	});
});

describe("OptionsFilter", () => {
	const intOrFloat = new OptionsFilter(new NumberFilter("int"), new NumberFilter("float"));

	test("first accepting alternative wins", () => {
		expect(intOrFloat.evaluate(json("5.0"))).toBe(ACCEPTED);
		expect(intOrFloat.evaluate(json("5"))).toBe(ACCEPTED);
	});

	test("joins every reason on failure", () => {
		expect(intOrFloat.evaluate(json('"a"'))).toEqual(
			rejected(
				"value not allowed (expected int, found 'a' of type string or expected float, found 'a' of type string)",
			),
		);
	});

	test("empty options reject everything", () => {
		expect(new OptionsFilter().evaluate(json("1"))).toEqual(rejected("value not allowed ()"));
	});

	test("nullable field", () => {
		const f = new ObjectFilter({ note: new OptionsFilter(new StringFilter(), new NullFilter()) });
		expect(f.evaluate(json('{"note": null}'))).toBe(ACCEPTED);
		expect(f.evaluate(json('{"note": false}'))).toEqual(
			rejected(
				"note: value not allowed (expected string, found 'false' of type boolean or expected null, found 'false' of type boolean)",
			),
		);
	});
});

describe("purity", () => {
	test("repeated evaluation gives identical results", () => {
		const f = new ArrayFilter(new ObjectFilter({ id: new NumberFilter("int") }));
		const value = json('[{"id": 1}, {"id": "2"}]');
		const first = evaluateFilter(f, value);
		for (let i = 0; i < 10; i++) evaluateFilter(f, json('[{"id": 3}]'));
		expect(evaluateFilter(f, value)).toEqual(first);
		expect(first).toEqual(rejected("1: id: expected int, found '2' of type string"));
	});

	test("filters are frozen", () => {
		expect(Object.isFrozen(new ObjectFilter({}))).toBe(true);
		expect(Object.isFrozen(new NumberFilter("int", { min: 1 }))).toBe(true);
		expect(Object.isFrozen(ACCEPTED)).toBe(true);
	});
});

describe("helpers", () => {
	test("filterDepth", () => {
		const int = new NumberFilter("int");
		expect(filterDepth(int)).toBe(1);
		expect(filterDepth(new ArrayFilter(int))).toBe(2);
		expect(filterDepth(new ObjectFilter({ a: new ArrayFilter(int) }))).toBe(3);
		expect(filterDepth(new OptionsFilter(int, new ArrayFilter(int)))).toBe(3);
		expect(filterDepth(new ObjectFilter({}))).toBe(1);
	});

	test("isFilter", () => {
		expect(isFilter(new BooleanFilter())).toBe(true);
		expect(isFilter(optional(new BooleanFilter()))).toBe(false);
		expect(isFilter({ evaluate: () => ACCEPTED })).toBe(false);
	});

	test("kindOf", () => {
		const cases: [ParsedJson, string][] = [
			[json("1"), "int"],
			[json("1.0"), "float"],
			[json("-2E2"), "float"],
			[2, "int"],
			[2.5, "float"],
			[10n, "int"],
			["s", "string"],
			[true, "boolean"],
			[null, "null"],
			[[], "array"],
			[{}, "object"],
		];
		for (const [value, kind] of cases) expect(kindOf(value)).toBe(kind);
	});
});
