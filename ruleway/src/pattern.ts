import { type Converter, isConverter } from "./converters.ts";
import { ConversionError, PatternError } from "./errors.ts";

/** A literal path fragment or a converter for a generic segment. */
export type PatternPart = string | Converter<unknown>;

/** A converter paired with the literal that ends its segment ("" = end of path). */
interface Step {
	readonly converter: Converter<unknown>;
	readonly literal: string;
}

/**
 * Path pattern: literals alternating with converters, starting with a literal.
 *
 *   PathPattern.of("/id/", INT, "/name/", STR)   matches /id/42/name/joe → [42, "joe"]
 *   path`/id/${INT}/name/${STR}`                   same pattern
 *
 * A converter's segment runs up to the first occurrence of the next literal,
 * so a captured value that contains that literal is split early.
 */
export class PathPattern {
	readonly head: string;
	private readonly steps: readonly Step[];

	private constructor(head: string, steps: readonly Step[]) {
		this.head = head;
		this.steps = steps;
		Object.freeze(this);
	}

	/**
	 * Build from alternating parts. A trailing empty literal is the same as
	 * none; an empty literal between two converters is rejected.
	 */
	static of(...parts: readonly PatternPart[]): PathPattern {
		const [head, ...rest] = parts;
		if (typeof head !== "string") {
			throw new PatternError("path pattern must start with a literal (use \"\" for none)");
		}

		const steps: Step[] = [];
		for (let i = 0; i < rest.length; i += 2) {
			const converter = rest[i];
			if (!isConverter(converter)) {
				throw new PatternError(
					`part ${i + 1}: expected a converter after literal "${String(rest[i - 1] ?? head)}"`,
				);
			}
			const literal = rest[i + 1] ?? "";
			if (typeof literal !== "string") {
				throw new PatternError(
					`part ${i + 2}: converters "${converter.name}" and "${literal.name}" are adjacent`,
				);
			}
			if (literal === "" && i + 2 < rest.length) {
				throw new PatternError(
					`part ${i + 2}: empty literal between converters "${converter.name}" and "${nameOf(rest[i + 2])}"`,
				);
			}
			steps.push(Object.freeze({ converter, literal }));
		}
		return new PathPattern(head, Object.freeze(steps));
	}

	/** Number of values a successful match captures. */
	get arity(): number {
		return this.steps.length;
	}

	/** Total length of all literal parts. */
	get literalLength(): number {
		return this.steps.reduce((sum, s) => sum + s.literal.length, this.head.length);
	}

	/** The parts in construction order, without a trailing empty literal. */
	parts(): PatternPart[] {
		const out: PatternPart[] = [this.head];
		for (const { converter, literal } of this.steps) {
			out.push(converter);
			if (literal !== "") out.push(literal);
		}
		return out;
	}

	/** Match a whole path. Returns the converted values, or null. */
	match(path: string): readonly unknown[] | null {
		if (!path.startsWith(this.head)) return null;
		let rest = path.slice(this.head.length);
		const captures: unknown[] = [];

		for (const { converter, literal } of this.steps) {
			let segment: string;
			if (literal === "") {
				segment = rest;
				rest = "";
			} else {
				const end = rest.indexOf(literal);
				if (end === -1) return null;
				segment = rest.slice(0, end);
				rest = rest.slice(end + literal.length);
			}

			try {
				captures.push(converter.parse(segment));
			} catch (e) {
				if (e instanceof ConversionError) return null;
				throw e;
			}
		}

		return rest === "" ? captures : null;
	}

	/** `/id/{int}/name/{str}` */
	toString(): string {
		return this.steps.reduce((out, s) => `${out}{${s.converter.name}}${s.literal}`, this.head);
	}
}

/** Tagged-template form of PathPattern.of. */
export function path(
	strings: TemplateStringsArray,
	...converters: readonly Converter<unknown>[]
): PathPattern {
	const parts: PatternPart[] = [strings[0] ?? ""];
	converters.forEach((converter, i) => {
		parts.push(converter, strings[i + 1] ?? "");
	});
	return PathPattern.of(...parts);
}

function nameOf(part: PatternPart | undefined): string {
	if (part === undefined) return "";
	return typeof part === "string" ? part : part.name;
}
