import { XMLParser, XMLValidator } from "fast-xml-parser";

import { DEFAULT_MAX_BODY_BYTES, decodeUtf8, readBody } from "./body.ts";
import { MalformedBodyError } from "./errors.ts";
import { type Logger, noopLogger } from "./logger.ts";
import type { RequestDescriptor } from "./types.ts";

/** An element of a parsed XML document. Text children are strings. */
export interface XmlElement {
	readonly name: string;
	readonly attributes: Readonly<Record<string, string>>;
	readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | string;

export interface XmlBodyParserOptions {
	readonly maxBodyBytes?: number;
	readonly logger?: Logger;
}

/** A request body that parsed as a single-rooted XML document. */
export interface ParsedXmlBody {
	readonly raw: Uint8Array;
	readonly root: XmlElement;
}

const ATTRIBUTES = ":@";
const TEXT = "#text";

const xml = new XMLParser({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: "",
	ignoreDeclaration: true,
	ignorePiTags: true,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
});

/**
 * Parse an XML document into its root element.
 *
 * Throws MalformedBodyError ("Invalid XML") unless the text is well formed
 * with exactly one root element.
 */
export function parseXmlText(text: string): XmlElement {
	if (XMLValidator.validate(text) !== true) throw new MalformedBodyError("Invalid XML");
	let parsed: unknown;
	try {
		parsed = xml.parse(text);
	} catch (e) {
		if (e instanceof Error) throw new MalformedBodyError("Invalid XML");
		throw e;
	}
	const roots = toNodes(parsed).filter(isElement);
	const [root, ...rest] = roots;
	if (root === undefined || rest.length > 0) throw new MalformedBodyError("Invalid XML");
	return root;
}

/**
 * Reads a request body once and parses it as XML.
 *
 * Holds no per-request state: one instance serves concurrent requests.
 */
export class XmlBodyParser {
	readonly maxBodyBytes: number;
	private readonly logger: Logger;

	constructor(options: XmlBodyParserOptions = {}) {
		this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
		this.logger = options.logger ?? noopLogger;
		Object.freeze(this);
	}

	async parse(req: RequestDescriptor): Promise<ParsedXmlBody> {
		const raw = await readBody(req, "xml", this.maxBodyBytes);
		const text = decodeUtf8(raw);
		if (text === null) {
			this.logger.debug("body rejected", { path: req.path, reason: "not UTF-8" });
			throw new MalformedBodyError("Invalid XML");
		}
		return { raw, root: parseXmlText(text) };
	}
}

/** Text content of an element and its descendants, in document order. */
export function textOf(node: XmlNode): string {
	if (typeof node === "string") return node;
	return node.children.map(textOf).join("");
}

// ── fast-xml-parser's ordered output ────────────────────────────────

function isElement(node: XmlNode): node is XmlElement {
	return typeof node !== "string";
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNodes(raw: unknown): XmlNode[] {
	if (!Array.isArray(raw)) throw new MalformedBodyError("Invalid XML");
	const nodes: XmlNode[] = [];
	for (const item of raw) {
		const node = toNode(item);
		if (node !== null) nodes.push(node);
	}
	return nodes;
}

// Each entry holds one tag name (or "#text"), plus ":@" for attributes.
function toNode(item: unknown): XmlNode | null {
	if (!isRecord(item)) throw new MalformedBodyError("Invalid XML");
	for (const [key, value] of Object.entries(item)) {
		if (key === ATTRIBUTES) continue;
		if (key === TEXT) return String(value);
		if (key.startsWith("?")) return null;
		return Object.freeze({
			name: key,
			attributes: toAttributes(item[ATTRIBUTES]),
			children: Object.freeze(toNodes(value)),
		});
	}
	return null;
}

function toAttributes(raw: unknown): Readonly<Record<string, string>> {
	const out: Record<string, string> = {};
	if (!isRecord(raw)) return Object.freeze(out);
	for (const [key, value] of Object.entries(raw)) {
		Object.defineProperty(out, key, {
			value: String(value),
			enumerable: true,
			writable: false,
			configurable: false,
		});
	}
	return Object.freeze(out);
}
