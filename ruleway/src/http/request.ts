import type { BodySource, RequestDescriptor } from "../types.ts";

/**
 * Request descriptor built from method, raw path and headers.
 *
 * Query string is split off rawPath at construction. Headers are stored
 * lowercased for case-insensitive lookup.
 */
export class HttpRequest implements RequestDescriptor {
	readonly path: string;
	readonly queryParams: ReadonlyMap<string, string>;
	readonly contentType: string | null;
	readonly contentLength: number | null;
	private readonly lowerHeaders: ReadonlyMap<string, string>;

	constructor(
		readonly method: string = "GET",
		readonly rawPath: string = "/",
		headers: Readonly<Record<string, string>> = {},
		readonly body: BodySource | null = null,
	) {
		const qIdx = rawPath.indexOf("?");
		const params = new Map<string, string>();
		if (qIdx >= 0) {
			this.path = rawPath.slice(0, qIdx);
			for (const part of rawPath.slice(qIdx + 1).split("&")) {
				const eqIdx = part.indexOf("=");
				if (eqIdx >= 0) {
					params.set(part.slice(0, eqIdx), part.slice(eqIdx + 1));
				} else if (part) {
					params.set(part, "");
				}
			}
		} else {
			this.path = rawPath;
		}
		this.queryParams = params;

		const lower = new Map<string, string>();
		for (const [k, v] of Object.entries(headers)) {
			lower.set(k.toLowerCase(), v);
		}
		this.lowerHeaders = lower;

		this.contentType = lower.get("content-type") ?? null;
		this.contentLength = parseContentLength(lower.get("content-length"));
	}

	header(name: string): string | null {
		return this.lowerHeaders.get(name.toLowerCase()) ?? null;
	}

	queryParam(name: string): string | null {
		return this.queryParams.get(name) ?? null;
	}
}

/** Non-negative decimal Content-Length, or null when absent or malformed. */
export function parseContentLength(raw: string | undefined): number | null {
	if (raw === undefined || !/^\d+$/.test(raw.trim())) return null;
	const n = Number(raw.trim());
	return Number.isSafeInteger(n) ? n : null;
}
