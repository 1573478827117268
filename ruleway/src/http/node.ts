import type { IncomingHttpHeaders, IncomingMessage } from "node:http";

import { streamBody } from "./body-source.ts";
import { HttpRequest } from "./request.ts";

/** Adapt a node:http request. The body is streamed from `req` on first read. */
export function fromIncomingMessage(req: IncomingMessage): HttpRequest {
	return new HttpRequest(req.method ?? "GET", req.url ?? "/", flattenHeaders(req.headers), streamBody(req));
}

/** Repeated headers are joined with ", ". */
export function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) continue;
		out[name] = Array.isArray(value) ? value.join(", ") : value;
	}
	return out;
}
