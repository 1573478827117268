import { bufferBody } from "./http/body-source.ts";
import { HttpRequest } from "./http/request.ts";
import type { Logger, LogLevel } from "./logger.ts";

/**
 * Request without a body, for tests and examples.
 *
 * `contentType` null leaves the header out.
 */
export function requestOf(method: string, rawPath: string, contentType: string | null = null): HttpRequest {
	const headers: Record<string, string> = {};
	if (contentType !== null) headers["content-type"] = contentType;
	return new HttpRequest(method, rawPath, headers);
}

/**
 * Request with an in-memory body. Content-Length is set from the encoded
 * bytes unless `contentLength` overrides it (null leaves it out).
 */
export function jsonRequest(
	method: string,
	rawPath: string,
	body: string | Uint8Array,
	contentType = "application/json",
	contentLength?: number | null,
): HttpRequest {
	const bytes = typeof body === "string" ? new TextEncoder().encode(body) : body;
	const headers: Record<string, string> = { "content-type": contentType };
	const length = contentLength === undefined ? bytes.length : contentLength;
	if (length !== null) headers["content-length"] = String(length);
	return new HttpRequest(method, rawPath, headers, bufferBody(bytes));
}

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	readonly fields: Readonly<Record<string, unknown>>;
}

/** Logger that keeps every entry in memory. */
export class RecordingLogger implements Logger {
	readonly entries: LogEntry[] = [];

	debug(message: string, fields: Record<string, unknown> = {}): void {
		this.entries.push({ level: "debug", message, fields });
	}

	info(message: string, fields: Record<string, unknown> = {}): void {
		this.entries.push({ level: "info", message, fields });
	}

	warn(message: string, fields: Record<string, unknown> = {}): void {
		this.entries.push({ level: "warn", message, fields });
	}

	error(message: string, fields: Record<string, unknown> = {}): void {
		this.entries.push({ level: "error", message, fields });
	}
}
