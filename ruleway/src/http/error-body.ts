import { STATUS_CODES } from "node:http";

import { HttpError } from "../errors.ts";

export const INTERNAL_ERROR_MESSAGE = "A server error occurred. Please contact an administrator.";

export interface ErrorBodyOptions {
	/** Indent with 4 spaces instead of compact output. */
	readonly friendly?: boolean;
}

/** Status, headers and body ready to be written by the surrounding server. */
export interface ErrorResponse {
	readonly status: number;
	readonly headers: Readonly<Record<string, string>>;
	readonly body: string;
}

/** Anything thrown → HttpError. Non-HTTP errors become a 500. */
export function toHttpError(error: unknown): HttpError {
	if (error instanceof HttpError) return error;
	return new HttpError(500, INTERNAL_ERROR_MESSAGE);
}

/** `{"code":404,"error":"Not Found","message":"Path not found"}` */
export function toErrorBody(error: HttpError, options: ErrorBodyOptions = {}): string {
	const payload = {
		code: error.status,
		error: STATUS_CODES[error.status] ?? "Unknown",
		message: error.message,
	};
	return options.friendly ? JSON.stringify(payload, null, 4) : JSON.stringify(payload);
}

export function toErrorResponse(error: unknown, options: ErrorBodyOptions = {}): ErrorResponse {
	const httpError = toHttpError(error);
	return {
		status: httpError.status,
		headers: { "Content-Type": "application/json", ...httpError.headers },
		body: toErrorBody(httpError, options),
	};
}
