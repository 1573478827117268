export { HttpRequest, parseContentLength } from "./request.ts";
export { bufferBody, streamBody } from "./body-source.ts";
export { flattenHeaders, fromIncomingMessage } from "./node.ts";
export {
	INTERNAL_ERROR_MESSAGE,
	toErrorBody,
	toErrorResponse,
	toHttpError,
} from "./error-body.ts";
export type { ErrorBodyOptions, ErrorResponse } from "./error-body.ts";
