// Core types
export type { BodySource, JsonValue, ParsedJson, RequestDescriptor } from "./types.ts";
// HTTP adapters and error bodies: import from "ruleway/http"
// Test utilities (requestOf, jsonRequest): import from "ruleway/testing"

// Errors
export {
	AmbiguousRouteError,
	BodyConsumedError,
	BodyRequiredError,
	ConversionError,
	HttpError,
	MalformedBodyError,
	MethodNotAllowedError,
	PatternError,
	PayloadTooLargeError,
	RouteNotFoundError,
	RulewayError,
	ShapeValidationError,
	UnsupportedMediaTypeError,
} from "./errors.ts";

// Converters and path patterns
export {
	FLOAT,
	FloatConverter,
	INT,
	IntConverter,
	RegexConverter,
	STR,
	StringConverter,
	isConverter,
} from "./converters.ts";
export type { Converter } from "./converters.ts";
export { PathPattern, path } from "./pattern.ts";
export type { PatternPart } from "./pattern.ts";

// Rules and routing
export {
	CONTENT_TYPE_RULE,
	ContentTypeRule,
	METHOD_RULE,
	MethodRule,
	NO_CAPTURES,
	PathRule,
	mediaTypeTokens,
} from "./rules.ts";
export type { Rule } from "./rules.ts";
export { Route, Router, RouterBuilder, createRouter } from "./router.ts";
export type { ExpectedOf, RouteKey, RouteMatch, RouterOptions } from "./router.ts";
export { currentCaptures, currentContext, runInContext } from "./context.ts";
export type { RequestContext } from "./context.ts";

// Filters and body parsing
export {
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
} from "./filters.ts";
export type {
	Filter,
	FilterResult,
	NumberBounds,
	NumberKind,
	ObjectEntry,
	ObjectFilterOptions,
	ValueKind,
} from "./filters.ts";
export {
	DEFAULT_MAX_BODY_BYTES,
	JsonBodyParser,
	parseJsonText,
	toPlainJson,
	validateJson,
} from "./body.ts";
export type { JsonBodyParserOptions, ParsedBody } from "./body.ts";
export { XmlBodyParser, parseXmlText, textOf } from "./xml.ts";
export type { ParsedXmlBody, XmlBodyParserOptions, XmlElement, XmlNode } from "./xml.ts";

// Logging
export { DEFAULT_LOG_LEVEL, createConsoleLogger, levelFromEnv, noopLogger } from "./logger.ts";
export type { ConsoleLoggerOptions, LogLevel, Logger } from "./logger.ts";

// Config types
export {
	ArrayFilterConfig,
	ConfigParseError,
	ConverterRef,
	DEFAULT_DIMENSIONS,
	LeafFilterConfig,
	ObjectEntryConfig,
	ObjectFilterConfig,
	OptionsFilterConfig,
	RouteConfig,
	RouterConfig,
	parseFilterConfig,
	parsePathConfig,
	parseRouterConfig,
} from "./config.ts";
export type { FilterConfig, LeafKind, PathPartConfig } from "./config.ts";

// Registry
export {
	FilterTooDeepError,
	InvalidConfigError,
	MAX_FILTER_DEPTH,
	MAX_OPTIONS,
	MAX_PATTERN_LENGTH,
	MAX_REGEX_PATTERN_LENGTH,
	MAX_ROUTES,
	PatternTooLongError,
	Registry,
	RegistryBuilder,
	TooManyOptionsError,
	TooManyRoutesError,
	UnknownNameError,
	createDefaultRegistry,
	registerDefaults,
} from "./registry.ts";
