/**
 * Structured logging.
 *
 * The router and body parser log through this interface; they default to
 * `noopLogger`. `createConsoleLogger` writes one JSON object per line.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type Fields = Record<string, unknown>;

export interface Logger {
	debug(message: string, fields?: Fields): void;
	info(message: string, fields?: Fields): void;
	warn(message: string, fields?: Fields): void;
	error(message: string, fields?: Fields): void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel | "silent", number>> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

/** Level used when RULEWAY_LOG_LEVEL is unset or unknown. */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const noopLogger: Logger = Object.freeze({
	debug() {},
	info() {},
	warn() {},
	error() {},
});

export interface ConsoleLoggerOptions {
	readonly level?: LogLevel | "silent";
	/** Receives each serialized line. Defaults to console.log. */
	readonly sink?: (line: string) => void;
	/** Fields merged into every entry. */
	readonly fields?: Fields;
}

/** Resolve the level from RULEWAY_LOG_LEVEL. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | "silent" {
	const raw = env.RULEWAY_LOG_LEVEL?.toLowerCase();
	if (raw !== undefined && isLevel(raw)) return raw;
	return DEFAULT_LOG_LEVEL;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const threshold = LEVEL_ORDER[options.level ?? levelFromEnv()];
	const sink = options.sink ?? ((line: string) => console.log(line));
	const base = options.fields ?? {};

	const write = (level: LogLevel, message: string, fields?: Fields): void => {
		if (LEVEL_ORDER[level] < threshold) return;
		sink(
			JSON.stringify({
				timestamp: new Date().toISOString(),
				level,
				message,
				...base,
				...fields,
			}),
		);
	};

	return {
		debug: (message, fields) => write("debug", message, fields),
		info: (message, fields) => write("info", message, fields),
		warn: (message, fields) => write("warn", message, fields),
		error: (message, fields) => write("error", message, fields),
	};
}

function isLevel(value: string): value is LogLevel | "silent" {
	return Object.hasOwn(LEVEL_ORDER, value);
}
