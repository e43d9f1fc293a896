/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Ciphertext (any Uint8Array) in a log object is replaced by a size marker
 * before pino sees it, so raw encrypted bytes never reach a log sink.
 * Path-based redaction is available for anything else.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Ciphertext scrubbing ────────────────────────────────────────────

const MAX_DEPTH = 4;

function scrub(value: unknown, depth: number): unknown {
	if (value instanceof Uint8Array) return `[ciphertext:${value.byteLength}B]`;
	if (value === null || typeof value !== "object" || depth >= MAX_DEPTH) return value;
	if (value instanceof Error) return value;
	if (Array.isArray(value)) return value.map((v) => scrub(v, depth + 1));

	const result: Record<string, unknown> = {};
	for (const [key, v] of Object.entries(value)) {
		result[key] = scrub(v, depth + 1);
	}
	return result;
}

function scrubObject(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, v] of Object.entries(obj)) {
		result[key] = scrub(v, 1);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const log =
		(level: Level) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				pinoLogger[level](msgOrObj);
			} else {
				pinoLogger[level](scrubObject(msgOrObj), msg ?? "");
			}
		};

	return {
		info: log("info"),
		warn: log("warn"),
		error: log("error"),
		debug: log("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(scrubObject(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ poolId: 0, encryptedStake }, "deposit committed");
 * // encryptedStake is logged as "[ciphertext:32B]"
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that discards everything. Default when none is injected. */
export const silentLogger: Logger = createLogger({ level: "fatal", destination: { write() {} } });
