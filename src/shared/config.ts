/**
 * Ledger configuration.
 *
 * Only the genesis owner is required. Everything else has a default, and any
 * field can come from the environment through configFromEnv().
 */

import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Identity, identity, isNullIdentity } from "./identifiers.js";

export interface LedgerConfig {
	/** Privileged identity at genesis (before any ownership transfer); replay starts from it */
	readonly owner: Identity;
	/** Minimum pino level for ledger logs */
	readonly logLevel: LogLevel;
	/** JSONL event log file; in-memory log when absent */
	readonly eventLogPath?: string | undefined;
	/** Rotate the event log file once it reaches this many bytes (optional) */
	readonly eventLogMaxFileSizeBytes?: number | undefined;
}

export const DEFAULT_LEDGER_CONFIG: Omit<LedgerConfig, "owner"> = {
	logLevel: "info",
};

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/** Mutable builder shape for constructing Partial<LedgerConfig>. */
interface MutableLedgerConfig {
	owner?: Identity;
	logLevel?: LogLevel;
	eventLogPath?: string;
	eventLogMaxFileSizeBytes?: number;
}

/**
 * Reads config values from environment variables.
 * Supported: CIPHERFARM_OWNER, CIPHERFARM_LOG_LEVEL, CIPHERFARM_EVENT_LOG,
 * CIPHERFARM_EVENT_LOG_MAX_BYTES.
 * @throws ConfigError if a variable is set to an unusable value
 */
export function configFromEnv(): Partial<LedgerConfig> {
	const result: MutableLedgerConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const owner = process.env["CIPHERFARM_OWNER"];
	if (owner !== undefined && owner.trim().length > 0) {
		result.owner = identity(owner);
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = process.env["CIPHERFARM_LOG_LEVEL"];
	if (level) {
		const parsed = validate(logLevelSchema, level);
		if (!parsed.ok) {
			throw new ConfigError(`Invalid CIPHERFARM_LOG_LEVEL: "${level}"`, { cause: parsed.error });
		}
		result.logLevel = parsed.value;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const path = process.env["CIPHERFARM_EVENT_LOG"];
	if (path) {
		result.eventLogPath = path;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const maxBytes = process.env["CIPHERFARM_EVENT_LOG_MAX_BYTES"];
	if (maxBytes) {
		const parsed = strictParseInt(maxBytes);
		if (Number.isNaN(parsed) || parsed <= 0) {
			throw new ConfigError(
				`Invalid CIPHERFARM_EVENT_LOG_MAX_BYTES: "${maxBytes}" must be a positive integer`,
			);
		}
		result.eventLogMaxFileSizeBytes = parsed;
	}

	return result;
}

/**
 * Merge a partial config over the defaults.
 * @throws ConfigError when no owner is given or the owner is the null identity
 */
export function resolveConfig(partial: Partial<LedgerConfig>): LedgerConfig {
	const { owner } = partial;
	if (owner === undefined) {
		throw new ConfigError("Ledger owner is required (set CIPHERFARM_OWNER)");
	}
	if (isNullIdentity(owner)) {
		throw new ConfigError("Ledger owner cannot be the null identity", { owner });
	}
	return { ...DEFAULT_LEDGER_CONFIG, ...partial, owner };
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}
