export {
	type PoolId,
	type Identity,
	poolId,
	identity,
	NULL_IDENTITY,
	isNullIdentity,
	positionKey,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	LedgerError,
	UnauthorizedError,
	InvalidArgumentError,
	PoolInactiveError,
	NoActivePositionError,
	ConfigError,
	SystemError,
	classifyError,
	isUnauthorizedError,
	isInvalidArgumentError,
	isPoolInactiveError,
	isNoActivePositionError,
	isConfigError,
	isSystemError,
} from "./errors.js";

export {
	type Ciphertext,
	EMPTY_CIPHERTEXT,
	isEmptyCiphertext,
	copyCiphertext,
	ciphertextEquals,
	ciphertextFromHex,
	ciphertextToHex,
	ciphertextFromUtf8,
} from "./ciphertext.js";

export { type Clock, SystemClock, FakeClock } from "./time.js";
export { type LedgerConfig, DEFAULT_LEDGER_CONFIG, configFromEnv, resolveConfig } from "./config.js";
