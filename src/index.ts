// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type PoolId,
	type Identity,
	poolId,
	identity,
	NULL_IDENTITY,
	isNullIdentity,
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	isOk,
	isErr,
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
	type Ciphertext,
	EMPTY_CIPHERTEXT,
	isEmptyCiphertext,
	copyCiphertext,
	ciphertextEquals,
	ciphertextFromHex,
	ciphertextToHex,
	ciphertextFromUtf8,
	type Clock,
	SystemClock,
	FakeClock,
	type LedgerConfig,
	DEFAULT_LEDGER_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Access ───────────────────────────────────────────────────────────
export { AccessController, type OwnerGuard } from "./access/index.js";

// ── Pools ────────────────────────────────────────────────────────────
export { PoolRegistry, type Pool, type PoolAggregates } from "./pool/index.js";

// ── Positions ────────────────────────────────────────────────────────
export {
	PositionLedger,
	PositionState,
	type Position,
	type PositionTransition,
} from "./position/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	LedgerEventType,
	type LedgerEvent,
	type LedgerEventOf,
	type LedgerEventPayload,
	type PositionEventPayload,
	type EventStamp,
	type PoolCreated,
	type PoolStatusChanged,
	type OwnershipTransferred,
	type DepositedEncrypted,
	type AccruedEncrypted,
	type ClaimedEncrypted,
	type WithdrawnEncrypted,
	type EncodedLedgerEvent,
	encodeEvent,
	decodeEvent,
} from "./events/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type EventLog,
	MemoryEventLog,
	FileEventLog,
	type FileEventLogConfig,
	type CorruptLine,
	type RestoreResult,
} from "./persistence/index.js";

// ── Ledger ───────────────────────────────────────────────────────────
export {
	FarmLedger,
	type FarmLedgerEvents,
	type FarmLedgerOptions,
	openLedger,
	type OpenLedgerOptions,
} from "./ledger/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	createLogger,
	silentLogger,
	type Logger,
	type LoggerConfig,
	type LogLevel,
} from "./lib/logger/index.js";
export { TypedEmitter, type EventMap, type ListenerErrorCallback } from "./lib/events/index.js";
export { ValidationError, validate } from "./lib/validation/index.js";
