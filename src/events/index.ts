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
	stamp,
	copyEvent,
} from "./ledger-events.js";
export { type EncodedLedgerEvent, decodeEvent, encodeEvent } from "./codec.js";
