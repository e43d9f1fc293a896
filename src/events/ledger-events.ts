/**
 * Ledger events — one record per successful mutating call.
 *
 * Payloads are what the components produce. The hosting ledger stamps each
 * with a gapless `sequence` (from 1) and a `timestamp` when it is appended to
 * the durable log.
 */

import { type Ciphertext, copyCiphertext } from "../shared/ciphertext.js";
import type { Identity, PoolId } from "../shared/identifiers.js";

export const LedgerEventType = {
	PoolCreated: "PoolCreated",
	PoolStatusChanged: "PoolStatusChanged",
	OwnershipTransferred: "OwnershipTransferred",
	DepositedEncrypted: "DepositedEncrypted",
	AccruedEncrypted: "AccruedEncrypted",
	ClaimedEncrypted: "ClaimedEncrypted",
	WithdrawnEncrypted: "WithdrawnEncrypted",
} as const;

export type LedgerEventType = (typeof LedgerEventType)[keyof typeof LedgerEventType];

// ── Payloads ─────────────────────────────────────────────────────────

export interface PoolCreated {
	readonly type: "PoolCreated";
	readonly poolId: PoolId;
	readonly name: Uint8Array;
}

export interface PoolStatusChanged {
	readonly type: "PoolStatusChanged";
	readonly poolId: PoolId;
	readonly active: boolean;
}

export interface OwnershipTransferred {
	readonly type: "OwnershipTransferred";
	readonly previousOwner: Identity;
	readonly newOwner: Identity;
}

export interface DepositedEncrypted {
	readonly type: "DepositedEncrypted";
	readonly poolId: PoolId;
	readonly participant: Identity;
	readonly encryptedStake: Ciphertext;
}

export interface AccruedEncrypted {
	readonly type: "AccruedEncrypted";
	readonly poolId: PoolId;
	readonly participant: Identity;
	/** Carried for observers only; the ledger never combines it */
	readonly encryptedRewardDelta: Ciphertext;
	readonly newEncryptedAccrued: Ciphertext;
}

export interface ClaimedEncrypted {
	readonly type: "ClaimedEncrypted";
	readonly poolId: PoolId;
	readonly participant: Identity;
	/** Caller-supplied; not checked against the accrued value */
	readonly encryptedPayout: Ciphertext;
}

export interface WithdrawnEncrypted {
	readonly type: "WithdrawnEncrypted";
	readonly poolId: PoolId;
	readonly participant: Identity;
	/** Caller-supplied; not checked against the stake */
	readonly encryptedAmount: Ciphertext;
}

export type LedgerEventPayload =
	| PoolCreated
	| PoolStatusChanged
	| OwnershipTransferred
	| DepositedEncrypted
	| AccruedEncrypted
	| ClaimedEncrypted
	| WithdrawnEncrypted;

export type PositionEventPayload =
	| DepositedEncrypted
	| AccruedEncrypted
	| ClaimedEncrypted
	| WithdrawnEncrypted;

/** Position in the log and the clock time of the call. */
export interface EventStamp {
	readonly sequence: number;
	readonly timestamp: number;
}

export type LedgerEvent = LedgerEventPayload & EventStamp;

/** Narrow a stamped record to one event type. */
export type LedgerEventOf<T extends LedgerEventType> = Extract<LedgerEventPayload, { type: T }> &
	EventStamp;

export function stamp(payload: LedgerEventPayload, sequence: number, timestamp: number): LedgerEvent {
	return { ...payload, sequence, timestamp };
}

/** Record with every ciphertext field detached from the original. */
export function copyEvent(event: LedgerEvent): LedgerEvent {
	switch (event.type) {
		case "PoolCreated":
			return { ...event, name: copyCiphertext(event.name) };
		case "PoolStatusChanged":
		case "OwnershipTransferred":
			return { ...event };
		case "DepositedEncrypted":
			return { ...event, encryptedStake: copyCiphertext(event.encryptedStake) };
		case "AccruedEncrypted":
			return {
				...event,
				encryptedRewardDelta: copyCiphertext(event.encryptedRewardDelta),
				newEncryptedAccrued: copyCiphertext(event.newEncryptedAccrued),
			};
		case "ClaimedEncrypted":
			return { ...event, encryptedPayout: copyCiphertext(event.encryptedPayout) };
		case "WithdrawnEncrypted":
			return { ...event, encryptedAmount: copyCiphertext(event.encryptedAmount) };
	}
}
