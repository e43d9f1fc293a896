/**
 * Encrypted position types.
 */

import type { PositionEventPayload } from "../events/ledger-events.js";
import type { PoolRegistry } from "../pool/pool-registry.js";
import type { Ciphertext } from "../shared/ciphertext.js";
import type { Identity, PoolId } from "../shared/identifiers.js";
import type { PositionLedger } from "./position-ledger.js";

/** Lifecycle of one (pool, participant) slot. Closed behaves like Unopened. */
export const PositionState = {
	Unopened: "unopened",
	Active: "active",
	Closed: "closed",
} as const;

export type PositionState = (typeof PositionState)[keyof typeof PositionState];

export interface Position {
	readonly poolId: PoolId;
	readonly participant: Identity;
	/** Overwritten wholesale on every deposit */
	readonly encryptedStake: Ciphertext;
	/** Overwritten by accrue, cleared by claim */
	readonly encryptedAccrued: Ciphertext;
	readonly lastUpdate: number;
	readonly active: boolean;
}

/** Everything one successful position call produces, published together or not at all. */
export interface PositionTransition {
	readonly ledger: PositionLedger;
	readonly registry: PoolRegistry;
	readonly position: Position;
	readonly event: PositionEventPayload;
}
