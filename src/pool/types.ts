/**
 * Pool domain types.
 */

import type { PoolId } from "../shared/identifiers.js";

/** Plaintext, non-attributable per-pool counters. */
export interface PoolAggregates {
	/** Positions in this pool currently active */
	readonly farmers: number;
	/** Lifetime successful deposits; never decreases */
	readonly deposits: number;
	/** Lifetime successful claims; never decreases */
	readonly claims: number;
}

export interface Pool extends PoolAggregates {
	readonly id: PoolId;
	/** Opaque label, plaintext or ciphertext; never interpreted */
	readonly name: Uint8Array;
	/** Clock time at creation; 0 for a record materialized by setPoolActive */
	readonly createdAt: number;
	/** When false every position-mutating call except withdraw fails */
	readonly active: boolean;
}
