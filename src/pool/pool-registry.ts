/**
 * PoolRegistry — immutable set of pools and their aggregate counters.
 *
 * Reads are present-or-default: an id that was never written reads as an
 * inactive pool with zero counters. Admin mutations take an OwnerGuard and
 * check it before anything else.
 */

import type { OwnerGuard } from "../access/access-controller.js";
import { EMPTY_CIPHERTEXT, copyCiphertext } from "../shared/ciphertext.js";
import type { UnauthorizedError } from "../shared/errors.js";
import { type Identity, type PoolId, poolId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { Pool, PoolAggregates } from "./types.js";

function defaultPool(id: PoolId): Pool {
	return {
		id,
		name: EMPTY_CIPHERTEXT,
		createdAt: 0,
		active: false,
		farmers: 0,
		deposits: 0,
		claims: 0,
	};
}

function copyPool(pool: Pool): Pool {
	return { ...pool, name: copyCiphertext(pool.name) };
}

export class PoolRegistry {
	private readonly records: ReadonlyMap<PoolId, Pool>;
	/** Id the next createPool will assign */
	readonly nextPoolId: PoolId;

	private constructor(records: ReadonlyMap<PoolId, Pool>, nextPoolId: PoolId) {
		this.records = records;
		this.nextPoolId = nextPoolId;
	}

	static create(): PoolRegistry {
		return new PoolRegistry(new Map(), poolId(0));
	}

	// ── Admin ─────────────────────────────────────────────────────

	/**
	 * Allocates the next sequential id and stores an active pool.
	 *
	 * Counters already materialized at that id (by an earlier increment on an
	 * unknown pool) are carried over so `farmers` keeps matching the open
	 * positions.
	 */
	createPool(
		guard: OwnerGuard,
		caller: Identity,
		name: Uint8Array,
		now: number,
	): Result<{ registry: PoolRegistry; poolId: PoolId }, UnauthorizedError> {
		const auth = guard.requireOwner(caller);
		if (!auth.ok) return auth;

		const id = this.nextPoolId;
		const existing = this.stored(id);
		const pool: Pool = {
			...existing,
			name: copyCiphertext(name),
			createdAt: now,
			active: true,
		};
		const registry = new PoolRegistry(this.withPool(pool), poolId(id + 1));
		return ok({ registry, poolId: id });
	}

	/**
	 * Sets the active flag with no existence check. An unknown id materializes
	 * a default record carrying the flag; nextPoolId is not advanced.
	 */
	setPoolActive(
		guard: OwnerGuard,
		caller: Identity,
		id: PoolId,
		active: boolean,
	): Result<PoolRegistry, UnauthorizedError> {
		const auth = guard.requireOwner(caller);
		if (!auth.ok) return auth;
		return ok(this.update(id, (pool) => ({ ...pool, active })));
	}

	// ── Counters (PositionLedger only) ────────────────────────────

	/**
	 * Adjust the farmer count; a decrement below zero clamps at zero.
	 * @internal
	 */
	incrementFarmers(id: PoolId, delta: number): PoolRegistry {
		return this.update(id, (pool) => ({ ...pool, farmers: Math.max(0, pool.farmers + delta) }));
	}

	/** @internal */
	incrementDeposits(id: PoolId): PoolRegistry {
		return this.update(id, (pool) => ({ ...pool, deposits: pool.deposits + 1 }));
	}

	/** @internal */
	incrementClaims(id: PoolId): PoolRegistry {
		return this.update(id, (pool) => ({ ...pool, claims: pool.claims + 1 }));
	}

	// ── Queries ───────────────────────────────────────────────────

	isActive(id: PoolId): boolean {
		return this.stored(id).active;
	}

	getAggregates(id: PoolId): PoolAggregates {
		const { farmers, deposits, claims } = this.stored(id);
		return { farmers, deposits, claims };
	}

	/** Copy of the stored record, or the default record for an unknown id. */
	getPool(id: PoolId): Pool {
		return copyPool(this.stored(id));
	}

	/** True once anything has been written for this id. */
	has(id: PoolId): boolean {
		return this.records.has(id);
	}

	/** Every stored record in id order. */
	pools(): readonly Pool[] {
		return [...this.records.values()].sort((a, b) => a.id - b.id).map(copyPool);
	}

	get poolCount(): number {
		return this.records.size;
	}

	// ── Internal ──────────────────────────────────────────────────

	private stored(id: PoolId): Pool {
		return this.records.get(id) ?? defaultPool(id);
	}

	private update(id: PoolId, fn: (pool: Pool) => Pool): PoolRegistry {
		return new PoolRegistry(this.withPool(fn(this.stored(id))), this.nextPoolId);
	}

	private withPool(pool: Pool): ReadonlyMap<PoolId, Pool> {
		const next = new Map(this.records);
		next.set(pool.id, pool);
		return next;
	}
}
