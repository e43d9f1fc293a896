/**
 * PositionLedger — immutable per-(pool, participant) encrypted positions.
 *
 * Each operation validates against the PoolRegistry it is handed and returns
 * the next ledger, the next registry (counters updated in the same step) and
 * the event payload. Nothing is changed when it returns err().
 */

import type { PoolRegistry } from "../pool/pool-registry.js";
import { type Ciphertext, EMPTY_CIPHERTEXT, copyCiphertext } from "../shared/ciphertext.js";
import { NoActivePositionError, PoolInactiveError } from "../shared/errors.js";
import { type Identity, type PoolId, positionKey } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Position, PositionState, type PositionTransition } from "./types.js";

/** Detached copy for anything leaving the ledger. */
function copyPosition(position: Position): Position {
	return {
		...position,
		encryptedStake: copyCiphertext(position.encryptedStake),
		encryptedAccrued: copyCiphertext(position.encryptedAccrued),
	};
}

function closedPosition(id: PoolId, participant: Identity, lastUpdate: number): Position {
	return {
		poolId: id,
		participant,
		encryptedStake: EMPTY_CIPHERTEXT,
		encryptedAccrued: EMPTY_CIPHERTEXT,
		lastUpdate,
		active: false,
	};
}

export class PositionLedger {
	private readonly records: ReadonlyMap<string, Position>;

	private constructor(records: ReadonlyMap<string, Position>) {
		this.records = records;
	}

	static create(): PositionLedger {
		return new PositionLedger(new Map());
	}

	// ── Lifecycle ──────────────────────────────────────────────

	/**
	 * Opens the position if needed and overwrites the stake.
	 *
	 * Opening (Unopened or Closed → Active) starts from a fresh record and adds
	 * a farmer. Every deposit adds to the deposit count.
	 */
	deposit(
		registry: PoolRegistry,
		id: PoolId,
		caller: Identity,
		encStake: Ciphertext,
		now: number,
	): Result<PositionTransition, PoolInactiveError> {
		if (!registry.isActive(id)) {
			return err(poolInactive(id, caller));
		}

		const stake = copyCiphertext(encStake);
		const existing = this.activePosition(id, caller);
		const position: Position = existing
			? { ...existing, encryptedStake: stake, lastUpdate: now }
			: {
					poolId: id,
					participant: caller,
					encryptedStake: stake,
					encryptedAccrued: EMPTY_CIPHERTEXT,
					lastUpdate: now,
					active: true,
				};

		const counted = existing ? registry : registry.incrementFarmers(id, 1);
		const transition: PositionTransition = {
			ledger: this.withPosition(position),
			registry: counted.incrementDeposits(id),
			position: copyPosition(position),
			event: {
				type: "DepositedEncrypted",
				poolId: id,
				participant: caller,
				encryptedStake: copyCiphertext(stake),
			},
		};
		return ok(transition);
	}

	/** Replaces the accrued ciphertext. The delta only travels in the event. */
	accrue(
		registry: PoolRegistry,
		id: PoolId,
		caller: Identity,
		encRewardDelta: Ciphertext,
		newEncAccrued: Ciphertext,
		now: number,
	): Result<PositionTransition, PoolInactiveError | NoActivePositionError> {
		const existing = this.requireActive(registry, id, caller);
		if (!existing.ok) return existing;

		const accrued = copyCiphertext(newEncAccrued);
		const position: Position = { ...existing.value, encryptedAccrued: accrued, lastUpdate: now };
		const transition: PositionTransition = {
			ledger: this.withPosition(position),
			registry,
			position: copyPosition(position),
			event: {
				type: "AccruedEncrypted",
				poolId: id,
				participant: caller,
				encryptedRewardDelta: copyCiphertext(encRewardDelta),
				newEncryptedAccrued: copyCiphertext(accrued),
			},
		};
		return ok(transition);
	}

	/** Resets accrued rewards to empty and counts the claim. The payout is not checked. */
	claim(
		registry: PoolRegistry,
		id: PoolId,
		caller: Identity,
		encPayout: Ciphertext,
		now: number,
	): Result<PositionTransition, PoolInactiveError | NoActivePositionError> {
		const existing = this.requireActive(registry, id, caller);
		if (!existing.ok) return existing;

		const position: Position = {
			...existing.value,
			encryptedAccrued: EMPTY_CIPHERTEXT,
			lastUpdate: now,
		};
		const transition: PositionTransition = {
			ledger: this.withPosition(position),
			registry: registry.incrementClaims(id),
			position: copyPosition(position),
			event: {
				type: "ClaimedEncrypted",
				poolId: id,
				participant: caller,
				encryptedPayout: copyCiphertext(encPayout),
			},
		};
		return ok(transition);
	}

	/**
	 * Closes the position. Allowed on inactive pools so participants can
	 * always leave. The amount is not checked against the stake.
	 */
	withdraw(
		registry: PoolRegistry,
		id: PoolId,
		caller: Identity,
		encAmount: Ciphertext,
		now: number,
	): Result<PositionTransition, NoActivePositionError> {
		if (!this.activePosition(id, caller)) {
			return err(noActivePosition(id, caller));
		}

		const position = closedPosition(id, caller, now);
		const transition: PositionTransition = {
			ledger: this.withPosition(position),
			registry: registry.incrementFarmers(id, -1),
			position: copyPosition(position),
			event: {
				type: "WithdrawnEncrypted",
				poolId: id,
				participant: caller,
				encryptedAmount: copyCiphertext(encAmount),
			},
		};
		return ok(transition);
	}

	// ── Queries ──────────────────────────────────────────────────

	isActive(id: PoolId, participant: Identity): boolean {
		return this.activePosition(id, participant) !== null;
	}

	/** Copy of the stored record, or an empty inactive record for an untouched slot. */
	getPosition(id: PoolId, participant: Identity): Position {
		const record = this.records.get(positionKey(id, participant));
		return record ? copyPosition(record) : closedPosition(id, participant, 0);
	}

	stateOf(id: PoolId, participant: Identity): PositionState {
		const record = this.records.get(positionKey(id, participant));
		if (!record) return PositionState.Unopened;
		return record.active ? PositionState.Active : PositionState.Closed;
	}

	/** Active positions in one pool, ordered by participant. */
	activePositions(id: PoolId): readonly Position[] {
		const result: Position[] = [];
		for (const position of this.records.values()) {
			if (position.poolId === id && position.active) result.push(copyPosition(position));
		}
		return result.sort((a, b) => (a.participant < b.participant ? -1 : 1));
	}

	activeCount(id: PoolId): number {
		let count = 0;
		for (const position of this.records.values()) {
			if (position.poolId === id && position.active) count++;
		}
		return count;
	}

	/** Every stored record, including closed slots. */
	all(): readonly Position[] {
		return [...this.records.values()].map(copyPosition);
	}

	// ── Internal ──────────────────────────────────────────────────

	private activePosition(id: PoolId, participant: Identity): Position | null {
		const record = this.records.get(positionKey(id, participant));
		return record?.active ? record : null;
	}

	/** Pool activity is checked first, then the caller's position. */
	private requireActive(
		registry: PoolRegistry,
		id: PoolId,
		caller: Identity,
	): Result<Position, PoolInactiveError | NoActivePositionError> {
		if (!registry.isActive(id)) {
			return err(poolInactive(id, caller));
		}
		const existing = this.activePosition(id, caller);
		return existing ? ok(existing) : err(noActivePosition(id, caller));
	}

	private withPosition(position: Position): PositionLedger {
		const next = new Map(this.records);
		next.set(positionKey(position.poolId, position.participant), position);
		return new PositionLedger(next);
	}
}

function poolInactive(id: PoolId, caller: Identity): PoolInactiveError {
	return new PoolInactiveError(`Pool ${id} is inactive`, { poolId: id, caller });
}

function noActivePosition(id: PoolId, caller: Identity): NoActivePositionError {
	return new NoActivePositionError(`No active position in pool ${id}`, { poolId: id, caller });
}
