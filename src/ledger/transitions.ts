/**
 * Ledger transitions — pure functions from one immutable state to the next.
 *
 * Each call either fails with the error its component reported or yields the
 * next state, the event payload to append and the value handed back to the
 * caller. Live calls and event-log replay go through the same functions.
 */

import { AccessController } from "../access/access-controller.js";
import type { LedgerEvent, LedgerEventPayload } from "../events/ledger-events.js";
import { PoolRegistry } from "../pool/pool-registry.js";
import { PositionLedger } from "../position/position-ledger.js";
import type { PositionTransition } from "../position/types.js";
import type { Ciphertext } from "../shared/ciphertext.js";
import { type LedgerError, SystemError } from "../shared/errors.js";
import type { Identity, PoolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export interface LedgerState {
	readonly access: AccessController;
	readonly pools: PoolRegistry;
	readonly positions: PositionLedger;
	/** Sequence of the last committed record; 0 at genesis */
	readonly sequence: number;
}

export interface Step<T> {
	readonly state: LedgerState;
	readonly payload: LedgerEventPayload;
	readonly value: T;
}

/** @throws InvalidArgumentError when owner is the null identity */
export function genesis(owner: Identity): LedgerState {
	return {
		access: AccessController.create(owner),
		pools: PoolRegistry.create(),
		positions: PositionLedger.create(),
		sequence: 0,
	};
}

// ── Admin ────────────────────────────────────────────────────────────

export function createPool(
	state: LedgerState,
	caller: Identity,
	name: Uint8Array,
	now: number,
): Result<Step<PoolId>, LedgerError> {
	const created = state.pools.createPool(state.access, caller, name, now);
	if (!created.ok) return created;

	const { registry, poolId } = created.value;
	const step: Step<PoolId> = {
		state: { ...state, pools: registry },
		payload: { type: "PoolCreated", poolId, name: registry.getPool(poolId).name },
		value: poolId,
	};
	return ok(step);
}

export function setPoolActive(
	state: LedgerState,
	caller: Identity,
	id: PoolId,
	active: boolean,
): Result<Step<void>, LedgerError> {
	const updated = state.pools.setPoolActive(state.access, caller, id, active);
	if (!updated.ok) return updated;

	const step: Step<void> = {
		state: { ...state, pools: updated.value },
		payload: { type: "PoolStatusChanged", poolId: id, active },
		value: undefined,
	};
	return ok(step);
}

export function transferOwnership(
	state: LedgerState,
	caller: Identity,
	newOwner: Identity,
): Result<Step<void>, LedgerError> {
	const transferred = state.access.transferOwnership(caller, newOwner);
	if (!transferred.ok) return transferred;

	const step: Step<void> = {
		state: { ...state, access: transferred.value },
		payload: { type: "OwnershipTransferred", previousOwner: state.access.owner, newOwner },
		value: undefined,
	};
	return ok(step);
}

// ── Positions ────────────────────────────────────────────────────────

export function deposit(
	state: LedgerState,
	caller: Identity,
	id: PoolId,
	encStake: Ciphertext,
	now: number,
): Result<Step<void>, LedgerError> {
	return fromPosition(state, state.positions.deposit(state.pools, id, caller, encStake, now));
}

export function accrue(
	state: LedgerState,
	caller: Identity,
	id: PoolId,
	encRewardDelta: Ciphertext,
	newEncAccrued: Ciphertext,
	now: number,
): Result<Step<void>, LedgerError> {
	return fromPosition(
		state,
		state.positions.accrue(state.pools, id, caller, encRewardDelta, newEncAccrued, now),
	);
}

export function claim(
	state: LedgerState,
	caller: Identity,
	id: PoolId,
	encPayout: Ciphertext,
	now: number,
): Result<Step<void>, LedgerError> {
	return fromPosition(state, state.positions.claim(state.pools, id, caller, encPayout, now));
}

export function withdraw(
	state: LedgerState,
	caller: Identity,
	id: PoolId,
	encAmount: Ciphertext,
	now: number,
): Result<Step<void>, LedgerError> {
	return fromPosition(state, state.positions.withdraw(state.pools, id, caller, encAmount, now));
}

// ── Replay ───────────────────────────────────────────────────────────

/**
 * Re-runs the call a committed record stands for. Admin records are replayed
 * as the owner of the moment; position records as their participant, at the
 * record's timestamp.
 */
export function replay(state: LedgerState, event: LedgerEvent): Result<Step<unknown>, LedgerError> {
	const owner = state.access.owner;
	const at = event.timestamp;

	switch (event.type) {
		case "PoolCreated": {
			if (event.poolId !== state.pools.nextPoolId) {
				return err(
					new SystemError(
						`PoolCreated record names pool ${event.poolId}, expected ${state.pools.nextPoolId}`,
						{ sequence: event.sequence },
					),
				);
			}
			return createPool(state, owner, event.name, at);
		}
		case "PoolStatusChanged":
			return setPoolActive(state, owner, event.poolId, event.active);
		case "OwnershipTransferred":
			return transferOwnership(state, event.previousOwner, event.newOwner);
		case "DepositedEncrypted":
			return deposit(state, event.participant, event.poolId, event.encryptedStake, at);
		case "AccruedEncrypted":
			return accrue(
				state,
				event.participant,
				event.poolId,
				event.encryptedRewardDelta,
				event.newEncryptedAccrued,
				at,
			);
		case "ClaimedEncrypted":
			return claim(state, event.participant, event.poolId, event.encryptedPayout, at);
		case "WithdrawnEncrypted":
			return withdraw(state, event.participant, event.poolId, event.encryptedAmount, at);
	}
}

function fromPosition(
	state: LedgerState,
	result: Result<PositionTransition, LedgerError>,
): Result<Step<void>, LedgerError> {
	if (!result.ok) return result;
	const { ledger, registry, event } = result.value;
	return ok({
		state: { ...state, pools: registry, positions: ledger },
		payload: event,
		value: undefined,
	});
}
