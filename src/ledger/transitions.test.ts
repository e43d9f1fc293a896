import { describe, expect, it } from "vitest";
import type { LedgerEvent } from "../events/ledger-events.js";
import { ciphertextFromUtf8 } from "../shared/ciphertext.js";
import { SystemError, UnauthorizedError } from "../shared/errors.js";
import { identity, poolId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import * as transitions from "./transitions.js";

const OWNER = identity("owner");
const ALICE = identity("alice");
const ct = ciphertextFromUtf8;

describe("ledger transitions", () => {
	it("createPool yields the allocated id and a PoolCreated payload", () => {
		const step = unwrap(transitions.createPool(transitions.genesis(OWNER), OWNER, ct("wheat"), 5));
		expect(step.value).toBe(0);
		expect(step.payload).toEqual({ type: "PoolCreated", poolId: 0, name: ct("wheat") });
		expect(step.state.pools.getPool(poolId(0)).createdAt).toBe(5);
	});

	it("createPool does not advance the sequence; the host stamps it", () => {
		const step = unwrap(transitions.createPool(transitions.genesis(OWNER), OWNER, ct("wheat"), 5));
		expect(step.state.sequence).toBe(0);
	});

	it("transferOwnership records the previous owner", () => {
		const step = unwrap(transitions.transferOwnership(transitions.genesis(OWNER), OWNER, ALICE));
		expect(step.payload).toEqual({
			type: "OwnershipTransferred",
			previousOwner: OWNER,
			newOwner: ALICE,
		});
		expect(step.state.access.owner).toBe(ALICE);
	});

	it("passes component errors through unchanged", () => {
		const result = transitions.setPoolActive(transitions.genesis(OWNER), ALICE, poolId(0), false);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(UnauthorizedError);
	});

	describe("replay", () => {
		it("replays a deposit at the record's timestamp", () => {
			const created = unwrap(transitions.createPool(transitions.genesis(OWNER), OWNER, ct("p"), 1));
			const record: LedgerEvent = {
				type: "DepositedEncrypted",
				poolId: poolId(0),
				participant: ALICE,
				encryptedStake: ct("s1"),
				sequence: 2,
				timestamp: 42,
			};
			const step = unwrap(transitions.replay(created.state, record));
			expect(step.state.positions.getPosition(poolId(0), ALICE).lastUpdate).toBe(42);
		});

		it("rejects a PoolCreated record for an id other than the next one", () => {
			const record: LedgerEvent = {
				type: "PoolCreated",
				poolId: poolId(3),
				name: ct("p"),
				sequence: 1,
				timestamp: 0,
			};
			const result = transitions.replay(transitions.genesis(OWNER), record);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(SystemError);
				expect(result.error.message).toBe("PoolCreated record names pool 3, expected 0");
			}
		});

		it("rejects an ownership record whose previous owner is not the owner", () => {
			const record: LedgerEvent = {
				type: "OwnershipTransferred",
				previousOwner: ALICE,
				newOwner: identity("bob"),
				sequence: 1,
				timestamp: 0,
			};
			const result = transitions.replay(transitions.genesis(OWNER), record);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("UNAUTHORIZED");
		});
	});
});
