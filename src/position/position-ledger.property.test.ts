import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { AccessController } from "../access/access-controller.js";
import { PoolRegistry } from "../pool/pool-registry.js";
import type { PoolAggregates } from "../pool/types.js";
import { ciphertextFromUtf8 } from "../shared/ciphertext.js";
import { type Identity, type PoolId, identity, poolId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { PositionLedger } from "./position-ledger.js";

const OWNER = identity("owner");
const access = AccessController.create(OWNER);
const PARTICIPANTS = [identity("alice"), identity("bob"), identity("carol")];
const POOLS = [poolId(0), poolId(1)];

type Op =
	| { kind: "deposit" | "accrue" | "claim" | "withdraw"; pool: number; who: number; blob: string }
	| { kind: "toggle"; pool: number; active: boolean };

const opArb: fc.Arbitrary<Op> = fc.oneof(
	fc.record({
		kind: fc.constantFrom("deposit" as const, "accrue" as const, "claim" as const, "withdraw" as const),
		pool: fc.integer({ min: 0, max: 2 }),
		who: fc.integer({ min: 0, max: PARTICIPANTS.length - 1 }),
		blob: fc.string({ maxLength: 6 }),
	}),
	fc.record({
		kind: fc.constant("toggle" as const),
		pool: fc.integer({ min: 0, max: 1 }),
		active: fc.boolean(),
	}),
);

interface State {
	ledger: PositionLedger;
	registry: PoolRegistry;
}

function genesis(): State {
	let registry = PoolRegistry.create();
	for (const _ of POOLS) {
		registry = unwrap(registry.createPool(access, OWNER, ciphertextFromUtf8("p"), 0)).registry;
	}
	return { ledger: PositionLedger.create(), registry };
}

function participant(i: number): Identity {
	const who = PARTICIPANTS[i];
	if (who === undefined) throw new Error(`no participant ${i}`);
	return who;
}

function apply(state: State, op: Op, now: number): { state: State; ok: boolean } {
	const id: PoolId = poolId(op.pool);
	if (op.kind === "toggle") {
		return {
			state: { ...state, registry: unwrap(state.registry.setPoolActive(access, OWNER, id, op.active)) },
			ok: true,
		};
	}
	const who = participant(op.who);
	const blob = ciphertextFromUtf8(op.blob);
	const { ledger, registry } = state;
	const result =
		op.kind === "deposit"
			? ledger.deposit(registry, id, who, blob, now)
			: op.kind === "accrue"
				? ledger.accrue(registry, id, who, blob, blob, now)
				: op.kind === "claim"
					? ledger.claim(registry, id, who, blob, now)
					: ledger.withdraw(registry, id, who, blob, now);
	if (!result.ok) return { state, ok: false };
	return { state: { ledger: result.value.ledger, registry: result.value.registry }, ok: true };
}

function allIds(): PoolId[] {
	return [...POOLS, poolId(2)];
}

describe("PositionLedger invariants (property-based)", () => {
	it("farmers always equals the number of active positions", () => {
		fc.assert(
			fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
				let state = genesis();
				ops.forEach((op, i) => {
					state = apply(state, op, i).state;
					for (const id of allIds()) {
						expect(state.registry.getAggregates(id).farmers).toBe(state.ledger.activeCount(id));
					}
				});
			}),
		);
	});

	it("deposits and claims never decrease", () => {
		fc.assert(
			fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
				let state = genesis();
				let previous = new Map<PoolId, PoolAggregates>(
					allIds().map((id) => [id, state.registry.getAggregates(id)]),
				);
				ops.forEach((op, i) => {
					state = apply(state, op, i).state;
					for (const id of allIds()) {
						const now = state.registry.getAggregates(id);
						const before = previous.get(id);
						expect(now.deposits).toBeGreaterThanOrEqual(before?.deposits ?? 0);
						expect(now.claims).toBeGreaterThanOrEqual(before?.claims ?? 0);
					}
					previous = new Map(allIds().map((id) => [id, state.registry.getAggregates(id)]));
				});
			}),
		);
	});

	it("claim leaves accrued empty and the position active; withdraw empties and closes", () => {
		fc.assert(
			fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
				let state = genesis();
				ops.forEach((op, i) => {
					const step = apply(state, op, i);
					state = step.state;
					if (!step.ok || op.kind === "toggle") return;
					const position = state.ledger.getPosition(poolId(op.pool), participant(op.who));
					if (op.kind === "claim") {
						expect(position.encryptedAccrued.byteLength).toBe(0);
						expect(position.active).toBe(true);
					}
					if (op.kind === "withdraw") {
						expect(position.encryptedStake.byteLength).toBe(0);
						expect(position.encryptedAccrued.byteLength).toBe(0);
						expect(position.active).toBe(false);
					}
				});
			}),
		);
	});

	it("inactive positions never hold ciphertext", () => {
		fc.assert(
			fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
				let state = genesis();
				ops.forEach((op, i) => {
					state = apply(state, op, i).state;
				});
				for (const position of state.ledger.all()) {
					if (!position.active) {
						expect(position.encryptedStake.byteLength + position.encryptedAccrued.byteLength).toBe(0);
					}
				}
			}),
		);
	});
});
