/**
 * JSON codec for ledger events.
 *
 * Ciphertexts and pool names travel as `0x`-prefixed lowercase hex. Decoding
 * goes through Zod so a hand-edited or truncated log line surfaces as a
 * ValidationError instead of a half-typed object.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { ciphertextFromHex, ciphertextToHex } from "../shared/ciphertext.js";
import { identity, poolId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { LedgerEvent } from "./ledger-events.js";

const hex = z
	.string()
	.regex(/^0x(?:[0-9a-fA-F]{2})*$/, "expected 0x-prefixed hex")
	.transform((value) => ciphertextFromHex(value));
const pool = z
	.number()
	.int()
	.nonnegative()
	.transform((value) => poolId(value));
const who = z
	.string()
	.trim()
	.min(1)
	.transform((value) => identity(value));

const stampShape = {
	sequence: z.number().int().positive(),
	timestamp: z.number().int().nonnegative(),
};

const ledgerEventSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("PoolCreated"), poolId: pool, name: hex, ...stampShape }),
	z.object({ type: z.literal("PoolStatusChanged"), poolId: pool, active: z.boolean(), ...stampShape }),
	z.object({
		type: z.literal("OwnershipTransferred"),
		previousOwner: who,
		newOwner: who,
		...stampShape,
	}),
	z.object({
		type: z.literal("DepositedEncrypted"),
		poolId: pool,
		participant: who,
		encryptedStake: hex,
		...stampShape,
	}),
	z.object({
		type: z.literal("AccruedEncrypted"),
		poolId: pool,
		participant: who,
		encryptedRewardDelta: hex,
		newEncryptedAccrued: hex,
		...stampShape,
	}),
	z.object({
		type: z.literal("ClaimedEncrypted"),
		poolId: pool,
		participant: who,
		encryptedPayout: hex,
		...stampShape,
	}),
	z.object({
		type: z.literal("WithdrawnEncrypted"),
		poolId: pool,
		participant: who,
		encryptedAmount: hex,
		...stampShape,
	}),
]);

/** JSON-safe form of a record. */
export type EncodedLedgerEvent = z.input<typeof ledgerEventSchema>;

export function encodeEvent(event: LedgerEvent): EncodedLedgerEvent {
	const { sequence, timestamp } = event;
	switch (event.type) {
		case "PoolCreated":
			return {
				type: event.type,
				poolId: event.poolId,
				name: ciphertextToHex(event.name),
				sequence,
				timestamp,
			};
		case "PoolStatusChanged":
			return { type: event.type, poolId: event.poolId, active: event.active, sequence, timestamp };
		case "OwnershipTransferred":
			return {
				type: event.type,
				previousOwner: event.previousOwner,
				newOwner: event.newOwner,
				sequence,
				timestamp,
			};
		case "DepositedEncrypted":
			return {
				type: event.type,
				poolId: event.poolId,
				participant: event.participant,
				encryptedStake: ciphertextToHex(event.encryptedStake),
				sequence,
				timestamp,
			};
		case "AccruedEncrypted":
			return {
				type: event.type,
				poolId: event.poolId,
				participant: event.participant,
				encryptedRewardDelta: ciphertextToHex(event.encryptedRewardDelta),
				newEncryptedAccrued: ciphertextToHex(event.newEncryptedAccrued),
				sequence,
				timestamp,
			};
		case "ClaimedEncrypted":
			return {
				type: event.type,
				poolId: event.poolId,
				participant: event.participant,
				encryptedPayout: ciphertextToHex(event.encryptedPayout),
				sequence,
				timestamp,
			};
		case "WithdrawnEncrypted":
			return {
				type: event.type,
				poolId: event.poolId,
				participant: event.participant,
				encryptedAmount: ciphertextToHex(event.encryptedAmount),
				sequence,
				timestamp,
			};
	}
}

export function decodeEvent(raw: unknown): Result<LedgerEvent, ValidationError> {
	return validate(ledgerEventSchema, raw, "event record");
}
