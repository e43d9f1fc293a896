import { bench, describe } from "vitest";
import { decodeEvent, encodeEvent } from "../src/events/codec.js";
import type { LedgerEvent } from "../src/events/ledger-events.js";
import { ciphertextFromHex } from "../src/shared/ciphertext.js";
import { identity, poolId } from "../src/shared/identifiers.js";

describe("event codec", () => {
	const record: LedgerEvent = {
		type: "AccruedEncrypted",
		poolId: poolId(3),
		participant: identity("alice"),
		encryptedRewardDelta: ciphertextFromHex(`0x${"0f".repeat(32)}`),
		newEncryptedAccrued: ciphertextFromHex(`0x${"f0".repeat(32)}`),
		sequence: 42,
		timestamp: 1_700_000_000_000,
	};
	const line = JSON.stringify(encodeEvent(record));

	bench("encode 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			JSON.stringify(encodeEvent(record));
		}
	});

	bench("decode 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			decodeEvent(JSON.parse(line));
		}
	});
});
