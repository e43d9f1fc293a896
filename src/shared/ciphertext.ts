/**
 * Ciphertext — opaque byte blobs supplied by callers.
 *
 * The ledger stores and forwards these without inspecting them. Encryption,
 * accumulation and decryption all happen off-ledger. A zero-length blob is the
 * "no value" state.
 */

import { Buffer } from "node:buffer";
import { InvalidArgumentError } from "./errors.js";

export type Ciphertext = Uint8Array;

export const EMPTY_CIPHERTEXT: Ciphertext = new Uint8Array(0);

const HEX_BODY = /^(?:[0-9a-fA-F]{2})*$/;

export function isEmptyCiphertext(value: Ciphertext): boolean {
	return value.byteLength === 0;
}

/** Detached copy; stored state never aliases caller memory. */
export function copyCiphertext(value: Ciphertext): Ciphertext {
	return value.byteLength === 0 ? EMPTY_CIPHERTEXT : Uint8Array.from(value);
}

export function ciphertextEquals(a: Ciphertext, b: Ciphertext): boolean {
	if (a.byteLength !== b.byteLength) return false;
	for (let i = 0; i < a.byteLength; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}

/**
 * Decode `0x`-prefixed (or bare) hex.
 * @throws InvalidArgumentError on odd length or non-hex characters
 */
export function ciphertextFromHex(hex: string): Ciphertext {
	const body = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
	if (!HEX_BODY.test(body)) {
		throw new InvalidArgumentError("Ciphertext hex must be an even number of hex digits", {
			length: body.length,
		});
	}
	return body.length === 0 ? EMPTY_CIPHERTEXT : Uint8Array.from(Buffer.from(body, "hex"));
}

/** Lowercase hex with `0x` prefix; the empty blob encodes as `0x`. */
export function ciphertextToHex(value: Ciphertext): string {
	return `0x${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")}`;
}

/** Labels and test fixtures. */
export function ciphertextFromUtf8(text: string): Ciphertext {
	return new TextEncoder().encode(text);
}
