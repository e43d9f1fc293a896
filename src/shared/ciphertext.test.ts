import { describe, expect, it } from "vitest";
import {
	EMPTY_CIPHERTEXT,
	ciphertextEquals,
	ciphertextFromHex,
	ciphertextFromUtf8,
	ciphertextToHex,
	copyCiphertext,
	isEmptyCiphertext,
} from "./ciphertext.js";
import { InvalidArgumentError } from "./errors.js";

describe("ciphertext", () => {
	it("empty blob is the no-value state", () => {
		expect(isEmptyCiphertext(EMPTY_CIPHERTEXT)).toBe(true);
		expect(isEmptyCiphertext(new Uint8Array([0]))).toBe(false);
	});

	describe("hex codec", () => {
		it("decodes prefixed and bare hex", () => {
			expect(Array.from(ciphertextFromHex("0xdeadBEEF"))).toEqual([0xde, 0xad, 0xbe, 0xef]);
			expect(Array.from(ciphertextFromHex("0102"))).toEqual([1, 2]);
		});

		it("decodes 0x as the empty blob", () => {
			expect(ciphertextFromHex("0x").byteLength).toBe(0);
		});

		it("encodes lowercase with prefix", () => {
			expect(ciphertextToHex(new Uint8Array([0xab, 0x01]))).toBe("0xab01");
			expect(ciphertextToHex(EMPTY_CIPHERTEXT)).toBe("0x");
		});

		it("encodes only the viewed window of a subarray", () => {
			const backing = new Uint8Array([1, 2, 3, 4]);
			expect(ciphertextToHex(backing.subarray(1, 3))).toBe("0x0203");
		});

		it.each(["0xabc", "zz", "0x12g4"])("rejects %s", (bad) => {
			expect(() => ciphertextFromHex(bad)).toThrow(InvalidArgumentError);
		});
	});

	it("copyCiphertext detaches from the source buffer", () => {
		const source = new Uint8Array([9, 9]);
		const copy = copyCiphertext(source);
		source[0] = 1;
		expect(Array.from(copy)).toEqual([9, 9]);
	});

	it("ciphertextEquals compares bytes", () => {
		expect(ciphertextEquals(ciphertextFromUtf8("s1"), ciphertextFromUtf8("s1"))).toBe(true);
		expect(ciphertextEquals(ciphertextFromUtf8("s1"), ciphertextFromUtf8("s2"))).toBe(false);
		expect(ciphertextEquals(ciphertextFromUtf8("s1"), ciphertextFromUtf8("s12"))).toBe(false);
	});
});
