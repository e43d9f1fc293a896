import { describe, expect, it } from "vitest";
import {
	ConfigError,
	ErrorCategory,
	InvalidArgumentError,
	LedgerError,
	NoActivePositionError,
	PoolInactiveError,
	SystemError,
	UnauthorizedError,
	classifyError,
	isConfigError,
	isInvalidArgumentError,
	isNoActivePositionError,
	isPoolInactiveError,
	isSystemError,
	isUnauthorizedError,
} from "./errors.js";

describe("LedgerError hierarchy", () => {
	const cases: Array<[string, LedgerError, string, ErrorCategory]> = [
		["UnauthorizedError", new UnauthorizedError("x"), "UNAUTHORIZED", ErrorCategory.NonRetryable],
		[
			"InvalidArgumentError",
			new InvalidArgumentError("x"),
			"INVALID_ARGUMENT",
			ErrorCategory.NonRetryable,
		],
		["PoolInactiveError", new PoolInactiveError("x"), "POOL_INACTIVE", ErrorCategory.NonRetryable],
		[
			"NoActivePositionError",
			new NoActivePositionError("x"),
			"NO_ACTIVE_POSITION",
			ErrorCategory.NonRetryable,
		],
		["ConfigError", new ConfigError("x"), "CONFIG_ERROR", ErrorCategory.Fatal],
		["SystemError", new SystemError("x"), "SYSTEM_ERROR", ErrorCategory.Fatal],
	];

	it.each(cases)("%s has code %s and category %s", (name, error, code, category) => {
		expect(error.name).toBe(name);
		expect(error.code).toBe(code);
		expect(error.category).toBe(category);
		expect(error.isRetryable).toBe(false);
		expect(error).toBeInstanceOf(LedgerError);
		expect(error).toBeInstanceOf(Error);
	});

	it("separates cause from context", () => {
		const cause = new Error("disk full");
		const e = new SystemError("append failed", { cause, sequence: 4 });
		expect(e.cause).toBe(cause);
		expect(e.context).toEqual({ sequence: 4 });
	});

	it("toJSON includes hint only when present", () => {
		expect(new PoolInactiveError("pool 1 is inactive", { poolId: 1 }).toJSON()).toEqual({
			name: "PoolInactiveError",
			message: "pool 1 is inactive",
			code: "POOL_INACTIVE",
			category: "non_retryable",
			hint: "wait for the owner to reactivate the pool",
			retryable: false,
			context: { poolId: 1 },
		});
		expect(new UnauthorizedError("nope").toJSON()).not.toHaveProperty("hint");
	});

	describe("classifyError", () => {
		it("passes LedgerErrors through", () => {
			const e = new UnauthorizedError("nope");
			expect(classifyError(e)).toBe(e);
		});

		it("wraps foreign errors as SystemError with cause", () => {
			const foreign = new TypeError("boom");
			const classified = classifyError(foreign);
			expect(classified).toBeInstanceOf(SystemError);
			expect(classified.message).toBe("boom");
			expect(classified.cause).toBe(foreign);
		});

		it("stringifies non-errors", () => {
			expect(classifyError(42).message).toBe("42");
		});
	});

	it("type guards match exactly their own class", () => {
		expect(isUnauthorizedError(new UnauthorizedError("x"))).toBe(true);
		expect(isUnauthorizedError(new PoolInactiveError("x"))).toBe(false);
		expect(isInvalidArgumentError(new InvalidArgumentError("x"))).toBe(true);
		expect(isPoolInactiveError(new PoolInactiveError("x"))).toBe(true);
		expect(isNoActivePositionError(new NoActivePositionError("x"))).toBe(true);
		expect(isNoActivePositionError(new Error("x"))).toBe(false);
		expect(isConfigError(new ConfigError("x"))).toBe(true);
		expect(isSystemError(new SystemError("x"))).toBe(true);
	});
});
