import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	deposited: (e: { poolId: number }) => void;
	closed: () => void;
};

describe("TypedEmitter", () => {
	it("emit() invokes registered handlers with the arguments", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		emitter.on("deposited", handler);
		emitter.emit("deposited", { poolId: 4 });
		expect(handler).toHaveBeenCalledWith({ poolId: 4 });
	});

	it("off() removes a handler", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		emitter.on("closed", handler).off("closed", handler);
		emitter.emit("closed");
		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires a single time", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		emitter.once("closed", handler);
		emitter.emit("closed");
		emitter.emit("closed");
		expect(handler).toHaveBeenCalledTimes(1);
	});

	describe("emitIsolated", () => {
		it("keeps dispatching after a handler throws and reports the failure", () => {
			const emitter = new TypedEmitter<TestEvents>();
			const boom = new Error("subscriber bug");
			const after = vi.fn();
			const onError = vi.fn();
			emitter.on("deposited", () => {
				throw boom;
			});
			emitter.on("deposited", after);

			const failures = emitter.emitIsolated("deposited", onError, { poolId: 1 });

			expect(failures).toBe(1);
			expect(after).toHaveBeenCalledWith({ poolId: 1 });
			expect(onError).toHaveBeenCalledWith(boom, "deposited");
		});

		it("honours once() registrations", () => {
			const emitter = new TypedEmitter<TestEvents>();
			const once = vi.fn();
			const always = vi.fn();
			emitter.once("closed", once);
			emitter.on("closed", always);

			emitter.emitIsolated("closed", vi.fn());
			emitter.emitIsolated("closed", vi.fn());

			expect(once).toHaveBeenCalledTimes(1);
			expect(always).toHaveBeenCalledTimes(2);
			expect(emitter.listenerCount("closed")).toBe(1);
		});
	});

	it("removeAllListeners() clears one event or all", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("closed", vi.fn()).on("deposited", vi.fn());
		emitter.removeAllListeners("closed");
		expect(emitter.listenerCount("closed")).toBe(0);
		expect(emitter.listenerCount("deposited")).toBe(1);
		emitter.removeAllListeners();
		expect(emitter.listenerCount("deposited")).toBe(0);
	});
});
