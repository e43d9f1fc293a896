import { EventEmitter } from "eventemitter3";

/**
 * Event name → handler signature.
 * Example: { deposited: (e: Deposit) => void; error: (err: Error) => void }
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** Called when a listener throws during isolated dispatch. */
export type ListenerErrorCallback = (error: unknown, event: string) => void;

/**
 * Type-safe event emitter wrapping eventemitter3.
 *
 * `emit` behaves like eventemitter3 (a throwing listener aborts dispatch).
 * `emitIsolated` runs every listener even if an earlier one throws and hands
 * the failure to a callback instead.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as (...args: unknown[]) => void);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as (...args: unknown[]) => void);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as (...args: unknown[]) => void);
		return this;
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/**
	 * Invokes each listener in registration order, isolating failures.
	 * @returns Number of listeners that threw
	 */
	emitIsolated<K extends keyof TEvents & string>(
		event: K,
		onError: ListenerErrorCallback,
		...args: Parameters<TEvents[K]>
	): number {
		let failures = 0;
		for (const listener of this.ee.listeners(event)) {
			try {
				// drops once() registrations only, as emit() would
				this.ee.removeListener(event, listener, undefined, true);
				listener(...args);
			} catch (error: unknown) {
				failures++;
				onError(error, event);
			}
		}
		return failures;
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
