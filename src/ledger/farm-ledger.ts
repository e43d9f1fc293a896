/**
 * FarmLedger — the hosting ledger around the pool, position and access
 * components.
 *
 * Calls run one at a time in submission order. Each computes the next state
 * from an immutable snapshot, appends its record to the event log and only
 * then publishes the new state and notifies subscribers. A call that fails at
 * any point leaves the ledger exactly as it was.
 */

import {
	type LedgerEvent,
	type LedgerEventOf,
	type LedgerEventType,
	copyEvent,
	stamp,
} from "../events/ledger-events.js";
import { type ListenerErrorCallback, TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { EventLog } from "../persistence/event-log.js";
import { MemoryEventLog } from "../persistence/memory-event-log.js";
import type { Pool, PoolAggregates } from "../pool/types.js";
import type { Position } from "../position/types.js";
import type { Ciphertext } from "../shared/ciphertext.js";
import { type LedgerError, SystemError, classifyError } from "../shared/errors.js";
import type { Identity, PoolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import * as transitions from "./transitions.js";
import type { LedgerState, Step } from "./transitions.js";

export interface FarmLedgerOptions {
	/** Genesis owner */
	readonly owner: Identity;
	readonly clock?: Clock | undefined;
	/** Defaults to a MemoryEventLog */
	readonly eventLog?: EventLog | undefined;
	readonly logger?: Logger | undefined;
}

/** One channel per record type, plus `event` for every record. */
export type FarmLedgerEvents = {
	[K in LedgerEventType]: (event: LedgerEventOf<K>) => void;
} & {
	event: (event: LedgerEvent) => void;
};

type Plan<T> = (state: LedgerState, now: number) => Result<Step<T>, LedgerError>;

export class FarmLedger {
	private state: LedgerState;
	private readonly clock: Clock;
	private readonly eventLog: EventLog;
	private readonly logger: Logger;
	private readonly emitter = new TypedEmitter<FarmLedgerEvents>();
	private queue: Promise<void> = Promise.resolve();
	private closed = false;

	private constructor(options: FarmLedgerOptions, state: LedgerState) {
		this.state = state;
		this.clock = options.clock ?? SystemClock;
		this.eventLog = options.eventLog ?? new MemoryEventLog();
		this.logger = (options.logger ?? silentLogger).child({ component: "farm-ledger" });
	}

	/** @throws InvalidArgumentError when the owner is the null identity */
	static create(options: FarmLedgerOptions): FarmLedger {
		return new FarmLedger(options, transitions.genesis(options.owner));
	}

	/**
	 * Rebuilds a ledger from committed records, replayed from genesis with
	 * `options.owner`, which must be the genesis owner rather than the current
	 * one. The records are not appended again.
	 * @throws SystemError on a sequence gap or a record that does not replay
	 */
	static restore(options: FarmLedgerOptions, records: readonly LedgerEvent[]): FarmLedger {
		let state = transitions.genesis(options.owner);
		for (const record of records) {
			const expected = state.sequence + 1;
			if (record.sequence !== expected) {
				throw new SystemError(
					`Event log out of order at sequence ${record.sequence}: expected ${expected}`,
					{ sequence: record.sequence, expected },
				);
			}
			const replayed = transitions.replay(state, record);
			if (!replayed.ok) {
				throw new SystemError(
					`Replay failed at sequence ${record.sequence}: ${replayed.error.message}`,
					{ sequence: record.sequence, type: record.type, cause: replayed.error },
				);
			}
			state = { ...replayed.value.state, sequence: record.sequence };
		}

		const ledger = new FarmLedger(options, state);
		ledger.logger.info({ records: records.length, owner: state.access.owner }, "Ledger restored");
		return ledger;
	}

	// ── Admin calls ──────────────────────────────────────────────────

	createPool(caller: Identity, name: Uint8Array): Promise<Result<PoolId, LedgerError>> {
		return this.submit("createPool", caller, (state, now) =>
			transitions.createPool(state, caller, name, now),
		);
	}

	setPoolActive(
		caller: Identity,
		poolId: PoolId,
		active: boolean,
	): Promise<Result<void, LedgerError>> {
		return this.submit("setPoolActive", caller, (state) =>
			transitions.setPoolActive(state, caller, poolId, active),
		);
	}

	transferOwnership(caller: Identity, newOwner: Identity): Promise<Result<void, LedgerError>> {
		return this.submit("transferOwnership", caller, (state) =>
			transitions.transferOwnership(state, caller, newOwner),
		);
	}

	// ── Participant calls ────────────────────────────────────────────

	depositEncrypted(
		caller: Identity,
		poolId: PoolId,
		encStake: Ciphertext,
	): Promise<Result<void, LedgerError>> {
		return this.submit("depositEncrypted", caller, (state, now) =>
			transitions.deposit(state, caller, poolId, encStake, now),
		);
	}

	accrueEncrypted(
		caller: Identity,
		poolId: PoolId,
		encRewardDelta: Ciphertext,
		newEncAccrued: Ciphertext,
	): Promise<Result<void, LedgerError>> {
		return this.submit("accrueEncrypted", caller, (state, now) =>
			transitions.accrue(state, caller, poolId, encRewardDelta, newEncAccrued, now),
		);
	}

	claimEncrypted(
		caller: Identity,
		poolId: PoolId,
		encPayout: Ciphertext,
	): Promise<Result<void, LedgerError>> {
		return this.submit("claimEncrypted", caller, (state, now) =>
			transitions.claim(state, caller, poolId, encPayout, now),
		);
	}

	withdrawEncrypted(
		caller: Identity,
		poolId: PoolId,
		encAmount: Ciphertext,
	): Promise<Result<void, LedgerError>> {
		return this.submit("withdrawEncrypted", caller, (state, now) =>
			transitions.withdraw(state, caller, poolId, encAmount, now),
		);
	}

	// ── Queries ──────────────────────────────────────────────────────

	get owner(): Identity {
		return this.state.access.owner;
	}

	/** Id the next createPool will assign */
	get nextPoolId(): PoolId {
		return this.state.pools.nextPoolId;
	}

	/** Sequence of the last committed record; 0 before the first call */
	get sequence(): number {
		return this.state.sequence;
	}

	isActive(poolId: PoolId, participant: Identity): boolean {
		return this.state.positions.isActive(poolId, participant);
	}

	isPoolActive(poolId: PoolId): boolean {
		return this.state.pools.isActive(poolId);
	}

	getPoolAggregates(poolId: PoolId): PoolAggregates {
		return this.state.pools.getAggregates(poolId);
	}

	getPool(poolId: PoolId): Pool {
		return this.state.pools.getPool(poolId);
	}

	/** Every stored pool record in id order. */
	pools(): readonly Pool[] {
		return this.state.pools.pools();
	}

	getPosition(poolId: PoolId, participant: Identity): Position {
		return this.state.positions.getPosition(poolId, participant);
	}

	activePositions(poolId: PoolId): readonly Position[] {
		return this.state.positions.activePositions(poolId);
	}

	// ── Notifications ────────────────────────────────────────────────

	on<K extends keyof FarmLedgerEvents & string>(event: K, handler: FarmLedgerEvents[K]): this {
		this.emitter.on(event, handler);
		return this;
	}

	off<K extends keyof FarmLedgerEvents & string>(event: K, handler: FarmLedgerEvents[K]): this {
		this.emitter.off(event, handler);
		return this;
	}

	once<K extends keyof FarmLedgerEvents & string>(event: K, handler: FarmLedgerEvents[K]): this {
		this.emitter.once(event, handler);
		return this;
	}

	// ── Lifecycle ────────────────────────────────────────────────────

	/** Waits for queued calls and pending event-log writes. */
	async flush(): Promise<void> {
		await this.queue;
		await this.eventLog.flush();
	}

	/**
	 * Rejects calls submitted from now on, lets queued ones finish, then
	 * closes the event log. Idempotent.
	 */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.queue;
		await this.eventLog.close();
		this.emitter.removeAllListeners();
	}

	// ── Internal ─────────────────────────────────────────────────────

	private submit<T>(call: string, caller: Identity, plan: Plan<T>): Promise<Result<T, LedgerError>> {
		if (this.closed) {
			return Promise.resolve(err(new SystemError("FarmLedger is closed", { call, caller })));
		}
		const task = this.queue
			.then(() => this.execute(call, caller, plan))
			.catch((error: unknown) => {
				this.logger.error({ err: error, call, caller }, `${call} failed unexpectedly`);
				return err(classifyError(error));
			});
		this.queue = task.then(() => undefined);
		return task;
	}

	private async execute<T>(
		call: string,
		caller: Identity,
		plan: Plan<T>,
	): Promise<Result<T, LedgerError>> {
		const before = this.state;
		// records carry whole milliseconds; state must match what replay will see
		const now = Math.floor(this.clock.now());

		const step = plan(before, now);
		if (!step.ok) {
			this.logger.warn(
				{ call, caller, code: step.error.code, ...step.error.context },
				`${call} rejected: ${step.error.message}`,
			);
			return step;
		}

		const record = stamp(step.value.payload, before.sequence + 1, now);
		try {
			await this.eventLog.append(record);
		} catch (error: unknown) {
			const failure = new SystemError(`Event log append failed at sequence ${record.sequence}`, {
				cause: error,
				call,
				sequence: record.sequence,
			});
			this.logger.error({ err: error, call, sequence: record.sequence }, failure.message);
			return err(failure);
		}

		this.state = { ...step.value.state, sequence: record.sequence };
		this.logCommitted(record, before);
		this.notify(record);
		return ok(step.value.value);
	}

	private logCommitted(record: LedgerEvent, before: LedgerState): void {
		const poolId = "poolId" in record ? record.poolId : undefined;
		this.logger.info({ sequence: record.sequence, type: record.type, poolId }, "Call committed");

		if (record.type === "WithdrawnEncrypted" && before.pools.getPool(record.poolId).farmers === 0) {
			this.logger.debug(
				{ sequence: record.sequence, poolId: record.poolId },
				"Farmer count already zero; withdraw clamped at zero",
			);
		}
	}

	/** Each channel gets its own copy, so a subscriber cannot reach stored state. */
	private notify(record: LedgerEvent): void {
		const onError: ListenerErrorCallback = (error, channel) => {
			this.logger.error({ err: error, channel, sequence: record.sequence }, "Subscriber threw");
		};

		const typed = copyEvent(record);
		// one case per type: emitIsolated needs `type` and the record narrowed together
		switch (typed.type) {
			case "PoolCreated":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
			case "PoolStatusChanged":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
			case "OwnershipTransferred":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
			case "DepositedEncrypted":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
			case "AccruedEncrypted":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
			case "ClaimedEncrypted":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
			case "WithdrawnEncrypted":
				this.emitter.emitIsolated(typed.type, onError, typed);
				break;
		}
		this.emitter.emitIsolated("event", onError, copyEvent(record));
	}
}
