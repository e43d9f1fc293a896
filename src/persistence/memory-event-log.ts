/**
 * MemoryEventLog — in-process, append-only event log.
 *
 * For tests and embedded use. Not persisted across restarts. Records are
 * copied in and out, so nothing outside the log can rewrite one.
 */

import { type LedgerEvent, copyEvent } from "../events/ledger-events.js";
import { SystemError } from "../shared/errors.js";
import type { EventLog } from "./event-log.js";

export class MemoryEventLog implements EventLog {
	private readonly store: LedgerEvent[] = [];
	private closed = false;

	async append(event: LedgerEvent): Promise<void> {
		if (this.closed) {
			throw new SystemError("MemoryEventLog is closed");
		}
		this.store.push(copyEvent(event));
	}

	/** Copies of every record in append order. */
	records(): LedgerEvent[] {
		return this.store.map(copyEvent);
	}

	/** No-op: appends complete synchronously. */
	async flush(): Promise<void> {}

	async close(): Promise<void> {
		this.closed = true;
	}

	get size(): number {
		return this.store.length;
	}
}
