/**
 * EventLog — durable, append-only sink for ledger events.
 *
 * The ledger publishes a call's new state only after append() resolves, so
 * an append that rejects means the call never happened.
 */

import type { LedgerEvent } from "../events/ledger-events.js";

export interface EventLog {
	append(event: LedgerEvent): Promise<void>;
	flush(): Promise<void>;
	close(): Promise<void>;
}
