/**
 * openLedger — build a FarmLedger from resolved configuration.
 *
 * With an event log path the file is replayed before the ledger accepts
 * calls; otherwise the ledger starts empty on an in-memory log.
 */

import { type Logger, createLogger } from "../lib/logger/index.js";
import { FileEventLog } from "../persistence/file-event-log.js";
import type { LedgerConfig } from "../shared/config.js";
import { SystemError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { FarmLedger } from "./farm-ledger.js";

export interface OpenLedgerOptions {
	readonly clock?: Clock | undefined;
	/** Overrides the pino logger built from `config.logLevel` */
	readonly logger?: Logger | undefined;
}

/**
 * `config.owner` must be the genesis owner, the one the log started with, even
 * after ownership has been transferred: replay starts from it and re-runs
 * every OwnershipTransferred record. The current owner is `ledger.owner`.
 *
 * @throws SystemError when the event log holds lines that do not decode or
 * records that do not replay (including a non-genesis `config.owner`)
 */
export async function openLedger(
	config: LedgerConfig,
	options: OpenLedgerOptions = {},
): Promise<FarmLedger> {
	const logger = options.logger ?? createLogger({ level: config.logLevel });

	if (config.eventLogPath === undefined) {
		return FarmLedger.create({ owner: config.owner, clock: options.clock, logger });
	}

	const eventLog = FileEventLog.create({
		filePath: config.eventLogPath,
		maxFileSizeBytes: config.eventLogMaxFileSizeBytes,
	});
	const { records, corruptLines } = await eventLog.restore();

	const [first] = corruptLines;
	if (first !== undefined) {
		logger.error(
			{ file: first.file, lineNumber: first.lineNumber, count: corruptLines.length },
			"Event log has undecodable lines",
		);
		throw new SystemError(
			`Event log ${first.file} line ${first.lineNumber} does not decode: ${first.reason}`,
			{ corruptLines: corruptLines.length },
		);
	}

	return FarmLedger.restore(
		{ owner: config.owner, clock: options.clock, eventLog, logger },
		records,
	);
}
