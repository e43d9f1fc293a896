/**
 * FileEventLog — JSONL event log on the local filesystem.
 *
 * One encoded record per line. Appends are serialized through a write queue
 * so concurrent callers never interleave partial lines. Rotation seals the
 * live file as the next numbered segment (`.1`, `.2`, ...) and never deletes
 * one. restore() reads every segment in order, then the live file, and
 * reports lines it cannot decode instead of dropping them.
 */

import { appendFile, readFile, rename, stat } from "node:fs/promises";
import { decodeEvent, encodeEvent } from "../events/codec.js";
import type { LedgerEvent } from "../events/ledger-events.js";
import { SystemError } from "../shared/errors.js";
import type { EventLog } from "./event-log.js";

export interface FileEventLogConfig {
	readonly filePath: string;
	/** Seal the live file as a new segment once it reaches this size */
	readonly maxFileSizeBytes?: number | undefined;
}

/** A line that is not valid JSON or not a valid ledger record. */
export interface CorruptLine {
	readonly file: string;
	readonly lineNumber: number;
	readonly raw: string;
	readonly reason: string;
}

export interface RestoreResult {
	readonly records: readonly LedgerEvent[];
	readonly corruptLines: readonly CorruptLine[];
}

const MAX_WRITE_ERRORS = 10;

export class FileEventLog implements EventLog {
	private readonly config: FileEventLogConfig;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly recentWriteErrors: SystemError[] = [];
	/** Number of sealed segments, learned from disk on first rotation */
	private segmentCount: number | null = null;

	private constructor(config: FileEventLogConfig) {
		this.config = config;
	}

	static create(config: FileEventLogConfig): FileEventLog {
		return new FileEventLog(config);
	}

	private get filePath(): string {
		return this.config.filePath;
	}

	/** @throws SystemError when closed or when the write fails */
	async append(event: LedgerEvent): Promise<void> {
		if (this.closed) {
			throw new SystemError("FileEventLog is closed", { filePath: this.filePath });
		}
		const line = `${JSON.stringify(encodeEvent(event))}\n`;
		const write = this.writeQueue.then(() => this.writeOnce(line));
		// the caller sees the failure through `write`; the queue itself stays usable
		this.writeQueue = write.catch((error: unknown) => {
			this.rememberWriteError(error);
		});
		await write;
	}

	async restore(): Promise<RestoreResult> {
		const records: LedgerEvent[] = [];
		const corruptLines: CorruptLine[] = [];

		for (const file of await this.filesOldestFirst()) {
			const content = await readIfExists(file);
			if (content === null) continue;

			const lines = content.split("\n");
			for (let i = 0; i < lines.length; i++) {
				const trimmed = lines[i]?.trim() ?? "";
				if (trimmed.length === 0) continue;

				const corrupt = (reason: string): CorruptLine => ({
					file,
					lineNumber: i + 1,
					raw: trimmed.slice(0, 200),
					reason,
				});

				let parsed: unknown;
				try {
					parsed = JSON.parse(trimmed);
				} catch (error: unknown) {
					corruptLines.push(corrupt(error instanceof Error ? error.message : String(error)));
					continue;
				}
				const decoded = decodeEvent(parsed);
				if (decoded.ok) {
					records.push(decoded.value);
				} else {
					corruptLines.push(corrupt(decoded.error.message));
				}
			}
		}

		return { records, corruptLines };
	}

	async flush(): Promise<void> {
		await this.writeQueue;
	}

	/** Drains pending writes; later appends reject. Idempotent. */
	async close(): Promise<void> {
		this.closed = true;
		await this.writeQueue;
	}

	/** Most recent write failures, oldest first. */
	writeErrors(): readonly SystemError[] {
		return [...this.recentWriteErrors];
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (this.config.maxFileSizeBytes !== undefined && this.config.maxFileSizeBytes > 0) {
				await this.rotateIfNeeded(this.config.maxFileSizeBytes);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (error: unknown) {
			const code = isNodeError(error) ? error.code : "UNKNOWN";
			const msg = error instanceof Error ? error.message : String(error);
			throw new SystemError(`FileEventLog write to ${this.filePath} failed: [${code}] ${msg}`, {
				cause: error,
				filePath: this.filePath,
			});
		}
	}

	private rememberWriteError(error: unknown): void {
		this.recentWriteErrors.push(
			error instanceof SystemError ? error : new SystemError(String(error), { cause: error }),
		);
		if (this.recentWriteErrors.length > MAX_WRITE_ERRORS) {
			this.recentWriteErrors.shift();
		}
	}

	private segmentPath(n: number): string {
		return `${this.filePath}.${n}`;
	}

	private async filesOldestFirst(): Promise<string[]> {
		const files: string[] = [];
		const sealed = await this.countSegments();
		for (let i = 1; i <= sealed; i++) {
			files.push(this.segmentPath(i));
		}
		files.push(this.filePath);
		return files;
	}

	/** Segments are contiguous from `.1`; the first missing number ends the run. */
	private async countSegments(): Promise<number> {
		let n = 0;
		while (await exists(this.segmentPath(n + 1))) {
			n++;
		}
		return n;
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) {
				return;
			}
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") {
				return;
			}
			throw error;
		}
		await this.rotate();
	}

	private async rotate(): Promise<void> {
		const sealed = this.segmentCount ?? (await this.countSegments());
		const next = sealed + 1;
		if (await exists(this.segmentPath(next))) {
			throw new Error(`Refusing to overwrite event log segment ${this.segmentPath(next)}`);
		}
		await rename(this.filePath, this.segmentPath(next));
		this.segmentCount = next;
	}
}

async function readIfExists(file: string): Promise<string | null> {
	try {
		return await readFile(file, "utf-8");
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === "ENOENT") {
			return null;
		}
		throw error;
	}
}

async function exists(file: string): Promise<boolean> {
	try {
		await stat(file);
		return true;
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === "ENOENT") {
			return false;
		}
		throw error;
	}
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
