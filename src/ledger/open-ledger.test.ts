import { appendFile, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { ciphertextFromUtf8 } from "../shared/ciphertext.js";
import { resolveConfig } from "../shared/config.js";
import { SystemError } from "../shared/errors.js";
import { identity, poolId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { openLedger } from "./open-ledger.js";

const OWNER = identity("owner");
const ALICE = identity("alice");

describe("openLedger", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "open-ledger-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("starts an empty in-memory ledger without an event log path", async () => {
		const ledger = await openLedger(resolveConfig({ owner: OWNER }), { logger: silentLogger });
		expect(ledger.owner).toBe(OWNER);
		expect(ledger.sequence).toBe(0);
		await ledger.close();
	});

	it("replays the event log file on open", async () => {
		const config = resolveConfig({ owner: OWNER, eventLogPath: join(dir, "ledger.jsonl") });
		const options = { logger: silentLogger, clock: new FakeClock(500) };

		const first = await openLedger(config, options);
		unwrap(await first.createPool(OWNER, ciphertextFromUtf8("wheat")));
		unwrap(await first.depositEncrypted(ALICE, poolId(0), ciphertextFromUtf8("s1")));
		await first.close();

		const second = await openLedger(config, options);
		expect(second.sequence).toBe(2);
		expect(second.getPoolAggregates(poolId(0))).toEqual({ farmers: 1, deposits: 1, claims: 0 });
		expect(second.getPool(poolId(0)).createdAt).toBe(500);

		unwrap(await second.setPoolActive(OWNER, poolId(0), false));
		await second.close();

		const third = await openLedger(config, options);
		expect(third.sequence).toBe(3);
		expect(third.isPoolActive(poolId(0))).toBe(false);
		await third.close();
	});

	it("reopens a rotated log without losing early records", async () => {
		const config = resolveConfig({
			owner: OWNER,
			eventLogPath: join(dir, "ledger.jsonl"),
			eventLogMaxFileSizeBytes: 1,
		});

		const first = await openLedger(config, { logger: silentLogger });
		for (let i = 0; i < 8; i++) {
			unwrap(await first.createPool(OWNER, ciphertextFromUtf8(`pool-${i}`)));
		}
		await first.close();

		const second = await openLedger(config, { logger: silentLogger });
		expect(second.sequence).toBe(8);
		expect(second.nextPoolId).toBe(8);
		expect(second.pools().map((pool) => pool.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);

		unwrap(await second.createPool(OWNER, ciphertextFromUtf8("pool-8")));
		await second.close();

		const third = await openLedger(config, { logger: silentLogger });
		expect(third.sequence).toBe(9);
		await third.close();
	});

	it("refuses to open over undecodable lines", async () => {
		const eventLogPath = join(dir, "ledger.jsonl");
		await appendFile(eventLogPath, "{not json\n", "utf-8");

		const open = openLedger(resolveConfig({ owner: OWNER, eventLogPath }), {
			logger: silentLogger,
		});
		await expect(open).rejects.toBeInstanceOf(SystemError);
		await expect(open).rejects.toThrow(/line 1 does not decode/);
	});
});
