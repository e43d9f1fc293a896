/**
 * Farm Demo — one pool, two farmers, an owner pause, and a replay.
 *
 * Ciphertexts here are UTF-8 placeholders; the ledger never looks inside them.
 *
 * Run: npx tsx examples/farm-demo.ts
 */

import {
	FarmLedger,
	MemoryEventLog,
	ciphertextFromUtf8,
	createLogger,
	identity,
	unwrap,
} from "../src/index.js";

const owner = identity("farm-owner");
const alice = identity("alice");
const bob = identity("bob");
const ct = ciphertextFromUtf8;

const eventLog = new MemoryEventLog();
const ledger = FarmLedger.create({
	owner,
	eventLog,
	logger: createLogger({ level: "info" }),
});

ledger.on("event", (event) => {
	console.log(`#${event.sequence} ${event.type}`);
});

const pool = unwrap(await ledger.createPool(owner, ct("wheat")));
unwrap(await ledger.depositEncrypted(alice, pool, ct("enc(100)")));
unwrap(await ledger.depositEncrypted(bob, pool, ct("enc(40)")));
unwrap(await ledger.accrueEncrypted(alice, pool, ct("enc(+5)"), ct("enc(5)")));
unwrap(await ledger.claimEncrypted(alice, pool, ct("enc(5)")));

console.log("\nAggregates:", ledger.getPoolAggregates(pool));

unwrap(await ledger.setPoolActive(owner, pool, false));
const blocked = await ledger.depositEncrypted(alice, pool, ct("enc(1)"));
console.log(`Deposit while paused: ${blocked.ok ? "accepted" : blocked.error.code}`);

unwrap(await ledger.withdrawEncrypted(bob, pool, ct("enc(40)")));
console.log("After Bob leaves:", ledger.getPoolAggregates(pool));

const replayed = FarmLedger.restore({ owner }, eventLog.records());
const { farmers } = replayed.getPoolAggregates(pool);
console.log(`\nReplayed ${replayed.sequence} records, farmers = ${farmers}`);

await ledger.close();
await replayed.close();
