import { bench, describe } from "vitest";
import { AccessController } from "../src/access/access-controller.js";
import { PoolRegistry } from "../src/pool/pool-registry.js";
import { PositionLedger } from "../src/position/position-ledger.js";
import { ciphertextFromHex } from "../src/shared/ciphertext.js";
import { identity, poolId } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";

describe("position ledger", () => {
	const owner = identity("owner");
	const access = AccessController.create(owner);
	const pool = poolId(0);
	const stake = ciphertextFromHex(`0x${"ab".repeat(64)}`);
	const { registry } = unwrap(PoolRegistry.create().createPool(access, owner, stake, 0));
	const participants = Array.from({ length: 100 }, (_, i) => identity(`farmer-${i}`));

	bench("deposit 100 participants", () => {
		let ledger = PositionLedger.create();
		let pools = registry;
		for (const who of participants) {
			const t = unwrap(ledger.deposit(pools, pool, who, stake, 1));
			ledger = t.ledger;
			pools = t.registry;
		}
	});

	bench("deposit then withdraw 100 participants", () => {
		let ledger = PositionLedger.create();
		let pools = registry;
		for (const who of participants) {
			const opened = unwrap(ledger.deposit(pools, pool, who, stake, 1));
			const closed = unwrap(opened.ledger.withdraw(opened.registry, pool, who, stake, 2));
			ledger = closed.ledger;
			pools = closed.registry;
		}
	});
});
