export { FarmLedger } from "./farm-ledger.js";
export type { FarmLedgerEvents, FarmLedgerOptions } from "./farm-ledger.js";
export { openLedger } from "./open-ledger.js";
export type { OpenLedgerOptions } from "./open-ledger.js";
export type { LedgerState, Step } from "./transitions.js";
