export { PositionState, type Position, type PositionTransition } from "./types.js";
export { PositionLedger } from "./position-ledger.js";
