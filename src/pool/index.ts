export type { Pool, PoolAggregates } from "./types.js";
export { PoolRegistry } from "./pool-registry.js";
