export type { EventLog } from "./event-log.js";
export { FileEventLog } from "./file-event-log.js";
export type { CorruptLine, FileEventLogConfig, RestoreResult } from "./file-event-log.js";
export { MemoryEventLog } from "./memory-event-log.js";
