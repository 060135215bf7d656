export { PositionReplica } from "./position-replica.js";
export { StateSynchronizer, estimateDcaLevel, isAcceptedPosition } from "./state-synchronizer.js";
export type { StateSynchronizerConfig } from "./state-synchronizer.js";
export { SyncOutcome, isOpen } from "./types.js";
export type { PositionSnapshot, PositionSyncResult, ResyncNotice, SynchronizerEvents } from "./types.js";
