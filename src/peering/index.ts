export { PeeringReconciler, createPeeringReconciler, toPeeringRecord, findReturnPeering } from "./reconciler.js";
export { peeringPairId, parseVirtualNetworkId } from "./identity.js";
export { summarizePeerings } from "./summary.js";
export type { PeeringReconcilerOptions } from "./reconciler.js";
export type {
  PeeringRecord,
  PeeringPair,
  PeeringSummary,
  PeeringReport,
  PeeringDataSource,
  VirtualNetworkRef,
} from "./types.js";
