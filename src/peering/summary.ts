import type { PeeringPair, PeeringSummary } from "./types.js";

export function summarizePeerings(pairs: readonly PeeringPair[]): PeeringSummary {
  const total = pairs.length;
  const connectedCount = pairs.filter((pair) => pair.connected).length;
  return {
    total,
    connectedCount,
    partialCount: total - connectedCount,
    connectivityPercentage: total > 0 ? Math.round((connectedCount / total) * 10_000) / 100 : 0,
  };
}
