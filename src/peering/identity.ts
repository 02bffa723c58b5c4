import { createHash } from "node:crypto";
import { tryParseResourceId } from "../network/resource-id.js";
import type { VirtualNetworkRef } from "./types.js";

/**
 * Order-independent identifier of the peering between two VNets: the MD5
 * hex digest of the sorted ids joined with ":".
 */
export function peeringPairId(a: string, b: string): string {
  const [first, second] = [a, b].sort();
  return createHash("md5").update(`${first}:${second}`).digest("hex");
}

export function parseVirtualNetworkId(id: string): VirtualNetworkRef | null {
  const parsed = tryParseResourceId(id);
  if (!parsed || parsed.resourceType.toLowerCase() !== "virtualnetworks") return null;
  return { subscriptionId: parsed.subscriptionId, resourceGroup: parsed.resourceGroup, vnetName: parsed.name };
}
