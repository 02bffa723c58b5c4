/**
 * Peering Reconciler
 *
 * Azure stores a peering as two one-sided objects, one on each VNet. The
 * reconciler walks the VNets in scope, pairs every peering with its return
 * peering on the remote VNet and reports each pair once.
 */

import { describeError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { resourceGroupFromId } from "../network/resource-id.js";
import type { VNetPeering, VirtualNetwork } from "../network/types.js";
import type { FetchOptions } from "../types.js";
import { parseVirtualNetworkId, peeringPairId } from "./identity.js";
import { summarizePeerings } from "./summary.js";
import type {
  PeeringDataSource,
  PeeringPair,
  PeeringRecord,
  PeeringReport,
  VirtualNetworkRef,
} from "./types.js";

export type PeeringReconcilerOptions = {
  dataSource: PeeringDataSource;
  logger?: Logger;
};

/**
 * Flatten a VNet peering into a one-sided record, applying the defaults for
 * fields the API left out.
 */
export function toPeeringRecord(vnet: VirtualNetwork, peering: VNetPeering, subscriptionId: string): PeeringRecord {
  return {
    localVnetId: vnet.id,
    localVnetName: vnet.name,
    resourceGroup: vnet.resourceGroup || resourceGroupFromId(vnet.id),
    subscriptionId,
    remoteVnetId: peering.remoteVirtualNetworkId ?? "",
    peeringState: peering.peeringState ?? "Unknown",
    allowVnetAccess: peering.allowVirtualNetworkAccess ?? true,
    allowForwardedTraffic: peering.allowForwardedTraffic ?? false,
    allowGatewayTransit: peering.allowGatewayTransit ?? false,
    useRemoteGateways: peering.useRemoteGateways ?? false,
    provisioningState: peering.provisioningState ?? "Unknown",
  };
}

type RemoteSideField =
  | "vnet2Id"
  | "vnet2Name"
  | "vnet2ResourceGroup"
  | "vnet2SubscriptionId"
  | "vnet2ToVnet1State"
  | "connected"
  | "partial";

function basePair(peeringId: string, local: PeeringRecord): Omit<PeeringPair, RemoteSideField> {
  return {
    peeringId,
    vnet1Id: local.localVnetId,
    vnet1Name: local.localVnetName,
    vnet1ResourceGroup: local.resourceGroup,
    vnet1SubscriptionId: local.subscriptionId,
    vnet1ToVnet2State: local.peeringState,
    // Flags describe the first side observed
    allowVirtualNetworkAccess: local.allowVnetAccess,
    allowForwardedTraffic: local.allowForwardedTraffic,
    allowGatewayTransit: local.allowGatewayTransit,
    useRemoteGateways: local.useRemoteGateways,
    provisioningState: local.provisioningState,
  };
}

export function findReturnPeering(remote: VirtualNetwork, localVnetId: string): VNetPeering | undefined {
  const target = localVnetId.toLowerCase();
  return remote.peerings.find((peering) => peering.remoteVirtualNetworkId?.toLowerCase() === target);
}

export class PeeringReconciler {
  private dataSource: PeeringDataSource;
  private logger: Logger;

  constructor(options: PeeringReconcilerOptions) {
    this.dataSource = options.dataSource;
    this.logger = options.logger ?? getLogger("peering");
  }

  /**
   * Reconcile every peering of the VNets in scope. Only a failure to list the
   * VNets propagates; a peering that cannot be processed is logged and
   * skipped, and an unreadable remote VNet yields a partial pair.
   */
  async reconcile(subscriptionId: string, resourceGroup?: string, options: FetchOptions = {}): Promise<PeeringPair[]> {
    const vnets = await this.dataSource.listVirtualNetworks(subscriptionId, resourceGroup, options);
    this.logger.debug(`found ${vnets.length} virtual network(s)`, { subscriptionId, resourceGroup });

    const pairs: PeeringPair[] = [];
    const seen = new Set<string>();

    for (const vnet of vnets) {
      for (const peering of vnet.peerings) {
        try {
          const pair = await this.reconcilePeering(subscriptionId, vnet, peering, seen, options);
          if (pair) pairs.push(pair);
        } catch (error) {
          this.logger.error(`error processing peering ${peering.name} of ${vnet.name}: ${describeError(error)}`);
        }
      }
    }

    this.logger.info(`reconciled ${pairs.length} peering pair(s)`, { subscriptionId, resourceGroup });
    return pairs;
  }

  async report(subscriptionId: string, resourceGroup?: string, options: FetchOptions = {}): Promise<PeeringReport> {
    const pairs = await this.reconcile(subscriptionId, resourceGroup, options);
    return { pairs, summary: summarizePeerings(pairs) };
  }

  private async reconcilePeering(
    subscriptionId: string,
    vnet: VirtualNetwork,
    peering: VNetPeering,
    seen: Set<string>,
    options: FetchOptions,
  ): Promise<PeeringPair | null> {
    const local = toPeeringRecord(vnet, peering, subscriptionId);
    if (!local.remoteVnetId) {
      this.logger.warn(`peering ${peering.name} of ${vnet.name} has no remote virtual network`);
      return null;
    }

    const remoteRef = parseVirtualNetworkId(local.remoteVnetId);
    if (!remoteRef) {
      this.logger.warn(`could not parse remote virtual network id ${local.remoteVnetId}`);
      return null;
    }

    // ARM does not guarantee consistent casing between the two sides
    const peeringId = peeringPairId(local.localVnetId.toLowerCase(), local.remoteVnetId.toLowerCase());
    if (seen.has(peeringId)) return null;
    seen.add(peeringId);

    let remote: VirtualNetwork;
    try {
      remote = await this.dataSource.getVirtualNetwork(
        remoteRef.subscriptionId,
        remoteRef.resourceGroup,
        remoteRef.vnetName,
        options,
      );
    } catch (error) {
      // Access denied on another subscription's VNet included
      this.logger.warn(`remote virtual network ${remoteRef.vnetName} unavailable: ${describeError(error)}`);
      return this.partialPair(peeringId, local, remoteRef);
    }

    const returnPeering = findReturnPeering(remote, local.localVnetId);
    const vnet2ToVnet1State = returnPeering ? (returnPeering.peeringState ?? "Unknown") : "NotConfigured";

    return {
      ...basePair(peeringId, local),
      vnet2Id: remote.id,
      vnet2Name: remote.name,
      vnet2ResourceGroup: remote.resourceGroup || remoteRef.resourceGroup,
      vnet2SubscriptionId: remoteRef.subscriptionId,
      vnet2ToVnet1State,
      connected: returnPeering !== undefined && local.peeringState === "Connected" && vnet2ToVnet1State === "Connected",
      partial: false,
    };
  }

  private partialPair(peeringId: string, local: PeeringRecord, remoteRef: VirtualNetworkRef): PeeringPair {
    return {
      ...basePair(peeringId, local),
      vnet2Id: local.remoteVnetId,
      vnet2Name: remoteRef.vnetName,
      vnet2ResourceGroup: remoteRef.resourceGroup,
      vnet2SubscriptionId: remoteRef.subscriptionId,
      vnet2ToVnet1State: "Unknown",
      connected: false,
      partial: true,
    };
  }
}

export function createPeeringReconciler(options: PeeringReconcilerOptions): PeeringReconciler {
  return new PeeringReconciler(options);
}
