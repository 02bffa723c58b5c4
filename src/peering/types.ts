/**
 * Peering report types.
 */

import type { VirtualNetwork } from "../network/types.js";
import type { FetchOptions } from "../types.js";

/** One side of a peering as configured on its local VNet. */
export type PeeringRecord = {
  localVnetId: string;
  localVnetName: string;
  resourceGroup: string;
  subscriptionId: string;
  remoteVnetId: string;
  peeringState: string;
  allowVnetAccess: boolean;
  allowForwardedTraffic: boolean;
  allowGatewayTransit: boolean;
  useRemoteGateways: boolean;
  provisioningState: string;
};

export type PeeringPair = {
  peeringId: string;
  vnet1Id: string;
  vnet1Name: string;
  vnet1ResourceGroup: string;
  vnet1SubscriptionId: string;
  vnet1ToVnet2State: string;
  vnet2Id: string;
  vnet2Name: string;
  vnet2ResourceGroup: string;
  vnet2SubscriptionId: string;
  /** "Unknown" when the remote VNet could not be read, "NotConfigured" without a return peering. */
  vnet2ToVnet1State: string;
  allowVirtualNetworkAccess: boolean;
  allowForwardedTraffic: boolean;
  allowGatewayTransit: boolean;
  useRemoteGateways: boolean;
  provisioningState: string;
  connected: boolean;
  partial: boolean;
};

export type PeeringSummary = {
  total: number;
  connectedCount: number;
  partialCount: number;
  connectivityPercentage: number;
};

export type PeeringReport = {
  pairs: PeeringPair[];
  summary: PeeringSummary;
};

export type VirtualNetworkRef = {
  subscriptionId: string;
  resourceGroup: string;
  vnetName: string;
};

/** The reads the reconciler needs. AzureResourceService satisfies this. */
export interface PeeringDataSource {
  listVirtualNetworks(subscriptionId: string, resourceGroup?: string, options?: FetchOptions): Promise<VirtualNetwork[]>;
  getVirtualNetwork(
    subscriptionId: string,
    resourceGroup: string,
    vnetName: string,
    options?: FetchOptions,
  ): Promise<VirtualNetwork>;
}
