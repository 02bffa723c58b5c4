/**
 * Upstream provider contract.
 *
 * Every method rejects with an AzureProviderError whose kind tells the
 * caller whether to fall back (NotFound, Transient), abort (Unauthorized)
 * or report (Unknown).
 */

import type { AzureSubscription } from "../subscriptions/types.js";
import type { ResourceGroup } from "../resources/types.js";
import type { VirtualMachine } from "../vms/types.js";
import type {
  NetworkInterface,
  NetworkSecurityGroup,
  PublicIpAddress,
  RouteEntry,
  SecurityRule,
  RouteTable,
  RouteTableSummary,
  Subnet,
  VirtualNetwork,
} from "../network/types.js";

export interface AzureResourceProvider {
  listSubscriptions(): Promise<AzureSubscription[]>;
  listResourceGroups(subscriptionId: string): Promise<ResourceGroup[]>;

  listVirtualMachines(subscriptionId: string, resourceGroup?: string): Promise<VirtualMachine[]>;
  getVirtualMachine(subscriptionId: string, resourceGroup: string, vmName: string): Promise<VirtualMachine>;

  getNetworkInterface(subscriptionId: string, resourceGroup: string, nicName: string): Promise<NetworkInterface>;
  getEffectiveRoutes(subscriptionId: string, resourceGroup: string, nicName: string): Promise<RouteEntry[]>;
  getSubnet(subscriptionId: string, resourceGroup: string, vnetName: string, subnetName: string): Promise<Subnet>;
  getPublicIpAddress(subscriptionId: string, resourceGroup: string, name: string): Promise<PublicIpAddress>;

  getNetworkSecurityGroup(subscriptionId: string, resourceGroup: string, nsgName: string): Promise<NetworkSecurityGroup>;
  getEffectiveSecurityRules(subscriptionId: string, resourceGroup: string, nicName: string): Promise<SecurityRule[]>;

  listRouteTables(subscriptionId: string, resourceGroup?: string): Promise<RouteTableSummary[]>;
  getRouteTable(subscriptionId: string, resourceGroup: string, routeTableName: string): Promise<RouteTable>;

  listVirtualNetworks(subscriptionId: string, resourceGroup?: string): Promise<VirtualNetwork[]>;
  getVirtualNetwork(subscriptionId: string, resourceGroup: string, vnetName: string): Promise<VirtualNetwork>;
}
