/**
 * Azure Network Manager
 *
 * Reads virtual networks, peerings, subnets, network interfaces, route
 * tables, security groups, public IPs and effective routes and rules via
 * @azure/arm-network. Lookups of a single resource resolve to null on 404.
 */

import type {
  NetworkManagementClient as NetworkClient,
  VirtualNetwork as SdkVirtualNetwork,
  VirtualNetworkPeering as SdkPeering,
  Subnet as SdkSubnet,
  NetworkInterface as SdkNetworkInterface,
  RouteTable as SdkRouteTable,
  EffectiveRoute as SdkEffectiveRoute,
  NetworkSecurityGroup as SdkNetworkSecurityGroup,
  SecurityRule as SdkSecurityRule,
  EffectiveNetworkSecurityRule as SdkEffectiveSecurityRule,
  PublicIPAddress as SdkPublicIpAddress,
} from "@azure/arm-network";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { ArmClientPool } from "../client-pool/manager.js";
import { withAzureRetry, readErrorStatus } from "../retry.js";
import { collectAll } from "../pagination.js";
import { resourceGroupFromId } from "./resource-id.js";
import type {
  VirtualNetwork,
  VNetPeering,
  Subnet,
  NetworkInterface,
  RouteTable,
  RouteTableSummary,
  RouteEntry,
  NetworkSecurityGroup,
  SecurityRule,
  PublicIpAddress,
} from "./types.js";

// =============================================================================
// Mapping
// =============================================================================

function mapSubnet(s: SdkSubnet): Subnet {
  return {
    id: s.id ?? "",
    name: s.name ?? "",
    addressPrefix: s.addressPrefix ?? s.addressPrefixes?.[0] ?? "",
    networkSecurityGroupId: s.networkSecurityGroup?.id,
    routeTableId: s.routeTable?.id,
    provisioningState: s.provisioningState,
  };
}

function mapPeering(p: SdkPeering): VNetPeering {
  return {
    id: p.id ?? "",
    name: p.name ?? "",
    remoteVirtualNetworkId: p.remoteVirtualNetwork?.id,
    peeringState: p.peeringState,
    provisioningState: p.provisioningState,
    allowVirtualNetworkAccess: p.allowVirtualNetworkAccess,
    allowForwardedTraffic: p.allowForwardedTraffic,
    allowGatewayTransit: p.allowGatewayTransit,
    useRemoteGateways: p.useRemoteGateways,
  };
}

function mapVirtualNetwork(v: SdkVirtualNetwork): VirtualNetwork {
  return {
    id: v.id ?? "",
    name: v.name ?? "",
    resourceGroup: resourceGroupFromId(v.id),
    location: v.location ?? "",
    addressSpace: v.addressSpace?.addressPrefixes ?? [],
    dnsServers: v.dhcpOptions?.dnsServers ?? [],
    provisioningState: v.provisioningState,
    subnets: (v.subnets ?? []).map(mapSubnet),
    peerings: (v.virtualNetworkPeerings ?? []).map(mapPeering),
    tags: v.tags,
  };
}

function mapNetworkInterface(n: SdkNetworkInterface): NetworkInterface {
  const ipConfigurations = n.ipConfigurations ?? [];
  return {
    id: n.id ?? "",
    name: n.name ?? "",
    resourceGroup: resourceGroupFromId(n.id),
    location: n.location,
    privateIpAddresses: ipConfigurations.flatMap((c) => (c.privateIPAddress ? [c.privateIPAddress] : [])),
    publicIpAddressIds: ipConfigurations.flatMap((c) => (c.publicIPAddress?.id ? [c.publicIPAddress.id] : [])),
    subnetIds: ipConfigurations.flatMap((c) => (c.subnet?.id ? [c.subnet.id] : [])),
    virtualMachineId: n.virtualMachine?.id,
    networkSecurityGroupId: n.networkSecurityGroup?.id,
    enableIpForwarding: n.enableIPForwarding,
  };
}

function mapRouteTableSummary(t: SdkRouteTable): RouteTableSummary {
  return {
    id: t.id ?? "",
    name: t.name ?? "",
    resourceGroup: resourceGroupFromId(t.id),
    location: t.location ?? "",
    routeCount: t.routes?.length ?? 0,
    subnetCount: t.subnets?.length ?? 0,
    provisioningState: t.provisioningState,
  };
}

function mapRouteTable(t: SdkRouteTable): RouteTable {
  return {
    ...mapRouteTableSummary(t),
    routes: (t.routes ?? []).map((r) => ({
      name: r.name ?? "",
      addressPrefix: r.addressPrefix ?? "",
      nextHopType: r.nextHopType ?? "None",
      nextHopIpAddress: r.nextHopIpAddress,
    })),
    subnetIds: (t.subnets ?? []).flatMap((s) => (s.id ? [s.id] : [])),
    disableBgpRoutePropagation: t.disableBgpRoutePropagation ?? false,
    tags: t.tags,
  };
}

/**
 * Effective routes report prefixes and next hops as lists; the first entry
 * of each represents the route.
 */
function mapEffectiveRoute(r: SdkEffectiveRoute): RouteEntry | null {
  const addressPrefix = r.addressPrefix?.[0];
  if (!addressPrefix) return null;
  return {
    addressPrefix,
    nextHopType: r.nextHopType ?? "None",
    nextHopIp: r.nextHopIpAddress?.[0] || undefined,
    origin: r.source ?? "Unknown",
  };
}

function portRangeOf(rule: { destinationPortRange?: string; destinationPortRanges?: string[] }): string {
  if (rule.destinationPortRange) return rule.destinationPortRange;
  const ranges = rule.destinationPortRanges ?? [];
  return ranges.length > 0 ? ranges.join(",") : "*";
}

function mapSecurityRule(r: SdkSecurityRule | SdkEffectiveSecurityRule): SecurityRule {
  return {
    name: r.name ?? "Unnamed",
    direction: r.direction ?? "Unknown",
    protocol: r.protocol ?? "Unknown",
    portRange: portRangeOf(r),
    access: r.access ?? "Unknown",
    priority: r.priority,
  };
}

function mapNetworkSecurityGroup(g: SdkNetworkSecurityGroup): NetworkSecurityGroup {
  return {
    id: g.id ?? "",
    name: g.name ?? "",
    resourceGroup: resourceGroupFromId(g.id),
    location: g.location ?? "",
    securityRules: (g.securityRules ?? []).map(mapSecurityRule),
    networkInterfaceIds: (g.networkInterfaces ?? []).flatMap((n) => (n.id ? [n.id] : [])),
    subnetIds: (g.subnets ?? []).flatMap((s) => (s.id ? [s.id] : [])),
  };
}

function mapPublicIpAddress(p: SdkPublicIpAddress): PublicIpAddress {
  return {
    id: p.id ?? "",
    name: p.name ?? "",
    resourceGroup: resourceGroupFromId(p.id),
    location: p.location,
    ipAddress: p.ipAddress,
    allocationMethod: p.publicIPAllocationMethod,
  };
}

async function nullOn404<T>(fn: () => Promise<T>): Promise<T | null> {
  try {
    return await fn();
  } catch (error) {
    if (readErrorStatus(error) === 404) return null;
    throw error;
  }
}

// =============================================================================
// AzureNetworkManager
// =============================================================================

export class AzureNetworkManager {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private retryOptions: AzureRetryOptions;
  private clientPool: ArmClientPool<NetworkClient>;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId: string,
    retryOptions?: AzureRetryOptions,
    clientPool?: ArmClientPool<NetworkClient>,
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions ?? {};
    this.clientPool = clientPool ?? new ArmClientPool<NetworkClient>();
  }

  private async getClient(): Promise<NetworkClient> {
    const { credential } = await this.credentialsManager.getCredential();
    const { NetworkManagementClient } = await import("@azure/arm-network");
    return this.clientPool.acquire(this.subscriptionId, credential, (cred, scope) => new NetworkManagementClient(cred, scope));
  }

  /**
   * List virtual networks, with their subnets and peerings.
   */
  async listVNets(resourceGroup?: string): Promise<VirtualNetwork[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.virtualNetworks.list(resourceGroup) : client.virtualNetworks.listAll(),
          mapVirtualNetwork,
        ),
      this.retryOptions,
    );
  }

  async getVNet(resourceGroup: string, vnetName: string): Promise<VirtualNetwork | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () => nullOn404(async () => mapVirtualNetwork(await client.virtualNetworks.get(resourceGroup, vnetName))),
      this.retryOptions,
    );
  }

  async getSubnet(resourceGroup: string, vnetName: string, subnetName: string): Promise<Subnet | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () => nullOn404(async () => mapSubnet(await client.subnets.get(resourceGroup, vnetName, subnetName))),
      this.retryOptions,
    );
  }

  async getNetworkInterface(resourceGroup: string, nicName: string): Promise<NetworkInterface | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () => nullOn404(async () => mapNetworkInterface(await client.networkInterfaces.get(resourceGroup, nicName))),
      this.retryOptions,
    );
  }

  /**
   * Effective route table of a NIC. This is a long-running operation on the
   * ARM side; the poller is awaited to completion. Null when the NIC is gone.
   */
  async getEffectiveRoutes(resourceGroup: string, nicName: string): Promise<RouteEntry[] | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        nullOn404(async () => {
          const result = await client.networkInterfaces.beginGetEffectiveRouteTableAndWait(resourceGroup, nicName);
          return (result.value ?? []).flatMap((r) => {
            const entry = mapEffectiveRoute(r);
            return entry ? [entry] : [];
          });
        }),
      this.retryOptions,
    );
  }

  /**
   * Rules of every NSG in effect on a NIC (its own and its subnet's), as
   * Azure evaluates them. Long-running on the ARM side, like effective routes.
   */
  async getEffectiveSecurityRules(resourceGroup: string, nicName: string): Promise<SecurityRule[] | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        nullOn404(async () => {
          const result = await client.networkInterfaces.beginListEffectiveNetworkSecurityGroupsAndWait(resourceGroup, nicName);
          return (result.value ?? []).flatMap((group) => (group.effectiveSecurityRules ?? []).map(mapSecurityRule));
        }),
      this.retryOptions,
    );
  }

  async getNetworkSecurityGroup(resourceGroup: string, nsgName: string): Promise<NetworkSecurityGroup | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () => nullOn404(async () => mapNetworkSecurityGroup(await client.networkSecurityGroups.get(resourceGroup, nsgName))),
      this.retryOptions,
    );
  }

  async getPublicIpAddress(resourceGroup: string, name: string): Promise<PublicIpAddress | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () => nullOn404(async () => mapPublicIpAddress(await client.publicIPAddresses.get(resourceGroup, name))),
      this.retryOptions,
    );
  }

  async listRouteTables(resourceGroup?: string): Promise<RouteTableSummary[]> {
    const client = await this.getClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.routeTables.list(resourceGroup) : client.routeTables.listAll(),
          mapRouteTableSummary,
        ),
      this.retryOptions,
    );
  }

  async getRouteTable(resourceGroup: string, routeTableName: string): Promise<RouteTable | null> {
    const client = await this.getClient();
    return withAzureRetry(
      () => nullOn404(async () => mapRouteTable(await client.routeTables.get(resourceGroup, routeTableName))),
      this.retryOptions,
    );
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createNetworkManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  clientPool?: ArmClientPool<NetworkClient>,
): AzureNetworkManager {
  return new AzureNetworkManager(credentialsManager, subscriptionId, retryOptions, clientPool);
}
