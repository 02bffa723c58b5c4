/**
 * Network resource types.
 */

// =============================================================================
// Routes
// =============================================================================

/** Next hop kinds reported by Azure. Any other string is passed through. */
export type NextHopType =
  | "Internet"
  | "VnetLocal"
  | "VirtualNetworkGateway"
  | "VirtualAppliance"
  | "VnetPeering"
  | "VirtualNetworkServiceEndpoint"
  | "None"
  | (string & {});

/** Where a route came from: system defaults, a user route table, BGP... */
export type RouteOrigin = "Default" | "User" | "VirtualNetworkGateway" | "Unknown" | (string & {});

/**
 * One routing rule. Identity is (addressPrefix, nextHopType, nextHopIp).
 */
export type RouteEntry = {
  readonly addressPrefix: string;
  readonly nextHopType: NextHopType;
  readonly nextHopIp?: string;
  readonly origin: RouteOrigin;
};

// =============================================================================
// Route Tables
// =============================================================================

export type RouteTableRoute = {
  name: string;
  addressPrefix: string;
  nextHopType: NextHopType;
  nextHopIpAddress?: string;
};

export type RouteTableSummary = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  routeCount: number;
  subnetCount: number;
  provisioningState?: string;
};

export type RouteTable = RouteTableSummary & {
  routes: RouteTableRoute[];
  subnetIds: string[];
  disableBgpRoutePropagation: boolean;
  tags?: Record<string, string>;
};

// =============================================================================
// Interfaces & Subnets
// =============================================================================

export type NetworkInterface = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  privateIpAddresses: string[];
  publicIpAddressIds: string[];
  subnetIds: string[];
  virtualMachineId?: string;
  networkSecurityGroupId?: string;
  enableIpForwarding?: boolean;
};

export type Subnet = {
  id: string;
  name: string;
  addressPrefix: string;
  networkSecurityGroupId?: string;
  routeTableId?: string;
  provisioningState?: string;
};

// =============================================================================
// Security Groups & Public IPs
// =============================================================================

export type SecurityRuleDirection = "Inbound" | "Outbound" | (string & {});

export type SecurityRuleAccess = "Allow" | "Deny" | (string & {});

/**
 * One NSG rule as shown to users. `portRange` is the destination port range,
 * a comma-joined list when the rule has several, or "*".
 */
export type SecurityRule = {
  readonly name: string;
  readonly direction: SecurityRuleDirection;
  readonly protocol: string;
  readonly portRange: string;
  readonly access: SecurityRuleAccess;
  readonly priority?: number;
};

export type NetworkSecurityGroup = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  securityRules: SecurityRule[];
  networkInterfaceIds: string[];
  subnetIds: string[];
};

export type PublicIpAddress = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  ipAddress?: string;
  allocationMethod?: string;
};

// =============================================================================
// Virtual Networks
// =============================================================================

export type VNetPeering = {
  id: string;
  name: string;
  remoteVirtualNetworkId?: string;
  peeringState?: string;
  provisioningState?: string;
  allowVirtualNetworkAccess?: boolean;
  allowForwardedTraffic?: boolean;
  allowGatewayTransit?: boolean;
  useRemoteGateways?: boolean;
};

export type VirtualNetwork = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  addressSpace: string[];
  dnsServers: string[];
  provisioningState?: string;
  subnets: Subnet[];
  peerings: VNetPeering[];
  tags?: Record<string, string>;
};
