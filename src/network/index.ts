export { AzureNetworkManager, createNetworkManager } from "./manager.js";
export { parseCidr, tryParseCidr, cidrContains, prefixContains, parseIpAddress } from "./cidr.js";
export { parseResourceId, tryParseResourceId, resourceGroupFromId, resourceNameFromId } from "./resource-id.js";
export type { CidrBlock, IpFamily, ParsedAddress } from "./cidr.js";
export type { ResourceIdentifier } from "./resource-id.js";
export type {
  NextHopType,
  RouteOrigin,
  RouteEntry,
  RouteTableRoute,
  RouteTableSummary,
  RouteTable,
  NetworkInterface,
  Subnet,
  VNetPeering,
  VirtualNetwork,
} from "./types.js";
