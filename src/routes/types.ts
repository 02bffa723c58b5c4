/**
 * Route resolution types.
 */

import type { NetworkInterface, RouteEntry, RouteTable, Subnet } from "../network/types.js";
import type { FetchOptions } from "../types.js";

/**
 * The reads route resolution needs. AzureResourceService satisfies this.
 */
export interface RouteDataSource {
  getEffectiveRoutes(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options?: FetchOptions,
  ): Promise<RouteEntry[]>;
  getNetworkInterface(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options?: FetchOptions,
  ): Promise<NetworkInterface>;
  getSubnet(
    subscriptionId: string,
    resourceGroup: string,
    vnetName: string,
    subnetName: string,
    options?: FetchOptions,
  ): Promise<Subnet>;
  getRouteTable(
    subscriptionId: string,
    resourceGroup: string,
    routeTableName: string,
    options?: FetchOptions,
  ): Promise<RouteTable>;
}

export type RouteStrategyName = "effective-route-table" | "subnet-route-table" | "default-routes";

export type RouteLookup = {
  subscriptionId: string;
  nic: NetworkInterface;
  options: FetchOptions;
};

export interface RouteStrategy {
  readonly name: RouteStrategyName;
  resolve(lookup: RouteLookup): Promise<RouteEntry[]>;
}

export type ResolvedRoutes = {
  routes: RouteEntry[];
  source: RouteStrategyName;
};

/** Where an interface's routes came from; "document" for routes read from disk. */
export type RouteProvenance = RouteStrategyName | "document";

export type InterfaceRoutes = {
  name: string;
  privateIpAddresses: string[];
  routes: RouteEntry[];
  source: RouteProvenance;
};

/**
 * A machine's routing view. `routes` merges every interface; graph building
 * only looks at `interfaces[0]`.
 */
export type MachineRouteSet = {
  name: string;
  interfaces: InterfaceRoutes[];
  routes: RouteEntry[];
};

/** What the resolver needs to know about a machine. */
export type MachineNetworkProfile = {
  name: string;
  subscriptionId: string;
  interfaces: NetworkInterface[];
};
