/**
 * In-memory provider for tests and offline development.
 *
 * Holds a fixed Azure estate per subscription and answers every provider
 * call from it. Lookups missing from the estate reject with NotFound, the
 * same way the ARM-backed provider does; `fail()` injects any other error.
 */

import { AzureProviderError } from "../errors.js";
import type { AzureResourceProvider } from "./types.js";
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

// =============================================================================
// Types
// =============================================================================

export type MockSubscriptionEstate = {
  resourceGroups?: ResourceGroup[];
  virtualMachines?: VirtualMachine[];
  networkInterfaces?: NetworkInterface[];
  /** Effective routes keyed by NIC name. */
  effectiveRoutes?: Record<string, RouteEntry[]>;
  /** Effective security rules keyed by NIC name. */
  effectiveSecurityRules?: Record<string, SecurityRule[]>;
  networkSecurityGroups?: NetworkSecurityGroup[];
  publicIpAddresses?: PublicIpAddress[];
  routeTables?: RouteTable[];
  virtualNetworks?: VirtualNetwork[];
};

export type MockProviderConfig = {
  subscriptions?: AzureSubscription[];
  estates?: Record<string, MockSubscriptionEstate>;
};

export type MockOperation = keyof AzureResourceProvider;

// =============================================================================
// Helpers
// =============================================================================

function sameGroup(a: string, b: string | undefined): boolean {
  return b === undefined || a.toLowerCase() === b.toLowerCase();
}

function notFound(description: string): AzureProviderError {
  return new AzureProviderError("NotFound", `${description} not found`, { statusCode: 404 });
}

function summarize(table: RouteTable): RouteTableSummary {
  return {
    id: table.id,
    name: table.name,
    resourceGroup: table.resourceGroup,
    location: table.location,
    routeCount: table.routes.length,
    subnetCount: table.subnetIds.length,
    provisioningState: table.provisioningState,
  };
}

// =============================================================================
// Mock Provider
// =============================================================================

export class MockResourceProvider implements AzureResourceProvider {
  private subscriptions: AzureSubscription[];
  private estates: Record<string, MockSubscriptionEstate>;
  private failures = new Map<string, AzureProviderError>();

  /** Number of calls per operation. */
  readonly calls = new Map<MockOperation, number>();

  constructor(config: MockProviderConfig = {}) {
    this.subscriptions = config.subscriptions ?? [];
    this.estates = config.estates ?? {};
  }

  /**
   * Make `operation` reject for the given resource name (or for every call
   * when `name` is "*").
   */
  fail(operation: MockOperation, name: string, error: AzureProviderError): this {
    this.failures.set(`${operation}:${name.toLowerCase()}`, error);
    return this;
  }

  callCount(operation: MockOperation): number {
    return this.calls.get(operation) ?? 0;
  }

  private enter(operation: MockOperation, name: string): void {
    this.calls.set(operation, this.callCount(operation) + 1);
    const failure =
      this.failures.get(`${operation}:${name.toLowerCase()}`) ?? this.failures.get(`${operation}:*`);
    if (failure) throw failure;
  }

  private estate(subscriptionId: string): MockSubscriptionEstate {
    return this.estates[subscriptionId] ?? {};
  }

  async listSubscriptions(): Promise<AzureSubscription[]> {
    this.enter("listSubscriptions", "*");
    return [...this.subscriptions];
  }

  async listResourceGroups(subscriptionId: string): Promise<ResourceGroup[]> {
    this.enter("listResourceGroups", subscriptionId);
    return [...(this.estate(subscriptionId).resourceGroups ?? [])];
  }

  async listVirtualMachines(subscriptionId: string, resourceGroup?: string): Promise<VirtualMachine[]> {
    this.enter("listVirtualMachines", subscriptionId);
    return (this.estate(subscriptionId).virtualMachines ?? []).filter((vm) => sameGroup(vm.resourceGroup, resourceGroup));
  }

  async getVirtualMachine(subscriptionId: string, resourceGroup: string, vmName: string): Promise<VirtualMachine> {
    this.enter("getVirtualMachine", vmName);
    const vm = (this.estate(subscriptionId).virtualMachines ?? []).find(
      (candidate) => candidate.name === vmName && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    if (!vm) throw notFound(`Virtual machine ${resourceGroup}/${vmName}`);
    return vm;
  }

  async getNetworkInterface(subscriptionId: string, resourceGroup: string, nicName: string): Promise<NetworkInterface> {
    this.enter("getNetworkInterface", nicName);
    const nic = (this.estate(subscriptionId).networkInterfaces ?? []).find(
      (candidate) => candidate.name === nicName && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    if (!nic) throw notFound(`Network interface ${resourceGroup}/${nicName}`);
    return nic;
  }

  async getEffectiveRoutes(subscriptionId: string, resourceGroup: string, nicName: string): Promise<RouteEntry[]> {
    this.enter("getEffectiveRoutes", nicName);
    const routes = this.estate(subscriptionId).effectiveRoutes?.[nicName];
    if (!routes) throw notFound(`Effective routes of ${resourceGroup}/${nicName}`);
    return [...routes];
  }

  async getSubnet(subscriptionId: string, resourceGroup: string, vnetName: string, subnetName: string): Promise<Subnet> {
    this.enter("getSubnet", subnetName);
    const vnet = (this.estate(subscriptionId).virtualNetworks ?? []).find(
      (candidate) => candidate.name === vnetName && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    const subnet = vnet?.subnets.find((candidate) => candidate.name === subnetName);
    if (!subnet) throw notFound(`Subnet ${resourceGroup}/${vnetName}/${subnetName}`);
    return subnet;
  }

  async getPublicIpAddress(subscriptionId: string, resourceGroup: string, name: string): Promise<PublicIpAddress> {
    this.enter("getPublicIpAddress", name);
    const address = (this.estate(subscriptionId).publicIpAddresses ?? []).find(
      (candidate) => candidate.name === name && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    if (!address) throw notFound(`Public IP address ${resourceGroup}/${name}`);
    return address;
  }

  async getNetworkSecurityGroup(subscriptionId: string, resourceGroup: string, nsgName: string): Promise<NetworkSecurityGroup> {
    this.enter("getNetworkSecurityGroup", nsgName);
    const group = (this.estate(subscriptionId).networkSecurityGroups ?? []).find(
      (candidate) => candidate.name === nsgName && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    if (!group) throw notFound(`Network security group ${resourceGroup}/${nsgName}`);
    return group;
  }

  async getEffectiveSecurityRules(subscriptionId: string, resourceGroup: string, nicName: string): Promise<SecurityRule[]> {
    this.enter("getEffectiveSecurityRules", nicName);
    const rules = this.estate(subscriptionId).effectiveSecurityRules?.[nicName];
    if (!rules) throw notFound(`Effective security rules of ${resourceGroup}/${nicName}`);
    return [...rules];
  }

  async listRouteTables(subscriptionId: string, resourceGroup?: string): Promise<RouteTableSummary[]> {
    this.enter("listRouteTables", subscriptionId);
    return (this.estate(subscriptionId).routeTables ?? [])
      .filter((table) => sameGroup(table.resourceGroup, resourceGroup))
      .map(summarize);
  }

  async getRouteTable(subscriptionId: string, resourceGroup: string, routeTableName: string): Promise<RouteTable> {
    this.enter("getRouteTable", routeTableName);
    const table = (this.estate(subscriptionId).routeTables ?? []).find(
      (candidate) => candidate.name === routeTableName && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    if (!table) throw notFound(`Route table ${resourceGroup}/${routeTableName}`);
    return table;
  }

  async listVirtualNetworks(subscriptionId: string, resourceGroup?: string): Promise<VirtualNetwork[]> {
    this.enter("listVirtualNetworks", subscriptionId);
    return (this.estate(subscriptionId).virtualNetworks ?? []).filter((vnet) => sameGroup(vnet.resourceGroup, resourceGroup));
  }

  async getVirtualNetwork(subscriptionId: string, resourceGroup: string, vnetName: string): Promise<VirtualNetwork> {
    this.enter("getVirtualNetwork", vnetName);
    const vnet = (this.estate(subscriptionId).virtualNetworks ?? []).find(
      (candidate) => candidate.name === vnetName && sameGroup(candidate.resourceGroup, resourceGroup),
    );
    if (!vnet) throw notFound(`Virtual network ${resourceGroup}/${vnetName}`);
    return vnet;
  }
}

export function createMockProvider(config?: MockProviderConfig): MockResourceProvider {
  return new MockResourceProvider(config);
}
