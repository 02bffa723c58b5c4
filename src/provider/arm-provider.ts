/**
 * ARM-backed resource provider.
 *
 * Composes the per-subscription managers, translates "null on 404" into
 * NotFound and every SDK or credential failure into an AzureProviderError.
 */

import type { NetworkManagementClient } from "@azure/arm-network";
import type { ComputeManagementClient } from "@azure/arm-compute";
import type { ResourceManagementClient } from "@azure/arm-resources";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { ArmClientPool } from "../client-pool/manager.js";
import { AzureProviderError, toProviderError } from "../errors.js";
import { AzureNetworkManager } from "../network/manager.js";
import { AzureVMManager } from "../vms/manager.js";
import { AzureResourceManager } from "../resources/manager.js";
import { AzureSubscriptionManager } from "../subscriptions/manager.js";
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

export type ArmResourceProviderOptions = {
  credentialsManager: AzureCredentialsManager;
  retryOptions?: AzureRetryOptions;
};

type SubscriptionManagers = {
  network: AzureNetworkManager;
  compute: AzureVMManager;
  resources: AzureResourceManager;
};

function required<T>(value: T | null, description: string): T {
  if (value === null) {
    throw new AzureProviderError("NotFound", `${description} not found`, { statusCode: 404 });
  }
  return value;
}

export class ArmResourceProvider implements AzureResourceProvider {
  private credentialsManager: AzureCredentialsManager;
  private retryOptions?: AzureRetryOptions;
  private managers = new Map<string, SubscriptionManagers>();
  private subscriptionManager: AzureSubscriptionManager;
  private networkClients = new ArmClientPool<NetworkManagementClient>();
  private computeClients = new ArmClientPool<ComputeManagementClient>();
  private resourceClients = new ArmClientPool<ResourceManagementClient>();

  constructor(options: ArmResourceProviderOptions) {
    this.credentialsManager = options.credentialsManager;
    this.retryOptions = options.retryOptions;
    this.subscriptionManager = new AzureSubscriptionManager(this.credentialsManager, this.retryOptions);
  }

  private forSubscription(subscriptionId: string): SubscriptionManagers {
    let managers = this.managers.get(subscriptionId);
    if (!managers) {
      managers = {
        network: new AzureNetworkManager(this.credentialsManager, subscriptionId, this.retryOptions, this.networkClients),
        compute: new AzureVMManager(this.credentialsManager, subscriptionId, this.retryOptions, this.computeClients),
        resources: new AzureResourceManager(this.credentialsManager, subscriptionId, this.retryOptions, this.resourceClients),
      };
      this.managers.set(subscriptionId, managers);
    }
    return managers;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toProviderError(error, operation);
    }
  }

  // ---------------------------------------------------------------------------
  // Subscriptions & resource groups
  // ---------------------------------------------------------------------------

  listSubscriptions(): Promise<AzureSubscription[]> {
    return this.call("listSubscriptions", () => this.subscriptionManager.listSubscriptions());
  }

  listResourceGroups(subscriptionId: string): Promise<ResourceGroup[]> {
    return this.call("listResourceGroups", () => this.forSubscription(subscriptionId).resources.listResourceGroups());
  }

  // ---------------------------------------------------------------------------
  // Virtual machines
  // ---------------------------------------------------------------------------

  listVirtualMachines(subscriptionId: string, resourceGroup?: string): Promise<VirtualMachine[]> {
    return this.call("listVirtualMachines", () => this.forSubscription(subscriptionId).compute.listVMs(resourceGroup));
  }

  getVirtualMachine(subscriptionId: string, resourceGroup: string, vmName: string): Promise<VirtualMachine> {
    return this.call("getVirtualMachine", async () =>
      required(
        await this.forSubscription(subscriptionId).compute.getVM(resourceGroup, vmName),
        `Virtual machine ${resourceGroup}/${vmName}`,
      ),
    );
  }

  // ---------------------------------------------------------------------------
  // Network
  // ---------------------------------------------------------------------------

  getNetworkInterface(subscriptionId: string, resourceGroup: string, nicName: string): Promise<NetworkInterface> {
    return this.call("getNetworkInterface", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getNetworkInterface(resourceGroup, nicName),
        `Network interface ${resourceGroup}/${nicName}`,
      ),
    );
  }

  getEffectiveRoutes(subscriptionId: string, resourceGroup: string, nicName: string): Promise<RouteEntry[]> {
    return this.call("getEffectiveRoutes", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getEffectiveRoutes(resourceGroup, nicName),
        `Network interface ${resourceGroup}/${nicName}`,
      ),
    );
  }

  getSubnet(subscriptionId: string, resourceGroup: string, vnetName: string, subnetName: string): Promise<Subnet> {
    return this.call("getSubnet", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getSubnet(resourceGroup, vnetName, subnetName),
        `Subnet ${resourceGroup}/${vnetName}/${subnetName}`,
      ),
    );
  }

  getPublicIpAddress(subscriptionId: string, resourceGroup: string, name: string): Promise<PublicIpAddress> {
    return this.call("getPublicIpAddress", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getPublicIpAddress(resourceGroup, name),
        `Public IP address ${resourceGroup}/${name}`,
      ),
    );
  }

  getNetworkSecurityGroup(subscriptionId: string, resourceGroup: string, nsgName: string): Promise<NetworkSecurityGroup> {
    return this.call("getNetworkSecurityGroup", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getNetworkSecurityGroup(resourceGroup, nsgName),
        `Network security group ${resourceGroup}/${nsgName}`,
      ),
    );
  }

  getEffectiveSecurityRules(subscriptionId: string, resourceGroup: string, nicName: string): Promise<SecurityRule[]> {
    return this.call("getEffectiveSecurityRules", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getEffectiveSecurityRules(resourceGroup, nicName),
        `Network interface ${resourceGroup}/${nicName}`,
      ),
    );
  }

  listRouteTables(subscriptionId: string, resourceGroup?: string): Promise<RouteTableSummary[]> {
    return this.call("listRouteTables", () => this.forSubscription(subscriptionId).network.listRouteTables(resourceGroup));
  }

  getRouteTable(subscriptionId: string, resourceGroup: string, routeTableName: string): Promise<RouteTable> {
    return this.call("getRouteTable", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getRouteTable(resourceGroup, routeTableName),
        `Route table ${resourceGroup}/${routeTableName}`,
      ),
    );
  }

  listVirtualNetworks(subscriptionId: string, resourceGroup?: string): Promise<VirtualNetwork[]> {
    return this.call("listVirtualNetworks", () => this.forSubscription(subscriptionId).network.listVNets(resourceGroup));
  }

  getVirtualNetwork(subscriptionId: string, resourceGroup: string, vnetName: string): Promise<VirtualNetwork> {
    return this.call("getVirtualNetwork", async () =>
      required(
        await this.forSubscription(subscriptionId).network.getVNet(resourceGroup, vnetName),
        `Virtual network ${resourceGroup}/${vnetName}`,
      ),
    );
  }
}

export function createArmResourceProvider(options: ArmResourceProviderOptions): ArmResourceProvider {
  return new ArmResourceProvider(options);
}
