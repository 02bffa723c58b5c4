/**
 * Azure Resource Service
 *
 * Cached, rate-limited facade over an AzureResourceProvider. Every upstream
 * attempt is admitted by the shared limiter and transient failures are
 * retried; every read accepts `refresh` to bypass the cache and overwrite the
 * stored entry.
 */

import { CachedFetcher, buildCacheKey, createCacheStore } from "../cache/index.js";
import type { CacheOptions, CacheStats, CacheStore } from "../cache/index.js";
import type { ConcurrencyLimiter } from "../concurrency/limiter.js";
import { getLogger, type Logger } from "../logging/index.js";
import { withAzureRetry } from "../retry.js";
import type { AzureResourceProvider } from "../provider/types.js";
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
import type { AzureRetryOptions, FetchOptions } from "../types.js";

export type AzureResourceServiceOptions = {
  provider: AzureResourceProvider;
  limiter: ConcurrencyLimiter;
  cache?: CacheOptions;
  retry?: AzureRetryOptions;
  logger?: Logger;
};

export type ResourceCacheStats = CacheStats;

type StoreHandle = Pick<CacheStore<unknown>, "invalidatePrefix" | "clear" | "getStats">;

export class AzureResourceService {
  readonly provider: AzureResourceProvider;
  readonly limiter: ConcurrencyLimiter;
  private retry: AzureRetryOptions | undefined;
  private logger: Logger;

  // One fetcher per value type keeps each store strongly typed
  private subscriptions: CachedFetcher<AzureSubscription[]>;
  private resourceGroups: CachedFetcher<ResourceGroup[]>;
  private machines: CachedFetcher<VirtualMachine[]>;
  private machine: CachedFetcher<VirtualMachine>;
  private interfaces: CachedFetcher<NetworkInterface>;
  private routes: CachedFetcher<RouteEntry[]>;
  private securityGroups: CachedFetcher<NetworkSecurityGroup>;
  private securityRules: CachedFetcher<SecurityRule[]>;
  private publicIps: CachedFetcher<PublicIpAddress>;
  private subnets: CachedFetcher<Subnet>;
  private routeTables: CachedFetcher<RouteTableSummary[]>;
  private routeTable: CachedFetcher<RouteTable>;
  private networks: CachedFetcher<VirtualNetwork[]>;
  private network: CachedFetcher<VirtualNetwork>;

  constructor(options: AzureResourceServiceOptions) {
    this.provider = options.provider;
    this.limiter = options.limiter;
    this.retry = options.retry;
    this.logger = options.logger ?? getLogger("resources");

    const cache = options.cache ?? {};
    this.subscriptions = new CachedFetcher(createCacheStore<AzureSubscription[]>(cache));
    this.resourceGroups = new CachedFetcher(createCacheStore<ResourceGroup[]>(cache));
    this.machines = new CachedFetcher(createCacheStore<VirtualMachine[]>(cache));
    this.machine = new CachedFetcher(createCacheStore<VirtualMachine>(cache));
    this.interfaces = new CachedFetcher(createCacheStore<NetworkInterface>(cache));
    this.routes = new CachedFetcher(createCacheStore<RouteEntry[]>(cache));
    this.securityGroups = new CachedFetcher(createCacheStore<NetworkSecurityGroup>(cache));
    this.securityRules = new CachedFetcher(createCacheStore<SecurityRule[]>(cache));
    this.publicIps = new CachedFetcher(createCacheStore<PublicIpAddress>(cache));
    this.subnets = new CachedFetcher(createCacheStore<Subnet>(cache));
    this.routeTables = new CachedFetcher(createCacheStore<RouteTableSummary[]>(cache));
    this.routeTable = new CachedFetcher(createCacheStore<RouteTable>(cache));
    this.networks = new CachedFetcher(createCacheStore<VirtualNetwork[]>(cache));
    this.network = new CachedFetcher(createCacheStore<VirtualNetwork>(cache));
  }

  private limited<T>(operation: string, fn: () => Promise<T>): () => Promise<T> {
    return () => {
      this.logger.debug(`fetching ${operation}`);
      // Permits are taken per attempt, so a call waiting out a backoff does not hold one
      return withAzureRetry(() => this.limiter.run(fn), this.retry);
    };
  }

  // ===========================================================================
  // Subscriptions & Resource Groups
  // ===========================================================================

  listSubscriptions(options: FetchOptions = {}): Promise<AzureSubscription[]> {
    return this.subscriptions.fetch(
      buildCacheKey("subscriptions"),
      this.limited("subscriptions", () => this.provider.listSubscriptions()),
      options,
    );
  }

  listResourceGroups(subscriptionId: string, options: FetchOptions = {}): Promise<ResourceGroup[]> {
    return this.resourceGroups.fetch(
      buildCacheKey(subscriptionId, "resource-groups"),
      this.limited("resource groups", () => this.provider.listResourceGroups(subscriptionId)),
      options,
    );
  }

  // ===========================================================================
  // Virtual Machines
  // ===========================================================================

  listVirtualMachines(subscriptionId: string, resourceGroup?: string, options: FetchOptions = {}): Promise<VirtualMachine[]> {
    return this.machines.fetch(
      buildCacheKey(subscriptionId, "vms", resourceGroup),
      this.limited("virtual machines", () => this.provider.listVirtualMachines(subscriptionId, resourceGroup)),
      options,
    );
  }

  getVirtualMachine(
    subscriptionId: string,
    resourceGroup: string,
    vmName: string,
    options: FetchOptions = {},
  ): Promise<VirtualMachine> {
    return this.machine.fetch(
      buildCacheKey(subscriptionId, "vm", resourceGroup.toLowerCase(), vmName),
      this.limited(`virtual machine ${vmName}`, () => this.provider.getVirtualMachine(subscriptionId, resourceGroup, vmName)),
      options,
    );
  }

  // ===========================================================================
  // Network Interfaces & Routes
  // ===========================================================================

  getNetworkInterface(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options: FetchOptions = {},
  ): Promise<NetworkInterface> {
    return this.interfaces.fetch(
      buildCacheKey(subscriptionId, "nic", resourceGroup.toLowerCase(), nicName),
      this.limited(`network interface ${nicName}`, () =>
        this.provider.getNetworkInterface(subscriptionId, resourceGroup, nicName),
      ),
      options,
    );
  }

  getEffectiveRoutes(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options: FetchOptions = {},
  ): Promise<RouteEntry[]> {
    return this.routes.fetch(
      buildCacheKey(subscriptionId, "effective-routes", resourceGroup.toLowerCase(), nicName),
      this.limited(`effective routes of ${nicName}`, () =>
        this.provider.getEffectiveRoutes(subscriptionId, resourceGroup, nicName),
      ),
      options,
    );
  }

  getSubnet(
    subscriptionId: string,
    resourceGroup: string,
    vnetName: string,
    subnetName: string,
    options: FetchOptions = {},
  ): Promise<Subnet> {
    return this.subnets.fetch(
      buildCacheKey(subscriptionId, "subnet", resourceGroup.toLowerCase(), vnetName, subnetName),
      this.limited(`subnet ${vnetName}/${subnetName}`, () =>
        this.provider.getSubnet(subscriptionId, resourceGroup, vnetName, subnetName),
      ),
      options,
    );
  }

  getPublicIpAddress(
    subscriptionId: string,
    resourceGroup: string,
    name: string,
    options: FetchOptions = {},
  ): Promise<PublicIpAddress> {
    return this.publicIps.fetch(
      buildCacheKey(subscriptionId, "public-ip", resourceGroup.toLowerCase(), name),
      this.limited(`public IP ${name}`, () => this.provider.getPublicIpAddress(subscriptionId, resourceGroup, name)),
      options,
    );
  }

  // ===========================================================================
  // Security Groups
  // ===========================================================================

  getNetworkSecurityGroup(
    subscriptionId: string,
    resourceGroup: string,
    nsgName: string,
    options: FetchOptions = {},
  ): Promise<NetworkSecurityGroup> {
    return this.securityGroups.fetch(
      buildCacheKey(subscriptionId, "nsg", resourceGroup.toLowerCase(), nsgName),
      this.limited(`network security group ${nsgName}`, () =>
        this.provider.getNetworkSecurityGroup(subscriptionId, resourceGroup, nsgName),
      ),
      options,
    );
  }

  getEffectiveSecurityRules(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options: FetchOptions = {},
  ): Promise<SecurityRule[]> {
    return this.securityRules.fetch(
      buildCacheKey(subscriptionId, "effective-security-rules", resourceGroup.toLowerCase(), nicName),
      this.limited(`effective security rules of ${nicName}`, () =>
        this.provider.getEffectiveSecurityRules(subscriptionId, resourceGroup, nicName),
      ),
      options,
    );
  }

  // ===========================================================================
  // Route Tables
  // ===========================================================================

  listRouteTables(subscriptionId: string, resourceGroup?: string, options: FetchOptions = {}): Promise<RouteTableSummary[]> {
    return this.routeTables.fetch(
      buildCacheKey(subscriptionId, "route-tables", resourceGroup),
      this.limited("route tables", () => this.provider.listRouteTables(subscriptionId, resourceGroup)),
      options,
    );
  }

  getRouteTable(
    subscriptionId: string,
    resourceGroup: string,
    routeTableName: string,
    options: FetchOptions = {},
  ): Promise<RouteTable> {
    return this.routeTable.fetch(
      buildCacheKey(subscriptionId, "route-table", resourceGroup.toLowerCase(), routeTableName),
      this.limited(`route table ${routeTableName}`, () =>
        this.provider.getRouteTable(subscriptionId, resourceGroup, routeTableName),
      ),
      options,
    );
  }

  // ===========================================================================
  // Virtual Networks
  // ===========================================================================

  listVirtualNetworks(subscriptionId: string, resourceGroup?: string, options: FetchOptions = {}): Promise<VirtualNetwork[]> {
    return this.networks.fetch(
      buildCacheKey(subscriptionId, "vnets", resourceGroup),
      this.limited("virtual networks", () => this.provider.listVirtualNetworks(subscriptionId, resourceGroup)),
      options,
    );
  }

  getVirtualNetwork(
    subscriptionId: string,
    resourceGroup: string,
    vnetName: string,
    options: FetchOptions = {},
  ): Promise<VirtualNetwork> {
    return this.network.fetch(
      buildCacheKey(subscriptionId, "vnet", resourceGroup.toLowerCase(), vnetName),
      this.limited(`virtual network ${vnetName}`, () =>
        this.provider.getVirtualNetwork(subscriptionId, resourceGroup, vnetName),
      ),
      options,
    );
  }

  // ===========================================================================
  // Cache Management
  // ===========================================================================

  private stores(): StoreHandle[] {
    return [
      this.subscriptions,
      this.resourceGroups,
      this.machines,
      this.machine,
      this.interfaces,
      this.routes,
      this.securityGroups,
      this.securityRules,
      this.publicIps,
      this.subnets,
      this.routeTables,
      this.routeTable,
      this.networks,
      this.network,
    ].map((fetcher) => fetcher.store);
  }

  /**
   * Drop cached entries, either everything or one subscription's.
   */
  async clearCache(subscriptionId?: string): Promise<number> {
    let removed = 0;
    for (const store of this.stores()) {
      if (subscriptionId) {
        removed += await store.invalidatePrefix(`${subscriptionId}:`);
      } else {
        removed += store.getStats().size;
        await store.clear();
      }
    }
    this.logger.info("cache cleared", { subscriptionId, removed });
    return removed;
  }

  getCacheStats(): ResourceCacheStats {
    const all = this.stores().map((store) => store.getStats());
    return {
      backend: all[0]?.backend ?? "none",
      size: all.reduce((sum, s) => sum + s.size, 0),
      hits: all.reduce((sum, s) => sum + s.hits, 0),
      misses: all.reduce((sum, s) => sum + s.misses, 0),
    };
  }
}

export function createResourceService(options: AzureResourceServiceOptions): AzureResourceService {
  return new AzureResourceService(options);
}
