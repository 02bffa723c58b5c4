/**
 * Network Topology Service
 *
 * Builds machine route sets live from a subscription and answers
 * connectivity queries and per-machine route reads on top of them.
 */

import { DEFAULT_GATEWAY_IP } from "../config.js";
import { describeError, isProviderError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { resourceGroupFromId, resourceNameFromId } from "../network/resource-id.js";
import type { NetworkInterface, RouteEntry } from "../network/types.js";
import { RouteResolver } from "../routes/resolver.js";
import { RouteSource } from "../routes/source.js";
import type { MachineNetworkProfile, MachineRouteSet } from "../routes/types.js";
import type { AzureResourceService } from "../service/resource-service.js";
import type { FetchOptions } from "../types.js";
import type { VirtualMachine } from "../vms/types.js";
import { checkConnectivity } from "./analyzer.js";
import { buildReachabilityGraph } from "./graph.js";
import { DEFAULT_GATEWAY_ROUTES, writeMachineDocuments } from "./loader.js";
import type { ConnectivityReport, GatewayRoute } from "./types.js";

export type NetworkTopologyServiceOptions = {
  resources: AzureResourceService;
  resolver?: RouteResolver;
  gatewayIp?: string;
  logger?: Logger;
};

export type ConnectivityQuery = {
  subscriptionId: string;
  resourceGroup?: string;
  source: string;
  destination: string;
  gatewayIp?: string;
  gatewayRoutes?: readonly GatewayRoute[];
} & FetchOptions;

export class NetworkTopologyService {
  private resources: AzureResourceService;
  private resolver: RouteResolver;
  private gatewayIp: string;
  private logger: Logger;

  constructor(options: NetworkTopologyServiceOptions) {
    this.resources = options.resources;
    this.logger = options.logger ?? getLogger("topology");
    this.resolver =
      options.resolver ??
      new RouteResolver({
        source: new RouteSource({ dataSource: options.resources, logger: this.logger.child("routes") }),
        logger: this.logger.child("routes"),
      });
    this.gatewayIp = options.gatewayIp ?? DEFAULT_GATEWAY_IP;
  }

  // ===========================================================================
  // Machines
  // ===========================================================================

  /**
   * Fetch the interfaces referenced by a VM. An interface that cannot be read
   * is skipped; Unauthorized propagates.
   */
  async getMachineInterfaces(
    subscriptionId: string,
    vm: VirtualMachine,
    options: FetchOptions = {},
  ): Promise<NetworkInterface[]> {
    const interfaces = await Promise.all(
      vm.networkInterfaceIds.map(async (nicId) => {
        const resourceGroup = resourceGroupFromId(nicId) || vm.resourceGroup;
        const nicName = resourceNameFromId(nicId);
        try {
          return await this.resources.getNetworkInterface(subscriptionId, resourceGroup, nicName, options);
        } catch (error) {
          if (isProviderError(error, "Unauthorized")) throw error;
          this.logger.warn(`skipping interface ${nicName} of ${vm.name}: ${describeError(error)}`);
          return null;
        }
      }),
    );
    return interfaces.filter((nic): nic is NetworkInterface => nic !== null);
  }

  async getMachineProfile(
    subscriptionId: string,
    vm: VirtualMachine,
    options: FetchOptions = {},
  ): Promise<MachineNetworkProfile> {
    return {
      name: vm.name,
      subscriptionId,
      interfaces: await this.getMachineInterfaces(subscriptionId, vm, options),
    };
  }

  /** Route set of one machine, from the same resolver the graph is built with. */
  resolveRoutes(profile: MachineNetworkProfile, options: FetchOptions = {}): Promise<MachineRouteSet> {
    return this.resolver.resolve(profile, options);
  }

  /**
   * Merged, deduplicated routes over every interface of a VM.
   */
  async getVirtualMachineRoutes(
    subscriptionId: string,
    resourceGroup: string,
    vmName: string,
    options: FetchOptions = {},
  ): Promise<RouteEntry[]> {
    const vm = await this.resources.getVirtualMachine(subscriptionId, resourceGroup, vmName, options);
    const routeSet = await this.resolver.resolve(await this.getMachineProfile(subscriptionId, vm, options), options);
    return routeSet.routes;
  }

  /** Effective routes of one NIC as Azure reports them, without fallback. */
  getInterfaceRoutes(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options: FetchOptions = {},
  ): Promise<RouteEntry[]> {
    return this.resources.getEffectiveRoutes(subscriptionId, resourceGroup, nicName, options);
  }

  /**
   * Route sets for every VM in scope. Listing failures propagate; a machine
   * that fails on its own is logged and left out.
   */
  async collectMachineRouteSets(
    subscriptionId: string,
    resourceGroup?: string,
    options: FetchOptions = {},
  ): Promise<MachineRouteSet[]> {
    const vms = await this.resources.listVirtualMachines(subscriptionId, resourceGroup, options);

    const sets = await Promise.all(
      vms.map(async (vm) => {
        try {
          return await this.resolver.resolve(await this.getMachineProfile(subscriptionId, vm, options), options);
        } catch (error) {
          if (isProviderError(error, "Unauthorized")) throw error;
          this.logger.warn(`skipping machine ${vm.name}: ${describeError(error)}`);
          return null;
        }
      }),
    );

    const machines = sets.filter((set): set is MachineRouteSet => set !== null);
    this.logger.info(`collected routes for ${machines.length} of ${vms.length} machine(s)`, {
      subscriptionId,
      resourceGroup,
    });
    return machines;
  }

  // ===========================================================================
  // Connectivity
  // ===========================================================================

  async checkConnectivity(query: ConnectivityQuery): Promise<ConnectivityReport> {
    const machines = await this.collectMachineRouteSets(query.subscriptionId, query.resourceGroup, {
      refresh: query.refresh,
    });
    return connectivityFromMachines(machines, query.source, query.destination, {
      gatewayIp: query.gatewayIp ?? this.gatewayIp,
      gatewayRoutes: query.gatewayRoutes,
      logger: this.logger,
    });
  }

  // ===========================================================================
  // Export
  // ===========================================================================

  async exportMachines(
    subscriptionId: string,
    directory: string,
    resourceGroup?: string,
    options: FetchOptions = {},
  ): Promise<string[]> {
    const machines = await this.collectMachineRouteSets(subscriptionId, resourceGroup, options);
    return writeMachineDocuments(directory, machines, { logger: this.logger });
  }
}

/**
 * Build a graph from already-resolved machines and answer one query.
 */
export function connectivityFromMachines(
  machines: readonly MachineRouteSet[],
  source: string,
  destination: string,
  options: { gatewayIp?: string; gatewayRoutes?: readonly GatewayRoute[]; logger?: Logger } = {},
): ConnectivityReport {
  const graph = buildReachabilityGraph(
    machines,
    options.gatewayIp ?? DEFAULT_GATEWAY_IP,
    options.gatewayRoutes ?? DEFAULT_GATEWAY_ROUTES,
    { logger: options.logger },
  );
  return checkConnectivity(graph, source, destination, { logger: options.logger });
}

export function createTopologyService(options: NetworkTopologyServiceOptions): NetworkTopologyService {
  return new NetworkTopologyService(options);
}
