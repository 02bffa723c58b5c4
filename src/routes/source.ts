/**
 * Route Source
 *
 * Ordered fallback strategies for a NIC's routes. The first strategy that
 * returns a non-empty list wins; the static defaults always succeed, so a
 * NIC never ends up without routes.
 */

import { isProviderError, describeError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { tryParseResourceId } from "../network/resource-id.js";
import type { NetworkInterface, RouteEntry } from "../network/types.js";
import type { FetchOptions } from "../types.js";
import type { ResolvedRoutes, RouteDataSource, RouteLookup, RouteStrategy } from "./types.js";

export const DEFAULT_ROUTES: readonly RouteEntry[] = [
  { addressPrefix: "0.0.0.0/0", nextHopType: "Internet", origin: "Default" },
  { addressPrefix: "10.0.0.0/8", nextHopType: "VnetLocal", origin: "Default" },
  { addressPrefix: "172.16.0.0/12", nextHopType: "VnetLocal", origin: "Default" },
  { addressPrefix: "192.168.0.0/16", nextHopType: "VnetLocal", origin: "Default" },
];

// =============================================================================
// Strategies
// =============================================================================

export class EffectiveRouteTableStrategy implements RouteStrategy {
  readonly name = "effective-route-table";

  constructor(private readonly dataSource: RouteDataSource) {}

  resolve({ subscriptionId, nic, options }: RouteLookup): Promise<RouteEntry[]> {
    return this.dataSource.getEffectiveRoutes(subscriptionId, nic.resourceGroup, nic.name, options);
  }
}

/**
 * Reads the user route tables attached to the NIC's subnets. Only
 * user-defined routes are visible this way, hence origin "User".
 */
export class SubnetRouteTableStrategy implements RouteStrategy {
  readonly name = "subnet-route-table";

  constructor(private readonly dataSource: RouteDataSource) {}

  async resolve({ nic, options }: RouteLookup): Promise<RouteEntry[]> {
    const routes: RouteEntry[] = [];

    for (const subnetId of nic.subnetIds) {
      const parsed = tryParseResourceId(subnetId);
      if (!parsed?.childName) continue;

      const subnet = await this.dataSource.getSubnet(
        parsed.subscriptionId,
        parsed.resourceGroup,
        parsed.name,
        parsed.childName,
        options,
      );
      if (!subnet.routeTableId) continue;

      const tableId = tryParseResourceId(subnet.routeTableId);
      if (!tableId) continue;

      const table = await this.dataSource.getRouteTable(tableId.subscriptionId, tableId.resourceGroup, tableId.name, options);
      for (const route of table.routes) {
        routes.push({
          addressPrefix: route.addressPrefix,
          nextHopType: route.nextHopType,
          nextHopIp: route.nextHopIpAddress,
          origin: "User",
        });
      }
    }

    return routes;
  }
}

export class DefaultRoutesStrategy implements RouteStrategy {
  readonly name = "default-routes";

  async resolve(): Promise<RouteEntry[]> {
    return DEFAULT_ROUTES.map((route) => ({ ...route }));
  }
}

// =============================================================================
// Route Source
// =============================================================================

export type RouteSourceOptions = {
  dataSource: RouteDataSource;
  logger?: Logger;
  /** Override the strategy chain; the static defaults are appended if missing. */
  strategies?: RouteStrategy[];
};

export class RouteSource {
  private strategies: RouteStrategy[];
  private logger: Logger;

  constructor(options: RouteSourceOptions) {
    this.logger = options.logger ?? getLogger("routes");
    const strategies = options.strategies ?? [
      new EffectiveRouteTableStrategy(options.dataSource),
      new SubnetRouteTableStrategy(options.dataSource),
    ];
    this.strategies = strategies.some((s) => s.name === "default-routes")
      ? strategies
      : [...strategies, new DefaultRoutesStrategy()];
  }

  /**
   * Resolve routes for one NIC. Unauthorized aborts; any other failure moves
   * on to the next strategy.
   */
  async routesFor(subscriptionId: string, nic: NetworkInterface, options: FetchOptions = {}): Promise<ResolvedRoutes> {
    for (const strategy of this.strategies) {
      try {
        const routes = await strategy.resolve({ subscriptionId, nic, options });
        if (routes.length > 0) {
          this.logger.debug(`routes for ${nic.name} from ${strategy.name}`, { count: routes.length });
          return { routes, source: strategy.name };
        }
      } catch (error) {
        if (isProviderError(error, "Unauthorized")) throw error;
        this.logger.warn(`${strategy.name} failed for ${nic.name}: ${describeError(error)}`);
      }
    }

    // Only reachable when a custom default strategy came back empty
    return { routes: [], source: "default-routes" };
  }
}
