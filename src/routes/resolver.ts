/**
 * Route Resolver
 *
 * Turns a machine's interfaces into a MachineRouteSet: per-interface routes
 * from the RouteSource plus one merged, deduplicated list.
 */

import { getLogger, type Logger } from "../logging/index.js";
import type { RouteEntry } from "../network/types.js";
import type { FetchOptions } from "../types.js";
import type { RouteSource } from "./source.js";
import type { InterfaceRoutes, MachineNetworkProfile, MachineRouteSet } from "./types.js";

export function routeKey(route: RouteEntry): string {
  return `${route.addressPrefix}|${route.nextHopType}|${route.nextHopIp ?? ""}`;
}

/**
 * Concatenate route lists, dropping later duplicates of
 * (addressPrefix, nextHopType, nextHopIp).
 */
export function mergeRoutes(...sets: ReadonlyArray<readonly RouteEntry[]>): RouteEntry[] {
  const seen = new Set<string>();
  const merged: RouteEntry[] = [];
  for (const routes of sets) {
    for (const route of routes) {
      const key = routeKey(route);
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(route);
    }
  }
  return merged;
}

export type RouteResolverOptions = {
  source: RouteSource;
  logger?: Logger;
};

export class RouteResolver {
  private source: RouteSource;
  private logger: Logger;

  constructor(options: RouteResolverOptions) {
    this.source = options.source;
    this.logger = options.logger ?? getLogger("routes");
  }

  /**
   * Interfaces are resolved concurrently; the resource service behind the
   * RouteSource admits each upstream call through the shared limiter.
   */
  async resolve(machine: MachineNetworkProfile, options: FetchOptions = {}): Promise<MachineRouteSet> {
    const interfaces: InterfaceRoutes[] = await Promise.all(
      machine.interfaces.map(async (nic) => {
        const { routes, source } = await this.source.routesFor(machine.subscriptionId, nic, options);
        return { name: nic.name, privateIpAddresses: [...nic.privateIpAddresses], routes, source };
      }),
    );

    const routes = mergeRoutes(...interfaces.map((nic) => nic.routes));
    this.logger.debug(`resolved ${routes.length} routes for ${machine.name}`, { interfaces: interfaces.length });

    return { name: machine.name, interfaces, routes };
  }
}
