/**
 * Network Topology: HTTP API Server
 *
 * Read-only REST facade over the cached resource service, the topology
 * service, the VM inventory and the peering reconciler. Uses Node's built-in http module.
 *
 * Endpoints:
 *   GET /health
 *   GET /api/subscriptions[/:sub/resource-groups | /:sub/virtual-machines | /:sub/routetables]
 *   GET /api/subscriptions/hostnames?subscription-id=
 *   GET /api/subscriptions/virtual_machines[/:vm]
 *   GET /api/reports/virtual-machines
 *   GET /api/subscriptions/:sub/resource-groups/:rg/virtual-machines/:vm
 *   GET /api/subscriptions/:sub/resourcegroups/:rg/routetables/:name
 *   GET /api/subscriptions/:sub/resourcegroups/:rg/virtualmachines/:vm/routes
 *   GET /api/subscriptions/:sub/resourcegroups/:rg/networkinterfaces/:nic/routes
 *   GET /api/virtual-networks/subscriptions/:sub[/resource-groups/:rg/:vnet]
 *   GET /api/vnet-peering-report/subscriptions/:sub
 *   GET /api/connectivity/subscriptions/:sub?source=&destination=
 *
 * Every endpoint accepts `refresh-cache=true`; listings accept `resource_group`.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { timingSafeEqual } from "node:crypto";
import { describeError, isProviderError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import type { VirtualMachineInventory } from "../inventory/service.js";
import type { PeeringReconciler } from "../peering/reconciler.js";
import type { AzureResourceService } from "../service/resource-service.js";
import type { NetworkTopologyService } from "../topology/service.js";
import type { GatewayRoute } from "../topology/types.js";
import type { FetchOptions } from "../types.js";
import { VERSION } from "../version.js";

// =============================================================================
// Types
// =============================================================================

export type ApiServerOptions = {
  port: number;
  host: string;
  resources: AzureResourceService;
  topology: NetworkTopologyService;
  peering: PeeringReconciler;
  inventory: VirtualMachineInventory;
  apiKey?: string;
  /** Allowed CORS origin (default: "*"). */
  corsOrigin?: string;
  /** Gateway routes used by connectivity queries (default: built-in routes). */
  gatewayRoutes?: readonly GatewayRoute[];
  logger?: Logger;
};

export type ApiServerHandle = {
  server: Server;
  close: () => Promise<void>;
};

type RouteHandler = (
  res: ServerResponse,
  params: Record<string, string>,
  query: URLSearchParams,
) => Promise<void>;

type RouteDefinition = { method: string; pattern: RegExp; handler: RouteHandler };

// =============================================================================
// Helpers
// =============================================================================

function securityHeaders(corsOrigin: string): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": corsOrigin,
    "Access-Control-Allow-Methods": "GET, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type, Authorization, X-API-Key",
    "X-Content-Type-Options": "nosniff",
    "X-Frame-Options": "DENY",
    "Cache-Control": "no-store",
  };
}

function json(res: ServerResponse, data: unknown, status = 200, corsOrigin = "*"): void {
  res.writeHead(status, {
    "Content-Type": "application/json",
    ...securityHeaders(corsOrigin),
  });
  res.end(JSON.stringify(data));
}

function error(res: ServerResponse, message: string, status = 400, corsOrigin = "*"): void {
  json(res, { error: message }, status, corsOrigin);
}

function matchRoute(
  method: string,
  url: string,
  routes: RouteDefinition[],
): { handler: RouteHandler; params: Record<string, string> } | null {
  for (const route of routes) {
    if (route.method !== method) continue;
    const match = url.match(route.pattern);
    if (match) {
      const params: Record<string, string> = {};
      for (const [key, value] of Object.entries(match.groups ?? {})) {
        params[key] = decodeURIComponent(value);
      }
      return { handler: route.handler, params };
    }
  }
  return null;
}

function fetchOptions(query: URLSearchParams): FetchOptions {
  return { refresh: query.get("refresh-cache") === "true" };
}

function resourceGroupParam(query: URLSearchParams): string | undefined {
  return query.get("resource_group") || undefined;
}

// =============================================================================
// Server
// =============================================================================

export async function startApiServer(opts: ApiServerOptions): Promise<ApiServerHandle> {
  const logger = opts.logger ?? getLogger("api");
  const corsOrigin = opts.corsOrigin ?? "*";
  const { resources, topology, peering, inventory } = opts;

  if (!Number.isFinite(opts.port) || opts.port < 0 || opts.port > 65535) {
    throw new Error(`Invalid port: ${opts.port}. Must be 0-65535.`);
  }

  // Timing-safe API key check
  const authenticate = (req: IncomingMessage): boolean => {
    if (!opts.apiKey) return true;
    const key = req.headers["x-api-key"] ?? req.headers.authorization?.replace("Bearer ", "");
    if (typeof key !== "string" || key.length === 0) return false;
    const expected = Buffer.from(opts.apiKey, "utf-8");
    const received = Buffer.from(key, "utf-8");
    if (expected.length !== received.length) return false;
    return timingSafeEqual(expected, received);
  };

  // ─── Route Definitions ─────────────────────────────────────────

  const routes: RouteDefinition[] = [];

  const route = (method: string, pattern: string, handler: RouteHandler) => {
    const re = new RegExp("^" + pattern.replace(/:(\w+)/g, "(?<$1>[^/]+)") + "$");
    routes.push({ method, pattern: re, handler });
  };

  route("GET", "/health", async (res) => {
    json(res, { status: "ok", version: VERSION, cache: resources.getCacheStats() }, 200, corsOrigin);
  });

  // ─── Cross-subscription VM views ───────────────────────────────
  // Registered ahead of the /:sub routes so the literal segments win.

  route("GET", "/api/subscriptions/hostnames", async (res, _params, query) => {
    const hostnames = await inventory.listHostnames(query.get("subscription-id") || undefined, fetchOptions(query));
    json(res, hostnames, 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/virtual_machines", async (res, _params, query) => {
    json(res, await inventory.listAllVirtualMachines(fetchOptions(query)), 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/virtual_machines/:vm", async (res, params, query) => {
    json(res, await inventory.findVirtualMachine(params.vm, fetchOptions(query)), 200, corsOrigin);
  });

  route("GET", "/api/reports/virtual-machines", async (res, _params, query) => {
    json(res, await inventory.buildReport(fetchOptions(query)), 200, corsOrigin);
  });

  // ─── Subscriptions & resource groups ───────────────────────────

  route("GET", "/api/subscriptions", async (res, _params, query) => {
    json(res, await resources.listSubscriptions(fetchOptions(query)), 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/:sub/resource-groups", async (res, params, query) => {
    json(res, await resources.listResourceGroups(params.sub, fetchOptions(query)), 200, corsOrigin);
  });

  // ─── Virtual machines ──────────────────────────────────────────

  route("GET", "/api/subscriptions/:sub/virtual-machines", async (res, params, query) => {
    const vms = await resources.listVirtualMachines(params.sub, resourceGroupParam(query), fetchOptions(query));
    json(res, vms, 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/:sub/resource-groups/:rg/virtual-machines/:vm", async (res, params, query) => {
    const detail = await inventory.getVirtualMachineDetail(params.sub, params.rg, params.vm, fetchOptions(query));
    json(res, detail, 200, corsOrigin);
  });

  // ─── Routes ────────────────────────────────────────────────────

  route("GET", "/api/subscriptions/:sub/routetables", async (res, params, query) => {
    const tables = await resources.listRouteTables(params.sub, resourceGroupParam(query), fetchOptions(query));
    json(res, tables, 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/:sub/resourcegroups/:rg/routetables/:name", async (res, params, query) => {
    json(res, await resources.getRouteTable(params.sub, params.rg, params.name, fetchOptions(query)), 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/:sub/resourcegroups/:rg/virtualmachines/:vm/routes", async (res, params, query) => {
    const entries = await topology.getVirtualMachineRoutes(params.sub, params.rg, params.vm, fetchOptions(query));
    json(res, entries, 200, corsOrigin);
  });

  route("GET", "/api/subscriptions/:sub/resourcegroups/:rg/networkinterfaces/:nic/routes", async (res, params, query) => {
    const entries = await topology.getInterfaceRoutes(params.sub, params.rg, params.nic, fetchOptions(query));
    json(res, entries, 200, corsOrigin);
  });

  // ─── Virtual networks & peering ────────────────────────────────

  route("GET", "/api/virtual-networks/subscriptions/:sub", async (res, params, query) => {
    const vnets = await resources.listVirtualNetworks(params.sub, resourceGroupParam(query), fetchOptions(query));
    json(res, vnets, 200, corsOrigin);
  });

  route("GET", "/api/virtual-networks/subscriptions/:sub/resource-groups/:rg/:vnet", async (res, params, query) => {
    json(res, await resources.getVirtualNetwork(params.sub, params.rg, params.vnet, fetchOptions(query)), 200, corsOrigin);
  });

  route("GET", "/api/vnet-peering-report/subscriptions/:sub", async (res, params, query) => {
    const report = await peering.report(params.sub, resourceGroupParam(query), fetchOptions(query));
    json(res, report, 200, corsOrigin);
  });

  // ─── Connectivity ──────────────────────────────────────────────

  route("GET", "/api/connectivity/subscriptions/:sub", async (res, params, query) => {
    const source = query.get("source");
    const destination = query.get("destination");
    if (!source || !destination) {
      error(res, "Query parameters 'source' and 'destination' are required", 400, corsOrigin);
      return;
    }

    const report = await topology.checkConnectivity({
      subscriptionId: params.sub,
      resourceGroup: resourceGroupParam(query),
      source,
      destination,
      gatewayIp: query.get("gateway_ip") || undefined,
      gatewayRoutes: opts.gatewayRoutes,
      ...fetchOptions(query),
    });
    json(res, report, 200, corsOrigin);
  });

  // ─── Start Server ──────────────────────────────────────────────

  const server = createServer(async (req, res) => {
    if (req.method === "OPTIONS") {
      res.writeHead(204, securityHeaders(corsOrigin));
      res.end();
      return;
    }

    if (!authenticate(req)) {
      error(res, "Unauthorized", 401, corsOrigin);
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const matched = matchRoute(method, url.pathname, routes);

    if (!matched) {
      error(res, `Not found: ${method} ${url.pathname}`, 404, corsOrigin);
      return;
    }

    try {
      await matched.handler(res, matched.params, url.searchParams);
    } catch (err) {
      if (isProviderError(err, "NotFound")) {
        error(res, err.message, 404, corsOrigin);
        return;
      }
      if (isProviderError(err, "Unauthorized")) {
        logger.error(`Azure rejected credentials for ${method} ${url.pathname}: ${err.message}`);
        error(res, "Azure authorization failed", 401, corsOrigin);
        return;
      }
      logger.error(`error handling ${method} ${url.pathname}: ${describeError(err)}`);
      // Internal details stay in the log
      error(res, "Internal server error", 500, corsOrigin);
    }
  });

  server.headersTimeout = 60_000;
  server.requestTimeout = 60_000;

  const shutdown = () => {
    close().then(() => process.exit(0)).catch(() => process.exit(1));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      logger.info("shutting down");
      process.removeListener("SIGINT", shutdown);
      process.removeListener("SIGTERM", shutdown);
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return new Promise<ApiServerHandle>((resolve, reject) => {
    server.on("error", reject);
    server.listen(opts.port, opts.host, () => {
      logger.info(`API server listening on http://${opts.host}:${opts.port}`);
      logger.info(`auth: ${opts.apiKey ? "API key required" : "open (no auth)"}`);
      resolve({ server, close });
    });
  });
}
