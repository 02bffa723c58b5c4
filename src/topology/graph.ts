/**
 * Reachability Graph Builder
 *
 * Machines and one synthetic gateway become nodes; routes become directed
 * edges:
 *   machine --(VirtualNetworkGateway route)--> gateway
 *   gateway --(gateway route containing the machine IP)--> machine
 *   machine --(VnetLocal route containing the other IP)--> other machine
 *
 * Only the primary interface represents a machine: its addresses identify
 * the node and its routes give the outgoing edges.
 */

import { ParseError, describeError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { cidrContains, parseCidr, type CidrBlock } from "../network/cidr.js";
import type { MachineRouteSet } from "../routes/types.js";
import type { GatewayRoute, GraphEdge, GraphNode, ReachabilityGraph } from "./types.js";

export const GATEWAY_NODE = "VirtualNetworkGateway";

export type BuildGraphOptions = {
  logger?: Logger;
};

// =============================================================================
// Graph Primitives
// =============================================================================

export function createGraph(): ReachabilityGraph {
  return { nodes: new Map(), edges: new Map() };
}

export function addNode(graph: ReachabilityGraph, node: GraphNode): void {
  graph.nodes.set(node.name, node);
  if (!graph.edges.has(node.name)) graph.edges.set(node.name, []);
}

/**
 * Add an edge unless the same (from, to, prefix) is already present.
 * Returns whether the edge was new.
 */
export function addEdge(graph: ReachabilityGraph, edge: GraphEdge): boolean {
  let outgoing = graph.edges.get(edge.from);
  if (!outgoing) {
    outgoing = [];
    graph.edges.set(edge.from, outgoing);
  }
  if (outgoing.some((e) => e.to === edge.to && e.prefix === edge.prefix)) return false;
  outgoing.push(edge);
  return true;
}

export function outgoingEdges(graph: ReachabilityGraph, name: string): GraphEdge[] {
  return graph.edges.get(name) ?? [];
}

export function edgeCount(graph: ReachabilityGraph): number {
  let count = 0;
  for (const edges of graph.edges.values()) count += edges.length;
  return count;
}

// =============================================================================
// Builder
// =============================================================================

function primaryIps(set: MachineRouteSet): string[] {
  return [...(set.interfaces[0]?.privateIpAddresses ?? [])];
}

function primaryRoutes(set: MachineRouteSet) {
  return set.interfaces[0]?.routes ?? [];
}

function anyIpIn(block: CidrBlock, ips: readonly string[]): boolean {
  return ips.some((ip) => cidrContains(block, ip));
}

export function buildReachabilityGraph(
  machines: readonly MachineRouteSet[],
  gatewayIp: string,
  gatewayRoutes: readonly GatewayRoute[],
  options: BuildGraphOptions = {},
): ReachabilityGraph {
  const logger = options.logger ?? getLogger("topology");
  const graph = createGraph();

  // Malformed prefixes are reported once and skipped
  const parsed = new Map<string, CidrBlock | null>();
  const block = (prefix: string, owner: string): CidrBlock | null => {
    if (!parsed.has(prefix)) {
      try {
        parsed.set(prefix, parseCidr(prefix));
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        logger.warn(`skipping route ${prefix} of ${owner}: ${describeError(error)}`);
        parsed.set(prefix, null);
      }
    }
    return parsed.get(prefix) ?? null;
  };

  for (const machine of machines) {
    addNode(graph, { name: machine.name, kind: "machine", ips: primaryIps(machine) });
  }
  addNode(graph, { name: GATEWAY_NODE, kind: "gateway", ips: [gatewayIp] });

  for (const machine of machines) {
    for (const route of primaryRoutes(machine)) {
      if (route.nextHopType === "VirtualNetworkGateway") {
        addEdge(graph, { from: machine.name, to: GATEWAY_NODE, prefix: route.addressPrefix });
      }
    }
  }

  for (const route of gatewayRoutes) {
    const target = block(route.addressPrefix, GATEWAY_NODE);
    if (!target) continue;
    for (const machine of machines) {
      if (anyIpIn(target, primaryIps(machine))) {
        addEdge(graph, { from: GATEWAY_NODE, to: machine.name, prefix: route.addressPrefix });
      }
    }
  }

  for (const machine of machines) {
    for (const route of primaryRoutes(machine)) {
      if (route.nextHopType !== "VnetLocal") continue;
      const target = block(route.addressPrefix, machine.name);
      if (!target) continue;
      for (const other of machines) {
        if (other.name === machine.name) continue;
        if (anyIpIn(target, primaryIps(other))) {
          addEdge(graph, { from: machine.name, to: other.name, prefix: route.addressPrefix });
        }
      }
    }
  }

  logger.debug("built reachability graph", { nodes: graph.nodes.size, edges: edgeCount(graph) });
  return graph;
}
