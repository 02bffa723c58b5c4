/**
 * Reachability Analyzer
 *
 * Breadth-first search over the reachability graph: the first path found is
 * a shortest one in hops.
 */

import { getLogger, type Logger } from "../logging/index.js";
import { outgoingEdges } from "./graph.js";
import type {
  ConnectivityReport,
  GraphEdge,
  PathResult,
  ReachabilityGraph,
  ReachabilityResult,
} from "./types.js";

export type AnalyzerOptions = {
  logger?: Logger;
};

export function findPath(graph: ReachabilityGraph, source: string, destination: string): PathResult {
  const missing = [source, destination].filter((name, i, all) => !graph.nodes.has(name) && all.indexOf(name) === i);
  if (missing.length > 0) {
    return { status: "unknown-node", missing, path: [], edges: [] };
  }

  if (source === destination) {
    return { status: "found", path: [source], edges: [] };
  }

  // BFS with parent tracking
  const visited = new Set<string>([source]);
  const parent = new Map<string, GraphEdge>();
  const queue: string[] = [source];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;

    for (const edge of outgoingEdges(graph, current)) {
      if (visited.has(edge.to)) continue;
      visited.add(edge.to);
      parent.set(edge.to, edge);

      if (edge.to === destination) {
        return { status: "found", ...reconstruct(parent, source, destination) };
      }
      queue.push(edge.to);
    }
  }

  return { status: "no-path", path: [], edges: [] };
}

function reconstruct(
  parent: Map<string, GraphEdge>,
  source: string,
  destination: string,
): { path: string[]; edges: GraphEdge[] } {
  const path: string[] = [destination];
  const edges: GraphEdge[] = [];
  let current = destination;

  while (current !== source) {
    const edge = parent.get(current);
    if (!edge) break;
    edges.unshift(edge);
    path.unshift(edge.from);
    current = edge.from;
  }

  return { path, edges };
}

/**
 * Unknown machines and missing paths both answer "not reachable"; only the
 * log line tells them apart.
 */
export function isReachable(
  graph: ReachabilityGraph,
  source: string,
  destination: string,
  options: AnalyzerOptions = {},
): ReachabilityResult {
  const logger = options.logger ?? getLogger("topology");
  const result = findPath(graph, source, destination);

  switch (result.status) {
    case "found":
      logger.info(`${source} reaches ${destination} in ${result.path.length - 1} hop(s)`, {
        via: result.edges.map((e) => e.prefix),
      });
      return { reachable: true, path: result.path };
    case "unknown-node":
      logger.error(`machine not found in graph: ${result.missing.join(", ")}`);
      return { reachable: false, path: [] };
    case "no-path":
      logger.info(`no path from ${source} to ${destination}`);
      return { reachable: false, path: [] };
  }
}

export function describePath(
  graph: ReachabilityGraph,
  query: { source: string; destination: string } & ReachabilityResult,
): ConnectivityReport {
  return {
    source: query.source,
    destination: query.destination,
    reachable: query.reachable,
    path: query.path.map((node, index) => ({
      hop: index + 1,
      node,
      ips: [...(graph.nodes.get(node)?.ips ?? [])],
    })),
  };
}

export function checkConnectivity(
  graph: ReachabilityGraph,
  source: string,
  destination: string,
  options: AnalyzerOptions = {},
): ConnectivityReport {
  return describePath(graph, { source, destination, ...isReachable(graph, source, destination, options) });
}
