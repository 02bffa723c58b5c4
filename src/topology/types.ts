/**
 * Reachability graph types.
 */

export type GraphNodeKind = "machine" | "gateway";

export type GraphNode = {
  name: string;
  kind: GraphNodeKind;
  ips: string[];
};

/** A directed edge, justified by the route prefix that produced it. */
export type GraphEdge = {
  from: string;
  to: string;
  prefix: string;
};

export type ReachabilityGraph = {
  nodes: Map<string, GraphNode>;
  /** Outgoing edges per node, in insertion order. */
  edges: Map<string, GraphEdge[]>;
};

/** A gateway-side route. Only the prefix matters for edge building. */
export type GatewayRoute = {
  addressPrefix: string;
  nextHopType: string;
};

export type PathResult =
  | { status: "found"; path: string[]; edges: GraphEdge[] }
  | { status: "no-path"; path: []; edges: [] }
  | { status: "unknown-node"; missing: string[]; path: []; edges: [] };

export type ReachabilityResult = {
  reachable: boolean;
  path: string[];
};

export type PathHop = {
  hop: number;
  node: string;
  ips: string[];
};

export type ConnectivityReport = {
  source: string;
  destination: string;
  reachable: boolean;
  path: PathHop[];
};
