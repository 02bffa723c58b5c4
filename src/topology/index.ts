export { buildReachabilityGraph, createGraph, addNode, addEdge, outgoingEdges, edgeCount, GATEWAY_NODE } from "./graph.js";
export { findPath, isReachable, describePath, checkConnectivity } from "./analyzer.js";
export {
  loadMachineDocuments,
  loadGatewayRoutes,
  writeMachineDocuments,
  machineFromDocument,
  machineToDocument,
  machineFileName,
  parseMachineDocument,
  machineDocumentSchema,
  gatewayRoutesSchema,
  DEFAULT_GATEWAY_ROUTES,
} from "./loader.js";
export { NetworkTopologyService, createTopologyService, connectivityFromMachines } from "./service.js";
export type { BuildGraphOptions } from "./graph.js";
export type { AnalyzerOptions } from "./analyzer.js";
export type { LoaderOptions, MachineDocument, RouteDocument } from "./loader.js";
export type { NetworkTopologyServiceOptions, ConnectivityQuery } from "./service.js";
export type {
  ReachabilityGraph,
  GraphNode,
  GraphNodeKind,
  GraphEdge,
  GatewayRoute,
  PathResult,
  ReachabilityResult,
  PathHop,
  ConnectivityReport,
} from "./types.js";
