export {
  RouteSource,
  EffectiveRouteTableStrategy,
  SubnetRouteTableStrategy,
  DefaultRoutesStrategy,
  DEFAULT_ROUTES,
} from "./source.js";
export { RouteResolver, mergeRoutes, routeKey } from "./resolver.js";
export type { RouteSourceOptions } from "./source.js";
export type { RouteResolverOptions } from "./resolver.js";
export type {
  RouteDataSource,
  RouteStrategy,
  RouteStrategyName,
  RouteProvenance,
  RouteLookup,
  ResolvedRoutes,
  InterfaceRoutes,
  MachineRouteSet,
  MachineNetworkProfile,
} from "./types.js";
