/**
 * Reachability Graph Tests
 */

import { describe, it, expect } from "vitest";
import { GATEWAY_NODE, addEdge, buildReachabilityGraph, createGraph, edgeCount, outgoingEdges } from "./graph.js";
import { isReachable } from "./analyzer.js";
import { MemoryTransport, StructuredLogger } from "../logging/index.js";
import type { RouteEntry } from "../network/types.js";
import type { MachineRouteSet } from "../routes/types.js";
import type { GatewayRoute } from "./types.js";

function machine(name: string, ips: string[], routes: Array<[string, string]>): MachineRouteSet {
  const entries: RouteEntry[] = routes.map(([addressPrefix, nextHopType]) => ({
    addressPrefix,
    nextHopType,
    origin: "Default",
  }));
  return {
    name,
    interfaces: [{ name: `${name}-nic`, privateIpAddresses: ips, routes: entries, source: "document" }],
    routes: entries,
  };
}

const gatewayRoutes: GatewayRoute[] = [{ addressPrefix: "10.0.0.0/8", nextHopType: "VirtualNetworkGateway" }];

function setup() {
  const transport = new MemoryTransport();
  const logger = new StructuredLogger({ subsystem: "test", transports: [transport] });
  return { transport, logger };
}

describe("buildReachabilityGraph", () => {
  it("adds machine nodes with primary IPs and a gateway node", () => {
    const { logger } = setup();
    const graph = buildReachabilityGraph([machine("a", ["10.0.0.4"], [])], "20.0.0.1", [], { logger });

    expect([...graph.nodes.values()]).toEqual([
      { name: "a", kind: "machine", ips: ["10.0.0.4"] },
      { name: GATEWAY_NODE, kind: "gateway", ips: ["20.0.0.1"] },
    ]);
  });

  it("links machines through VnetLocal routes", () => {
    const { logger } = setup();
    const graph = buildReachabilityGraph(
      [
        machine("a", ["10.1.0.4"], [["10.1.0.0/16", "VnetLocal"]]),
        machine("b", ["10.1.1.4"], [["10.1.0.0/16", "VnetLocal"]]),
        machine("c", ["10.2.0.4"], [["10.1.0.0/16", "VnetLocal"]]),
      ],
      "20.0.0.1",
      [],
      { logger },
    );

    expect(outgoingEdges(graph, "a")).toEqual([{ from: "a", to: "b", prefix: "10.1.0.0/16" }]);
    expect(outgoingEdges(graph, "b")).toEqual([{ from: "b", to: "a", prefix: "10.1.0.0/16" }]);
    expect(outgoingEdges(graph, "c").map((e) => e.to)).toEqual(["a", "b"]);
  });

  it("links machines to and from the gateway", () => {
    const { logger } = setup();
    const graph = buildReachabilityGraph(
      [
        machine("a", ["10.1.0.4"], [["172.20.0.0/16", "VirtualNetworkGateway"]]),
        machine("b", ["192.168.1.4"], []),
      ],
      "20.0.0.1",
      gatewayRoutes,
      { logger },
    );

    expect(outgoingEdges(graph, "a")).toEqual([{ from: "a", to: GATEWAY_NODE, prefix: "172.20.0.0/16" }]);
    expect(outgoingEdges(graph, GATEWAY_NODE)).toEqual([{ from: GATEWAY_NODE, to: "a", prefix: "10.0.0.0/8" }]);
  });

  it("keeps parallel edges with different prefixes", () => {
    const { logger } = setup();
    const graph = buildReachabilityGraph(
      [
        machine("a", ["10.1.0.4"], [["10.1.0.0/16", "VnetLocal"], ["10.0.0.0/8", "VnetLocal"], ["10.1.0.0/16", "VnetLocal"]]),
        machine("b", ["10.1.1.4"], []),
      ],
      "20.0.0.1",
      [],
      { logger },
    );

    expect(outgoingEdges(graph, "a").map((e) => e.prefix)).toEqual(["10.1.0.0/16", "10.0.0.0/8"]);
  });

  it("only uses the primary interface's addresses", () => {
    const { logger } = setup();
    const b = machine("b", ["192.168.0.4"], []);
    b.interfaces.push({ name: "b-nic2", privateIpAddresses: ["10.1.1.4"], routes: [], source: "document" });

    const graph = buildReachabilityGraph([machine("a", ["10.1.0.4"], [["10.1.0.0/16", "VnetLocal"]]), b], "20.0.0.1", [], {
      logger,
    });

    expect(outgoingEdges(graph, "a")).toEqual([]);
  });

  it("ignores routes that only a secondary interface carries", () => {
    const { logger } = setup();
    const a = machine("a", ["10.0.0.4"], []);
    const secondary: RouteEntry[] = [{ addressPrefix: "10.9.0.0/16", nextHopType: "VnetLocal", origin: "Default" }];
    a.interfaces.push({ name: "a-nic1", privateIpAddresses: ["10.8.0.4"], routes: secondary, source: "document" });
    a.routes = [...secondary];

    const graph = buildReachabilityGraph([a, machine("b", ["10.9.0.5"], [])], "20.0.0.1", [], { logger });

    expect(outgoingEdges(graph, "a")).toEqual([]);
    expect(isReachable(graph, "a", "b", { logger })).toEqual({ reachable: false, path: [] });
  });

  it("skips malformed prefixes and ignores bad addresses", () => {
    const { logger, transport } = setup();
    const graph = buildReachabilityGraph(
      [
        machine("a", ["10.1.0.4"], [["10.0.0.0/33", "VnetLocal"], ["10.0.0.0/8", "VnetLocal"]]),
        machine("b", ["", "not-an-ip", "10.9.0.4"], []),
      ],
      "20.0.0.1",
      [],
      { logger },
    );

    expect(outgoingEdges(graph, "a")).toEqual([{ from: "a", to: "b", prefix: "10.0.0.0/8" }]);
    expect(transport.messages("warn")).toEqual(["skipping route 10.0.0.0/33 of a: Invalid prefix length in 10.0.0.0/33"]);
  });

  it("matches IPv6 prefixes numerically", () => {
    const { logger } = setup();
    const graph = buildReachabilityGraph(
      [machine("a", ["fd00::4"], [["fd00::/64", "VnetLocal"]]), machine("b", ["fd00::0:5"], [])],
      "20.0.0.1",
      [],
      { logger },
    );

    expect(edgeCount(graph)).toBe(1);
  });
});

describe("reachability over a hub with an on-premises range", () => {
  const { logger } = setup();
  const graph = buildReachabilityGraph(
    [
      machine("vm1", ["10.0.0.4"], [
        ["10.0.0.0/24", "VnetLocal"],
        ["172.20.4.0/22", "VirtualNetworkGateway"],
      ]),
      machine("vm2", ["10.0.0.5"], [["10.0.0.0/24", "VnetLocal"]]),
      machine("vm3", ["172.20.5.10"], [["172.20.4.0/22", "VnetLocal"]]),
    ],
    "20.0.0.1",
    [{ addressPrefix: "172.20.4.0/22", nextHopType: "VirtualNetworkGateway" }],
    { logger },
  );

  it("reaches a machine in the same range directly", () => {
    expect(isReachable(graph, "vm1", "vm2", { logger })).toEqual({ reachable: true, path: ["vm1", "vm2"] });
  });

  it("reaches a machine behind the gateway in three hops", () => {
    expect(isReachable(graph, "vm1", "vm3", { logger })).toEqual({
      reachable: true,
      path: ["vm1", GATEWAY_NODE, "vm3"],
    });
  });
});

describe("addEdge", () => {
  it("stores identical edges once", () => {
    const graph = createGraph();
    expect(addEdge(graph, { from: "a", to: "b", prefix: "10.0.0.0/8" })).toBe(true);
    expect(addEdge(graph, { from: "a", to: "b", prefix: "10.0.0.0/8" })).toBe(false);
    expect(edgeCount(graph)).toBe(1);
  });
});
