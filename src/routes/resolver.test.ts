import { describe, it, expect } from "vitest";
import { RouteResolver, mergeRoutes } from "./resolver.js";
import { RouteSource } from "./source.js";
import { MockResourceProvider } from "../provider/provider-mock.js";
import { MemoryTransport, StructuredLogger } from "../logging/index.js";
import type { NetworkInterface, RouteEntry } from "../network/types.js";

const local: RouteEntry = { addressPrefix: "10.0.0.0/16", nextHopType: "VnetLocal", origin: "Default" };
const internet: RouteEntry = { addressPrefix: "0.0.0.0/0", nextHopType: "Internet", origin: "Default" };
const viaGateway: RouteEntry = { addressPrefix: "172.20.0.0/16", nextHopType: "VirtualNetworkGateway", nextHopIp: "10.0.255.4", origin: "VirtualNetworkGateway" };

function nic(name: string, ip: string): NetworkInterface {
  return {
    id: `/subscriptions/sub-1/resourceGroups/rg/providers/Microsoft.Network/networkInterfaces/${name}`,
    name,
    resourceGroup: "rg",
    privateIpAddresses: [ip],
    publicIpAddressIds: [],
    subnetIds: [],
  };
}

describe("mergeRoutes", () => {
  it("keeps the first occurrence of each route", () => {
    const userInternet: RouteEntry = { ...internet, origin: "User" };
    expect(mergeRoutes([local, internet], [userInternet, viaGateway])).toEqual([local, internet, viaGateway]);
  });

  it("distinguishes next hop addresses", () => {
    const other: RouteEntry = { ...viaGateway, nextHopIp: "10.0.255.5" };
    expect(mergeRoutes([viaGateway], [other])).toHaveLength(2);
  });

  it("returns an empty list for no input", () => {
    expect(mergeRoutes()).toEqual([]);
  });
});

describe("RouteResolver", () => {
  it("resolves every interface and merges their routes", async () => {
    const provider = new MockResourceProvider({
      estates: {
        "sub-1": {
          effectiveRoutes: {
            "nic-a": [local, internet],
            "nic-b": [local, viaGateway],
          },
        },
      },
    });
    const logger = new StructuredLogger({ subsystem: "test", transports: [new MemoryTransport()] });
    const resolver = new RouteResolver({ source: new RouteSource({ dataSource: provider, logger }), logger });

    const set = await resolver.resolve({
      name: "vm-1",
      subscriptionId: "sub-1",
      interfaces: [nic("nic-a", "10.0.0.4"), nic("nic-b", "10.0.1.4")],
    });

    expect(set.name).toBe("vm-1");
    expect(set.interfaces.map((i) => [i.name, i.privateIpAddresses, i.source])).toEqual([
      ["nic-a", ["10.0.0.4"], "effective-route-table"],
      ["nic-b", ["10.0.1.4"], "effective-route-table"],
    ]);
    expect(set.routes).toEqual([local, internet, viaGateway]);
  });

  it("returns an empty set for a machine without interfaces", async () => {
    const provider = new MockResourceProvider();
    const resolver = new RouteResolver({
      source: new RouteSource({ dataSource: provider, logger: new StructuredLogger({ subsystem: "test", transports: [] }) }),
      logger: new StructuredLogger({ subsystem: "test", transports: [] }),
    });

    expect(await resolver.resolve({ name: "vm-empty", subscriptionId: "sub-1", interfaces: [] })).toEqual({
      name: "vm-empty",
      interfaces: [],
      routes: [],
    });
  });
});
