/**
 * Route Source Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_ROUTES, RouteSource } from "./source.js";
import { MockResourceProvider } from "../provider/provider-mock.js";
import { AzureProviderError } from "../errors.js";
import { MemoryTransport, StructuredLogger } from "../logging/index.js";
import type { NetworkInterface, RouteTable, VirtualNetwork } from "../network/types.js";

const SUB = "sub-1";
const SUBNET_ID = `/subscriptions/${SUB}/resourceGroups/rg-net/providers/Microsoft.Network/virtualNetworks/hub/subnets/app`;
const TABLE_ID = `/subscriptions/${SUB}/resourceGroups/rg-net/providers/Microsoft.Network/routeTables/rt-app`;

const nic: NetworkInterface = {
  id: `/subscriptions/${SUB}/resourceGroups/rg-app/providers/Microsoft.Network/networkInterfaces/nic-1`,
  name: "nic-1",
  resourceGroup: "rg-app",
  privateIpAddresses: ["10.1.0.4"],
  publicIpAddressIds: [],
  subnetIds: [SUBNET_ID],
};

const vnet: VirtualNetwork = {
  id: `/subscriptions/${SUB}/resourceGroups/rg-net/providers/Microsoft.Network/virtualNetworks/hub`,
  name: "hub",
  resourceGroup: "rg-net",
  location: "westeurope",
  addressSpace: ["10.1.0.0/16"],
  dnsServers: [],
  subnets: [{ id: SUBNET_ID, name: "app", addressPrefix: "10.1.0.0/24", routeTableId: TABLE_ID }],
  peerings: [],
};

const table: RouteTable = {
  id: TABLE_ID,
  name: "rt-app",
  resourceGroup: "rg-net",
  location: "westeurope",
  routeCount: 1,
  subnetCount: 1,
  routes: [{ name: "to-fw", addressPrefix: "0.0.0.0/0", nextHopType: "VirtualAppliance", nextHopIpAddress: "10.1.255.4" }],
  subnetIds: [SUBNET_ID],
  disableBgpRoutePropagation: false,
};

function setup(options: { effective?: boolean } = {}) {
  const transport = new MemoryTransport();
  const logger = new StructuredLogger({ subsystem: "test", level: "trace", transports: [transport] });
  const provider = new MockResourceProvider({
    estates: {
      [SUB]: {
        effectiveRoutes: options.effective
          ? { "nic-1": [{ addressPrefix: "10.1.0.0/16", nextHopType: "VnetLocal", origin: "Default" }] }
          : {},
        virtualNetworks: [vnet],
        routeTables: [table],
      },
    },
  });
  const source = new RouteSource({ dataSource: provider, logger });
  return { provider, source, transport };
}

describe("RouteSource", () => {
  it("prefers the effective route table", async () => {
    const { source, provider } = setup({ effective: true });

    const result = await source.routesFor(SUB, nic);

    expect(result).toEqual({
      source: "effective-route-table",
      routes: [{ addressPrefix: "10.1.0.0/16", nextHopType: "VnetLocal", origin: "Default" }],
    });
    expect(provider.callCount("getSubnet")).toBe(0);
  });

  it("falls back to the subnet route table when effective routes are missing", async () => {
    const { source, transport } = setup();

    const result = await source.routesFor(SUB, nic);

    expect(result).toEqual({
      source: "subnet-route-table",
      routes: [{ addressPrefix: "0.0.0.0/0", nextHopType: "VirtualAppliance", nextHopIp: "10.1.255.4", origin: "User" }],
    });
    expect(transport.messages("warn")).toEqual([
      "effective-route-table failed for nic-1: Effective routes of rg-app/nic-1 not found",
    ]);
  });

  it("falls back to the static defaults on transient failures", async () => {
    const { source, provider } = setup({ effective: true });
    provider
      .fail("getEffectiveRoutes", "nic-1", new AzureProviderError("Transient", "throttled"))
      .fail("getSubnet", "app", new AzureProviderError("Unknown", "boom"));

    const result = await source.routesFor(SUB, nic);

    expect(result.source).toBe("default-routes");
    expect(result.routes).toEqual(DEFAULT_ROUTES);
  });

  it("uses the defaults for a NIC without subnets", async () => {
    const { source } = setup();

    const result = await source.routesFor(SUB, { ...nic, subnetIds: [] });

    expect(result.source).toBe("default-routes");
    expect(result.routes.map((route) => route.addressPrefix)).toEqual([
      "0.0.0.0/0",
      "10.0.0.0/8",
      "172.16.0.0/12",
      "192.168.0.0/16",
    ]);
  });

  it("aborts on Unauthorized", async () => {
    const { source, provider } = setup({ effective: true });
    provider.fail("getEffectiveRoutes", "nic-1", new AzureProviderError("Unauthorized", "denied", { statusCode: 403 }));

    await expect(source.routesFor(SUB, nic)).rejects.toMatchObject({ kind: "Unauthorized" });
    expect(provider.callCount("getSubnet")).toBe(0);
  });
});
