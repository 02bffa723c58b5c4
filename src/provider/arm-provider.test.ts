/**
 * ARM Resource Provider: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ArmResourceProvider } from "./arm-provider.js";
import { AzureProviderError } from "../errors.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";

async function* asyncIter<T>(items: T[]): AsyncIterable<T> {
  yield* items;
}

function sdkError(message: string, statusCode: number, code?: string): Error {
  return Object.assign(new Error(message), { statusCode, code });
}

const mockVirtualNetworks = { listAll: vi.fn(), list: vi.fn(), get: vi.fn() };
const mockNetworkInterfaces = { get: vi.fn(), beginGetEffectiveRouteTableAndWait: vi.fn() };
const mockPublicIps = { get: vi.fn() };
const mockVMs = { get: vi.fn(), list: vi.fn(), listAll: vi.fn() };
const mockNetworkClientConstructor = vi.fn();

vi.mock("@azure/arm-network", () => ({
  NetworkManagementClient: vi.fn().mockImplementation(function (...args: unknown[]) {
    mockNetworkClientConstructor(...args);
    return {
      virtualNetworks: mockVirtualNetworks,
      networkInterfaces: mockNetworkInterfaces,
      publicIPAddresses: mockPublicIps,
    };
  }),
}));

vi.mock("@azure/arm-compute", () => ({
  ComputeManagementClient: vi.fn().mockImplementation(function () {
    return { virtualMachines: mockVMs };
  }),
}));

const mockCredentialsManager = {
  getCredential: vi.fn().mockResolvedValue({ credential: { getToken: vi.fn() }, method: "default" }),
} as unknown as AzureCredentialsManager;

describe("ArmResourceProvider", () => {
  let provider: ArmResourceProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    provider = new ArmResourceProvider({
      credentialsManager: mockCredentialsManager,
      retryOptions: { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 },
    });
  });

  it("returns mapped resources", async () => {
    mockVirtualNetworks.list.mockReturnValue(asyncIter([{ id: "/subscriptions/sub-1/resourceGroups/rg/providers/Microsoft.Network/virtualNetworks/hub", name: "hub" }]));
    const vnets = await provider.listVirtualNetworks("sub-1", "rg");
    expect(vnets.map((v) => v.name)).toEqual(["hub"]);
  });

  it("turns a missing resource into NotFound", async () => {
    mockVirtualNetworks.get.mockRejectedValue(sdkError("gone", 404, "ResourceNotFound"));
    const error = await provider.getVirtualNetwork("sub-1", "rg", "hub").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AzureProviderError);
    expect(error).toMatchObject({ kind: "NotFound", statusCode: 404, message: "Virtual network rg/hub not found" });
  });

  it("turns a missing public IP into NotFound", async () => {
    mockPublicIps.get.mockRejectedValue(sdkError("gone", 404, "ResourceNotFound"));
    await expect(provider.getPublicIpAddress("sub-1", "rg", "web-pip")).rejects.toMatchObject({
      kind: "NotFound",
      message: "Public IP address rg/web-pip not found",
    });
  });

  it("classifies authorization failures", async () => {
    mockVMs.get.mockRejectedValue(sdkError("no access", 403, "AuthorizationFailed"));
    await expect(provider.getVirtualMachine("sub-1", "rg", "vm1")).rejects.toMatchObject({ kind: "Unauthorized" });
  });

  it("classifies throttling as transient", async () => {
    mockNetworkInterfaces.beginGetEffectiveRouteTableAndWait.mockRejectedValue(sdkError("slow down", 429, "TooManyRequests"));
    await expect(provider.getEffectiveRoutes("sub-1", "rg", "nic")).rejects.toMatchObject({
      kind: "Transient",
      message: "getEffectiveRoutes failed: [TooManyRequests] (HTTP 429) slow down",
    });
  });

  it("keeps one network client per subscription", async () => {
    mockVirtualNetworks.listAll.mockImplementation(() => asyncIter([]));
    await provider.listVirtualNetworks("sub-1");
    await provider.listVirtualNetworks("sub-1");
    await provider.listVirtualNetworks("sub-2");
    expect(mockNetworkClientConstructor).toHaveBeenCalledTimes(2);
    expect(mockNetworkClientConstructor.mock.calls.map((c) => c[1])).toEqual(["sub-1", "sub-2"]);
  });
});
