/**
 * Credentials Manager Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AzureCredentialsManager, createCredentialsManager, createCredentialsManagerFromConfig } from "./manager.js";
import { getDefaultConfig } from "../config.js";
import { AzureProviderError } from "../errors.js";

vi.mock("@azure/identity", () => {
  const mockGetToken = vi.fn().mockResolvedValue({
    token: "test-token",
    expiresOnTimestamp: Date.now() + 3600000,
  });

  return {
    DefaultAzureCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken, kind: "default" }; }),
    AzureCliCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken, kind: "cli" }; }),
    ClientSecretCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken, kind: "sp" }; }),
    ManagedIdentityCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken, kind: "mi" }; }),
    InteractiveBrowserCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken, kind: "browser" }; }),
  };
});

describe("AzureCredentialsManager", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("creates with default options", () => {
    expect(createCredentialsManager()).toBeInstanceOf(AzureCredentialsManager);
  });

  it("resolves the default credential chain", async () => {
    const result = await createCredentialsManager().getCredential();
    expect(result.method).toBe("default");
    expect(result.credential).toMatchObject({ kind: "default" });
  });

  it("honours an explicit method", async () => {
    const result = await createCredentialsManager({ credentialMethod: "cli" }).getCredential();
    expect(result.method).toBe("cli");
    expect(result.credential).toMatchObject({ kind: "cli" });
  });

  it("caches the resolved credential", async () => {
    const mgr = createCredentialsManager();
    const first = await mgr.getCredential();
    const second = await mgr.getCredential();
    expect(first.credential).toBe(second.credential);
  });

  it("creates a new credential after clearCache", async () => {
    const mgr = createCredentialsManager();
    const first = await mgr.getCredential();
    mgr.clearCache();
    const second = await mgr.getCredential();
    expect(second.credential).not.toBe(first.credential);
  });

  it("shares one resolution between concurrent callers", async () => {
    const mgr = createCredentialsManager();
    const [first, second] = await Promise.all([mgr.getCredential(), mgr.getCredential()]);
    expect(first.credential).toBe(second.credential);
  });

  it("resolves again once the credential is older than cacheTtlMs", async () => {
    vi.useFakeTimers();
    try {
      const mgr = createCredentialsManager({ cacheTtlMs: 1000 });
      const first = await mgr.getCredential();
      vi.advanceTimersByTime(1000);
      const second = await mgr.getCredential();
      expect(second.credential).not.toBe(first.credential);
    } finally {
      vi.useRealTimers();
    }
  });

  it("retries after a failed resolution", async () => {
    delete process.env.AZURE_CLIENT_ID;
    delete process.env.AZURE_CLIENT_SECRET;
    const mgr = createCredentialsManager({ credentialMethod: "service-principal", defaultTenantId: "tenant-1" });
    await expect(mgr.getCredential()).rejects.toThrow("Service principal auth requires");

    process.env.AZURE_CLIENT_ID = "client-1";
    process.env.AZURE_CLIENT_SECRET = "test-secret";
    const result = await mgr.getCredential();
    expect(result.credential).toMatchObject({ kind: "sp" });
  });

  it("service-principal fails as Unauthorized without env vars", async () => {
    delete process.env.AZURE_TENANT_ID;
    delete process.env.AZURE_CLIENT_ID;
    delete process.env.AZURE_CLIENT_SECRET;

    const mgr = createCredentialsManager({ credentialMethod: "service-principal" });
    const error = await mgr.getCredential().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AzureProviderError);
    expect(error).toMatchObject({ kind: "Unauthorized" });
  });

  it("service-principal builds a client secret credential", async () => {
    process.env.AZURE_CLIENT_ID = "client-1";
    process.env.AZURE_CLIENT_SECRET = "test-secret";
    const mgr = createCredentialsManager({ credentialMethod: "service-principal", defaultTenantId: "tenant-1" });
    const result = await mgr.getCredential();
    expect(result.credential).toMatchObject({ kind: "sp" });
    expect(result.tenantId).toBe("tenant-1");
  });

  it("builds from application config", () => {
    const mgr = createCredentialsManagerFromConfig({ ...getDefaultConfig(), subscriptionId: "sub-9", tenantId: "tenant-9" });
    expect(mgr.getSubscriptionId()).toBe("sub-9");
    expect(mgr.getTenantId()).toBe("tenant-9");
  });
});
