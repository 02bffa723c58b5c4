/**
 * Tests for the `vnet-topology` CLI commands.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Command } from "commander";
import { createProgram } from "./program.js";
import { theme } from "./format.js";
import { getDefaultConfig, type AppConfig } from "../config.js";
import { AzureProviderError } from "../errors.js";
import type { ApiServerHandle, ApiServerOptions } from "../api/server.js";
import { createTestEstate, SUB, type TestEstate } from "../testing/estate.js";

const FIXTURES = fileURLToPath(new URL("../topology/fixtures", import.meta.url));

// ── Helpers ─────────────────────────────────────────────────────────────────

type Harness = {
  program: Command;
  estate: TestEstate;
  setExitCode: ReturnType<typeof vi.fn>;
  startServer: ReturnType<typeof vi.fn>;
};

function createHarness(config: Partial<AppConfig> = { subscriptionId: SUB }): Harness {
  const estate = createTestEstate();
  const setExitCode = vi.fn();
  const startServer = vi.fn(async (_options: ApiServerOptions) => ({ close: async () => {} }) as unknown as ApiServerHandle);
  const program = createProgram({
    loadConfig: () => ({ ...getDefaultConfig(), ...config }),
    createServices: () => estate,
    startServer,
    setExitCode,
  });
  return { program, estate, setExitCode, startServer };
}

function stdout(): string {
  return (console.log as ReturnType<typeof vi.fn>).mock.calls.map((c) => c[0]).join("\n");
}

function stderr(): string {
  return (console.error as ReturnType<typeof vi.fn>).mock.calls.map((c) => c[0]).join("\n");
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe("createProgram", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers every command group", () => {
    const { program } = createHarness();
    expect(program.commands.map((c) => c.name())).toEqual([
      "connectivity",
      "peering",
      "routes",
      "vnets",
      "vms",
      "subscriptions",
      "resource-groups",
      "export",
      "serve",
    ]);
  });

  // ── connectivity ──────────────────────────────────────────────────────────

  describe("connectivity", () => {
    it("reads machine documents from a folder", async () => {
      const { program, setExitCode } = createHarness();

      await program.parseAsync(["connectivity", "-s", "vm2", "-d", "vm3", "-f", join(FIXTURES, "infra")], { from: "user" });

      expect(stdout()).toBe(
        [
          "Connectivity confirmed from vm2 to vm3. Path:",
          "Hop 1: vm2 | IPs: 10.0.2.4",
          "Hop 2: vm1 | IPs: 10.0.1.4",
          "Hop 3: VirtualNetworkGateway | IPs: 20.240.246.240",
          "Hop 4: vm3 | IPs: 172.20.4.10",
        ].join("\n"),
      );
      expect(setExitCode).not.toHaveBeenCalled();
    });

    it("uses the gateway routes file", async () => {
      const { program, setExitCode } = createHarness();

      await program.parseAsync(
        ["connectivity", "-s", "vm2", "-d", "vm3", "-f", join(FIXTURES, "infra"), "-r", join(FIXTURES, "gateway-routes.json")],
        { from: "user" },
      );

      // The gateway only routes back to 10.0.1.0/24, so vm3 is out of reach
      expect(stdout()).toBe("No connectivity path found from vm2 to vm3.");
      expect(setExitCode).not.toHaveBeenCalled();
    });

    it("queries the subscription and prints JSON", async () => {
      const { program } = createHarness();

      await program.parseAsync(["connectivity", "-s", "web", "-d", "db", "-g", "192.0.2.1", "--format", "json"], {
        from: "user",
      });

      expect(JSON.parse(stdout())).toEqual({
        source: "web",
        destination: "db",
        reachable: true,
        path: [
          { hop: 1, node: "web", ips: ["10.0.1.4"] },
          { hop: 2, node: "VirtualNetworkGateway", ips: ["192.0.2.1"] },
          { hop: 3, node: "db", ips: ["172.20.4.10"] },
        ],
      });
    });

    it("exits 0 for an unreachable machine", async () => {
      const { program, setExitCode } = createHarness();

      await program.parseAsync(["connectivity", "-s", "web", "-d", "ghost", "--format", "json"], { from: "user" });

      expect(JSON.parse(stdout())).toEqual({ source: "web", destination: "ghost", reachable: false, path: [] });
      expect(setExitCode).not.toHaveBeenCalled();
    });

    it("rejects an unknown format", async () => {
      const { program, setExitCode } = createHarness();

      await program.parseAsync(["connectivity", "-s", "web", "-d", "db", "--format", "yaml"], { from: "user" });

      expect(stderr()).toBe(theme.error('Failed to check connectivity: Unsupported format "yaml" (expected text, json)'));
      expect(setExitCode).toHaveBeenCalledWith(1);
    });
  });

  // ── peering ───────────────────────────────────────────────────────────────

  describe("peering report", () => {
    it("prints the report as markdown", async () => {
      const { program } = createHarness();

      await program.parseAsync(["peering", "report", "--format", "markdown"], { from: "user" });

      expect(stdout()).toBe(
        [
          "## VNet Peering Report",
          "",
          "| VNet 1 | VNet 2 | 1 → 2 | 2 → 1 | Status |",
          "| --- | --- | --- | --- | --- |",
          "| hub (rg-net) | spoke (rg-net) | Connected | Connected | Connected |",
          "",
          "**1 of 1 peering(s) connected (100%)**",
        ].join("\n"),
      );
    });

    it("exits 1 on Unauthorized", async () => {
      const { program, estate, setExitCode } = createHarness();
      estate.provider.fail("listVirtualNetworks", "*", new AzureProviderError("Unauthorized", "token expired"));

      await program.parseAsync(["peering", "report"], { from: "user" });

      expect(stderr()).toBe(theme.error("Azure authorization failed: token expired"));
      expect(setExitCode).toHaveBeenCalledWith(1);
    });

    it("exits 1 when no subscription is configured", async () => {
      const { program, setExitCode } = createHarness({});

      await program.parseAsync(["peering", "report"], { from: "user" });

      expect(stderr()).toBe(
        theme.error("Invalid configuration: /subscriptionId: pass --subscription or set AZURE_SUBSCRIPTION_ID"),
      );
      expect(setExitCode).toHaveBeenCalledWith(1);
    });
  });

  // ── raw reads ─────────────────────────────────────────────────────────────

  describe("resource reads", () => {
    it("lists subscriptions as a markdown table", async () => {
      const { program } = createHarness();

      await program.parseAsync(["subscriptions", "list", "--format", "markdown"], { from: "user" });

      expect(stdout()).toBe(["| Subscription | Name | State |", "| --- | --- | --- |", "| sub-1 | Test | Enabled |"].join("\n"));
    });

    it("lists VMs of one resource group", async () => {
      const { program } = createHarness();

      await program.parseAsync(["vms", "list", "--resource-group", "rg-app"], { from: "user" });

      const vms: unknown = JSON.parse(stdout());
      expect(Array.isArray(vms) ? vms.map((vm: { name: string }) => vm.name) : []).toEqual(["web", "db"]);
    });

    it("passes --refresh through to the cache", async () => {
      const { program, estate } = createHarness();

      await program.parseAsync(["vnets", "list"], { from: "user" });
      await program.parseAsync(["vnets", "list", "--refresh"], { from: "user" });

      expect(estate.provider.callCount("listVirtualNetworks")).toBe(2);
    });

    it("reports a missing VM and exits 1", async () => {
      const { program, setExitCode } = createHarness();

      await program.parseAsync(["vms", "show", "rg-app", "ghost"], { from: "user" });

      expect(stderr()).toBe(theme.error("Failed to read virtual machine: Virtual machine rg-app/ghost not found"));
      expect(setExitCode).toHaveBeenCalledWith(1);
    });

    it("prints VM routes as a table", async () => {
      const { program } = createHarness();

      await program.parseAsync(["routes", "vm", "rg-app", "web", "--format", "table"], { from: "user" });

      expect(stdout().split("\n")).toEqual([
        " Prefix        │ Next Hop              │ Next Hop IP │ Origin                ",
        "───────────────┼───────────────────────┼─────────────┼───────────────────────",
        " 10.0.0.0/16   │ VnetLocal             │             │ Default               ",
        " 172.20.0.0/16 │ VirtualNetworkGateway │             │ VirtualNetworkGateway ",
      ]);
    });

    it("lists resource groups", async () => {
      const { program } = createHarness();

      await program.parseAsync(["resource-groups", "list", "--format", "markdown"], { from: "user" });

      expect(stdout()).toBe(
        ["| Name | Location | State |", "| --- | --- | --- |", "| rg-app | westeurope |  |", "| rg-net | westeurope |  |"].join("\n"),
      );
    });
  });

  // ── VM inventory ──────────────────────────────────────────────────────────

  describe("VM inventory", () => {
    it("shows a VM with public IPs and security rules", async () => {
      const { program } = createHarness();

      await program.parseAsync(["vms", "show", "rg-app", "web"], { from: "user" });

      expect(JSON.parse(stdout())).toMatchObject({
        name: "web",
        networkInterfaces: [{ name: "web-nic", publicIpAddresses: ["20.1.2.3"] }],
        securityRuleSource: "effective-security-rules",
      });
    });

    it("lists VMs in every subscription", async () => {
      const { program } = createHarness();

      await program.parseAsync(["vms", "all", "--format", "markdown"], { from: "user" });

      expect(stdout()).toBe(
        [
          "| Name | Subscription | Resource Group | Size | State |",
          "| --- | --- | --- | --- | --- |",
          "| web | Test | rg-app | Standard_B2s | running |",
          "| db | Test | rg-app | Standard_B2s | running |",
        ].join("\n"),
      );
    });

    it("finds a VM by name", async () => {
      const { program } = createHarness();

      await program.parseAsync(["vms", "find", "WEB"], { from: "user" });

      expect(JSON.parse(stdout())).toMatchObject({ name: "web", hostname: "web01.test.local", resourceGroup: "rg-app" });
    });

    it("reports a VM no subscription has and exits 1", async () => {
      const { program, setExitCode } = createHarness();

      await program.parseAsync(["vms", "find", "ghost"], { from: "user" });

      expect(stderr()).toBe(theme.error("Failed to find virtual machine: Virtual machine ghost not found in any subscription"));
      expect(setExitCode).toHaveBeenCalledWith(1);
    });

    it("lists hostnames without needing a configured subscription", async () => {
      const { program } = createHarness({});

      await program.parseAsync(["vms", "hostnames", "--format", "markdown"], { from: "user" });

      expect(stdout()).toBe(["| VM | Hostname |", "| --- | --- |", "| web | web01.test.local |", "| db |  |"].join("\n"));
    });

    it("prints the VM report", async () => {
      const { program } = createHarness();

      await program.parseAsync(["vms", "report", "--format", "markdown"], { from: "user" });

      expect(stdout().split("\n")).toEqual([
        "| VM | Hostname | OS | Environment | Purpose | Private IPs | Public IPs | Size | OS Disk (GB) | Subscription |",
        "| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |",
        "| web | web01.test.local | Linux | prod | frontend | 10.0.1.4 | 20.1.2.3 | Standard_B2s | 30 | Test |",
        "| db |  |  |  |  | 172.20.4.10 |  | Standard_B2s |  | Test |",
      ]);
    });
  });

  // ── export ────────────────────────────────────────────────────────────────

  describe("export machines", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "vnet-topology-cli-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes documents that connectivity -f can read", async () => {
      const { program } = createHarness();

      await program.parseAsync(["export", "machines", "--out", dir], { from: "user" });
      expect(readdirSync(dir).sort()).toEqual(["vm_db.json", "vm_web.json"]);
      expect(stdout()).toBe(theme.success(`Wrote 2 machine document(s) to ${dir}`));

      (console.log as ReturnType<typeof vi.fn>).mockClear();
      await program.parseAsync(["connectivity", "-s", "web", "-d", "db", "-f", dir, "--format", "json"], { from: "user" });

      expect(JSON.parse(stdout())).toEqual({
        source: "web",
        destination: "db",
        reachable: true,
        path: [
          { hop: 1, node: "web", ips: ["10.0.1.4"] },
          { hop: 2, node: "VirtualNetworkGateway", ips: ["20.240.246.240"] },
          { hop: 3, node: "db", ips: ["172.20.4.10"] },
        ],
      });
    });
  });

  // ── serve ─────────────────────────────────────────────────────────────────

  describe("serve", () => {
    it("starts the API with options layered over the config", async () => {
      const { program, estate, startServer } = createHarness({ server: { port: 8000, host: "127.0.0.1", apiKey: "test-secret" } });

      await program.parseAsync(["serve", "--port", "9001", "--host", "0.0.0.0"], { from: "user" });

      expect(startServer).toHaveBeenCalledWith({
        port: 9001,
        host: "0.0.0.0",
        apiKey: "test-secret",
        resources: estate.resources,
        topology: estate.topology,
        peering: estate.peering,
        inventory: estate.inventory,
        gatewayRoutes: undefined,
      });
    });

    it("falls back to the configured port and host", async () => {
      const { program, startServer } = createHarness();

      await program.parseAsync(["serve"], { from: "user" });

      expect(startServer).toHaveBeenCalledWith(expect.objectContaining({ port: 8000, host: "127.0.0.1" }));
    });
  });
});
