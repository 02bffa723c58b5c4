/**
 * Network Topology: CLI Commands
 *
 * `vnet-topology` subcommands: connectivity analysis (from live Azure data or
 * exported machine documents), peering reports, raw resource reads, the VM
 * inventory, machine export and the REST facade.
 */

import { Command } from "commander";
import { startApiServer, type ApiServerHandle, type ApiServerOptions } from "../api/server.js";
import { loadConfig, type AppConfig } from "../config.js";
import { ConfigError, describeError, isProviderError } from "../errors.js";
import type {
  VirtualMachineHostname,
  VirtualMachineReportEntry,
  VirtualMachineWithContext,
} from "../inventory/types.js";
import { createServices, type Services } from "../lifecycle.js";
import { getLogger } from "../logging/index.js";
import type { RouteEntry, RouteTableSummary, VirtualNetwork } from "../network/types.js";
import type { AzureSubscription } from "../subscriptions/types.js";
import type { ResourceGroup } from "../resources/types.js";
import { connectivityFromMachines } from "../topology/service.js";
import { loadGatewayRoutes, loadMachineDocuments } from "../topology/loader.js";
import type { FetchOptions } from "../types.js";
import { VERSION } from "../version.js";
import type { VirtualMachine } from "../vms/types.js";
import {
  formatConnectivityText,
  formatPeeringReport,
  parseFormat,
  renderRecords,
  theme,
  type Column,
  type OutputFormat,
} from "./format.js";

// =============================================================================
// Types
// =============================================================================

export type ProgramOptions = {
  loadConfig?: () => AppConfig;
  createServices?: (config: AppConfig) => Services;
  startServer?: (options: ApiServerOptions) => Promise<ApiServerHandle>;
  setExitCode?: (code: number) => void;
};

type ScopeOptions = {
  subscription?: string;
  resourceGroup?: string;
  refresh?: boolean;
};

type ListOptions = ScopeOptions & { format: string };

const LIST_FORMATS: readonly OutputFormat[] = ["json", "table", "markdown"];

// =============================================================================
// Columns
// =============================================================================

const subscriptionColumns: Column<AzureSubscription>[] = [
  ["Subscription", (s) => s.subscriptionId],
  ["Name", (s) => s.displayName],
  ["State", (s) => s.state],
];

const resourceGroupColumns: Column<ResourceGroup>[] = [
  ["Name", (rg) => rg.name],
  ["Location", (rg) => rg.location],
  ["State", (rg) => rg.provisioningState ?? ""],
];

const vmColumns: Column<VirtualMachine>[] = [
  ["Name", (vm) => vm.name],
  ["Resource Group", (vm) => vm.resourceGroup],
  ["Size", (vm) => vm.vmSize],
  ["State", (vm) => vm.powerState],
  ["Location", (vm) => vm.location],
];

const vmContextColumns: Column<VirtualMachineWithContext>[] = [
  ["Name", (vm) => vm.name],
  ["Subscription", (vm) => vm.subscriptionName],
  ["Resource Group", (vm) => vm.resourceGroup],
  ["Size", (vm) => vm.vmSize],
  ["State", (vm) => vm.powerState],
];

const hostnameColumns: Column<VirtualMachineHostname>[] = [
  ["VM", (h) => h.vmName],
  ["Hostname", (h) => h.hostname ?? ""],
];

const vmReportColumns: Column<VirtualMachineReportEntry>[] = [
  ["VM", (e) => e.vmName],
  ["Hostname", (e) => e.hostname ?? ""],
  ["OS", (e) => e.os ?? ""],
  ["Environment", (e) => e.environment ?? ""],
  ["Purpose", (e) => e.purpose ?? ""],
  ["Private IPs", (e) => e.privateIpAddresses.join(", ")],
  ["Public IPs", (e) => e.publicIpAddresses.join(", ")],
  ["Size", (e) => e.vmSize],
  ["OS Disk (GB)", (e) => (e.osDiskSizeGb === undefined ? "" : String(e.osDiskSizeGb))],
  ["Subscription", (e) => e.subscriptionName],
];

const vnetColumns: Column<VirtualNetwork>[] = [
  ["Name", (v) => v.name],
  ["Resource Group", (v) => v.resourceGroup],
  ["Address Space", (v) => v.addressSpace.join(", ")],
  ["Subnets", (v) => String(v.subnets.length)],
  ["Peerings", (v) => String(v.peerings.length)],
];

const routeColumns: Column<RouteEntry>[] = [
  ["Prefix", (r) => r.addressPrefix],
  ["Next Hop", (r) => r.nextHopType],
  ["Next Hop IP", (r) => r.nextHopIp ?? ""],
  ["Origin", (r) => r.origin],
];

const routeTableColumns: Column<RouteTableSummary>[] = [
  ["Name", (t) => t.name],
  ["Resource Group", (t) => t.resourceGroup],
  ["Routes", (t) => String(t.routeCount)],
  ["Subnets", (t) => String(t.subnetCount)],
];

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid port: ${value}`);
  return port;
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(options: ProgramOptions = {}): Command {
  const readConfig = options.loadConfig ?? (() => loadConfig());
  const buildServices = options.createServices ?? ((config: AppConfig) => createServices(config));
  const startServer = options.startServer ?? startApiServer;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  let config: AppConfig | null = null;
  let services: Services | null = null;

  const getConfig = (): AppConfig => {
    if (!config) {
      config = readConfig();
      getLogger().setLevel(config.logLevel);
    }
    return config;
  };

  const getServices = (): Services => {
    if (!services) services = buildServices(getConfig());
    return services;
  };

  const subscriptionOf = (opts: { subscription?: string }): string => {
    const subscriptionId = opts.subscription ?? getConfig().subscriptionId;
    if (!subscriptionId) {
      throw new ConfigError(["/subscriptionId: pass --subscription or set AZURE_SUBSCRIPTION_ID"]);
    }
    return subscriptionId;
  };

  const fetchOptions = (opts: { refresh?: boolean }): FetchOptions => ({ refresh: Boolean(opts.refresh) });

  /** Run a command body; any failure is printed and turns into exit code 1. */
  const run = async (label: string, body: () => Promise<void>): Promise<void> => {
    try {
      await body();
    } catch (error) {
      if (isProviderError(error, "Unauthorized")) {
        console.error(theme.error(`Azure authorization failed: ${error.message}`));
      } else if (error instanceof ConfigError) {
        console.error(theme.error(error.message));
      } else {
        console.error(theme.error(`Failed to ${label}: ${describeError(error)}`));
      }
      setExitCode(1);
    }
  };

  const program = new Command();
  program
    .name("vnet-topology")
    .description("Azure VNet routing, reachability and peering analysis")
    .version(VERSION);

  /** Options shared by every command that reads from a subscription. */
  const scoped = (command: Command): Command =>
    command
      .option("--subscription <id>", "Azure subscription ID (default: AZURE_SUBSCRIPTION_ID)")
      .option("--resource-group <rg>", "Limit to one resource group")
      .option("--refresh", "Bypass the cache");

  const listing = (command: Command): Command =>
    scoped(command).option("--format <format>", `Output format (${LIST_FORMATS.join("|")})`, "json");

  // ---------------------------------------------------------------------------
  // connectivity
  // ---------------------------------------------------------------------------
  scoped(
    program
      .command("connectivity")
      .description("Check whether one VM can reach another")
      .requiredOption("-s, --source <vm>", "Source VM name")
      .requiredOption("-d, --destination <vm>", "Destination VM name")
      .option("-f, --folder <dir>", "Read machine documents (vm_*.json) instead of querying Azure")
      .option("-g, --gateway-ip <ip>", "Address of the virtual network gateway")
      .option("-r, --routes <file>", "JSON file with gateway routes")
      .option("--format <format>", "Output format (text|json)", "text"),
  ).action(
    async (opts: ListOptions & { source: string; destination: string; folder?: string; gatewayIp?: string; routes?: string }) => {
      await run("check connectivity", async () => {
        const format = parseFormat(opts.format, ["text", "json"]);
        const gatewayRoutes = await loadGatewayRoutes(opts.routes);

        const report = opts.folder
          ? connectivityFromMachines(await loadMachineDocuments(opts.folder), opts.source, opts.destination, {
              gatewayIp: opts.gatewayIp ?? getConfig().gatewayIp,
              gatewayRoutes,
            })
          : await getServices().topology.checkConnectivity({
              subscriptionId: subscriptionOf(opts),
              resourceGroup: opts.resourceGroup,
              source: opts.source,
              destination: opts.destination,
              gatewayIp: opts.gatewayIp,
              gatewayRoutes,
              ...fetchOptions(opts),
            });

        console.log(format === "json" ? JSON.stringify(report, null, 2) : formatConnectivityText(report));
      });
    },
  );

  // ---------------------------------------------------------------------------
  // peering
  // ---------------------------------------------------------------------------
  const peering = program.command("peering").description("VNet peering analysis");

  listing(peering.command("report").description("Reconcile both sides of every VNet peering")).action(
    async (opts: ListOptions) => {
      await run("build peering report", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const report = await getServices().peering.report(subscriptionOf(opts), opts.resourceGroup, fetchOptions(opts));
        console.log(formatPeeringReport(report, format));
      });
    },
  );

  // ---------------------------------------------------------------------------
  // routes
  // ---------------------------------------------------------------------------
  const routes = program.command("routes").description("Effective routes and route tables");

  listing(routes.command("vm <resourceGroup> <vmName>").description("Merged effective routes of a VM")).action(
    async (resourceGroup: string, vmName: string, opts: ListOptions) => {
      await run("read VM routes", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const entries = await getServices().topology.getVirtualMachineRoutes(
          subscriptionOf(opts),
          resourceGroup,
          vmName,
          fetchOptions(opts),
        );
        console.log(renderRecords(entries, routeColumns, format));
      });
    },
  );

  listing(routes.command("nic <resourceGroup> <nicName>").description("Effective routes of a network interface")).action(
    async (resourceGroup: string, nicName: string, opts: ListOptions) => {
      await run("read interface routes", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const entries = await getServices().topology.getInterfaceRoutes(
          subscriptionOf(opts),
          resourceGroup,
          nicName,
          fetchOptions(opts),
        );
        console.log(renderRecords(entries, routeColumns, format));
      });
    },
  );

  listing(routes.command("tables").description("List route tables")).action(async (opts: ListOptions) => {
    await run("list route tables", async () => {
      const format = parseFormat(opts.format, LIST_FORMATS);
      const tables = await getServices().resources.listRouteTables(
        subscriptionOf(opts),
        opts.resourceGroup,
        fetchOptions(opts),
      );
      console.log(renderRecords(tables, routeTableColumns, format));
    });
  });

  scoped(routes.command("table <resourceGroup> <name>").description("Show one route table")).action(
    async (resourceGroup: string, name: string, opts: ScopeOptions) => {
      await run("read route table", async () => {
        const table = await getServices().resources.getRouteTable(
          subscriptionOf(opts),
          resourceGroup,
          name,
          fetchOptions(opts),
        );
        console.log(JSON.stringify(table, null, 2));
      });
    },
  );

  // ---------------------------------------------------------------------------
  // vnets / vms
  // ---------------------------------------------------------------------------
  const vnets = program.command("vnets").description("Virtual networks");

  listing(vnets.command("list").description("List virtual networks")).action(async (opts: ListOptions) => {
    await run("list virtual networks", async () => {
      const format = parseFormat(opts.format, LIST_FORMATS);
      const list = await getServices().resources.listVirtualNetworks(
        subscriptionOf(opts),
        opts.resourceGroup,
        fetchOptions(opts),
      );
      console.log(renderRecords(list, vnetColumns, format));
    });
  });

  scoped(vnets.command("show <resourceGroup> <name>").description("Show one virtual network")).action(
    async (resourceGroup: string, name: string, opts: ScopeOptions) => {
      await run("read virtual network", async () => {
        const vnet = await getServices().resources.getVirtualNetwork(
          subscriptionOf(opts),
          resourceGroup,
          name,
          fetchOptions(opts),
        );
        console.log(JSON.stringify(vnet, null, 2));
      });
    },
  );

  const vms = program.command("vms").description("Virtual machines");

  listing(vms.command("list").description("List virtual machines")).action(async (opts: ListOptions) => {
    await run("list virtual machines", async () => {
      const format = parseFormat(opts.format, LIST_FORMATS);
      const list = await getServices().resources.listVirtualMachines(
        subscriptionOf(opts),
        opts.resourceGroup,
        fetchOptions(opts),
      );
      console.log(renderRecords(list, vmColumns, format));
    });
  });

  scoped(
    vms.command("show <resourceGroup> <name>").description("Show a VM with its interfaces, routes and security rules"),
  ).action(async (resourceGroup: string, name: string, opts: ScopeOptions) => {
    await run("read virtual machine", async () => {
      const detail = await getServices().inventory.getVirtualMachineDetail(
        subscriptionOf(opts),
        resourceGroup,
        name,
        fetchOptions(opts),
      );
      console.log(JSON.stringify(detail, null, 2));
    });
  });

  vms
    .command("all")
    .description("List virtual machines in every subscription")
    .option("--refresh", "Bypass the cache")
    .option("--format <format>", `Output format (${LIST_FORMATS.join("|")})`, "json")
    .action(async (opts: { refresh?: boolean; format: string }) => {
      await run("list virtual machines", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const list = await getServices().inventory.listAllVirtualMachines(fetchOptions(opts));
        console.log(renderRecords(list, vmContextColumns, format));
      });
    });

  vms
    .command("find <name>")
    .description("Show a VM by name, searching every subscription")
    .option("--refresh", "Bypass the cache")
    .action(async (name: string, opts: { refresh?: boolean }) => {
      await run("find virtual machine", async () => {
        const detail = await getServices().inventory.findVirtualMachine(name, fetchOptions(opts));
        console.log(JSON.stringify(detail, null, 2));
      });
    });

  vms
    .command("hostnames")
    .description("List VM names with their hostname tag")
    .option("--subscription <id>", "Limit to one subscription (default: all)")
    .option("--refresh", "Bypass the cache")
    .option("--format <format>", `Output format (${LIST_FORMATS.join("|")})`, "json")
    .action(async (opts: { subscription?: string; refresh?: boolean; format: string }) => {
      await run("list hostnames", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const list = await getServices().inventory.listHostnames(opts.subscription, fetchOptions(opts));
        console.log(renderRecords(list, hostnameColumns, format));
      });
    });

  vms
    .command("report")
    .description("Report every VM with its tags, addresses, size and OS disk")
    .option("--refresh", "Bypass the cache")
    .option("--format <format>", `Output format (${LIST_FORMATS.join("|")})`, "json")
    .action(async (opts: { refresh?: boolean; format: string }) => {
      await run("build VM report", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const report = await getServices().inventory.buildReport(fetchOptions(opts));
        console.log(renderRecords(report, vmReportColumns, format));
      });
    });

  // ---------------------------------------------------------------------------
  // subscriptions / resource-groups
  // ---------------------------------------------------------------------------
  program
    .command("subscriptions")
    .description("Azure subscriptions")
    .command("list")
    .description("List subscriptions visible to the credential")
    .option("--refresh", "Bypass the cache")
    .option("--format <format>", `Output format (${LIST_FORMATS.join("|")})`, "json")
    .action(async (opts: { refresh?: boolean; format: string }) => {
      await run("list subscriptions", async () => {
        const format = parseFormat(opts.format, LIST_FORMATS);
        const list = await getServices().resources.listSubscriptions(fetchOptions(opts));
        console.log(renderRecords(list, subscriptionColumns, format));
      });
    });

  const groups = program.command("resource-groups").description("Resource groups");

  listing(groups.command("list").description("List resource groups")).action(async (opts: ListOptions) => {
    await run("list resource groups", async () => {
      const format = parseFormat(opts.format, LIST_FORMATS);
      const list = await getServices().resources.listResourceGroups(subscriptionOf(opts), fetchOptions(opts));
      console.log(renderRecords(list, resourceGroupColumns, format));
    });
  });

  // ---------------------------------------------------------------------------
  // export
  // ---------------------------------------------------------------------------
  const exportCmd = program.command("export").description("Export data for offline analysis");

  exportCmd
    .command("machines")
    .description("Write one vm_<name>.json document per VM, for `connectivity -f`")
    .option("--subscription <id>", "Azure subscription ID (default: AZURE_SUBSCRIPTION_ID)")
    .option("--resource-group <rg>", "Limit to one resource group")
    .option("--refresh", "Bypass the cache")
    .requiredOption("--out <dir>", "Output directory")
    .action(async (opts: { subscription?: string; resourceGroup?: string; refresh?: boolean; out: string }) => {
      await run("export machines", async () => {
        const written = await getServices().topology.exportMachines(
          subscriptionOf(opts),
          opts.out,
          opts.resourceGroup,
          fetchOptions(opts),
        );
        console.log(theme.success(`Wrote ${written.length} machine document(s) to ${opts.out}`));
      });
    });

  // ---------------------------------------------------------------------------
  // serve
  // ---------------------------------------------------------------------------
  program
    .command("serve")
    .description("Start the REST API")
    .option("--port <port>", "Port to listen on (default: PORT or 8000)", parsePort)
    .option("--host <host>", "Interface to bind (default: HOST or 127.0.0.1)")
    .option("-r, --routes <file>", "JSON file with gateway routes for connectivity queries")
    .action(async (opts: { port?: number; host?: string; routes?: string }) => {
      await run("start API server", async () => {
        const { server: serverConfig } = getConfig();
        const { resources, topology, peering: reconciler, inventory } = getServices();
        await startServer({
          port: opts.port ?? serverConfig.port,
          host: opts.host ?? serverConfig.host,
          apiKey: serverConfig.apiKey,
          resources,
          topology,
          peering: reconciler,
          inventory,
          gatewayRoutes: opts.routes ? await loadGatewayRoutes(opts.routes) : undefined,
        });
      });
    });

  return program;
}
