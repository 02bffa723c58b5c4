/**
 * VM Inventory
 *
 * VM reads that span subscriptions (listing, lookup by name, hostnames and
 * the VM report) and the per-VM detail view with public IPs and security
 * rules resolved.
 */

import { AzureProviderError, describeError, isProviderError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { tryParseResourceId } from "../network/resource-id.js";
import type { NetworkInterface } from "../network/types.js";
import { NsgRuleSource } from "../security/source.js";
import type { ResolvedNsgRules } from "../security/types.js";
import type { AzureResourceService } from "../service/resource-service.js";
import type { NetworkTopologyService } from "../topology/service.js";
import type { FetchOptions } from "../types.js";
import type { NetworkInterfaceDetail, VirtualMachine, VirtualMachineDetail } from "../vms/types.js";
import type { VirtualMachineHostname, VirtualMachineReportEntry, VirtualMachineWithContext } from "./types.js";

export const VM_DETAIL_PATH = "/api/subscriptions/virtual_machines";

/** Tag names are case-insensitive in Azure. */
export function tagValue(tags: Record<string, string> | undefined, key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const [name, value] of Object.entries(tags ?? {})) {
    if (name.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export type VirtualMachineInventoryOptions = {
  resources: AzureResourceService;
  topology: NetworkTopologyService;
  rules?: NsgRuleSource;
  logger?: Logger;
};

export class VirtualMachineInventory {
  private resources: AzureResourceService;
  private topology: NetworkTopologyService;
  private rules: NsgRuleSource;
  private logger: Logger;

  constructor(options: VirtualMachineInventoryOptions) {
    this.resources = options.resources;
    this.topology = options.topology;
    this.logger = options.logger ?? getLogger("inventory");
    this.rules = options.rules ?? new NsgRuleSource({ dataSource: options.resources, logger: this.logger.child("security") });
  }

  // ===========================================================================
  // Detail
  // ===========================================================================

  async getVirtualMachineDetail(
    subscriptionId: string,
    resourceGroup: string,
    vmName: string,
    options: FetchOptions = {},
  ): Promise<VirtualMachineDetail> {
    const vm = await this.resources.getVirtualMachine(subscriptionId, resourceGroup, vmName, options);
    const profile = await this.topology.getMachineProfile(subscriptionId, vm, options);

    const [interfaces, routeSet, security] = await Promise.all([
      this.withPublicIps(profile.interfaces, options),
      this.topology.resolveRoutes(profile, options),
      this.primaryRules(subscriptionId, vm, profile.interfaces[0], options),
    ]);

    return {
      ...vm,
      hostname: tagValue(vm.tags, "hostname"),
      networkInterfaces: interfaces,
      effectiveRoutes: routeSet.routes,
      effectiveSecurityRules: security?.rules ?? [],
      securityRuleSource: security?.source,
    };
  }

  private async primaryRules(
    subscriptionId: string,
    vm: VirtualMachine,
    nic: NetworkInterface | undefined,
    options: FetchOptions,
  ): Promise<ResolvedNsgRules | null> {
    if (!nic) {
      this.logger.warn(`${vm.name} has no readable network interface, so no security rules`);
      return null;
    }
    return this.rules.rulesFor(subscriptionId, nic, options);
  }

  /**
   * Addresses behind a NIC's public IP resources. Unallocated dynamic IPs
   * have none; an IP that cannot be read is skipped, Unauthorized propagates.
   */
  async resolvePublicIps(nic: NetworkInterface, options: FetchOptions = {}): Promise<string[]> {
    const addresses = await Promise.all(
      nic.publicIpAddressIds.map(async (id) => {
        const parsed = tryParseResourceId(id);
        if (!parsed) {
          this.logger.warn(`skipping malformed public IP id on ${nic.name}: ${id}`);
          return null;
        }
        try {
          const address = await this.resources.getPublicIpAddress(parsed.subscriptionId, parsed.resourceGroup, parsed.name, options);
          return address.ipAddress ?? null;
        } catch (error) {
          if (isProviderError(error, "Unauthorized")) throw error;
          this.logger.warn(`skipping public IP ${parsed.name} of ${nic.name}: ${describeError(error)}`);
          return null;
        }
      }),
    );
    return addresses.filter((address): address is string => address !== null);
  }

  private withPublicIps(interfaces: NetworkInterface[], options: FetchOptions): Promise<NetworkInterfaceDetail[]> {
    return Promise.all(
      interfaces.map(async (nic) => ({ ...nic, publicIpAddresses: await this.resolvePublicIps(nic, options) })),
    );
  }

  // ===========================================================================
  // Across Subscriptions
  // ===========================================================================

  /**
   * Every VM visible to the credential. A subscription whose VMs cannot be
   * listed is logged and left out; failing to list subscriptions propagates.
   */
  async listAllVirtualMachines(options: FetchOptions = {}): Promise<VirtualMachineWithContext[]> {
    const subscriptions = await this.resources.listSubscriptions(options);

    const perSubscription = await Promise.all(
      subscriptions.map(async (subscription) => {
        try {
          const vms = await this.resources.listVirtualMachines(subscription.subscriptionId, undefined, options);
          return vms.map((vm) => ({
            ...vm,
            subscriptionId: subscription.subscriptionId,
            subscriptionName: subscription.displayName,
            detailUrl: `${VM_DETAIL_PATH}/${encodeURIComponent(vm.name)}`,
          }));
        } catch (error) {
          this.logger.warn(`skipping subscription ${subscription.subscriptionId}: ${describeError(error)}`);
          return [];
        }
      }),
    );

    const vms = perSubscription.flat();
    this.logger.info(`found ${vms.length} VM(s) across ${subscriptions.length} subscription(s)`);
    return vms;
  }

  /**
   * Detail of the first VM whose name matches, ignoring case, in
   * subscription listing order.
   */
  async findVirtualMachine(vmName: string, options: FetchOptions = {}): Promise<VirtualMachineDetail> {
    const wanted = vmName.toLowerCase();
    const match = (await this.listAllVirtualMachines(options)).find((vm) => vm.name.toLowerCase() === wanted);
    if (!match) {
      throw new AzureProviderError("NotFound", `Virtual machine ${vmName} not found in any subscription`, {
        statusCode: 404,
      });
    }
    return this.getVirtualMachineDetail(match.subscriptionId, match.resourceGroup, match.name, options);
  }

  /**
   * VM names with their `hostname` tag, for one subscription or all of them.
   */
  async listHostnames(subscriptionId?: string, options: FetchOptions = {}): Promise<VirtualMachineHostname[]> {
    if (subscriptionId) {
      const subscriptions = await this.resources.listSubscriptions(options);
      if (!subscriptions.some((s) => s.subscriptionId.toLowerCase() === subscriptionId.toLowerCase())) {
        throw new AzureProviderError("NotFound", `Subscription ${subscriptionId} not found`, { statusCode: 404 });
      }
      const vms = await this.resources.listVirtualMachines(subscriptionId, undefined, options);
      return vms.map(hostnameOf);
    }

    const vms = await this.listAllVirtualMachines(options);
    if (vms.length === 0) {
      this.logger.warn("no VMs found in any subscription; the credential may lack read access");
    }
    return vms.map(hostnameOf);
  }

  // ===========================================================================
  // Report
  // ===========================================================================

  /**
   * One row per VM across every subscription. A VM whose interfaces cannot
   * be read is left out of the report.
   */
  async buildReport(options: FetchOptions = {}): Promise<VirtualMachineReportEntry[]> {
    const vms = await this.listAllVirtualMachines(options);

    const entries = await Promise.all(
      vms.map(async (vm) => {
        try {
          const interfaces = await this.withPublicIps(
            await this.topology.getMachineInterfaces(vm.subscriptionId, vm, options),
            options,
          );
          return toReportEntry(vm, interfaces);
        } catch (error) {
          this.logger.warn(`leaving ${vm.name} out of the report: ${describeError(error)}`);
          return null;
        }
      }),
    );

    const report = entries.filter((entry): entry is VirtualMachineReportEntry => entry !== null);
    this.logger.info(`report covers ${report.length} of ${vms.length} VM(s)`);
    return report;
  }
}

function hostnameOf(vm: VirtualMachine): VirtualMachineHostname {
  return { vmName: vm.name, hostname: tagValue(vm.tags, "hostname") };
}

function toReportEntry(vm: VirtualMachineWithContext, interfaces: NetworkInterfaceDetail[]): VirtualMachineReportEntry {
  return {
    vmName: vm.name,
    hostname: tagValue(vm.tags, "hostname"),
    os: vm.osType,
    environment: tagValue(vm.tags, "environment"),
    purpose: tagValue(vm.tags, "purpose"),
    privateIpAddresses: interfaces.flatMap((nic) => nic.privateIpAddresses),
    publicIpAddresses: interfaces.flatMap((nic) => nic.publicIpAddresses),
    vmSize: vm.vmSize,
    osDiskSizeGb: vm.osDiskSizeGb,
    resourceGroup: vm.resourceGroup,
    location: vm.location,
    subscriptionId: vm.subscriptionId,
    subscriptionName: vm.subscriptionName,
  };
}
