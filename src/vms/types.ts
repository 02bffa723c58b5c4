/**
 * Virtual machine types.
 */

import type { NetworkInterface, RouteEntry, SecurityRule } from "../network/types.js";
import type { NsgRuleStrategyName } from "../security/types.js";

export type VMPowerState = "running" | "stopped" | "deallocated" | "starting" | "stopping" | "deallocating" | "unknown";

export type VirtualMachine = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  vmSize: string;
  osType?: string;
  osDiskSizeGb?: number;
  powerState: VMPowerState;
  provisioningState?: string;
  networkInterfaceIds: string[];
  tags?: Record<string, string>;
};

/** A NIC with its public IP ids resolved to addresses. */
export type NetworkInterfaceDetail = NetworkInterface & {
  publicIpAddresses: string[];
};

/**
 * Everything known about one VM. Routes merge every interface; security
 * rules are those of the primary interface, absent when the VM has none.
 */
export type VirtualMachineDetail = VirtualMachine & {
  hostname?: string;
  networkInterfaces: NetworkInterfaceDetail[];
  effectiveRoutes: RouteEntry[];
  effectiveSecurityRules: SecurityRule[];
  securityRuleSource?: NsgRuleStrategyName;
};
