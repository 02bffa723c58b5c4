/**
 * VM inventory types.
 */

import type { VirtualMachine } from "../vms/types.js";

/** A VM together with the subscription it was found in. */
export type VirtualMachineWithContext = VirtualMachine & {
  subscriptionId: string;
  subscriptionName: string;
  /** REST path that returns this VM's detail by name. */
  detailUrl: string;
};

export type VirtualMachineHostname = {
  vmName: string;
  hostname?: string;
};

export type VirtualMachineReportEntry = {
  vmName: string;
  hostname?: string;
  os?: string;
  environment?: string;
  purpose?: string;
  privateIpAddresses: string[];
  publicIpAddresses: string[];
  vmSize: string;
  osDiskSizeGb?: number;
  resourceGroup: string;
  location: string;
  subscriptionId: string;
  subscriptionName: string;
};
