/**
 * Azure VM Manager
 *
 * Reads virtual machines via @azure/arm-compute.
 */

import type { ComputeManagementClient as ComputeClient, VirtualMachine as SdkVirtualMachine } from "@azure/arm-compute";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { ArmClientPool } from "../client-pool/manager.js";
import { withAzureRetry, readErrorStatus } from "../retry.js";
import { collectAll } from "../pagination.js";
import { resourceGroupFromId } from "../network/resource-id.js";
import type { VirtualMachine, VMPowerState } from "./types.js";

const POWER_STATES: Record<string, VMPowerState> = {
  running: "running",
  stopped: "stopped",
  deallocated: "deallocated",
  starting: "starting",
  stopping: "stopping",
  deallocating: "deallocating",
};

export function parsePowerState(code: string | undefined): VMPowerState {
  if (!code?.startsWith("PowerState/")) return "unknown";
  return POWER_STATES[code.slice("PowerState/".length).toLowerCase()] ?? "unknown";
}

function mapVirtualMachine(vm: SdkVirtualMachine): VirtualMachine {
  const powerStatus = vm.instanceView?.statuses?.find((s) => s.code?.startsWith("PowerState/"));
  return {
    id: vm.id ?? "",
    name: vm.name ?? "",
    resourceGroup: resourceGroupFromId(vm.id),
    location: vm.location ?? "",
    vmSize: vm.hardwareProfile?.vmSize ?? "",
    osType: vm.storageProfile?.osDisk?.osType,
    osDiskSizeGb: vm.storageProfile?.osDisk?.diskSizeGB,
    powerState: parsePowerState(powerStatus?.code),
    provisioningState: vm.provisioningState,
    networkInterfaceIds: (vm.networkProfile?.networkInterfaces ?? []).flatMap((n) => (n.id ? [n.id] : [])),
    tags: vm.tags,
  };
}

// =============================================================================
// AzureVMManager
// =============================================================================

export class AzureVMManager {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private retryOptions: AzureRetryOptions;
  private clientPool: ArmClientPool<ComputeClient>;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId: string,
    retryOptions?: AzureRetryOptions,
    clientPool?: ArmClientPool<ComputeClient>,
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions ?? {};
    this.clientPool = clientPool ?? new ArmClientPool<ComputeClient>();
  }

  private async getComputeClient(): Promise<ComputeClient> {
    const { credential } = await this.credentialsManager.getCredential();
    const { ComputeManagementClient } = await import("@azure/arm-compute");
    return this.clientPool.acquire(this.subscriptionId, credential, (cred, scope) => new ComputeManagementClient(cred, scope));
  }

  /**
   * List virtual machines. Power state is only known for single-VM reads,
   * which expand the instance view.
   */
  async listVMs(resourceGroup?: string): Promise<VirtualMachine[]> {
    const client = await this.getComputeClient();
    return withAzureRetry(
      () =>
        collectAll(
          resourceGroup ? client.virtualMachines.list(resourceGroup) : client.virtualMachines.listAll(),
          mapVirtualMachine,
        ),
      this.retryOptions,
    );
  }

  async getVM(resourceGroup: string, vmName: string): Promise<VirtualMachine | null> {
    const client = await this.getComputeClient();
    return withAzureRetry(async () => {
      try {
        const vm = await client.virtualMachines.get(resourceGroup, vmName, { expand: "instanceView" });
        return mapVirtualMachine(vm);
      } catch (error) {
        if (readErrorStatus(error) === 404) return null;
        throw error;
      }
    }, this.retryOptions);
  }
}

export function createVMManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  clientPool?: ArmClientPool<ComputeClient>,
): AzureVMManager {
  return new AzureVMManager(credentialsManager, subscriptionId, retryOptions, clientPool);
}
