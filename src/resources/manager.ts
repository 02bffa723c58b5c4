/**
 * Azure Resource Manager
 *
 * Lists resource groups via @azure/arm-resources.
 */

import type { ResourceManagementClient as SdkResourceClient, ResourceGroup as SdkResourceGroup } from "@azure/arm-resources";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { ArmClientPool } from "../client-pool/manager.js";
import { withAzureRetry } from "../retry.js";
import { collectAll } from "../pagination.js";
import type { ResourceGroup } from "./types.js";

function mapResourceGroup(rg: SdkResourceGroup): ResourceGroup {
  return {
    id: rg.id ?? "",
    name: rg.name ?? "",
    location: rg.location,
    provisioningState: rg.properties?.provisioningState,
    managedBy: rg.managedBy,
    tags: rg.tags,
  };
}

export class AzureResourceManager {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;
  private clientPool: ArmClientPool<SdkResourceClient>;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId: string,
    retryOptions?: AzureRetryOptions,
    clientPool?: ArmClientPool<SdkResourceClient>,
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
    this.clientPool = clientPool ?? new ArmClientPool<SdkResourceClient>();
  }

  private async getClient(): Promise<SdkResourceClient> {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    const { credential } = await this.credentialsManager.getCredential();
    return this.clientPool.acquire(this.subscriptionId, credential, (cred, scope) => new ResourceManagementClient(cred, scope));
  }

  async listResourceGroups(): Promise<ResourceGroup[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      return collectAll(client.resourceGroups.list(), mapResourceGroup);
    }, this.retryOptions);
  }
}

export function createResourceManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  clientPool?: ArmClientPool<SdkResourceClient>,
): AzureResourceManager {
  return new AzureResourceManager(credentialsManager, subscriptionId, retryOptions, clientPool);
}
