/**
 * Azure Subscription Manager
 *
 * Lists the subscriptions visible to the credential via @azure/arm-subscriptions.
 */

import type { SubscriptionClient as SdkSubscriptionClient, Subscription as SdkSubscription } from "@azure/arm-subscriptions";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { ArmClientPool, TENANT_SCOPE } from "../client-pool/manager.js";
import { withAzureRetry } from "../retry.js";
import { collectAll } from "../pagination.js";
import type { AzureSubscription } from "./types.js";

function mapSubscription(s: SdkSubscription): AzureSubscription {
  return {
    id: s.id ?? "",
    subscriptionId: s.subscriptionId ?? "",
    displayName: s.displayName ?? "",
    state: s.state ?? "Unknown",
    tenantId: s.tenantId,
  };
}

export class AzureSubscriptionManager {
  private credentialsManager: AzureCredentialsManager;
  private retryOptions?: AzureRetryOptions;
  private clientPool: ArmClientPool<SdkSubscriptionClient>;

  constructor(
    credentialsManager: AzureCredentialsManager,
    retryOptions?: AzureRetryOptions,
    clientPool?: ArmClientPool<SdkSubscriptionClient>,
  ) {
    this.credentialsManager = credentialsManager;
    this.retryOptions = retryOptions;
    this.clientPool = clientPool ?? new ArmClientPool<SdkSubscriptionClient>();
  }

  private async getClient(): Promise<SdkSubscriptionClient> {
    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const { credential } = await this.credentialsManager.getCredential();
    return this.clientPool.acquire(TENANT_SCOPE, credential, (cred) => new SubscriptionClient(cred));
  }

  async listSubscriptions(): Promise<AzureSubscription[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      return collectAll(client.subscriptions.list(), mapSubscription);
    }, this.retryOptions);
  }
}

export function createSubscriptionManager(
  credentialsManager: AzureCredentialsManager,
  retryOptions?: AzureRetryOptions,
): AzureSubscriptionManager {
  return new AzureSubscriptionManager(credentialsManager, retryOptions);
}
