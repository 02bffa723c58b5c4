/**
 * Credentials Manager
 *
 * Resolves one @azure/identity TokenCredential for the configured method and
 * hands the same object to every ARM client until it goes stale. Concurrent
 * callers share a single resolution.
 */

import type { TokenCredential } from "@azure/identity";
import type { AppConfig } from "../config.js";
import { AzureProviderError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type AzureCredentialMethod = "default" | "cli" | "service-principal" | "managed-identity" | "browser";

export type CredentialsManagerOptions = {
  defaultSubscription?: string;
  defaultTenantId?: string;
  credentialMethod?: AzureCredentialMethod;
  /** Lifetime of a resolved credential object, not of the tokens it issues. */
  cacheTtlMs?: number;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

type IdentityModule = typeof import("@azure/identity");

type CredentialSettings = {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
};

type CredentialBuilder = (identity: IdentityModule, settings: CredentialSettings) => TokenCredential;

const builders: Record<AzureCredentialMethod, CredentialBuilder> = {
  default: (identity) => new identity.DefaultAzureCredential(),
  cli: (identity, { tenantId }) => new identity.AzureCliCredential(tenantId ? { tenantId } : {}),
  "service-principal": (identity, { tenantId, clientId, clientSecret }) => {
    if (!tenantId || !clientId || !clientSecret) {
      throw new AzureProviderError(
        "Unauthorized",
        "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
      );
    }
    return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
  },
  "managed-identity": (identity, { clientId }) =>
    clientId ? new identity.ManagedIdentityCredential({ clientId }) : new identity.ManagedIdentityCredential(),
  browser: (identity, { tenantId }) => new identity.InteractiveBrowserCredential({ tenantId }),
};

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private readonly method: AzureCredentialMethod;
  private readonly subscriptionId?: string;
  private readonly tenantId?: string;
  private readonly ttlMs: number;
  private pending: Promise<TokenCredential> | null = null;
  private resolvedAt = 0;

  constructor(options: CredentialsManagerOptions = {}) {
    this.method = options.credentialMethod ?? "default";
    this.subscriptionId = options.defaultSubscription ?? process.env.AZURE_SUBSCRIPTION_ID;
    this.tenantId = options.defaultTenantId ?? process.env.AZURE_TENANT_ID;
    this.ttlMs = options.cacheTtlMs ?? 3_600_000;
  }

  async getCredential(): Promise<CredentialResolutionResult> {
    if (!this.pending || Date.now() - this.resolvedAt >= this.ttlMs) {
      this.resolvedAt = Date.now();
      const pending = this.resolve();
      this.pending = pending;
      // A failed resolution is not kept, the next call tries again
      void pending.catch(() => {
        if (this.pending === pending) this.pending = null;
      });
    }

    return {
      credential: await this.pending,
      method: this.method,
      subscriptionId: this.subscriptionId,
      tenantId: this.tenantId,
    };
  }

  getSubscriptionId(): string | undefined {
    return this.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  /** Drop the resolved credential; ARM clients built on it are rebuilt on next use. */
  clearCache(): void {
    this.pending = null;
  }

  // Dynamic import keeps @azure/identity off the load path of commands that
  // only read local machine documents.
  private async resolve(): Promise<TokenCredential> {
    const identity = await import("@azure/identity");
    return builders[this.method](identity, {
      tenantId: this.tenantId,
      clientId: process.env.AZURE_CLIENT_ID,
      clientSecret: process.env.AZURE_CLIENT_SECRET,
    });
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}

export function createCredentialsManagerFromConfig(config: AppConfig): AzureCredentialsManager {
  return new AzureCredentialsManager({
    defaultSubscription: config.subscriptionId,
    defaultTenantId: config.tenantId,
    credentialMethod: config.credentialMethod,
  });
}
