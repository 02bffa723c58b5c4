/**
 * Service wiring.
 *
 * Builds the ARM-backed provider and the services layered on it from one
 * validated configuration. One limiter and one set of caches is shared by
 * every component built here.
 */

import type { AppConfig } from "./config.js";
import { ConcurrencyLimiter } from "./concurrency/limiter.js";
import { createCredentialsManagerFromConfig } from "./credentials/index.js";
import { VirtualMachineInventory } from "./inventory/service.js";
import { getLogger, type Logger } from "./logging/index.js";
import { PeeringReconciler } from "./peering/reconciler.js";
import { ArmResourceProvider } from "./provider/arm-provider.js";
import type { AzureResourceProvider } from "./provider/types.js";
import { AzureResourceService } from "./service/resource-service.js";
import { NetworkTopologyService } from "./topology/service.js";

export type Services = {
  resources: AzureResourceService;
  topology: NetworkTopologyService;
  peering: PeeringReconciler;
  inventory: VirtualMachineInventory;
};

/**
 * Build the service stack. `provider` replaces the ARM-backed provider,
 * e.g. with the in-memory one.
 */
export function createServices(config: AppConfig, provider?: AzureResourceProvider, logger?: Logger): Services {
  const log = logger ?? getLogger();
  log.debug("initializing services", { maxConcurrency: config.maxConcurrency, cache: config.cache.type });

  const upstream =
    provider ??
    new ArmResourceProvider({
      credentialsManager: createCredentialsManagerFromConfig(config),
      // The service retries around its limiter
      retryOptions: { maxAttempts: 1 },
    });

  const resources = new AzureResourceService({
    provider: upstream,
    limiter: new ConcurrencyLimiter(config.maxConcurrency),
    cache: {
      backend: config.cache.type,
      ttlSeconds: config.cache.ttlSeconds,
      maxEntries: config.cache.maxEntries,
    },
    retry: config.retry,
    logger: log.child("service"),
  });

  const topology = new NetworkTopologyService({ resources, gatewayIp: config.gatewayIp, logger: log.child("topology") });

  return {
    resources,
    topology,
    peering: new PeeringReconciler({ dataSource: resources, logger: log.child("peering") }),
    inventory: new VirtualMachineInventory({ resources, topology, logger: log.child("inventory") }),
  };
}
