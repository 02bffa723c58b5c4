/**
 * azure-vnet-topology
 *
 * Cached Azure network resource facade, route and security rule resolution,
 * VM inventory, reachability analysis and VNet peering reconciliation.
 */

export { VERSION } from "./version.js";

// Configuration & errors
export { loadConfig, validateConfig, getDefaultConfig, configSchema, DEFAULT_GATEWAY_IP } from "./config.js";
export type { AppConfig, Environment } from "./config.js";
export {
  AzureProviderError,
  ParseError,
  ConfigError,
  classifyAzureError,
  toProviderError,
  isProviderError,
  describeError,
} from "./errors.js";
export type { AzureErrorKind, AzureProviderErrorOptions } from "./errors.js";
export { withAzureRetry, shouldRetryAzureError, formatErrorMessage } from "./retry.js";
export type { AzureRetryOptions, FetchOptions } from "./types.js";

// Infrastructure
export * from "./logging/index.js";
export * from "./cache/index.js";
export { ConcurrencyLimiter, createConcurrencyLimiter } from "./concurrency/limiter.js";
export type { LimiterStats } from "./concurrency/limiter.js";
export * from "./credentials/index.js";

// Azure resources
export * from "./network/index.js";
export * from "./vms/index.js";
export * from "./subscriptions/index.js";
export * from "./resources/index.js";
export * from "./provider/index.js";
export * from "./service/index.js";

// Analysis
export * from "./routes/index.js";
export * from "./topology/index.js";
export * from "./peering/index.js";
export * from "./security/index.js";
export * from "./inventory/index.js";

// Surfaces
export { createServices } from "./lifecycle.js";
export type { Services } from "./lifecycle.js";
export { startApiServer } from "./api/server.js";
export type { ApiServerOptions, ApiServerHandle } from "./api/server.js";
export { createProgram } from "./cli/program.js";
export type { ProgramOptions } from "./cli/program.js";
