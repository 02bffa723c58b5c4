export { AzureResourceService, createResourceService } from "./resource-service.js";
export type { AzureResourceServiceOptions, ResourceCacheStats } from "./resource-service.js";
