export { AzureResourceManager, createResourceManager } from "./manager.js";
export type { ResourceGroup } from "./types.js";
