export { AzureSubscriptionManager, createSubscriptionManager } from "./manager.js";
export type { AzureSubscription } from "./types.js";
