export { ArmResourceProvider, createArmResourceProvider } from "./arm-provider.js";
export type { ArmResourceProviderOptions } from "./arm-provider.js";
export type { AzureResourceProvider } from "./types.js";
export { MockResourceProvider, createMockProvider } from "./provider-mock.js";
export type { MockProviderConfig, MockSubscriptionEstate, MockOperation } from "./provider-mock.js";
