/**
 * Security rule resolution types.
 */

import type { NetworkInterface, NetworkSecurityGroup, SecurityRule } from "../network/types.js";
import type { FetchOptions } from "../types.js";

/**
 * The reads NSG rule resolution needs. AzureResourceService satisfies this.
 */
export interface NsgRuleDataSource {
  getNetworkSecurityGroup(
    subscriptionId: string,
    resourceGroup: string,
    nsgName: string,
    options?: FetchOptions,
  ): Promise<NetworkSecurityGroup>;
  getEffectiveSecurityRules(
    subscriptionId: string,
    resourceGroup: string,
    nicName: string,
    options?: FetchOptions,
  ): Promise<SecurityRule[]>;
}

export type NsgRuleStrategyName = "nic-security-group" | "effective-security-rules" | "default-security-rules";

export type NsgRuleLookup = {
  subscriptionId: string;
  nic: NetworkInterface;
  options: FetchOptions;
};

export interface NsgRuleStrategy {
  readonly name: NsgRuleStrategyName;
  resolve(lookup: NsgRuleLookup): Promise<SecurityRule[]>;
}

export type ResolvedNsgRules = {
  rules: SecurityRule[];
  source: NsgRuleStrategyName;
};
