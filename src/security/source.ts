/**
 * NSG Rule Source
 *
 * Ordered fallback strategies for the security rules of a NIC: the NSG
 * attached to the NIC, then the rules Azure reports as effective, then the
 * rules every NSG starts with.
 */

import { isProviderError, describeError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { tryParseResourceId } from "../network/resource-id.js";
import type { NetworkInterface, SecurityRule } from "../network/types.js";
import type { FetchOptions } from "../types.js";
import type { NsgRuleDataSource, NsgRuleLookup, NsgRuleStrategy, ResolvedNsgRules } from "./types.js";

/** Azure's built-in rules, present in every NSG below any user rule. */
export const DEFAULT_NSG_RULES: readonly SecurityRule[] = [
  { name: "AllowVnetInBound", direction: "Inbound", protocol: "*", portRange: "*", access: "Allow", priority: 65000 },
  { name: "AllowAzureLoadBalancerInBound", direction: "Inbound", protocol: "*", portRange: "*", access: "Allow", priority: 65001 },
  { name: "DenyAllInBound", direction: "Inbound", protocol: "*", portRange: "*", access: "Deny", priority: 65500 },
  { name: "AllowVnetOutBound", direction: "Outbound", protocol: "*", portRange: "*", access: "Allow", priority: 65000 },
  { name: "AllowInternetOutBound", direction: "Outbound", protocol: "*", portRange: "*", access: "Allow", priority: 65001 },
  { name: "DenyAllOutBound", direction: "Outbound", protocol: "*", portRange: "*", access: "Deny", priority: 65500 },
];

// =============================================================================
// Strategies
// =============================================================================

/**
 * User rules of the NSG attached directly to the NIC. A NIC without one
 * yields nothing.
 */
export class NicSecurityGroupStrategy implements NsgRuleStrategy {
  readonly name = "nic-security-group";

  constructor(private readonly dataSource: NsgRuleDataSource) {}

  async resolve({ nic, options }: NsgRuleLookup): Promise<SecurityRule[]> {
    if (!nic.networkSecurityGroupId) return [];
    const nsgId = tryParseResourceId(nic.networkSecurityGroupId);
    if (!nsgId) return [];

    const group = await this.dataSource.getNetworkSecurityGroup(nsgId.subscriptionId, nsgId.resourceGroup, nsgId.name, options);
    return group.securityRules;
  }
}

export class EffectiveSecurityRulesStrategy implements NsgRuleStrategy {
  readonly name = "effective-security-rules";

  constructor(private readonly dataSource: NsgRuleDataSource) {}

  resolve({ subscriptionId, nic, options }: NsgRuleLookup): Promise<SecurityRule[]> {
    return this.dataSource.getEffectiveSecurityRules(subscriptionId, nic.resourceGroup, nic.name, options);
  }
}

export class DefaultSecurityRulesStrategy implements NsgRuleStrategy {
  readonly name = "default-security-rules";

  async resolve(): Promise<SecurityRule[]> {
    return DEFAULT_NSG_RULES.map((rule) => ({ ...rule }));
  }
}

// =============================================================================
// NSG Rule Source
// =============================================================================

export type NsgRuleSourceOptions = {
  dataSource: NsgRuleDataSource;
  logger?: Logger;
  /** Override the strategy chain; the built-in rules are appended if missing. */
  strategies?: NsgRuleStrategy[];
};

export class NsgRuleSource {
  private strategies: NsgRuleStrategy[];
  private logger: Logger;

  constructor(options: NsgRuleSourceOptions) {
    this.logger = options.logger ?? getLogger("security");
    const strategies = options.strategies ?? [
      new NicSecurityGroupStrategy(options.dataSource),
      new EffectiveSecurityRulesStrategy(options.dataSource),
    ];
    this.strategies = strategies.some((s) => s.name === "default-security-rules")
      ? strategies
      : [...strategies, new DefaultSecurityRulesStrategy()];
  }

  /**
   * Resolve rules for one NIC. Unauthorized aborts; any other failure moves
   * on to the next strategy.
   */
  async rulesFor(subscriptionId: string, nic: NetworkInterface, options: FetchOptions = {}): Promise<ResolvedNsgRules> {
    for (const strategy of this.strategies) {
      try {
        const rules = await strategy.resolve({ subscriptionId, nic, options });
        if (rules.length > 0) {
          this.logger.debug(`security rules for ${nic.name} from ${strategy.name}`, { count: rules.length });
          return { rules, source: strategy.name };
        }
      } catch (error) {
        if (isProviderError(error, "Unauthorized")) throw error;
        this.logger.warn(`${strategy.name} failed for ${nic.name}: ${describeError(error)}`);
      }
    }

    return { rules: [], source: "default-security-rules" };
  }
}
