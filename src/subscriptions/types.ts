/**
 * Subscription types.
 */

export type AzureSubscription = {
  id: string;
  subscriptionId: string;
  displayName: string;
  state: string;
  tenantId?: string;
};
