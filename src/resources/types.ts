/**
 * Resource group types.
 */

export type ResourceGroup = {
  id: string;
  name: string;
  location: string;
  provisioningState?: string;
  managedBy?: string;
  tags?: Record<string, string>;
};
