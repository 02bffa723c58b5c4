/**
 * ARM resource identifier parsing.
 *
 * /subscriptions/{sub}/resourceGroups/{rg}/providers/{namespace}/{type}/{name}[/{childType}/{childName}]
 */

import { ParseError } from "../errors.js";

export type ResourceIdentifier = {
  subscriptionId: string;
  resourceGroup: string;
  namespace: string;
  resourceType: string;
  name: string;
  childType?: string;
  childName?: string;
};

export function parseResourceId(id: string): ResourceIdentifier {
  const parts = id.trim().split("/");

  if (
    parts.length < 9 ||
    parts[0] !== "" ||
    parts[1]?.toLowerCase() !== "subscriptions" ||
    parts[3]?.toLowerCase() !== "resourcegroups" ||
    parts[5]?.toLowerCase() !== "providers"
  ) {
    throw new ParseError(`Malformed resource id: ${id}`, id);
  }

  const [, , subscriptionId, , resourceGroup, , namespace, resourceType, name, childType, childName] = parts;
  if (!subscriptionId || !resourceGroup || !namespace || !resourceType || !name) {
    throw new ParseError(`Malformed resource id: ${id}`, id);
  }

  return {
    subscriptionId,
    resourceGroup,
    namespace,
    resourceType,
    name,
    childType: childType || undefined,
    childName: childName || undefined,
  };
}

export function tryParseResourceId(id: string): ResourceIdentifier | null {
  try {
    return parseResourceId(id);
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
}

/**
 * Resource group segment of an id, or "" when the id carries none.
 */
export function resourceGroupFromId(id: string | undefined): string {
  return (id ?? "").match(/resourceGroups\/([^/]+)/i)?.[1] ?? "";
}

/**
 * Last path segment, i.e. the resource name of a (possibly nested) id.
 */
export function resourceNameFromId(id: string | undefined): string {
  const segments = (id ?? "").split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "";
}
