/**
 * Error Model
 *
 * Every upstream failure is normalised into an AzureProviderError carrying a
 * kind. Callers branch on the kind: NotFound and Transient degrade to a
 * fallback, Unauthorized aborts the whole operation.
 */

import { formatErrorMessage, readErrorCode, readErrorField, readErrorStatus, shouldRetryAzureError } from "./retry.js";

// =============================================================================
// Types
// =============================================================================

export type AzureErrorKind = "NotFound" | "Unauthorized" | "Transient" | "Unknown";

export type AzureProviderErrorOptions = {
  statusCode?: number;
  code?: string;
  cause?: unknown;
};

// =============================================================================
// Error Classes
// =============================================================================

export class AzureProviderError extends Error {
  readonly kind: AzureErrorKind;
  readonly statusCode?: number;
  readonly code?: string;

  constructor(kind: AzureErrorKind, message: string, options: AzureProviderErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "AzureProviderError";
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.code = options.code;
  }
}

/**
 * Raised for malformed resource identifiers, address prefixes and route
 * documents. The offending item is skipped; the surrounding batch continues.
 */
export class ParseError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "ParseError";
    this.input = input;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// =============================================================================
// Classification
// =============================================================================

const NOT_FOUND_CODES = new Set([
  "ResourceNotFound",
  "NotFound",
  "ResourceGroupNotFound",
  "SubscriptionNotFound",
  "ParentResourceNotFound",
]);

const UNAUTHORIZED_CODES = new Set([
  "AuthorizationFailed",
  "AuthenticationFailed",
  "InvalidAuthenticationToken",
  "InvalidAuthenticationTokenTenant",
  "LinkedAuthorizationFailed",
]);

// Thrown by @azure/identity when no credential in the chain can produce a token
const CREDENTIAL_ERROR_NAMES = new Set([
  "CredentialUnavailableError",
  "AuthenticationError",
  "AggregateAuthenticationError",
  "AuthenticationRequiredError",
]);

export function classifyAzureError(error: unknown): AzureErrorKind {
  if (error instanceof AzureProviderError) return error.kind;

  const name = readErrorField(error, "name");
  if (typeof name === "string" && CREDENTIAL_ERROR_NAMES.has(name)) return "Unauthorized";

  const statusCode = readErrorStatus(error);
  const code = readErrorCode(error);

  if (statusCode === 401 || statusCode === 403) return "Unauthorized";
  if (code && UNAUTHORIZED_CODES.has(code)) return "Unauthorized";
  if (statusCode === 404) return "NotFound";
  if (code && NOT_FOUND_CODES.has(code)) return "NotFound";
  if (shouldRetryAzureError(error)) return "Transient";

  return "Unknown";
}

/**
 * Wrap any thrown value in an AzureProviderError. Values that already are one
 * pass through untouched.
 */
export function toProviderError(error: unknown, operation?: string): AzureProviderError {
  if (error instanceof AzureProviderError) return error;

  const kind = classifyAzureError(error);
  const detail = formatErrorMessage(error);
  const message = operation ? `${operation} failed: ${detail}` : detail;

  return new AzureProviderError(kind, message, {
    statusCode: readErrorStatus(error),
    code: readErrorCode(error),
    cause: error,
  });
}

export function isProviderError(error: unknown, kind?: AzureErrorKind): error is AzureProviderError {
  return error instanceof AzureProviderError && (kind === undefined || error.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
