/**
 * Shared types used across the Azure managers, the resource service and the
 * topology components.
 */

// =============================================================================
// Retry
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

// =============================================================================
// Fetching
// =============================================================================

/**
 * Per-call options accepted by every cached read.
 */
export type FetchOptions = {
  /** Bypass the cache and overwrite the stored entry with a fresh value. */
  refresh?: boolean;
};
