/**
 * Retry Utilities
 *
 * Azure-specific retry logic with exponential backoff and jitter. Only
 * transient failures (throttling, 5xx, dropped sockets) are retried; a
 * 404 or an authorization failure surfaces on the first attempt.
 */

import type { AzureRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
  "RetryableError",
  "RequestRateTooLarge",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error Fields
// =============================================================================

/**
 * Read a property off an arbitrary thrown value. SDK errors (RestError,
 * identity errors, Node system errors) are plain objects as far as the
 * type system is concerned.
 */
export function readErrorField(error: unknown, field: string): unknown {
  if (typeof error !== "object" || error === null || !(field in error)) return undefined;
  return Reflect.get(error, field);
}

export function readErrorStatus(error: unknown): number | undefined {
  const status = readErrorField(error, "statusCode") ?? readErrorField(error, "status");
  return typeof status === "number" ? status : undefined;
}

export function readErrorCode(error: unknown): string | undefined {
  const code = readErrorField(error, "code") ?? readErrorField(error, "Code");
  return typeof code === "string" && code.length > 0 ? code : undefined;
}

function readErrorMessage(error: unknown): string {
  const message = readErrorField(error, "message");
  return typeof message === "string" ? message : "";
}

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  // Already classified by the provider
  const kind = readErrorField(error, "kind");
  if (kind === "Transient") return true;
  if (kind === "NotFound" || kind === "Unauthorized" || kind === "Unknown") return false;

  const code = readErrorCode(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = readErrorStatus(error) ?? 0;
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = readErrorMessage(error).toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Server-requested wait from a `Retry-After` header, in ms. ARM sends either
 * delta-seconds or an HTTP date.
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const headers = readErrorField(error, "headers");
  if (typeof headers !== "object" || headers === null) return null;

  const header = readErrorField(headers, "retry-after") ?? readErrorField(headers, "Retry-After");
  if (typeof header !== "string" || header.trim() === "") return null;

  if (/^\d+(\.\d+)?$/.test(header.trim())) return Number(header) * 1000;

  const at = Date.parse(header);
  return Number.isNaN(at) ? null : Math.max(0, at - Date.now());
}

// =============================================================================
// Retry Execution
// =============================================================================

export function resolveRetryConfig(options: AzureRetryOptions = {}): RetryConfig {
  const { maxAttempts, minDelayMs, maxDelayMs, jitterFactor } = AZURE_RETRY_DEFAULTS;
  return {
    maxAttempts: options.maxAttempts ?? maxAttempts,
    minDelayMs: options.minDelayMs ?? minDelayMs,
    maxDelayMs: options.maxDelayMs ?? maxDelayMs,
    jitterFactor: options.jitterFactor ?? jitterFactor,
  };
}

/**
 * Wait before the next attempt: the server's Retry-After when present,
 * otherwise exponential backoff from minDelayMs with +/- jitterFactor noise.
 * Both are capped at maxDelayMs.
 */
export function retryDelayMs(error: unknown, attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const requested = getAzureRetryAfterMs(error);
  if (requested !== null) return Math.min(requested, config.maxDelayMs);

  const backoff = Math.min(config.minDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
  const noise = backoff * config.jitterFactor * (random() * 2 - 1);
  return Math.max(config.minDelayMs, backoff + noise);
}

/**
 * Run `fn`, retrying transient Azure failures. The last error is rethrown
 * unchanged.
 */
export async function withAzureRetry<T>(fn: () => Promise<T>, options?: AzureRetryOptions): Promise<T> {
  const config = resolveRetryConfig(options);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxAttempts || !shouldRetryAzureError(error)) throw error;
      await new Promise((resolve) => setTimeout(resolve, retryDelayMs(error, attempt, config)));
    }
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = readErrorCode(error);
  const statusCode = readErrorStatus(error);
  const message = readErrorMessage(error) || "Unknown error";

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
