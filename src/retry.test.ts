/**
 * Retry Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  AZURE_RETRYABLE_CODES,
  formatErrorMessage,
  getAzureRetryAfterMs,
  readErrorStatus,
  retryDelayMs,
  shouldRetryAzureError,
  withAzureRetry,
} from "./retry.js";

const fast = { minDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 };

describe("shouldRetryAzureError", () => {
  it("returns false for null/undefined", () => {
    expect(shouldRetryAzureError(null)).toBe(false);
    expect(shouldRetryAzureError(undefined)).toBe(false);
  });

  it("retries known Azure error codes", () => {
    for (const code of AZURE_RETRYABLE_CODES) {
      expect(shouldRetryAzureError({ code })).toBe(true);
    }
  });

  it("retries throttling and server errors", () => {
    expect(shouldRetryAzureError({ statusCode: 429 })).toBe(true);
    expect(shouldRetryAzureError({ statusCode: 503 })).toBe(true);
    expect(shouldRetryAzureError({ status: 500 })).toBe(true);
  });

  it("does not retry client errors", () => {
    expect(shouldRetryAzureError({ statusCode: 400 })).toBe(false);
    expect(shouldRetryAzureError({ statusCode: 403 })).toBe(false);
    expect(shouldRetryAzureError({ statusCode: 404, code: "ResourceNotFound" })).toBe(false);
  });

  it("retries errors with retryable message patterns", () => {
    expect(shouldRetryAzureError(new Error("socket hang up"))).toBe(true);
    expect(shouldRetryAzureError({ message: "Invalid parameter" })).toBe(false);
  });
});

describe("getAzureRetryAfterMs", () => {
  it("parses numeric retry-after seconds", () => {
    expect(getAzureRetryAfterMs({ headers: { "retry-after": "5" } })).toBe(5000);
  });

  it("returns null without a usable header", () => {
    expect(getAzureRetryAfterMs(null)).toBeNull();
    expect(getAzureRetryAfterMs({ message: "error" })).toBeNull();
    expect(getAzureRetryAfterMs({ headers: {} })).toBeNull();
  });
});

describe("retryDelayMs", () => {
  const config = { maxAttempts: 5, minDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0.2 };

  it("doubles the delay per attempt without jitter at the midpoint", () => {
    expect(retryDelayMs(new Error("busy"), 1, config, () => 0.5)).toBe(100);
    expect(retryDelayMs(new Error("busy"), 3, config, () => 0.5)).toBe(400);
  });

  it("applies jitter and the cap", () => {
    expect(retryDelayMs(new Error("busy"), 2, config, () => 1)).toBeCloseTo(240);
    expect(retryDelayMs(new Error("busy"), 10, config, () => 0.5)).toBe(1000);
  });

  it("prefers Retry-After, capped at maxDelayMs", () => {
    expect(retryDelayMs({ headers: { "retry-after": "0.5" } }, 1, config)).toBe(500);
    expect(retryDelayMs({ headers: { "retry-after": "30" } }, 1, config)).toBe(1000);
  });
});

describe("readErrorStatus", () => {
  it("reads statusCode or status", () => {
    expect(readErrorStatus({ statusCode: 404 })).toBe(404);
    expect(readErrorStatus({ status: 429 })).toBe(429);
    expect(readErrorStatus({ statusCode: "404" })).toBeUndefined();
    expect(readErrorStatus("boom")).toBeUndefined();
  });
});

describe("withAzureRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    expect(await withAzureRetry(fn)).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures until success", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce({ statusCode: 503 })
      .mockRejectedValueOnce({ code: "ECONNRESET" })
      .mockResolvedValue("ok");
    expect(await withAzureRetry(fn, { ...fast, maxAttempts: 3 })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry a 404", async () => {
    const fn = vi.fn().mockRejectedValue({ statusCode: 404, message: "missing" });
    await expect(withAzureRetry(fn, { ...fast, maxAttempts: 3 })).rejects.toEqual({ statusCode: 404, message: "missing" });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts", async () => {
    const fn = vi.fn().mockRejectedValue({ statusCode: 429 });
    await expect(withAzureRetry(fn, { ...fast, maxAttempts: 2 })).rejects.toEqual({ statusCode: 429 });
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe("formatErrorMessage", () => {
  it("includes code and status", () => {
    expect(formatErrorMessage({ code: "AuthorizationFailed", statusCode: 403, message: "denied" })).toBe(
      "[AuthorizationFailed] (HTTP 403) denied",
    );
  });

  it("handles strings and empty values", () => {
    expect(formatErrorMessage("plain")).toBe("plain");
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
    expect(formatErrorMessage({})).toBe("Unknown error");
  });
});
