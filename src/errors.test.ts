import { describe, it, expect } from "vitest";
import { AzureProviderError, classifyAzureError, isProviderError, toProviderError } from "./errors.js";

describe("classifyAzureError", () => {
  it("maps status codes", () => {
    expect(classifyAzureError({ statusCode: 404 })).toBe("NotFound");
    expect(classifyAzureError({ statusCode: 401 })).toBe("Unauthorized");
    expect(classifyAzureError({ statusCode: 403 })).toBe("Unauthorized");
    expect(classifyAzureError({ statusCode: 503 })).toBe("Transient");
    expect(classifyAzureError({ statusCode: 400 })).toBe("Unknown");
  });

  it("maps ARM error codes without a status", () => {
    expect(classifyAzureError({ code: "ResourceGroupNotFound" })).toBe("NotFound");
    expect(classifyAzureError({ code: "InvalidAuthenticationToken" })).toBe("Unauthorized");
    expect(classifyAzureError({ code: "ETIMEDOUT" })).toBe("Transient");
  });

  it("treats identity failures as Unauthorized", () => {
    const error = new Error("No credential in the chain");
    error.name = "CredentialUnavailableError";
    expect(classifyAzureError(error)).toBe("Unauthorized");
  });

  it("falls back to Unknown", () => {
    expect(classifyAzureError(new Error("boom"))).toBe("Unknown");
    expect(classifyAzureError(null)).toBe("Unknown");
  });
});

describe("toProviderError", () => {
  it("wraps and keeps the cause", () => {
    const cause = Object.assign(new Error("gone"), { statusCode: 404, code: "ResourceNotFound" });
    const wrapped = toProviderError(cause, "getSubnet");
    expect(wrapped.kind).toBe("NotFound");
    expect(wrapped.message).toBe("getSubnet failed: [ResourceNotFound] (HTTP 404) gone");
    expect(wrapped.statusCode).toBe(404);
    expect(wrapped.cause).toBe(cause);
  });

  it("passes provider errors through", () => {
    const original = new AzureProviderError("Transient", "busy");
    expect(toProviderError(original, "x")).toBe(original);
  });
});

describe("isProviderError", () => {
  it("narrows on kind", () => {
    const error = new AzureProviderError("Unauthorized", "denied");
    expect(isProviderError(error)).toBe(true);
    expect(isProviderError(error, "Unauthorized")).toBe(true);
    expect(isProviderError(error, "NotFound")).toBe(false);
    expect(isProviderError(new Error("x"))).toBe(false);
  });
});
