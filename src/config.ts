/**
 * Configuration schema (TypeBox), defaults and environment loading.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

export const DEFAULT_GATEWAY_IP = "20.240.246.240";

export const configSchema = Type.Object({
  logLevel: Type.Union(
    [
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
    ],
    { description: "Minimum level written by the logger" },
  ),
  maxConcurrency: Type.Integer({ minimum: 1, maximum: 100, description: "Upper bound on in-flight Azure calls" }),
  cache: Type.Object({
    type: Type.Union([Type.Literal("memory"), Type.Literal("none")]),
    ttlSeconds: Type.Integer({ minimum: 0, description: "Default entry lifetime; 0 disables expiry" }),
    maxEntries: Type.Integer({ minimum: 1 }),
  }),
  subscriptionId: Type.Optional(Type.String({ description: "Default Azure subscription ID" })),
  tenantId: Type.Optional(Type.String({ description: "Default Azure AD tenant ID" })),
  credentialMethod: Type.Union([
    Type.Literal("default"),
    Type.Literal("cli"),
    Type.Literal("service-principal"),
    Type.Literal("managed-identity"),
    Type.Literal("browser"),
  ]),
  retry: Type.Object({
    maxAttempts: Type.Integer({ minimum: 1 }),
    minDelayMs: Type.Integer({ minimum: 0 }),
    maxDelayMs: Type.Integer({ minimum: 0 }),
  }),
  server: Type.Object({
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
    host: Type.String({ minLength: 1 }),
    apiKey: Type.Optional(Type.String({ minLength: 1 })),
  }),
  gatewayIp: Type.String({ minLength: 1, description: "Address of the synthetic gateway node" }),
});

export type AppConfig = Static<typeof configSchema>;

export function getDefaultConfig(): AppConfig {
  return {
    logLevel: "info",
    maxConcurrency: 5,
    cache: { type: "memory", ttlSeconds: 3600, maxEntries: 5000 },
    credentialMethod: "default",
    retry: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30000 },
    server: { port: 8000, host: "127.0.0.1" },
    gatewayIp: DEFAULT_GATEWAY_IP,
  };
}

// =============================================================================
// Environment Loading
// =============================================================================

export type Environment = Record<string, string | undefined>;

const LEVEL_ALIASES: Record<string, string> = { warning: "warn", critical: "fatal" };
const CACHE_TYPE_ALIASES: Record<string, string> = { "no-cache": "none", nocache: "none" };

function normalize(value: string | undefined, aliases: Record<string, string>): string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const lower = value.trim().toLowerCase();
  return aliases[lower] ?? lower;
}

function pick(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Build the configuration from environment variables layered over the
 * defaults. Numeric values arrive as strings and are converted by the schema.
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const defaults = getDefaultConfig();

  const raw = {
    logLevel: normalize(env.LOG_LEVEL, LEVEL_ALIASES) ?? defaults.logLevel,
    maxConcurrency: pick(env.MAX_CONCURRENCY) ?? defaults.maxConcurrency,
    cache: {
      type: normalize(env.CACHE_TYPE, CACHE_TYPE_ALIASES) ?? defaults.cache.type,
      ttlSeconds: pick(env.CACHE_TTL) ?? defaults.cache.ttlSeconds,
      maxEntries: pick(env.CACHE_MAX_ENTRIES) ?? defaults.cache.maxEntries,
    },
    subscriptionId: pick(env.AZURE_SUBSCRIPTION_ID),
    tenantId: pick(env.AZURE_TENANT_ID),
    credentialMethod: normalize(env.AZURE_CREDENTIAL_METHOD, {}) ?? defaults.credentialMethod,
    retry: {
      maxAttempts: pick(env.AZURE_RETRY_MAX_ATTEMPTS) ?? defaults.retry.maxAttempts,
      minDelayMs: pick(env.AZURE_RETRY_MIN_DELAY_MS) ?? defaults.retry.minDelayMs,
      maxDelayMs: pick(env.AZURE_RETRY_MAX_DELAY_MS) ?? defaults.retry.maxDelayMs,
    },
    server: {
      port: pick(env.PORT) ?? defaults.server.port,
      host: pick(env.HOST) ?? defaults.server.host,
      apiKey: pick(env.API_KEY),
    },
    gatewayIp: pick(env.GATEWAY_IP) ?? defaults.gatewayIp,
  };

  return validateConfig(raw);
}

/**
 * Convert and validate an arbitrary value against the schema.
 */
export function validateConfig(value: unknown): AppConfig {
  const converted = Value.Convert(configSchema, value);
  if (Value.Check(configSchema, converted)) {
    return converted;
  }

  const issues = [...Value.Errors(configSchema, converted)].map((e) => `${e.path || "/"}: ${e.message}`);
  throw new ConfigError(issues);
}
