/**
 * Purpose: Resolve the immutable migration configuration from environment variables.
 * Persists: None.
 * Security Risks: Reads the storage account key; never log the resolved config as-is.
 */

import { parseAccessTier, type AccessTier } from "@tiermover/types";

import { ConfigurationError } from "./errors";

export type MigrationConfig = Readonly<{
  accountName: string;
  accountKey: string;
  accountUrl: string;
  containerName: string;
  sourceTier: AccessTier;
  targetTier: AccessTier;
  batchSize: number;
  sasExpiryHours: number;
  maxInFlightBatches?: number;
}>;

export const ACCOUNT_KEY_ENV = "AZURE_STORAGE_ACCOUNT_KEY";

const DEFAULT_ACCOUNT_NAME = "sourcecms";
const DEFAULT_CONTAINER_NAME = "case-01";
const DEFAULT_SOURCE_TIER: AccessTier = "Hot";
const DEFAULT_TARGET_TIER: AccessTier = "Cool";
const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_SAS_EXPIRY_HOURS = 1;

// The batch API rejects more than 256 sub-requests per call.
export const configCaps = {
  batchSize: { min: 1, max: 256 },
  sasExpiryHours: { min: 1, max: 168 },
  maxInFlightBatches: { min: 1, max: 64 },
} as const;

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(
      "invalid_number",
      `${name}=${raw} is out of allowed range [${range.min}..${range.max}]`
    );
  }

  return value;
};

const parseTier = (env: NodeJS.ProcessEnv, name: string, fallback: AccessTier): AccessTier => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;

  const tier = parseAccessTier(raw);
  if (!tier) {
    throw new ConfigurationError("invalid_tier", `${name}=${raw} is not one of Hot, Cool, Cold, Archive`);
  }
  return tier;
};

const nameRules = {
  account: {
    pattern: /^[a-z0-9]{3,24}$/,
    description: "must be 3-24 lowercase letters and digits",
  },
  // Dashes must sit between letters or digits.
  container: {
    pattern: /^(?=.{3,63}$)[a-z0-9]+(-[a-z0-9]+)*$/,
    description: "must be 3-63 lowercase letters, digits and single dashes, starting and ending with a letter or digit",
  },
} as const;

const parseName = (
  env: NodeJS.ProcessEnv,
  name: string,
  rule: keyof typeof nameRules,
  fallback: string
): string => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const { pattern, description } = nameRules[rule];
  if (!pattern.test(raw)) {
    throw new ConfigurationError("invalid_name", `${name}=${raw} ${description}`);
  }
  return raw;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError("invalid_url", `${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError("invalid_url", `${name} must use http or https scheme. Received: ${value}`);
  }

  return value.replace(/\/+$/, "");
};

export const requireAccountKey = (value: string | undefined): string => {
  if (value == null || value.trim() === "") {
    throw new ConfigurationError("missing_account_key", `The environment variable ${ACCOUNT_KEY_ENV} is not set.`);
  }
  return value;
};

export const validateConfig = (sourceTier: AccessTier, targetTier: AccessTier): void => {
  if (sourceTier === targetTier) {
    throw new ConfigurationError("same_tier", `Source and target access tiers cannot be the same (${sourceTier}).`);
  }
};

export const resolveMigrationConfig = (env: NodeJS.ProcessEnv = process.env): MigrationConfig => {
  const accountKey = requireAccountKey(env[ACCOUNT_KEY_ENV]);

  const sourceTier = parseTier(env, "TIERMOVER_SOURCE_TIER", DEFAULT_SOURCE_TIER);
  const targetTier = parseTier(env, "TIERMOVER_TARGET_TIER", DEFAULT_TARGET_TIER);
  validateConfig(sourceTier, targetTier);

  const accountName = parseName(env, "TIERMOVER_ACCOUNT_NAME", "account", DEFAULT_ACCOUNT_NAME);
  const rawAccountUrl = env.TIERMOVER_ACCOUNT_URL?.trim();

  const config: MigrationConfig = {
    accountName,
    accountKey,
    accountUrl: validateHttpUrl(
      "TIERMOVER_ACCOUNT_URL",
      rawAccountUrl ? rawAccountUrl : `https://${accountName}.blob.core.windows.net`
    ),
    containerName: parseName(env, "TIERMOVER_CONTAINER", "container", DEFAULT_CONTAINER_NAME),
    sourceTier,
    targetTier,
    batchSize: parseOptionalIntInRange(env, "TIERMOVER_BATCH_SIZE", configCaps.batchSize) ?? DEFAULT_BATCH_SIZE,
    sasExpiryHours:
      parseOptionalIntInRange(env, "TIERMOVER_SAS_EXPIRY_HOURS", configCaps.sasExpiryHours) ??
      DEFAULT_SAS_EXPIRY_HOURS,
    maxInFlightBatches: parseOptionalIntInRange(env, "TIERMOVER_MAX_IN_FLIGHT", configCaps.maxInFlightBatches),
  };

  return Object.freeze(config);
};

export const describeConfig = (config: MigrationConfig) => ({
  accountName: config.accountName,
  accountUrl: config.accountUrl,
  containerName: config.containerName,
  sourceTier: config.sourceTier,
  targetTier: config.targetTier,
  batchSize: config.batchSize,
  sasExpiryHours: config.sasExpiryHours,
  maxInFlightBatches: config.maxInFlightBatches ?? "unbounded",
});
