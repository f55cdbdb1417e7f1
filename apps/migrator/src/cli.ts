/**
 * Purpose: Run one tier migration end to end and map its result to a process exit code.
 * Persists: Blob access tiers, through the migration routine.
 * Security Risks: Reads the storage account key from the environment; error logs omit it.
 */

import type { BlobClient } from "@azure/storage-blob";
import { logEvent } from "@tiermover/logger";

import { authenticate } from "./auth";
import { describeConfig, resolveMigrationConfig, type MigrationConfig } from "./config";
import { ConfigurationError, describeError, isDebugMode, wrapOperationFailure } from "./errors";
import { enumerateAndDispatch, type MigrationResult } from "./migrate";
import { createAzureTierStore, type TierStore } from "./storage";

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  configuration: 2,
  partial: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  createStore?: (config: MigrationConfig) => TierStore;
  now?: () => number;
};

export const createDefaultStore = (config: MigrationConfig): TierStore =>
  createAzureTierStore<BlobClient>(authenticate(config), config.containerName);

export const summaryMessage = (result: MigrationResult): string => {
  const { summary } = result;
  const tiers = `from ${summary.sourceTier} to ${summary.targetTier} tier`;
  const runtime = `Total runtime: ${summary.elapsed}`;
  switch (result.kind) {
    case "completed":
      return `Moved ${summary.totalProcessed} blobs ${tiers}. ${runtime}`;
    case "partial":
      return `Moved ${summary.succeeded} of ${summary.totalProcessed} blobs ${tiers}; ${summary.failed} failed. ${runtime}`;
    case "failed":
      return `Run failed after submitting ${summary.totalProcessed} blobs; ${summary.succeeded} moved ${tiers}. ${runtime}`;
  }
};

const reportResult = (result: MigrationResult): void => {
  logEvent({
    level: result.kind === "completed" ? "info" : "warn",
    op: "migrate.summary",
    event: result.kind === "failed" ? "migration.aborted" : "migration.completed",
    outcome: result.kind,
    ...result.summary,
    message: summaryMessage(result),
  });
};

export const runMigratorCli = async (deps: CliDeps = {}): Promise<ExitCode> => {
  const env = deps.env ?? process.env;
  const includeStack = isDebugMode(env);

  let config: MigrationConfig;
  try {
    config = resolveMigrationConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logEvent({ level: "error", op: "migrate.config", event: "config.invalid", ...describeError(error, false) });
      return EXIT_CODES.configuration;
    }
    throw error;
  }

  logEvent({ level: "info", op: "migrate.start", event: "migration.start", ...describeConfig(config) });

  let store: TierStore;
  try {
    store = (deps.createStore ?? createDefaultStore)(config);
  } catch (error) {
    const failure = wrapOperationFailure("authentication_failed", error, "Unable to connect to the storage account");
    logEvent({ level: "error", op: "migrate.failed", event: "migration.failed", ...describeError(failure, includeStack) });
    return EXIT_CODES.failed;
  }

  const result = await enumerateAndDispatch({ store, config, now: deps.now });
  reportResult(result);

  if (result.kind === "failed") {
    logEvent({
      level: "error",
      op: "migrate.failed",
      event: "migration.failed",
      ...describeError(result.error, includeStack),
    });
  }

  return EXIT_CODES[result.kind];
};
