/**
 * Purpose: Enumerate a container, batch blobs at the source tier and dispatch tier changes to the target tier.
 * Persists: Blob access tiers, through the TierStore.
 * Security Risks: Logs blob names, unsigned URLs and metadata values; do not store secrets in blob metadata.
 */

import { logEvent } from "@tiermover/logger";
import type { BatchOutcome, BatchSubResult, BlobRecord, MigrationSummary } from "@tiermover/types";

import { validateConfig, type MigrationConfig } from "./config";
import { OperationError, wrapOperationFailure } from "./errors";
import { createLimiter, unlimited } from "./limiter";
import type { TierStore } from "./storage";

export type MigrationPlan = Pick<MigrationConfig, "sourceTier" | "targetTier" | "batchSize" | "maxInFlightBatches">;

export type MigrationResult =
  | { kind: "completed"; summary: MigrationSummary; outcomes: BatchOutcome[] }
  | { kind: "partial"; summary: MigrationSummary; outcomes: BatchOutcome[] }
  | { kind: "failed"; error: OperationError; summary: MigrationSummary; outcomes: BatchOutcome[] };

type SettledBatch =
  | { ok: true; outcome: BatchOutcome }
  | { ok: false; batchNumber: number; size: number; error: OperationError };

const pad2 = (value: number): string => String(value).padStart(2, "0");

export const formatElapsed = (elapsedMs: number): string => {
  const totalSeconds = Math.max(0, Math.floor(elapsedMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
};

export const isSubRequestFailure = (result: BatchSubResult): boolean =>
  result.status < 200 || result.status >= 300;

export const summarizeBatch = (batchNumber: number, results: BatchSubResult[]): BatchOutcome => {
  const failures = results.filter(isSubRequestFailure);
  return {
    batchNumber,
    size: results.length,
    succeeded: results.length - failures.length,
    failed: failures.length,
    failures,
  };
};

const reportBlob = (blob: BlobRecord): void => {
  logEvent({
    level: "info",
    op: "migrate.enumerate",
    event: "blob.listed",
    name: blob.name,
    url: blob.url,
    tier: blob.tier ?? "Unknown",
  });

  const entries = Object.entries(blob.metadata);
  if (entries.length === 0) {
    logEvent({ level: "debug", op: "migrate.enumerate", event: "blob.metadata.none", name: blob.name });
    return;
  }
  for (const [key, value] of entries) {
    logEvent({ level: "info", op: "migrate.enumerate", event: "blob.metadata", name: blob.name, key, value });
  }
};

const reportOutcome = (outcome: BatchOutcome): void => {
  logEvent({
    level: outcome.failed > 0 ? "warn" : "info",
    op: "migrate.batch",
    event: "batch.completed",
    batchNumber: outcome.batchNumber,
    size: outcome.size,
    succeeded: outcome.succeeded,
    failed: outcome.failed,
  });
  for (const failure of outcome.failures) {
    logEvent({
      level: "warn",
      op: "migrate.batch",
      event: "blob.tier.failed",
      batchNumber: outcome.batchNumber,
      name: failure.name,
      status: failure.status,
      errorCode: failure.errorCode,
    });
  }
};

/**
 * Lists every blob in the store once, dispatching a tier change for each full
 * batch of blobs at the source tier and for the trailing partial batch.
 *
 * Dispatched batches are not awaited until enumeration ends. A batch request
 * that throws stops further dispatch; the batches already in flight are still
 * awaited so their outcomes are reported.
 */
export const enumerateAndDispatch = async (deps: {
  store: TierStore;
  config: MigrationPlan;
  now?: () => number;
}): Promise<MigrationResult> => {
  const { store, config } = deps;
  const now = deps.now ?? Date.now;
  const { sourceTier, targetTier, batchSize } = config;

  validateConfig(sourceTier, targetTier);
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error("batchSize must be an integer >= 1");
  }

  const startedAt = now();
  const limit = config.maxInFlightBatches ? createLimiter(config.maxInFlightBatches) : unlimited;
  const pending: Array<Promise<SettledBatch>> = [];
  let batch: string[] = [];
  let batchCount = 0;
  let totalProcessed = 0;
  let dispatchFailure: OperationError | undefined;

  const dispatch = (names: string[]): void => {
    batchCount += 1;
    const batchNumber = batchCount;
    totalProcessed += names.length;

    pending.push(
      limit(() => store.setTier(names, targetTier)).then(
        (results): SettledBatch => {
          const outcome = summarizeBatch(batchNumber, results);
          reportOutcome(outcome);
          return { ok: true, outcome };
        },
        (reason: unknown): SettledBatch => {
          const error = wrapOperationFailure("batch_failed", reason, `Batch ${batchNumber} tier change failed`);
          dispatchFailure ??= error;
          return { ok: false, batchNumber, size: names.length, error };
        }
      )
    );

    logEvent({
      level: "info",
      op: "migrate.batch",
      event: "batch.submitted",
      batchNumber,
      size: names.length,
      totalProcessed,
      message: `No. of blobs moved to ${targetTier} tier: ${totalProcessed}`,
    });
  };

  logEvent({ level: "info", op: "migrate.enumerate", event: "blobs.enumerate.start", message: "Enumerating blobs ..." });

  let enumerationFailure: OperationError | undefined;
  try {
    for await (const blob of store.listBlobs()) {
      if (dispatchFailure) break;

      reportBlob(blob);
      if (blob.tier === sourceTier) {
        batch.push(blob.name);
      }

      if (batch.length === batchSize) {
        dispatch(batch);
        batch = [];
      }
    }

    if (batch.length > 0 && !dispatchFailure) {
      dispatch(batch);
      batch = [];
    }
  } catch (error) {
    enumerationFailure = wrapOperationFailure("enumeration_failed", error, "Blob enumeration failed");
  }

  const settled = await Promise.all(pending);

  const outcomes: BatchOutcome[] = [];
  let succeeded = 0;
  let failed = 0;
  for (const entry of settled) {
    if (entry.ok) {
      outcomes.push(entry.outcome);
      succeeded += entry.outcome.succeeded;
      failed += entry.outcome.failed;
    } else {
      failed += entry.size;
    }
  }

  const elapsedMs = now() - startedAt;
  const summary: MigrationSummary = {
    sourceTier,
    targetTier,
    totalProcessed,
    batchCount,
    succeeded,
    failed,
    elapsedMs,
    elapsed: formatElapsed(elapsedMs),
  };

  const error = enumerationFailure ?? dispatchFailure;
  if (error) {
    return { kind: "failed", error, summary, outcomes };
  }
  if (failed > 0) {
    return { kind: "partial", summary, outcomes };
  }
  return { kind: "completed", summary, outcomes };
};
