/**
 * Purpose: Provide an in-memory TierStore and log capture for migrator tests.
 * Persists: None.
 * Security Risks: None.
 */

import { vi } from "vitest";

import type { AccessTier, BatchSubResult, BlobRecord } from "@tiermover/types";

import type { TierStore } from "../src/storage";

export type FakeBlob = {
  name: string;
  tier?: AccessTier;
  metadata?: Record<string, string>;
};

export type FakeStoreOptions = {
  // names whose sub-request reports the given status
  failingBlobs?: Record<string, { status: number; errorCode: string }>;
  // batch numbers (1-based) whose request throws
  throwingBatches?: number[];
  // throw after yielding this many blobs
  listFailsAfter?: number;
  delayMs?: number;
};

export const createFakeStore = (blobs: FakeBlob[], options: FakeStoreOptions = {}) => {
  const state = new Map<string, FakeBlob>(blobs.map((blob) => [blob.name, { ...blob }]));
  const batches: Array<{ names: string[]; tier: AccessTier }> = [];
  let listCalls = 0;
  let active = 0;
  let maxActive = 0;

  const store: TierStore = {
    async *listBlobs() {
      listCalls += 1;
      let yielded = 0;
      for (const blob of state.values()) {
        if (options.listFailsAfter !== undefined && yielded >= options.listFailsAfter) {
          throw new Error("listing interrupted");
        }
        const record: BlobRecord = {
          name: blob.name,
          url: `https://acct.blob.core.windows.net/case-01/${blob.name}`,
          tier: blob.tier,
          metadata: { ...(blob.metadata ?? {}) },
        };
        yielded += 1;
        yield record;
      }
    },

    async setTier(blobNames, tier) {
      batches.push({ names: [...blobNames], tier });
      const batchNumber = batches.length;
      active += 1;
      maxActive = Math.max(maxActive, active);
      try {
        if (options.delayMs) {
          await new Promise((resolve) => setTimeout(resolve, options.delayMs));
        }
        if (options.throwingBatches?.includes(batchNumber)) {
          throw new Error(`service rejected batch ${batchNumber}`);
        }
        return blobNames.map((name): BatchSubResult => {
          const failure = options.failingBlobs?.[name];
          if (failure) {
            return { name, status: failure.status, errorCode: failure.errorCode };
          }
          const current = state.get(name);
          if (current) current.tier = tier;
          return { name, status: 202 };
        });
      } finally {
        active -= 1;
      }
    },
  };

  return {
    store,
    batches,
    tierOf: (name: string) => state.get(name)?.tier,
    listCalls: () => listCalls,
    maxActive: () => maxActive,
  };
};

export const makeBlobs = (count: number, tier: AccessTier | undefined, prefix = "blob"): FakeBlob[] =>
  Array.from({ length: count }, (_, index) => ({ name: `${prefix}-${index + 1}`, tier }));

export type CapturedLog = Record<string, unknown>;

export const captureLogs = () => {
  const entries: CapturedLog[] = [];
  const record = (line: unknown) => {
    entries.push(JSON.parse(String(line)));
  };
  const logSpy = vi.spyOn(console, "log").mockImplementation(record);
  const errorSpy = vi.spyOn(console, "error").mockImplementation(record);

  return {
    entries,
    events: () => entries.map((entry) => entry.event),
    find: (event: string) => entries.filter((entry) => entry.event === event),
    restore: () => {
      logSpy.mockRestore();
      errorSpy.mockRestore();
    },
  };
};
