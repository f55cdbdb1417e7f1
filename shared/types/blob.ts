/**
 * Purpose: Describe enumerated blobs and the per-batch results of tier changes.
 * Persists: None.
 * Security Risks: None; signed URLs stay inside the storage adapter.
 */

import type { AccessTier } from "./tier";

export type BlobRecord = {
  name: string;
  // unsigned, safe to log
  url: string;
  // undefined when the service reports no tier or a premium tier
  tier?: AccessTier;
  metadata: Record<string, string>;
};

export type BatchSubResult = {
  name: string;
  status: number;
  errorCode?: string;
};

export type BatchOutcome = {
  batchNumber: number;
  size: number;
  succeeded: number;
  failed: number;
  failures: BatchSubResult[];
};
