/**
 * Purpose: Shape the summary reported at the end of a tier migration run.
 * Persists: None.
 * Security Risks: None.
 */

import type { AccessTier } from "./tier";

export interface MigrationSummary {
  sourceTier: AccessTier;
  targetTier: AccessTier;
  totalProcessed: number;
  batchCount: number;
  succeeded: number;
  failed: number;
  elapsedMs: number;
  elapsed: string;
}
