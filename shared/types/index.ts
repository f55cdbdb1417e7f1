/**
 * Purpose: Re-export shared tiermover types for workspace consumption.
 * Persists: None.
 * Security Risks: None.
 */

export { ACCESS_TIERS, parseAccessTier } from "./tier";
export type { AccessTier } from "./tier";
export type { BatchOutcome, BatchSubResult, BlobRecord } from "./blob";
export type { MigrationSummary } from "./migration";
