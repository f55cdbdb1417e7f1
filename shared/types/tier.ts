/**
 * Purpose: Enumerate the blob access tiers the migrator can move between.
 * Persists: None.
 * Security Risks: None.
 */

export const ACCESS_TIERS = ["Hot", "Cool", "Cold", "Archive"] as const;

export type AccessTier = (typeof ACCESS_TIERS)[number];

export const parseAccessTier = (value: string | undefined): AccessTier | undefined => {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return ACCESS_TIERS.find((tier) => tier.toLowerCase() === normalized);
};
