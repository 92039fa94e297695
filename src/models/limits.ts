/**
 * Domain Limits
 */

export const DomainLimits = {
  /** Absolute ceiling for history, whatever the settings say */
  maxHistoryItems: 500,
  /** Floor applied to the user's history limit */
  minHistoryItems: 10,
  maxPinnedItems: 50,
  maxSnippets: 200,
  /** Images above this size are rejected at capture and never persisted */
  maxPersistedImageBytes: 1024 * 1024,
} as const;
