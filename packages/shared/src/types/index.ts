/**
 * Shared type definitions
 */

// ============================================================================
// ID Types
// ============================================================================

/** Unique identifier for a submarine class profile */
export type ProfileId = string & { readonly __brand: 'ProfileId' };

// ============================================================================
// Diagnostics
// ============================================================================

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning' | 'error';

/** Model warning codes */
export type ModelWarningCode = 'GROWTH_FACTOR_OUT_OF_RANGE';

/** Non-fatal diagnostic attached to model inputs */
export interface ModelWarning {
  code: ModelWarningCode;
  message: string;
  severity: WarningSeverity;
  context?: Record<string, unknown>;
}

// ============================================================================
// Helper creators
// ============================================================================

/** Create a ProfileId */
export function profileId(value: string): ProfileId {
  return value as ProfileId;
}
