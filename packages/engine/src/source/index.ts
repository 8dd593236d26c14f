/**
 * Radiated noise of a submarine as a function of speed
 */

import { DomainError, assertFinite, isValidNumber, ratioToDecibels } from '@sonar-snr/shared';
import type { SubmarineProfile } from '@sonar-snr/core';

/** Acoustic constants the source model reads */
export type SourceProfile = Pick<
  SubmarineProfile,
  'baseNoiseLevel' | 'cavitationOnsetSpeed' | 'noiseGrowthFactor' | 'cavitationScale' | 'cavitationExponent'
>;

// ============================================================================
// Input Guards
// ============================================================================

export function assertSpeed(speedKnots: number): void {
  if (!isValidNumber(speedKnots)) {
    throw new DomainError('INVALID_INPUT', `Speed must be a finite number, got ${speedKnots}`, { speedKnots });
  }
  if (speedKnots < 0) {
    throw new DomainError('NEGATIVE_SPEED', `Speed must be >= 0 knots, got ${speedKnots}`, { speedKnots });
  }
}

export function assertOnsetSpeed(profile: SourceProfile): void {
  const v0 = profile.cavitationOnsetSpeed;
  if (!isValidNumber(v0) || v0 <= 0) {
    throw new DomainError('INVALID_ONSET_SPEED', `Cavitation onset speed must be > 0 knots, got ${v0}`, {
      cavitationOnsetSpeed: v0,
    });
  }
}

// ============================================================================
// Cavitation
// ============================================================================

/**
 * Closed-below, open-above partition: v == v0 does not cavitate
 */
export function isCavitating(profile: SourceProfile, speedKnots: number): boolean {
  return speedKnots > profile.cavitationOnsetSpeed;
}

/**
 * Cavitation noise increment (dB): A·(v − v0)^p above onset, 0 at or below it.
 * Continuous at v0, where both branches give 0.
 */
export function cavitationIncrement(profile: SourceProfile, speedKnots: number): number {
  assertSpeed(speedKnots);
  assertOnsetSpeed(profile);

  if (!isCavitating(profile, speedKnots)) {
    return 0;
  }
  const increment =
    profile.cavitationScale * Math.pow(speedKnots - profile.cavitationOnsetSpeed, profile.cavitationExponent);
  return assertFinite(increment, 'cavitationIncrement', { speedKnots });
}

// ============================================================================
// Source Level
// ============================================================================

/**
 * Flow-noise growth over the cruise level: 10·log10(1 + (v/v0)^n).
 * The argument is at least 1 for v >= 0, so the result is never negative.
 */
export function flowNoiseGrowth(profile: SourceProfile, speedKnots: number): number {
  assertSpeed(speedKnots);
  assertOnsetSpeed(profile);

  const x = 1 + Math.pow(speedKnots / profile.cavitationOnsetSpeed, profile.noiseGrowthFactor);
  return assertFinite(ratioToDecibels(x), 'flowNoiseGrowth', { speedKnots });
}

/**
 * Source level L_p = L0 + flow-noise growth + cavitation increment
 */
export function noiseLevel(profile: SourceProfile, speedKnots: number): number {
  return assertFinite(
    profile.baseNoiseLevel + flowNoiseGrowth(profile, speedKnots) + cavitationIncrement(profile, speedKnots),
    'noiseLevel',
    { speedKnots }
  );
}
