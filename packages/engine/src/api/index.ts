/**
 * Detectability API - result types and the boundary offered to presentation layers
 */

import type { ProfileId } from '@sonar-snr/shared';
import type { ProfileSummary } from '@sonar-snr/core';

// ============================================================================
// Result Types
// ============================================================================

/** SNR breakdown for one profile under one scenario (all values in dB) */
export interface SNRResult {
  profileId: ProfileId;
  /** Source level L_p, cavitation included */
  noiseLevel: number;
  /** Cavitation share of noiseLevel; 0 at or below onset speed */
  cavitationIncrement: number;
  transmissionLoss: number;
  snr: number;
}

/** One sample of a speed sweep */
export interface SpeedSweepPoint {
  speedKnots: number;
  noiseLevel: number;
  snr: number;
  cavitating: boolean;
}

/** One sample of a range sweep */
export interface RangeSweepPoint {
  rangeMeters: number;
  transmissionLoss: number;
  snr: number;
}

/** Sweep bounds; `to` is included when it lies on the step grid */
export interface SweepAxis {
  from: number;
  to: number;
  step: number;
}

// ============================================================================
// Boundary Interface
// ============================================================================

/**
 * Functional boundary used by CLI/plotting layers.
 * Profile names are resolved before any computation; every method throws
 * DomainError or NotFoundError rather than returning partial results.
 */
export interface DetectabilityApi {
  computeSNR(
    profileName: string,
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult;

  listProfiles(): ProfileSummary[];

  compareAll(
    profileNames: readonly string[],
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult[];

  quietestAt(
    profileNames: readonly string[],
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult;

  loudestAt(
    profileNames: readonly string[],
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult;
}
