/**
 * Underwater transmission loss: spherical spreading plus seawater absorption
 */

import {
  DomainError,
  SEAWATER_ABSORPTION,
  SPHERICAL_SPREADING_FACTOR,
  assertFinite,
  isValidNumber,
} from '@sonar-snr/shared';

// ============================================================================
// Input Guards
// ============================================================================

export function assertRange(rangeMeters: number): void {
  if (!isValidNumber(rangeMeters)) {
    throw new DomainError('INVALID_INPUT', `Range must be a finite number, got ${rangeMeters}`, { rangeMeters });
  }
  if (rangeMeters <= 0) {
    throw new DomainError('NON_POSITIVE_RANGE', `Range must be > 0 m, got ${rangeMeters}`, { rangeMeters });
  }
}

// ============================================================================
// Spreading Loss
// ============================================================================

/**
 * Spherical spreading loss 20·log10(r)
 * @param rangeMeters - Range in meters
 */
export function spreadingLoss(rangeMeters: number): number {
  assertRange(rangeMeters);
  return SPHERICAL_SPREADING_FACTOR * Math.log10(rangeMeters);
}

// ============================================================================
// Absorption
// ============================================================================

/**
 * Linear absorption loss α·r
 * @param rangeMeters - Range in meters
 * @param alpha - Absorption coefficient in dB/m
 */
export function absorptionLoss(rangeMeters: number, alpha: number = SEAWATER_ABSORPTION): number {
  assertRange(rangeMeters);
  return assertFinite(alpha * rangeMeters, 'absorptionLoss', { rangeMeters, alpha });
}

// ============================================================================
// Transmission Loss
// ============================================================================

/**
 * Transmission loss TL = 20·log10(r) + α·r
 * Strictly increasing in r for r > 0 and α >= 0.
 */
export function transmissionLoss(rangeMeters: number, alpha: number = SEAWATER_ABSORPTION): number {
  return assertFinite(spreadingLoss(rangeMeters) + absorptionLoss(rangeMeters, alpha), 'transmissionLoss', {
    rangeMeters,
    alpha,
  });
}
