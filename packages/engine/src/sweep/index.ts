/**
 * Speed and range sweeps - data series for noise/SNR curves
 */

import { DomainError, MAX_SWEEP_SAMPLES, isValidNumber, linspace, sampleCount } from '@sonar-snr/shared';
import type { SubmarineProfile } from '@sonar-snr/core';
import type { RangeSweepPoint, SpeedSweepPoint, SweepAxis } from '../api/index.js';
import type { AcousticModel } from '../model/index.js';
import { isCavitating } from '../source/index.js';

/**
 * Sample positions along an axis; every sample is validated later by the model.
 */
export function axisSamples(axis: SweepAxis): number[] {
  const { from, to, step } = axis;
  if (!isValidNumber(from) || !isValidNumber(to) || !isValidNumber(step)) {
    throw new DomainError('INVALID_SWEEP', 'Sweep bounds and step must be finite numbers', { ...axis });
  }
  if (step <= 0) {
    throw new DomainError('INVALID_SWEEP', `Sweep step must be > 0, got ${step}`, { ...axis });
  }
  if (to < from) {
    throw new DomainError('INVALID_SWEEP', `Sweep end ${to} is before start ${from}`, { ...axis });
  }
  const count = sampleCount(from, to, step);
  if (count > MAX_SWEEP_SAMPLES) {
    throw new DomainError('INVALID_SWEEP', `Sweep would produce ${count} samples, limit is ${MAX_SWEEP_SAMPLES}`, {
      ...axis,
    });
  }
  return linspace(from, to, step);
}

/**
 * Source level and SNR across a range of speeds at a fixed range
 */
export function sweepSpeed(
  model: AcousticModel,
  profile: SubmarineProfile,
  speeds: SweepAxis,
  rangeMeters: number,
  ambientNoiseLevel?: number
): SpeedSweepPoint[] {
  return axisSamples(speeds).map((speedKnots) => {
    const result = model.evaluate(profile, { speedKnots, rangeMeters, ambientNoiseLevel });
    return {
      speedKnots,
      noiseLevel: result.noiseLevel,
      snr: result.snr,
      cavitating: isCavitating(profile, speedKnots),
    };
  });
}

/**
 * Transmission loss and SNR across a range of distances at a fixed speed
 */
export function sweepRange(
  model: AcousticModel,
  profile: SubmarineProfile,
  speedKnots: number,
  ranges: SweepAxis,
  ambientNoiseLevel?: number
): RangeSweepPoint[] {
  return axisSamples(ranges).map((rangeMeters) => {
    const result = model.evaluate(profile, { speedKnots, rangeMeters, ambientNoiseLevel });
    return {
      rangeMeters,
      transmissionLoss: result.transmissionLoss,
      snr: result.snr,
    };
  });
}
