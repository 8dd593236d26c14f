/**
 * Unit tests for @sonar-snr/core schemas
 */

import { describe, it, expect } from 'vitest';
import { DomainError, SEAWATER_ABSORPTION } from '@sonar-snr/shared';
import {
  parseProfile,
  validateProfile,
  parseScenario,
  parseModelConfig,
  getDefaultModelConfig,
  mergeModelConfig,
} from './index.js';

const baseProfile = {
  id: 'test-class',
  name: 'Test Class',
  baseNoiseLevel: 80,
  cavitationOnsetSpeed: 21,
  noiseGrowthFactor: 2,
  cavitationScale: 0.3125,
  cavitationExponent: 2.5,
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

// ============================================================================
// Profiles
// ============================================================================

describe('parseProfile', () => {
  it('returns a frozen profile', () => {
    const profile = parseProfile(baseProfile);
    expect(profile.id).toBe('test-class');
    expect(profile.baseNoiseLevel).toBe(80);
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('rejects a zero onset speed with INVALID_ONSET_SPEED', () => {
    const err = captureError(() => parseProfile({ ...baseProfile, cavitationOnsetSpeed: 0 }));
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toMatchObject({ code: 'INVALID_ONSET_SPEED' });
  });

  it('rejects ids that are not slugs', () => {
    const err = captureError(() => parseProfile({ ...baseProfile, id: 'Test Class' }));
    expect(err).toMatchObject({ code: 'INVALID_PROFILE' });
  });

  it('accepts growth factors outside the conventional range', () => {
    const result = validateProfile({ ...baseProfile, noiseGrowthFactor: 3.6 });
    expect(result.success).toBe(true);
  });

  it('accepts a zero growth factor', () => {
    expect(parseProfile({ ...baseProfile, noiseGrowthFactor: 0 }).noiseGrowthFactor).toBe(0);
  });

  it('rejects a negative growth factor with INVALID_PROFILE', () => {
    const err = captureError(() => parseProfile({ ...baseProfile, noiseGrowthFactor: -1 }));
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toMatchObject({ code: 'INVALID_PROFILE' });
  });
});

// ============================================================================
// Scenarios
// ============================================================================

describe('parseScenario', () => {
  it('fills the default ambient noise level', () => {
    const scenario = parseScenario({ speedKnots: 15, rangeMeters: 5000 });
    expect(scenario).toEqual({ speedKnots: 15, rangeMeters: 5000, ambientNoiseLevel: 50 });
  });

  it('accepts zero speed', () => {
    expect(parseScenario({ speedKnots: 0, rangeMeters: 1 }).speedKnots).toBe(0);
  });

  it('rejects negative speed with NEGATIVE_SPEED', () => {
    const err = captureError(() => parseScenario({ speedKnots: -1, rangeMeters: 1000 }));
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toMatchObject({ code: 'NEGATIVE_SPEED' });
  });

  it('rejects zero range with NON_POSITIVE_RANGE', () => {
    const err = captureError(() => parseScenario({ speedKnots: 5, rangeMeters: 0 }));
    expect(err).toMatchObject({ code: 'NON_POSITIVE_RANGE' });
  });

  it('rejects NaN with INVALID_INPUT', () => {
    const err = captureError(() => parseScenario({ speedKnots: Number.NaN, rangeMeters: 10 }));
    expect(err).toMatchObject({ code: 'INVALID_INPUT' });
  });
});

// ============================================================================
// Model configuration
// ============================================================================

describe('model configuration', () => {
  it('defaults match the seawater constants', () => {
    expect(getDefaultModelConfig()).toEqual({
      absorptionCoefficient: SEAWATER_ABSORPTION,
      defaultAmbientNoise: 50,
    });
    expect(parseModelConfig()).toEqual(getDefaultModelConfig());
  });

  it('mergeModelConfig overrides only the given keys', () => {
    const merged = mergeModelConfig(getDefaultModelConfig(), { absorptionCoefficient: 0.001 });
    expect(merged).toEqual({ absorptionCoefficient: 0.001, defaultAmbientNoise: 50 });
  });

  it('mergeModelConfig returns defaults untouched without an override', () => {
    const defaults = getDefaultModelConfig();
    expect(mergeModelConfig(defaults)).toBe(defaults);
  });

  it('rejects a negative absorption coefficient', () => {
    const err = captureError(() => mergeModelConfig(getDefaultModelConfig(), { absorptionCoefficient: -1 }));
    expect(err).toMatchObject({ code: 'INVALID_INPUT' });
  });
});
