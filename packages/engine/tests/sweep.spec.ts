import { describe, it, expect } from 'vitest';
import { DomainError } from '@sonar-snr/shared';
import { createDefaultRegistry } from '@sonar-snr/core';
import { AcousticModel } from '../src/model/index.js';
import { axisSamples, sweepRange, sweepSpeed } from '../src/sweep/index.js';

const ohio = createDefaultRegistry().resolve('ohio');
const model = new AcousticModel();

describe('axisSamples', () => {
  it('includes both ends on the grid', () => {
    expect(axisSamples({ from: 0, to: 25, step: 5 })).toEqual([0, 5, 10, 15, 20, 25]);
  });

  it('rejects a non-positive step', () => {
    expect(() => axisSamples({ from: 0, to: 10, step: 0 })).toThrow(DomainError);
  });

  it('rejects a reversed axis', () => {
    expect(() => axisSamples({ from: 10, to: 0, step: 1 })).toThrow('Sweep end 0 is before start 10');
  });

  it('rejects non-finite bounds', () => {
    expect(() => axisSamples({ from: 0, to: Number.POSITIVE_INFINITY, step: 1 })).toThrow(DomainError);
  });

  it('accepts an axis of exactly the sample limit', () => {
    expect(axisSamples({ from: 0, to: 99_999, step: 1 })).toHaveLength(100_000);
  });

  it('rejects an axis with more samples than the limit', () => {
    expect(() => axisSamples({ from: 0, to: 100_000, step: 1 })).toThrow(
      'Sweep would produce 100001 samples, limit is 100000'
    );
  });

  it('rejects a fine step over a long axis before allocating', () => {
    let err: unknown;
    try {
      sweepRange(model, ohio, 15, { from: 1, to: 1e7, step: 0.01 });
    } catch (caught) {
      err = caught;
    }
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toMatchObject({ code: 'INVALID_SWEEP' });
  });
});

describe('sweepSpeed', () => {
  const points = sweepSpeed(model, ohio, { from: 0, to: 25, step: 5 }, 1000, 50);

  it('produces one point per speed', () => {
    expect(points.map((p) => p.speedKnots)).toEqual([0, 5, 10, 15, 20, 25]);
  });

  it('flags cavitation only above onset speed', () => {
    expect(points.map((p) => p.cavitating)).toEqual([false, false, false, false, false, true]);
  });

  it('does not flag cavitation at exactly the onset speed', () => {
    const [atOnset] = sweepSpeed(model, ohio, { from: 21, to: 21, step: 1 }, 1000);
    expect(atOnset.cavitating).toBe(false);
  });

  it('flags cavitation exactly where the increment is positive', () => {
    const fine = sweepSpeed(model, ohio, { from: 19, to: 23, step: 0.5 }, 1000);
    for (const point of fine) {
      expect(point.cavitating).toBe(model.cavitationIncrement(ohio, point.speedKnots) > 0);
    }
    expect(fine.filter((p) => p.cavitating).map((p) => p.speedKnots)).toEqual([21.5, 22, 22.5, 23]);
  });

  it('matches direct evaluation', () => {
    expect(points[0].noiseLevel).toBe(100);
    expect(points[3].snr).toBeCloseTo(-8.482993233630715, 9);
    expect(points[5].noiseLevel).toBeCloseTo(114.05914445834401, 9);
  });

  it('noise level never decreases along the sweep', () => {
    for (let i = 1; i < points.length; i += 1) {
      expect(points[i].noiseLevel).toBeGreaterThanOrEqual(points[i - 1].noiseLevel);
    }
  });

  it('rejects a sweep that starts below zero knots', () => {
    expect(() => sweepSpeed(model, ohio, { from: -5, to: 5, step: 5 }, 1000)).toThrow(DomainError);
  });
});

describe('sweepRange', () => {
  const points = sweepRange(model, ohio, 15, { from: 1000, to: 5000, step: 1000 });

  it('produces increasing transmission loss and decreasing SNR', () => {
    expect(points).toHaveLength(5);
    for (let i = 1; i < points.length; i += 1) {
      expect(points[i].transmissionLoss).toBeGreaterThan(points[i - 1].transmissionLoss);
      expect(points[i].snr).toBeLessThan(points[i - 1].snr);
    }
  });

  it('uses the default ambient noise level', () => {
    expect(points[0].rangeMeters).toBe(1000);
    expect(points[0].transmissionLoss).toBeCloseTo(60.04, 9);
    expect(points[0].snr).toBeCloseTo(-8.482993233630715, 9);
  });

  it('rejects a sweep that reaches zero range', () => {
    expect(() => sweepRange(model, ohio, 15, { from: 0, to: 100, step: 50 })).toThrow(DomainError);
  });
});
