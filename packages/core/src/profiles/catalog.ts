/**
 * Built-in submarine class profiles (hand-tuned estimates)
 */

import { CAVITATION_HEADROOM_DB } from '@sonar-snr/shared';
import type { SubmarineProfileInput } from '../schema/index.js';

/**
 * Solve A in A·(vmax − v0)^p = headroom, so cavitation adds `headroom` dB at top speed.
 * Ohio: 10 / (25 − 21)^2.5 = 10 / 32 = 0.3125
 */
export function fitCavitationScale(
  cavitationOnsetSpeed: number,
  maxSubmergedSpeed: number,
  cavitationExponent: number,
  headroomDb: number = CAVITATION_HEADROOM_DB
): number {
  return headroomDb / Math.pow(maxSubmergedSpeed - cavitationOnsetSpeed, cavitationExponent);
}

/** Registration order is listing order */
export const BUILTIN_PROFILES: readonly SubmarineProfileInput[] = [
  {
    id: 'ohio',
    name: 'Ohio',
    baseNoiseLevel: 100,
    cavitationOnsetSpeed: 21,
    noiseGrowthFactor: 2.5,
    cavitationScale: fitCavitationScale(21, 25, 2.5),
    cavitationExponent: 2.5,
    maxSubmergedSpeed: 25,
  },
  {
    id: 'seawolf',
    name: 'Seawolf',
    baseNoiseLevel: 90,
    cavitationOnsetSpeed: 20,
    noiseGrowthFactor: 2.2,
    cavitationScale: fitCavitationScale(20, 35, 2.5),
    cavitationExponent: 2.5,
    maxSubmergedSpeed: 35,
  },
  {
    id: 'lafayette',
    name: 'Lafayette',
    baseNoiseLevel: 110,
    cavitationOnsetSpeed: 18,
    noiseGrowthFactor: 2.8,
    cavitationScale: fitCavitationScale(18, 25, 2.5),
    cavitationExponent: 2.5,
    maxSubmergedSpeed: 25,
  },
];
