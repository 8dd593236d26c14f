/**
 * Acoustic model - passive sonar equation SNR = L_p − TL − NL
 */

import { DomainError, assertFinite, isValidNumber } from '@sonar-snr/shared';
import { getDefaultModelConfig, mergeModelConfig } from '@sonar-snr/core';
import type { AcousticModelConfig, ScenarioInput, SubmarineProfile } from '@sonar-snr/core';
import type { SNRResult } from '../api/index.js';
import { cavitationIncrement, flowNoiseGrowth } from '../source/index.js';
import type { SourceProfile } from '../source/index.js';
import { transmissionLoss } from '../propagation/index.js';

/**
 * Model-wide constants live on the instance, so alternate absorption
 * coefficients can be used side by side.
 */
export class AcousticModel {
  readonly config: AcousticModelConfig;

  constructor(config?: Partial<AcousticModelConfig>) {
    this.config = mergeModelConfig(getDefaultModelConfig(), config);
  }

  get absorptionCoefficient(): number {
    return this.config.absorptionCoefficient;
  }

  cavitationIncrement(profile: SourceProfile, speedKnots: number): number {
    return cavitationIncrement(profile, speedKnots);
  }

  noiseLevel(profile: SourceProfile, speedKnots: number): number {
    return this.sourceTerms(profile, speedKnots).noiseLevel;
  }

  transmissionLoss(rangeMeters: number): number {
    return transmissionLoss(rangeMeters, this.config.absorptionCoefficient);
  }

  snr(profile: SubmarineProfile, scenario: ScenarioInput): number {
    return this.evaluate(profile, scenario).snr;
  }

  /**
   * Full SNR breakdown. `ambientNoiseLevel` falls back to the configured default.
   */
  evaluate(profile: SubmarineProfile, scenario: ScenarioInput): SNRResult {
    const ambient = scenario.ambientNoiseLevel ?? this.config.defaultAmbientNoise;
    if (!isValidNumber(ambient)) {
      throw new DomainError('INVALID_INPUT', `Ambient noise level must be a finite number, got ${ambient}`, {
        ambientNoiseLevel: ambient,
      });
    }

    const source = this.sourceTerms(profile, scenario.speedKnots);
    const tl = this.transmissionLoss(scenario.rangeMeters);

    return {
      profileId: profile.id,
      noiseLevel: source.noiseLevel,
      cavitationIncrement: source.cavitationIncrement,
      transmissionLoss: tl,
      snr: assertFinite(source.noiseLevel - tl - ambient, 'snr', { ...scenario }),
    };
  }

  private sourceTerms(
    profile: SourceProfile,
    speedKnots: number
  ): { noiseLevel: number; cavitationIncrement: number } {
    const growth = flowNoiseGrowth(profile, speedKnots);
    const cavitation = cavitationIncrement(profile, speedKnots);
    return {
      noiseLevel: assertFinite(profile.baseNoiseLevel + growth + cavitation, 'noiseLevel', { speedKnots }),
      cavitationIncrement: cavitation,
    };
  }
}
