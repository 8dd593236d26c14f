/**
 * Comparison engine - evaluates a shared scenario across profiles and ranks them
 */

import { DomainError, logger } from '@sonar-snr/shared';
import type { ScenarioInput, SubmarineProfile } from '@sonar-snr/core';
import type { SNRResult } from '../api/index.js';
import { AcousticModel } from '../model/index.js';

/** A selected profile together with the result it was selected by */
export interface ComparisonPick {
  profile: SubmarineProfile;
  result: SNRResult;
}

export class ComparisonEngine {
  readonly model: AcousticModel;

  constructor(model: AcousticModel = new AcousticModel()) {
    this.model = model;
  }

  /**
   * One result per profile, in input order. The first DomainError aborts the batch.
   */
  evaluateAll(profiles: readonly SubmarineProfile[], scenario: ScenarioInput): SNRResult[] {
    const results = profiles.map((profile) => this.model.evaluate(profile, scenario));
    logger.debug(`evaluated ${results.length} profile(s)`, scenario);
    return results;
  }

  /** Lowest SNR, i.e. hardest to detect. Ties go to the first listed profile. */
  quietest(profiles: readonly SubmarineProfile[], scenario: ScenarioInput): ComparisonPick {
    return this.select(profiles, this.evaluateAll(profiles, scenario), (candidate, best) => candidate < best);
  }

  /** Highest SNR, i.e. easiest to detect. Ties go to the first listed profile. */
  loudest(profiles: readonly SubmarineProfile[], scenario: ScenarioInput): ComparisonPick {
    return this.select(profiles, this.evaluateAll(profiles, scenario), (candidate, best) => candidate > best);
  }

  /** Results ordered quietest first; equal SNRs keep input order */
  rank(profiles: readonly SubmarineProfile[], scenario: ScenarioInput): SNRResult[] {
    return this.evaluateAll(profiles, scenario).sort((a, b) => a.snr - b.snr);
  }

  private select(
    profiles: readonly SubmarineProfile[],
    results: readonly SNRResult[],
    isBetter: (candidate: number, best: number) => boolean
  ): ComparisonPick {
    if (profiles.length === 0) {
      throw new DomainError('EMPTY_COMPARISON', 'Cannot select from an empty set of profiles');
    }

    let bestIndex = 0;
    for (let i = 1; i < results.length; i++) {
      if (isBetter(results[i].snr, results[bestIndex].snr)) {
        bestIndex = i;
      }
    }
    return { profile: profiles[bestIndex], result: results[bestIndex] };
  }
}
