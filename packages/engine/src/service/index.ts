/**
 * Detectability service - resolves profile names and runs the model
 */

import { createDefaultRegistry, parseScenario } from '@sonar-snr/core';
import type { ProfileRegistry, ProfileSummary, Scenario, SubmarineProfile } from '@sonar-snr/core';
import type { DetectabilityApi, SNRResult } from '../api/index.js';
import { AcousticModel } from '../model/index.js';
import { ComparisonEngine } from '../compare/index.js';

export class DetectabilityService implements DetectabilityApi {
  readonly registry: ProfileRegistry;
  readonly model: AcousticModel;
  private readonly comparison: ComparisonEngine;

  constructor(options?: { registry?: ProfileRegistry; model?: AcousticModel }) {
    this.registry = options?.registry ?? createDefaultRegistry();
    this.model = options?.model ?? new AcousticModel();
    this.comparison = new ComparisonEngine(this.model);
  }

  computeSNR(profileName: string, speedKnots: number, rangeMeters: number, ambientNoiseLevel?: number): SNRResult {
    const profile = this.registry.resolve(profileName);
    return this.model.evaluate(profile, this.scenario(speedKnots, rangeMeters, ambientNoiseLevel));
  }

  listProfiles(): ProfileSummary[] {
    return this.registry.listAll();
  }

  compareAll(
    profileNames: readonly string[],
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult[] {
    const profiles = this.resolveAll(profileNames);
    return this.comparison.evaluateAll(profiles, this.scenario(speedKnots, rangeMeters, ambientNoiseLevel));
  }

  quietestAt(
    profileNames: readonly string[],
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult {
    const profiles = this.resolveAll(profileNames);
    return this.comparison.quietest(profiles, this.scenario(speedKnots, rangeMeters, ambientNoiseLevel)).result;
  }

  loudestAt(
    profileNames: readonly string[],
    speedKnots: number,
    rangeMeters: number,
    ambientNoiseLevel?: number
  ): SNRResult {
    const profiles = this.resolveAll(profileNames);
    return this.comparison.loudest(profiles, this.scenario(speedKnots, rangeMeters, ambientNoiseLevel)).result;
  }

  private resolveAll(profileNames: readonly string[]): SubmarineProfile[] {
    return profileNames.map((name) => this.registry.resolve(name));
  }

  private scenario(speedKnots: number, rangeMeters: number, ambientNoiseLevel?: number): Scenario {
    return parseScenario({
      speedKnots,
      rangeMeters,
      ambientNoiseLevel: ambientNoiseLevel ?? this.model.config.defaultAmbientNoise,
    });
  }
}

// ============================================================================
// Default instance (built-in catalog, default model configuration)
// ============================================================================

let defaultService: DetectabilityService | null = null;

export function getDefaultService(): DetectabilityService {
  if (!defaultService) {
    defaultService = new DetectabilityService();
  }
  return defaultService;
}

export function computeSNR(
  profileName: string,
  speedKnots: number,
  rangeMeters: number,
  ambientNoiseLevel?: number
): SNRResult {
  return getDefaultService().computeSNR(profileName, speedKnots, rangeMeters, ambientNoiseLevel);
}

export function listProfiles(): ProfileSummary[] {
  return getDefaultService().listProfiles();
}

export function compareAll(
  profileNames: readonly string[],
  speedKnots: number,
  rangeMeters: number,
  ambientNoiseLevel?: number
): SNRResult[] {
  return getDefaultService().compareAll(profileNames, speedKnots, rangeMeters, ambientNoiseLevel);
}

export function quietestAt(
  profileNames: readonly string[],
  speedKnots: number,
  rangeMeters: number,
  ambientNoiseLevel?: number
): SNRResult {
  return getDefaultService().quietestAt(profileNames, speedKnots, rangeMeters, ambientNoiseLevel);
}

export function loudestAt(
  profileNames: readonly string[],
  speedKnots: number,
  rangeMeters: number,
  ambientNoiseLevel?: number
): SNRResult {
  return getDefaultService().loudestAt(profileNames, speedKnots, rangeMeters, ambientNoiseLevel);
}
