/**
 * Submarine profile registry
 */

import {
  DomainError,
  NotFoundError,
  NOISE_GROWTH_MIN,
  NOISE_GROWTH_MAX,
  logger,
  normalizeKey,
} from '@sonar-snr/shared';
import type { ModelWarning, ProfileId } from '@sonar-snr/shared';
import { parseProfile } from '../schema/index.js';
import type { SubmarineProfile } from '../schema/index.js';
import { BUILTIN_PROFILES } from './catalog.js';

export { BUILTIN_PROFILES, fitCavitationScale } from './catalog.js';

/** Summary row used for listing */
export interface ProfileSummary {
  id: ProfileId;
  name: string;
  baseNoiseLevel: number;
  cavitationOnsetSpeed: number;
}

/**
 * Non-fatal checks on a validated profile
 */
export function profileWarnings(profile: SubmarineProfile): ModelWarning[] {
  const warnings: ModelWarning[] = [];
  const n = profile.noiseGrowthFactor;
  if (n < NOISE_GROWTH_MIN || n > NOISE_GROWTH_MAX) {
    warnings.push({
      code: 'GROWTH_FACTOR_OUT_OF_RANGE',
      message: `Profile "${profile.id}" noise growth factor ${n} is outside the conventional ${NOISE_GROWTH_MIN}..${NOISE_GROWTH_MAX} range`,
      severity: 'warning',
      context: { profileId: profile.id, noiseGrowthFactor: n },
    });
  }
  return warnings;
}

/**
 * Read-only catalog of submarine profiles.
 * Lookups match the id or display name, ignoring case and surrounding whitespace.
 */
export class ProfileRegistry {
  private readonly profiles: readonly SubmarineProfile[];
  private readonly index = new Map<string, SubmarineProfile>();

  constructor(entries: readonly unknown[]) {
    const parsed: SubmarineProfile[] = [];
    for (const entry of entries) {
      const profile = parseProfile(entry);
      const keys = new Set([normalizeKey(profile.id), normalizeKey(profile.name)]);
      for (const key of keys) {
        if (this.index.has(key)) {
          throw new DomainError('DUPLICATE_PROFILE', `Duplicate submarine profile key "${key}"`, {
            profileId: profile.id,
          });
        }
      }

      for (const warning of profileWarnings(profile)) {
        logger.warn(warning.message);
      }

      for (const key of keys) this.index.set(key, profile);
      parsed.push(profile);
    }
    this.profiles = Object.freeze(parsed);
  }

  get size(): number {
    return this.profiles.length;
  }

  /** All profiles in registration order */
  all(): readonly SubmarineProfile[] {
    return this.profiles;
  }

  listAll(): ProfileSummary[] {
    return this.profiles.map((p) => ({
      id: p.id,
      name: p.name,
      baseNoiseLevel: p.baseNoiseLevel,
      cavitationOnsetSpeed: p.cavitationOnsetSpeed,
    }));
  }

  has(name: string): boolean {
    return this.index.has(normalizeKey(name));
  }

  resolve(name: string): SubmarineProfile {
    const profile = this.index.get(normalizeKey(name));
    if (!profile) {
      throw new NotFoundError(name, this.profiles.map((p) => p.id));
    }
    return profile;
  }
}

/**
 * Create a registry populated with the built-in catalog
 */
export function createDefaultRegistry(): ProfileRegistry {
  return new ProfileRegistry(BUILTIN_PROFILES);
}
