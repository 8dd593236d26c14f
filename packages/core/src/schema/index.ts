/**
 * Model Schema - sonar-snr
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import {
  DEFAULT_AMBIENT_NOISE,
  SEAWATER_ABSORPTION,
  DomainError,
  profileId,
} from '@sonar-snr/shared';
import type { DomainErrorCode, ProfileId } from '@sonar-snr/shared';

// ============================================================================
// Submarine Profile
// ============================================================================

/**
 * Acoustic constants for one submarine class.
 *
 * `noiseGrowthFactor` is curve-fit metadata: 2..3 is conventional, but values
 * outside that range are accepted (the registry only warns about them).
 */
export const SubmarineProfileSchema = z.object({
  id: z
    .string()
    .min(1)
    .regex(/^[a-z0-9-]+$/, 'id must be a lower-case slug')
    .transform((value): ProfileId => profileId(value)),
  name: z.string().min(1),
  baseNoiseLevel: z.number().finite(), // L0, dB
  cavitationOnsetSpeed: z.number().finite().positive(), // v0, knots
  noiseGrowthFactor: z.number().finite().nonnegative(), // n
  cavitationScale: z.number().finite().nonnegative(), // A
  cavitationExponent: z.number().finite().positive(), // p
  maxSubmergedSpeed: z.number().finite().positive().optional(), // knots
});

// ============================================================================
// Scenario
// ============================================================================

/** Scenario inputs for a single query */
export const ScenarioSchema = z.object({
  speedKnots: z.number().finite().nonnegative(),
  rangeMeters: z.number().finite().positive(),
  ambientNoiseLevel: z.number().finite().default(DEFAULT_AMBIENT_NOISE),
});

// ============================================================================
// Model Configuration
// ============================================================================

/** Model-wide acoustic configuration */
export const AcousticModelConfigSchema = z.object({
  absorptionCoefficient: z.number().finite().nonnegative().default(SEAWATER_ABSORPTION), // dB/m
  defaultAmbientNoise: z.number().finite().default(DEFAULT_AMBIENT_NOISE), // dB
});

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type SubmarineProfileInput = z.input<typeof SubmarineProfileSchema>;
export type SubmarineProfile = Readonly<z.infer<typeof SubmarineProfileSchema>>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;
export type AcousticModelConfigInput = z.input<typeof AcousticModelConfigSchema>;
export type AcousticModelConfig = z.infer<typeof AcousticModelConfigSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/** Fold zod issues into a single readable line */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Pick the most specific domain code for a failed scenario */
function scenarioErrorCode(error: z.ZodError): DomainErrorCode {
  const issue = error.issues[0];
  if (issue?.code !== 'too_small') return 'INVALID_INPUT';
  if (issue.path[0] === 'speedKnots') return 'NEGATIVE_SPEED';
  if (issue.path[0] === 'rangeMeters') return 'NON_POSITIVE_RANGE';
  return 'INVALID_INPUT';
}

/**
 * Validate a submarine profile object against the schema
 */
export function validateProfile(
  data: unknown
): { success: true; data: SubmarineProfile } | { success: false; errors: z.ZodError } {
  const result = SubmarineProfileSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Parse and validate a profile, throwing a DomainError on failure
 */
export function parseProfile(data: unknown): SubmarineProfile {
  const result = validateProfile(data);
  if (!result.success) {
    const code: DomainErrorCode = result.errors.issues.some((i) => i.path[0] === 'cavitationOnsetSpeed')
      ? 'INVALID_ONSET_SPEED'
      : 'INVALID_PROFILE';
    throw new DomainError(code, `Invalid submarine profile: ${formatIssues(result.errors)}`);
  }
  return Object.freeze(result.data);
}

/**
 * Parse and validate scenario inputs, throwing a DomainError on failure
 */
export function parseScenario(data: unknown): Scenario {
  const result = ScenarioSchema.safeParse(data);
  if (!result.success) {
    throw new DomainError(scenarioErrorCode(result.error), `Invalid scenario: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Parse model configuration, filling defaults
 */
export function parseModelConfig(data: unknown = {}): AcousticModelConfig {
  const result = AcousticModelConfigSchema.safeParse(data);
  if (!result.success) {
    throw new DomainError('INVALID_INPUT', `Invalid model configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Get the default model configuration
 */
export function getDefaultModelConfig(): AcousticModelConfig {
  return {
    absorptionCoefficient: SEAWATER_ABSORPTION,
    defaultAmbientNoise: DEFAULT_AMBIENT_NOISE,
  };
}

/**
 * Merge a partial override into a model configuration and re-validate
 */
export function mergeModelConfig(
  defaults: AcousticModelConfig,
  override?: Partial<AcousticModelConfig>
): AcousticModelConfig {
  if (!override) return defaults;

  return parseModelConfig({
    absorptionCoefficient: override.absorptionCoefficient ?? defaults.absorptionCoefficient,
    defaultAmbientNoise: override.defaultAmbientNoise ?? defaults.defaultAmbientNoise,
  });
}
