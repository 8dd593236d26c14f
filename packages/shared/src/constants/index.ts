/**
 * Physical and model constants
 */

// ============================================================================
// Propagation
// ============================================================================

/** Seawater absorption coefficient (dB/m), i.e. 0.04 dB/km */
export const SEAWATER_ABSORPTION = 0.00004;

/** Spherical spreading factor for 20·log10(r) */
export const SPHERICAL_SPREADING_FACTOR = 20;

// ============================================================================
// Scenario Defaults
// ============================================================================

/** Default ambient noise level at the listener (dB) */
export const DEFAULT_AMBIENT_NOISE = 50;

// ============================================================================
// Profile Conventions
// ============================================================================

/** Lower bound of the conventional noise growth exponent */
export const NOISE_GROWTH_MIN = 2;

/** Upper bound of the conventional noise growth exponent */
export const NOISE_GROWTH_MAX = 3;

/** Cavitation noise added at a class's top submerged speed when fitting A (dB) */
export const CAVITATION_HEADROOM_DB = 10;

// ============================================================================
// Sweeps
// ============================================================================

/** Largest number of samples a single sweep may produce */
export const MAX_SWEEP_SAMPLES = 100_000;

/** Small epsilon for floating point comparisons */
export const EPSILON = 1e-10;
