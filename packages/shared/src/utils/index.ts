/**
 * Shared utility functions
 */

import { EPSILON } from '../constants/index.js';

// ============================================================================
// Acoustic Math Utilities
// ============================================================================

/**
 * Express a power ratio in decibels
 */
export function ratioToDecibels(ratio: number): number {
  return 10 * Math.log10(ratio);
}

// ============================================================================
// Numeric Utilities
// ============================================================================

/**
 * Number of samples linspace(start, end, step) produces
 */
export function sampleCount(start: number, end: number, step: number): number {
  return Math.floor((end - start) / step + EPSILON) + 1;
}

/**
 * Evenly spaced samples from start to end (inclusive when end lies on the grid).
 * Each sample is start + i * step, so long series do not accumulate drift.
 */
export function linspace(start: number, end: number, step: number): number[] {
  const count = sampleCount(start, end, step);
  const result: number[] = [];
  for (let i = 0; i < count; i++) {
    result.push(start + i * step);
  }
  return result;
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Check if a value is a valid finite number
 */
export function isValidNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Normalize a lookup key: trimmed and lower-cased
 */
export function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}
