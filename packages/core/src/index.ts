/**
 * @sonar-snr/core
 * Profile, scenario and configuration schemas plus the submarine profile registry
 */

export * from './schema/index.js';
export * from './profiles/index.js';
