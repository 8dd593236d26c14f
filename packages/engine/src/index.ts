/**
 * @sonar-snr/engine
 * Passive sonar acoustic model, profile comparison and sweeps
 */

export * from './api/index.js';
export * from './source/index.js';
export * from './propagation/index.js';
export * from './model/index.js';
export * from './compare/index.js';
export * from './sweep/index.js';
export * from './service/index.js';
