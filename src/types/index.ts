/**
 * Central type exports.
 */

export * from './config.js';
export * from './coverage.js';
export * from './navigator-layer.js';
