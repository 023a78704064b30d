/**
 * @piston-doe/core
 *
 * Variant synthesis, mesh rescaling and batch coordination for
 * piston/cylinder DOE sweeps.
 */

export * from './constants.js';
export * from './types.js';
export * from './errors.js';
export * from './events.js';
export * from './textFile.js';
export * from './geometry.js';
export * from './scaleTable.js';
export * from './derive.js';
export * from './scalarConfig.js';
export * from './meshRescaler.js';
export * from './synthesize.js';
export * from './runners.js';
export * from './batch.js';
export * from './setup.js';
export * from './config.js';
export * from './worker.js';
