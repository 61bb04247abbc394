/**
 * shiftlog type exports.
 */

export * from './exit-codes.js';
export * from './config.js';
export * from './session.js';
export * from './context.js';
export * from './transcript.js';
export * from './synthesis.js';
