/**
 * TableKit schema resolution
 */

export * from './types';
export * from './errors';
export * from './inference';
export * from './derivation';
