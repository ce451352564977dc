/**
 * TableKit column names
 */

export * from './types';
export * from './normalizer';
