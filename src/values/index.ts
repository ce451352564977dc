/**
 * TableKit scalar values
 */

export * from './types';
export * from './errors';
export * from './decimal';
export * from './local-date';
