/**
 * TableKit table views
 */

export * from './errors';
export * from './facade';
