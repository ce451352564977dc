/**
 * TableKit sessions
 */

export * from './options';
export * from './session';
export * from './actions';
