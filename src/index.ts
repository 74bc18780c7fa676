/**
 * @fileoverview Extract a consistent, ID-bounded subsample from a family of
 * CSV files keyed by the same entity ID in their first column.
 */

export * from './errors';
export * from './lines';
export * from './ids';
export * from './subset';
export * from './config';
export * from './manifest';
export * from './subsample';

export { subsample as default } from './subsample';
