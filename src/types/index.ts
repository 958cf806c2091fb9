/**
 * Core type definitions for Chipwatch.
 */

export type * from './logger.js';
export type * from './detection.js';
export type * from './delivery.js';

export { createTagEvent } from './detection.js';
