/**
 * Shared types index - barrel export
 */

export * from './card';
export * from './fulfillment';
export * from './editor';
export * from './settings';
