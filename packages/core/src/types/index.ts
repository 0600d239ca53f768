/**
 * Core Types
 * Barrel export for all type definitions
 */

export * from './lnurl';
export * from './notification';
export * from './collaborators';
