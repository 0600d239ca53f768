/**
 * LNURL Wallet Core
 * Barrel export for all core modules
 */

// Logger (must be first - no dependencies)
export * from './logger';

export * from './errors';
export * from './notify';

// Type definitions
export * from './types/index';
