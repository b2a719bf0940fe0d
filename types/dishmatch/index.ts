/**
 * Dishmatch Type Definitions
 */

export * from './interaction';
export * from './recommendation';
export * from './catalog';
