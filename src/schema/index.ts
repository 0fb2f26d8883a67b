/**
 * Schema module: data shapes that cross a boundary.
 * Zod schemas + inferred TypeScript types.
 */

export * from './config.js';
export * from './cookie.js';
export * from './navigation.js';
