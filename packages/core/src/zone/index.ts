/**
 * Timezone conversion and local-time formatting.
 */

export * from './types.js';
export * from './format.js';
export * from './timeZone.js';
