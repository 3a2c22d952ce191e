/**
 * Rendering into a character cell grid.
 */

export * from './buffer.js';
export * from './block.js';
export * from './labels.js';
export * from './timeline.js';
