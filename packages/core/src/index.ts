/**
 * Core rendering logic for the zonestrip multi-timezone clock.
 * This package contains pure TypeScript logic with no terminal or I/O dependencies.
 */

/**
 * Re-export the timeline window and column mapping utilities.
 */
export * from './time/index.js';

/**
 * Re-export the timezone capability and local-time formatting.
 */
export * from './zone/index.js';

/**
 * Re-export activity classification and its configuration schema.
 */
export * from './activity/index.js';

/**
 * Re-export color themes.
 */
export * from './theme/colors.js';

/**
 * Re-export DST transition detection.
 */
export * from './dst/detector.js';

/**
 * Re-export the cell buffer and the timeline widget.
 */
export * from './render/index.js';
