/**
 * Timeline window utilities.
 *
 * This module maps between absolute instants and columns of a fixed 48-hour track:
 * - Constants for the window size
 * - Instant to column (saturating)
 * - Column to instant (for classifying each column)
 */

export * from './constants.js';
export * from './window.js';
