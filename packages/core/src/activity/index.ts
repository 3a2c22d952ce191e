/**
 * Activity module public exports.
 */

// Configuration
export type {
  TimeActivity,
  TimeDisplayConfig,
  TimeDisplayConfigOverrides,
} from './config.js';

export {
  DEFAULT_TIME_DISPLAY_CONFIG,
  timeDisplayConfigSchema,
  parseTimeDisplayConfig,
  createTimeDisplayConfig,
} from './config.js';

// Classification
export type { HourDisplay } from './classifier.js';
export {
  isHourInRange,
  classifyHour,
  activityGlyph,
  activityColor,
  hourDisplay,
} from './classifier.js';
