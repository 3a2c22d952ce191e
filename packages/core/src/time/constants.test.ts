import { describe, it, expect } from 'vitest';
import {
  HALF_WINDOW_HOURS,
  HOUR_MS,
  MINUTE_MS,
  WINDOW_HOURS,
  WINDOW_MINUTES,
} from './constants.js';

describe('timeline window constants', () => {
  it('should have correct unit sizes', () => {
    expect(MINUTE_MS).toBe(60 * 1000);
    expect(HOUR_MS).toBe(60 * MINUTE_MS);
  });

  it('should span 24 hours either side of the position', () => {
    expect(HALF_WINDOW_HOURS).toBe(24);
    expect(WINDOW_HOURS).toBe(48);
  });

  it('should have WINDOW_MINUTES = WINDOW_HOURS * 60', () => {
    expect(WINDOW_MINUTES).toBe(2880);
  });
});
