import { describe, it, expect } from 'vitest';
import { timelineWindow } from '../time/window.js';
import { TimeZone } from '../zone/timeZone.js';
import { detectDstTransition, getDstTransitionsInRange } from './detector.js';

describe('detectDstTransition', () => {
  const newYork = TimeZone.fromIana('America/New_York');

  it('should report an offset increase as fallBack', () => {
    // 2024-03-10 07:00Z: offset goes from UTC-5 to UTC-4
    expect(detectDstTransition(newYork, new Date('2024-03-10T06:00:00Z'))).toBe('fallBack');
  });

  it('should report an offset decrease as springForward', () => {
    // 2024-11-03 06:00Z: offset goes from UTC-4 to UTC-5
    expect(detectDstTransition(newYork, new Date('2024-11-03T05:00:00Z'))).toBe('springForward');
  });

  it('should report nothing when the offset is unchanged', () => {
    expect(detectDstTransition(newYork, new Date('2024-03-10T07:00:00Z'))).toBeUndefined();
    expect(detectDstTransition(newYork, new Date('2024-06-15T12:00:00Z'))).toBeUndefined();
  });
});

describe('getDstTransitionsInRange', () => {
  it('should find the single transition in a window', () => {
    const window = timelineWindow(new Date('2024-03-10T12:00:00Z'));
    const transitions = getDstTransitionsInRange(TimeZone.fromIana('America/New_York'), window);
    expect(transitions).toHaveLength(1);
    expect(transitions[0]?.instant.toISOString()).toBe('2024-03-10T06:00:00.000Z');
    expect(transitions[0]?.transition).toBe('fallBack');
  });

  it('should return nothing for fixed-offset zones', () => {
    const window = timelineWindow(new Date('2024-03-10T12:00:00Z'));
    expect(getDstTransitionsInRange(TimeZone.fromIana('UTC'), window)).toEqual([]);
    expect(getDstTransitionsInRange(TimeZone.fromIana('Etc/GMT-3'), window)).toEqual([]);
    expect(getDstTransitionsInRange(TimeZone.fromIana('Asia/Kolkata'), window)).toEqual([]);
  });

  it('should keep every transition inside the window', () => {
    // Europe/London leaves BST at 2024-10-27 01:00Z
    const window = timelineWindow(new Date('2024-10-27T01:00:00Z'));
    const transitions = getDstTransitionsInRange(TimeZone.fromIana('Europe/London'), window);
    expect(transitions).toHaveLength(1);
    for (const { instant, transition } of transitions) {
      expect(instant.getTime()).toBeGreaterThanOrEqual(window.start.getTime());
      expect(instant.getTime()).toBeLessThan(window.end.getTime());
      expect(['springForward', 'fallBack']).toContain(transition);
    }
    expect(transitions[0]?.instant.toISOString()).toBe('2024-10-27T00:00:00.000Z');
  });

  it('should report a half-hour shift at the preceding hourly sample', () => {
    // Australia/Lord_Howe goes from UTC+11 to UTC+10:30 at 2024-04-06 15:00Z
    const window = timelineWindow(new Date('2024-04-07T00:00:00Z'));
    const transitions = getDstTransitionsInRange(TimeZone.fromIana('Australia/Lord_Howe'), window);
    expect(transitions).toEqual([
      { instant: new Date('2024-04-06T14:00:00Z'), transition: 'springForward' },
    ]);
  });

  it('should catch a change at the window end from the last sample', () => {
    // The last sample is one hour before the end and looks one hour ahead
    const window = timelineWindow(new Date('2024-03-09T07:00:00Z'));
    expect(window.end.toISOString()).toBe('2024-03-10T07:00:00.000Z');
    const transitions = getDstTransitionsInRange(TimeZone.fromIana('America/New_York'), window);
    expect(transitions.map((t) => t.instant.toISOString())).toEqual(['2024-03-10T06:00:00.000Z']);
  });
});
