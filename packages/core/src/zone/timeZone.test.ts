import { describe, it, expect } from 'vitest';
import { TimeZone } from './timeZone.js';

describe('TimeZone', () => {
  const newYork = TimeZone.fromIana('America/New_York');

  it('should throw for an unknown zone', () => {
    expect(() => TimeZone.fromIana('Not/AZone')).toThrow('Unknown timezone: Not/AZone');
  });

  describe('displayName', () => {
    it('should derive the city from the last IANA segment', () => {
      expect(newYork.displayName).toBe('New York');
      expect(TimeZone.fromIana('UTC').displayName).toBe('UTC');
    });

    it('should prefer an explicit label', () => {
      expect(TimeZone.fromIana('Europe/Berlin', 'Office').displayName).toBe('Office');
    });
  });

  describe('localTime', () => {
    it('should read the wall clock in the zone', () => {
      // Saturday, June 15, 2024 13:00 EDT (UTC-4)
      expect(newYork.localTime(new Date('2024-06-15T17:00:00Z'))).toEqual({
        year: 2024,
        month: 6,
        day: 15,
        hour: 13,
        minute: 0,
        second: 0,
        weekday: 5,
      });
    });

    it('should report midnight as hour 0', () => {
      // Monday, January 1, 2024 00:00 EST
      const local = newYork.localTime(new Date('2024-01-01T05:00:00Z'));
      expect(local.hour).toBe(0);
      expect(local.weekday).toBe(0);
    });
  });

  describe('utcOffsetSeconds', () => {
    it('should follow DST', () => {
      expect(newYork.utcOffsetSeconds(new Date('2024-01-15T12:00:00Z'))).toBe(-5 * 3600);
      expect(newYork.utcOffsetSeconds(new Date('2024-06-15T12:00:00Z'))).toBe(-4 * 3600);
    });

    it('should handle fractional offsets and sub-second instants', () => {
      const kolkata = TimeZone.fromIana('Asia/Kolkata');
      expect(kolkata.utcOffsetSeconds(new Date('2024-06-15T12:00:00.750Z'))).toBe(5.5 * 3600);
      expect(TimeZone.fromIana('UTC').utcOffsetSeconds(new Date('2024-06-15T12:00:00Z'))).toBe(0);
    });
  });

  describe('offsetString and fullDisplayName', () => {
    it('should format the offset in effect at the instant', () => {
      expect(newYork.offsetString(new Date('2024-01-15T12:00:00Z'))).toBe('UTC-5');
      expect(TimeZone.fromIana('Asia/Kolkata').offsetString(new Date('2024-01-15T12:00:00Z'))).toBe('UTC+5:30');
    });

    it('should include the IANA identifier in the full name', () => {
      expect(newYork.fullDisplayName(new Date('2024-06-15T12:00:00Z'))).toBe(
        'New York (America/New_York) UTC-4',
      );
    });
  });

  describe('resolveLocal', () => {
    it('should resolve an ordinary wall time to one instant', () => {
      const result = newYork.resolveLocal({ year: 2024, month: 6, day: 15, hour: 13, minute: 0, second: 0 });
      expect(result.kind).toBe('single');
      if (result.kind === 'single') {
        expect(result.instant.toISOString()).toBe('2024-06-15T17:00:00.000Z');
      }
    });

    it('should report no instant for a wall time skipped by spring forward', () => {
      // March 10, 2024 2:00 AM EST -> 3:00 AM EDT
      const result = newYork.resolveLocal({ year: 2024, month: 3, day: 10, hour: 2, minute: 30, second: 0 });
      expect(result).toEqual({ kind: 'none' });
    });

    it('should report both instants for a wall time repeated by fall back', () => {
      // November 3, 2024 2:00 AM EDT -> 1:00 AM EST, 1:30 occurs twice
      const result = newYork.resolveLocal({ year: 2024, month: 11, day: 3, hour: 1, minute: 30, second: 0 });
      expect(result.kind).toBe('ambiguous');
      if (result.kind === 'ambiguous') {
        expect(result.earliest.toISOString()).toBe('2024-11-03T05:30:00.000Z');
        expect(result.latest.toISOString()).toBe('2024-11-03T06:30:00.000Z');
      }
    });
  });
});
