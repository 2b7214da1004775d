/**
 * Tests for challenge time parsing
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  formatScheduleText,
  isValidTimeZone,
  parseScheduleText,
  parseTimeWithTimezone,
  SCHEDULE_FORMAT_HINT,
  TimeParseError,
} from './time.js';

describe('parseTimeWithTimezone', () => {
  it('should parse 24-hour times in UTC by default', () => {
    expect(parseTimeWithTimezone('21:00')).toEqual({ hour: 21, minute: 0, timezone: 'UTC' });
    expect(parseTimeWithTimezone('7:05')).toEqual({ hour: 7, minute: 5, timezone: 'UTC' });
  });

  it('should parse 12-hour times with a timezone', () => {
    expect(parseTimeWithTimezone('9:00 PM America/St_Johns')).toEqual({
      hour: 21,
      minute: 0,
      timezone: 'America/St_Johns',
    });
  });

  it('should accept lowercase am/pm', () => {
    expect(parseTimeWithTimezone('12:15 am')).toEqual({ hour: 0, minute: 15, timezone: 'UTC' });
    expect(parseTimeWithTimezone('12:00 pm')).toEqual({ hour: 12, minute: 0, timezone: 'UTC' });
  });

  it('should accept a timezone after a 24-hour time', () => {
    expect(parseTimeWithTimezone('  06:30   Europe/Berlin ')).toEqual({
      hour: 6,
      minute: 30,
      timezone: 'Europe/Berlin',
    });
  });

  it('should reject out-of-range times', () => {
    expect(() => parseTimeWithTimezone('25:00')).toThrow(
      '"25:00" is not a valid time (use HH:MM or H:MM AM/PM)'
    );
    expect(() => parseTimeWithTimezone('13:00 PM')).toThrow(TimeParseError);
  });

  it('should reject text that is not a time', () => {
    expect(() => parseTimeWithTimezone('noon')).toThrow(
      '"noon" is not a valid time (use HH:MM or H:MM AM/PM)'
    );
  });

  it('should reject empty input', () => {
    expect(() => parseTimeWithTimezone('   ')).toThrow('Expected a time such as 21:00 or 9:00 PM');
  });

  it('should reject unknown timezones', () => {
    expect(() => parseTimeWithTimezone('9:00 Mars/Olympus')).toThrow('Unknown timezone: Mars/Olympus');
  });

  it('should parse every valid 24-hour time', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }), (hour, minute) => {
        const text = `${hour}:${String(minute).padStart(2, '0')}`;
        expect(parseTimeWithTimezone(text)).toEqual({ hour, minute, timezone: 'UTC' });
      }),
      { numRuns: 100 }
    );
  });
});

describe('isValidTimeZone', () => {
  it('should accept IANA names and reject others', () => {
    expect(isValidTimeZone('UTC')).toBe(true);
    expect(isValidTimeZone('America/St_Johns')).toBe(true);
    expect(isValidTimeZone('Nowhere/Special')).toBe(false);
  });
});

describe('parseScheduleText', () => {
  it('should split a daily schedule', () => {
    expect(parseScheduleText('10:00 daily')).toEqual({ time: '10:00', frequency: 'daily', day: null });
  });

  it('should split a weekly schedule with timezone and day', () => {
    expect(parseScheduleText('9:00 PM America/St_Johns Weekly Monday')).toEqual({
      time: '9:00 PM America/St_Johns',
      frequency: 'weekly',
      day: 'monday',
    });
  });

  it('should require at least a time and a frequency', () => {
    expect(() => parseScheduleText('10:00')).toThrow(SCHEDULE_FORMAT_HINT);
  });

  it('should require a known frequency', () => {
    expect(() => parseScheduleText('10:00 monthly')).toThrow("Must include 'daily' or 'weekly' frequency.");
  });
});

describe('formatScheduleText', () => {
  it('should render the stored schedule for the edit form', () => {
    expect(formatScheduleText({ time: '10:00', frequency: 'daily', day: null })).toBe('10:00 daily');
    expect(formatScheduleText({ time: '9:00 PM UTC', frequency: 'weekly', day: 'friday' })).toBe(
      '9:00 PM UTC weekly friday'
    );
  });

  it('should be read back by parseScheduleText', () => {
    const schedule = { time: '18:45 Asia/Tokyo', frequency: 'weekly' as const, day: 'sunday' };
    expect(parseScheduleText(formatScheduleText(schedule))).toEqual(schedule);
  });
});
