/**
 * Challenge time parsing
 * Accepts "21:00", "9:00 PM", and either form followed by an IANA timezone
 */

import { isValid, parse } from 'date-fns';
import type { ChallengeFrequency, Weekday } from '../../database/schema.js';

export const DEFAULT_TIMEZONE = 'UTC';

export const WEEKDAYS: readonly Weekday[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

export const FREQUENCIES: readonly ChallengeFrequency[] = ['daily', 'weekly'];

export class TimeParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeParseError';
  }
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  timezone: string;
}

export interface ScheduleText {
  /** Time portion, still unparsed (may carry a timezone) */
  time: string;
  frequency: ChallengeFrequency;
  /** Lowercased token after the frequency, if any */
  day: string | null;
}

export function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some(day => day === value);
}

export function isFrequency(value: string): value is ChallengeFrequency {
  return FREQUENCIES.some(frequency => frequency === value);
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

// Any fixed day works; only the clock fields are read back
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a time of day with an optional trailing timezone
 * @throws TimeParseError if the time or timezone is not recognised
 */
export function parseTimeWithTimezone(text: string): TimeOfDay {
  const parts = text.trim().split(/\s+/).filter(part => part.length > 0);
  if (parts.length === 0) {
    throw new TimeParseError('Expected a time such as 21:00 or 9:00 PM');
  }

  const isTwelveHour = parts.length >= 2 && /^(am|pm)$/i.test(parts[1]);
  const timePart = isTwelveHour ? `${parts[0]} ${parts[1].toUpperCase()}` : parts[0];
  const timezonePart = parts.slice(isTwelveHour ? 2 : 1).join(' ') || DEFAULT_TIMEZONE;

  const parsed = isTwelveHour
    ? parse(timePart, 'h:mm a', REFERENCE_DATE)
    : parse(timePart, 'H:mm', REFERENCE_DATE);

  if (!isValid(parsed)) {
    throw new TimeParseError(`"${timePart}" is not a valid time (use HH:MM or H:MM AM/PM)`);
  }

  if (!isValidTimeZone(timezonePart)) {
    throw new TimeParseError(`Unknown timezone: ${timezonePart}`);
  }

  return {
    hour: parsed.getHours(),
    minute: parsed.getMinutes(),
    timezone: timezonePart,
  };
}

export const SCHEDULE_FORMAT_HINT =
  "Time and Frequency must be in format 'HH:MM daily' or '9:00 PM America/St_Johns weekly monday'.";

/**
 * Splits "<time> <daily|weekly> [day]" as typed into the edit form
 * @throws TimeParseError when the layout is wrong; the time itself is not validated here
 */
export function parseScheduleText(text: string): ScheduleText {
  const parts = text.trim().split(/\s+/).filter(part => part.length > 0);
  if (parts.length < 2) {
    throw new TimeParseError(SCHEDULE_FORMAT_HINT);
  }

  let frequencyIndex = -1;
  let frequency: ChallengeFrequency | undefined;
  for (const [index, part] of parts.entries()) {
    const lowered = part.toLowerCase();
    if (isFrequency(lowered)) {
      frequencyIndex = index;
      frequency = lowered;
      break;
    }
  }

  if (frequency === undefined) {
    throw new TimeParseError("Must include 'daily' or 'weekly' frequency.");
  }

  return {
    time: parts.slice(0, frequencyIndex).join(' '),
    frequency,
    day: frequencyIndex + 1 < parts.length ? parts[frequencyIndex + 1].toLowerCase() : null,
  };
}

/**
 * Renders the stored schedule back into the edit form's text
 */
export function formatScheduleText(schedule: { time: string; frequency: ChallengeFrequency; day: string | null }): string {
  const base = `${schedule.time} ${schedule.frequency}`;
  return schedule.day ? `${base} ${schedule.day}` : base;
}
