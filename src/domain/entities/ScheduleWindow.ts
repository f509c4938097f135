import { ConfigError } from '../errors.js';

/**
 * Day names in `Date.prototype.getUTCDay()` order
 */
export const WEEKDAYS = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const DEFAULT_WORK_DAYS: readonly Weekday[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
];

export const MAX_OFFSET_HOURS = 23;

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

/**
 * Same-day active window, repeated on every work day.
 * Times are wall-clock in the zone `offsetHours` away from UTC.
 */
export interface ScheduleWindow {
  readonly workDays: ReadonlySet<Weekday>;
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;
  readonly offsetHours: number;
}

export interface ScheduleWindowInput {
  workDays: Iterable<Weekday>;
  start: TimeOfDay;
  end: TimeOfDay;
  offsetHours: number;
}

export function minutesOfDay(time: TimeOfDay): number {
  return time.hours * 60 + time.minutes;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hours).padStart(2, '0')}:${String(time.minutes).padStart(2, '0')}`;
}

/**
 * Build an immutable window, rejecting empty work days, inverted or
 * cross-midnight ranges and out-of-range offsets
 */
export function createScheduleWindow(input: ScheduleWindowInput): ScheduleWindow {
  const workDays = new Set(input.workDays);
  if (workDays.size === 0) {
    throw new ConfigError('At least one work day must be configured');
  }

  if (minutesOfDay(input.start) >= minutesOfDay(input.end)) {
    throw new ConfigError(
      `Work start (${formatTimeOfDay(input.start)}) must be before work end (${formatTimeOfDay(input.end)})`
    );
  }

  if (
    !Number.isInteger(input.offsetHours) ||
    Math.abs(input.offsetHours) > MAX_OFFSET_HOURS
  ) {
    throw new ConfigError(
      `GMT offset must be an integer between -${MAX_OFFSET_HOURS} and ${MAX_OFFSET_HOURS}, got ${input.offsetHours}`
    );
  }

  return Object.freeze({
    workDays,
    start: Object.freeze({ ...input.start }),
    end: Object.freeze({ ...input.end }),
    offsetHours: input.offsetHours,
  });
}

function findWeekday(name: string): Weekday | undefined {
  return WEEKDAYS.find(
    (day) => day === name || (name.length === 3 && day.startsWith(name))
  );
}

/**
 * Parse a comma separated list such as `monday,Tue,friday`.
 * Blank input means Monday to Friday.
 */
export function parseWorkDays(value: string | undefined): Weekday[] {
  if (value === undefined || value.trim() === '') {
    return [...DEFAULT_WORK_DAYS];
  }

  const days: Weekday[] = [];
  for (const token of value.split(',')) {
    const name = token.trim().toLowerCase();
    if (name === '') continue;

    const day = findWeekday(name);
    if (!day) {
      throw new ConfigError(`Invalid work day: ${token.trim()}`);
    }
    if (!days.includes(day)) {
      days.push(day);
    }
  }
  return days;
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Parse `HH:MM` (24h)
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid time format: ${value} (expected HH:MM)`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new ConfigError(`Invalid time of day: ${value}`);
  }
  return { hours, minutes };
}

const OFFSET_PATTERN = /^(?:GMT|UTC)?\s*([+-]?\d{1,2})$/i;

/**
 * Parse a signed hour offset, optionally prefixed with GMT or UTC (`GMT+2`, `-5`).
 * Blank input means 0.
 */
export function parseGmtOffset(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return 0;
  }

  const match = OFFSET_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid GMT offset: ${value}`);
  }

  const offset = Number(match[1]);
  if (Math.abs(offset) > MAX_OFFSET_HOURS) {
    throw new ConfigError(
      `GMT offset must be between -${MAX_OFFSET_HOURS} and ${MAX_OFFSET_HOURS}, got ${offset}`
    );
  }
  return offset;
}
