import {
  WEEKDAYS,
  createScheduleWindow,
  minutesOfDay,
  type ScheduleWindow,
  type Weekday,
} from '../domain/entities/ScheduleWindow.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/** Today plus one full week covers any non-empty work-day set */
const MAX_DAYS_AHEAD = 7;

/**
 * Decides whether the session should exist at a given instant.
 * Pure: depends only on the window and the instant passed in.
 */
export class ScheduleGate {
  private readonly window: ScheduleWindow;
  private readonly offsetMs: number;
  private readonly startMs: number;
  private readonly endMs: number;

  /**
   * @throws ConfigError for an empty work-day set, `start >= end` or an
   * out-of-range offset
   */
  constructor(window: ScheduleWindow) {
    this.window = createScheduleWindow(window);
    this.offsetMs = this.window.offsetHours * HOUR_MS;
    this.startMs = minutesOfDay(this.window.start) * MINUTE_MS;
    this.endMs = minutesOfDay(this.window.end) * MINUTE_MS;
  }

  get offsetHours(): number {
    return this.window.offsetHours;
  }

  /**
   * True iff the local weekday is a work day and the local time lies strictly
   * between start and end
   */
  isActive(now: Date): boolean {
    const local = this.toLocal(now);
    if (!this.isWorkDay(local)) {
      return false;
    }
    const sinceMidnight = local - this.localMidnight(local);
    return sinceMidnight > this.startMs && sinceMidnight < this.endMs;
  }

  /**
   * When `isActive` next changes: today's end while active, otherwise the
   * next work day's start (today included). At exactly a start instant that
   * instant is returned, since the window opens right after it.
   */
  nextTransition(now: Date): Date {
    const local = this.toLocal(now);
    const midnight = this.localMidnight(local);

    if (this.isActive(now)) {
      return this.toUtc(midnight + this.endMs);
    }

    for (let day = 0; day <= MAX_DAYS_AHEAD; day++) {
      const candidateMidnight = midnight + day * DAY_MS;
      const start = candidateMidnight + this.startMs;
      if (this.isWorkDay(candidateMidnight) && start >= local) {
        return this.toUtc(start);
      }
    }

    // Unreachable while the window has at least one work day
    throw new Error('No work day found within a week');
  }

  /**
   * Render an instant in the configured offset, e.g. `2024-03-04 09:00:00 (GMT+2)`
   */
  format(instant: Date): string {
    const local = new Date(this.toLocal(instant)).toISOString();
    const sign = this.window.offsetHours >= 0 ? '+' : '';
    return `${local.slice(0, 10)} ${local.slice(11, 19)} (GMT${sign}${this.window.offsetHours})`;
  }

  // Local wall-clock is represented as epoch ms shifted by the offset, read with UTC getters
  private toLocal(instant: Date): number {
    return instant.getTime() + this.offsetMs;
  }

  private toUtc(local: number): Date {
    return new Date(local - this.offsetMs);
  }

  private localMidnight(local: number): number {
    return Math.floor(local / DAY_MS) * DAY_MS;
  }

  private isWorkDay(local: number): boolean {
    const weekday: Weekday = WEEKDAYS[new Date(local).getUTCDay()];
    return this.window.workDays.has(weekday);
  }
}
