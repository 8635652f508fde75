import type { Random } from 'random-js';
import { bucketedPick, logNormal } from './distributions';
import type { BucketDistribution } from './distributions';
import { InvalidRangeError } from './errors';
import type { DueDateBucket, Horizon } from './types';
import { DAY_MS, HOUR_MS, addDays, addHours, clampNumber, startOfUtcDay, utcWeekday } from './utils';

const MINUTE_MS = 60_000;
const EARLY_WEEKDAYS = new Set([1, 2, 3]);
const COMPLETION_LOG_MEAN = 1.5;
const COMPLETION_LOG_SIGMA = 0.8;
const DUE_DATE_ANCHOR_RATE = 0.6;

export type TemporalEngineOptions = {
  rng: Random;
  horizon: Horizon;
  dueDateDistribution: BucketDistribution<DueDateBucket>;
  weekendAvoidanceRate: number;
  weekdayBiasRate: number;
  sprintDurationDays: number;
};

/**
 * Derives work-item timestamps inside a fixed horizon. All calendar logic is
 * UTC; due dates are UTC day starts. Each method consumes randomness in a
 * fixed order, so a seeded source replays the same timeline.
 */
export class TemporalEngine {
  private readonly rng: Random;
  readonly horizon: Horizon;
  private readonly dueDateDistribution: BucketDistribution<DueDateBucket>;
  private readonly weekendAvoidanceRate: number;
  private readonly weekdayBiasRate: number;
  private readonly sprintDurationDays: number;

  constructor(options: TemporalEngineOptions) {
    if (options.horizon.end < options.horizon.start) {
      throw new InvalidRangeError('Horizon end precedes its start.');
    }
    if (!(options.sprintDurationDays > 0)) {
      throw new InvalidRangeError(`Sprint duration must be positive, got ${options.sprintDurationDays}.`);
    }
    this.rng = options.rng;
    this.horizon = options.horizon;
    this.dueDateDistribution = options.dueDateDistribution;
    this.weekendAvoidanceRate = options.weekendAvoidanceRate;
    this.weekdayBiasRate = options.weekdayBiasRate;
    this.sprintDurationDays = options.sprintDurationDays;
  }

  get now() {
    return this.horizon.end;
  }

  /** Uniform instant in [start, end]. */
  between(start: number, end: number) {
    if (end < start) throw new InvalidRangeError(`Range end ${end} precedes start ${start}.`);
    return start + this.rng.real(0, 1) * (end - start);
  }

  createdAt(rangeStart: number, rangeEnd: number) {
    let created = this.between(rangeStart, rangeEnd);

    if (this.rng.real(0, 1) < this.weekdayBiasRate && containsEarlyWeekday(rangeStart, rangeEnd)) {
      while (!EARLY_WEEKDAYS.has(utcWeekday(created))) {
        created = this.between(rangeStart, rangeEnd);
      }
    }

    const hour = this.rng.integer(9, 18);
    const minute = this.rng.integer(0, 59);
    const atBusinessHours = startOfUtcDay(created) + hour * HOUR_MS + minute * MINUTE_MS;
    return clampNumber(atBusinessHours, rangeStart, rangeEnd);
  }

  dueDate(createdAt: number): number | null {
    const bucket = bucketedPick(this.dueDateDistribution, this.rng.real(0, 1));
    const offsetDays = this.dueOffsetDays(bucket);
    if (offsetDays === null) return null;

    let due = addDays(createdAt, offsetDays);
    if (startOfUtcDay(due) > startOfUtcDay(this.now)) {
      due = addDays(this.now, -this.rng.integer(1, 7));
    }
    return this.avoidWeekend(startOfUtcDay(due));
  }

  private dueOffsetDays(bucket: DueDateBucket): number | null {
    switch (bucket) {
      case 'within_1_week':
        return this.rng.integer(1, 7);
      case 'within_1_month':
        return this.rng.integer(8, 30);
      case 'within_3_months':
        return this.rng.integer(31, 90);
      case 'overdue':
        return -this.rng.integer(1, 30);
      case 'no_due_date':
        return null;
      default: {
        const exhaustive: never = bucket;
        return exhaustive;
      }
    }
  }

  /**
   * Moves a weekend day to Monday with probability `weekendAvoidanceRate`.
   * A Monday past the horizon's last day becomes the preceding Friday.
   */
  avoidWeekend(day: number) {
    const start = startOfUtcDay(day);
    if (this.rng.real(0, 1) >= this.weekendAvoidanceRate) return start;

    const weekday = utcWeekday(start);
    if (weekday !== 6 && weekday !== 0) return start;

    const monday = addDays(start, weekday === 6 ? 2 : 1);
    if (monday <= startOfUtcDay(this.now)) return monday;
    return addDays(start, weekday === 6 ? -1 : -2);
  }

  completedAt(createdAt: number, dueDate: number | null) {
    const elapsedDays = logNormal(this.rng, COMPLETION_LOG_MEAN, COMPLETION_LOG_SIGMA, { min: 1, max: 14 });
    let completed = addDays(createdAt, elapsedDays);

    if (completed > this.now) {
      completed = addHours(this.now, -this.rng.integer(1, 48));
    }

    if (dueDate !== null) {
      const anchorDraw = this.rng.real(0, 1);
      if (anchorDraw < DUE_DATE_ANCHOR_RATE && dueDate < this.now) {
        completed = addDays(dueDate, this.rng.real(-2, 1));
      }
    }

    if (completed < createdAt) {
      completed = addHours(createdAt, this.rng.integer(2, 48));
    }
    return Math.min(completed, this.now);
  }

  /** Drifts open items only once two whole days have passed since creation. */
  modifiedAt(createdAt: number, completedAt: number | null) {
    if (completedAt !== null) return completedAt;
    if (this.now - createdAt >= 2 * DAY_MS) return this.between(createdAt, this.now);
    return createdAt;
  }

  sprintDueDate(createdAt: number) {
    const anchor = startOfUtcDay(this.horizon.start);
    const daysSinceStart = Math.floor((startOfUtcDay(createdAt) - anchor) / DAY_MS);
    const sprintsElapsed = Math.floor(daysSinceStart / this.sprintDurationDays);
    const nextBoundary = anchor + (sprintsElapsed + 1) * this.sprintDurationDays * DAY_MS;
    const variance = this.rng.integer(-2, 2);
    let due = addDays(nextBoundary, variance);
    if (due > startOfUtcDay(this.now)) {
      due = addDays(this.now, -this.rng.integer(1, 7));
    }
    return this.avoidWeekend(startOfUtcDay(due));
  }
}

const containsEarlyWeekday = (start: number, end: number) => {
  if (start === end) return EARLY_WEEKDAYS.has(utcWeekday(start));
  if (end - start >= 7 * DAY_MS) return true;
  for (let day = startOfUtcDay(start); day < end; day += DAY_MS) {
    const overlap = Math.min(day + DAY_MS, end) - Math.max(day, start);
    if (overlap > 0 && EARLY_WEEKDAYS.has(utcWeekday(day))) return true;
  }
  return false;
};
