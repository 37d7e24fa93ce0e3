/**
 * Source of the current time, injectable so temp branch names and record timestamps are deterministic in tests.
 */
export interface Clock {
  now(): Date;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
