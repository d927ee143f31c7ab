import { DateTime } from 'luxon';

export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots (CLI context, server bootstrap) should call this.
 * Registry services take the clock as a parameter so tests can pin timestamps.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * Fixed or stepping clock for tests and replays.
 */
export function createFixedClock(startMs: number, stepMs: number = 0): ClockPort {
  let current = startMs;
  return {
    nowMs: () => {
      const value = current;
      current += stepMs;
      return value;
    },
  };
}

/**
 * ISO-8601 timestamp (UTC, millisecond precision) for a clock reading.
 * Lexicographic order of these strings matches chronological order.
 */
export function isoTimestamp(clock: ClockPort): string {
  const ms = clock.nowMs();
  const iso = DateTime.fromMillis(ms, { zone: 'utc' }).toISO();
  if (iso === null) {
    throw new RangeError(`Clock returned an unrepresentable time: ${ms}`);
  }
  return iso;
}
