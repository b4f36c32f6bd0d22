// src/util/time.ts
// time helpers in epoch milliseconds
export type Ms = number;

export const MS_PER_HOUR = 3_600_000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function hoursToMs(hours: number): Ms {
  return hours * MS_PER_HOUR;
}

/** exclusive end of a window that starts at `start` and lasts `hours` */
export function windowEnd(start: Ms, hours: number): Ms {
  return start + hoursToMs(hours);
}

/** the fixture window always starts one day before the run */
export function dayBefore(now: Ms = Date.now()): Ms {
  return now - MS_PER_DAY;
}
