import { addDays, format, parseISO } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface DateRange {
  start: Date; // Monday 00:00:00.000, inclusive
  end: Date; // Sunday 23:59:59.999, inclusive
  startDate: string; // yyyy-MM-dd
  endDate: string; // yyyy-MM-dd
  timezone: string;
}

/**
 * The Monday-to-Sunday week before the one containing today, where
 * today is the clock's calendar date in `timezone`.
 *
 * The end is always the most recent Sunday strictly before today, so a
 * run on a Sunday reports the week that ended seven days earlier.
 */
export function previousWeekRange(clock: Clock, timezone: string): DateRange {
  const now = clock.now();
  const today = parseISO(formatInTimeZone(now, timezone, "yyyy-MM-dd"));
  // ISO day of week: 1 = Monday ... 7 = Sunday
  const isoDay = Number(formatInTimeZone(now, timezone, "i"));

  const endDate = format(addDays(today, -isoDay), "yyyy-MM-dd");
  const startDate = format(addDays(today, -isoDay - 6), "yyyy-MM-dd");

  return {
    start: fromZonedTime(`${startDate}T00:00:00.000`, timezone),
    end: fromZonedTime(`${endDate}T23:59:59.999`, timezone),
    startDate,
    endDate,
    timezone,
  };
}

export function isWithinRange(instant: string | Date, range: DateRange): boolean {
  const time = new Date(instant).getTime();
  if (Number.isNaN(time)) {
    return false;
  }
  return time >= range.start.getTime() && time <= range.end.getTime();
}
