import { TZDate } from "@date-fns/tz";
import { addDays, addMinutes, addWeeks, getDate, getMonth, getYear } from "date-fns";

export type SimClock = {
  readonly start: TZDate;
  readonly timeZone: string;
  instantFor: (week: number, dayOffset?: number, hour?: number, minute?: number) => TZDate;
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseStartDate(startDate: string, timeZone: string): TZDate {
  const match = ISO_DATE.exec(startDate.trim());
  if (!match) {
    throw new Error(`Start date must be YYYY-MM-DD, got "${startDate}".`);
  }
  const [, year, month, day] = match;
  return new TZDate(Number(year), Number(month) - 1, Number(day), 0, 0, timeZone);
}

export function createSimClock(params: { startDate: string; timeZone: string }): SimClock {
  const start = parseStartDate(params.startDate, params.timeZone);

  return {
    start,
    timeZone: params.timeZone,
    instantFor: (week, dayOffset = 0, hour = 9, minute = 0) => {
      const weekStart = addWeeks(start, week - 1);
      // Wall-clock fields are fixed on the week's first day, then the offset is layered on.
      const local = new TZDate(getYear(weekStart), getMonth(weekStart), getDate(weekStart), hour, minute, params.timeZone);
      return addDays(local, dayOffset);
    },
  };
}

export function minutesApart(instant: TZDate, minutes: number): TZDate {
  return addMinutes(instant, minutes);
}
