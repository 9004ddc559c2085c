import type { TZDate } from "@date-fns/tz";
import { addDays, set } from "date-fns";
import type { EventKind, SimEvent, TravelPlan } from "../contracts.js";
import type { SimClock } from "./clock.js";
import type { Rng } from "./rng.js";
import { destinationForWeek } from "./travel-plan.js";

export type ScheduleInput = {
  clock: SimClock;
  travelPlan: TravelPlan;
  totalWeeks: number;
  rng: Rng;
};

export const NUTRITION_WEEKS: ReadonlySet<number> = new Set([3, 7, 11, 15, 19, 23, 27, 31]);

const FIRST_DIAGNOSTIC_WEEK = 4;
const DIAGNOSTIC_INTERVAL_WEEKS = 12;
const RESULTS_DAY_OFFSET = 4;
const MIN_CURIOSITY_PER_WEEK = 3;
const MAX_CURIOSITY_PER_WEEK = 7;
const WEARABLE_ANOMALY_CHANCE = 0.5;
const FIVE_MINUTE_MARKS = [0, 5, 10, 15, 20, 25, 30, 35, 40, 45, 50, 55] as const;

export function diagnosticWeeks(totalWeeks: number): number[] {
  const weeks: number[] = [];
  for (let week = FIRST_DIAGNOSTIC_WEEK; week <= totalWeeks; week += DIAGNOSTIC_INTERVAL_WEEKS) {
    weeks.push(week);
  }
  return weeks;
}

function randomTime(rng: Rng, base: TZDate, hourLow = 8, hourHigh = 20): TZDate {
  const hours = rng.int(hourLow, hourHigh);
  const minutes = rng.pick(FIVE_MINUTE_MARKS);
  return set(base, { hours, minutes });
}

function event(kind: EventKind, week: number, when: TZDate, destination?: string): SimEvent {
  return destination === undefined ? { kind, week, when } : { kind, week, when, meta: { destination } };
}

export function buildEvents(input: ScheduleInput): SimEvent[] {
  const { clock, travelPlan, totalWeeks, rng } = input;
  const diagnostics = new Set(diagnosticWeeks(totalWeeks));
  const events: SimEvent[] = [];

  for (let week = 1; week <= totalWeeks; week += 1) {
    const weekStart = clock.instantFor(week, 0, 9, 0);

    events.push(event("weekly_report", week, randomTime(rng, weekStart)));

    if (week % 2 === 0) {
      events.push(event("exercise_update", week, randomTime(rng, weekStart)));
      events.push(event("medical_checkin", week, randomTime(rng, weekStart, 10, 14)));
    }

    if (NUTRITION_WEEKS.has(week)) {
      events.push(event("nutrition_update", week, randomTime(rng, weekStart, 11, 16)));
    }

    const destination = destinationForWeek(travelPlan, week);
    if (destination) {
      events.push(event("travel_adaptation", week, randomTime(rng, weekStart), destination));
    }

    if (diagnostics.has(week)) {
      events.push(event("diagnostics_schedule", week, randomTime(rng, weekStart, 8, 11)));
      const friday = addDays(weekStart, RESULTS_DAY_OFFSET);
      events.push(event("diagnostics_results", week, randomTime(rng, friday, 13, 18)));
    }

    const curiosityCount = rng.int(MIN_CURIOSITY_PER_WEEK, MAX_CURIOSITY_PER_WEEK);
    for (let i = 0; i < curiosityCount; i += 1) {
      const day = rng.int(0, 6);
      events.push(event("member_curiosity", week, randomTime(rng, addDays(weekStart, day))));
    }

    if (rng.chance(WEARABLE_ANOMALY_CHANCE)) {
      const day = rng.int(1, 6);
      events.push(event("wearable_anomaly", week, randomTime(rng, addDays(weekStart, day))));
    }
  }

  // Array.prototype.sort is stable, so same-instant events keep their scheduling order.
  return events.sort((a, b) => a.when.getTime() - b.when.getTime());
}
