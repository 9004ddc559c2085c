import type { TravelPlan } from "../contracts.js";

export const TRAVEL_DESTINATIONS = ["United Kingdom", "United States", "South Korea", "Jakarta"] as const;

const TRAVEL_EVERY_WEEKS = 4;

export function buildTravelPlan(totalWeeks: number): TravelPlan {
  const travelWeeks: number[] = [];
  for (let week = TRAVEL_EVERY_WEEKS; week <= totalWeeks; week += TRAVEL_EVERY_WEEKS) {
    travelWeeks.push(week);
  }
  return {
    travelWeeks,
    destinations: [...TRAVEL_DESTINATIONS],
  };
}

export function destinationForWeek(plan: TravelPlan, week: number): string | undefined {
  const index = plan.travelWeeks.indexOf(week);
  if (index < 0 || plan.destinations.length === 0) {
    return undefined;
  }
  return plan.destinations[index % plan.destinations.length];
}
