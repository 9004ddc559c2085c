import { describe, expect, it } from "vitest";
import { buildTravelPlan, destinationForWeek } from "./travel-plan.js";

describe("travel-plan", () => {
  it("marks every fourth week starting at week 4", () => {
    expect(buildTravelPlan(34).travelWeeks).toEqual([4, 8, 12, 16, 20, 24, 28, 32]);
    expect(buildTravelPlan(3).travelWeeks).toEqual([]);
  });

  it("cycles through the destination list in order", () => {
    const plan = buildTravelPlan(34);
    expect(plan.travelWeeks.map((week) => destinationForWeek(plan, week))).toEqual([
      "United Kingdom",
      "United States",
      "South Korea",
      "Jakarta",
      "United Kingdom",
      "United States",
      "South Korea",
      "Jakarta",
    ]);
  });

  it("returns no destination for home weeks", () => {
    const plan = buildTravelPlan(34);
    expect(destinationForWeek(plan, 5)).toBeUndefined();
    expect(destinationForWeek(plan, 0)).toBeUndefined();
  });
});
