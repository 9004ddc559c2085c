import { describe, expect, it } from "vitest";
import { makeRng } from "../../sim/rng.js";
import { bernoulli, defaultInterventions, totalWeeklyHours, weeklyAdherenceProbability } from "./intervention-catalog.js";

const NEUTRAL = {
  base: 0.5,
  travel: false,
  paSupport: false,
  busyWeek: false,
  lastWeekWin: false,
  weeklyHours: 4.0,
};

describe("intervention-catalog", () => {
  it("applies travel and assistant support modifiers", () => {
    const probability = weeklyAdherenceProbability({ ...NEUTRAL, travel: true, paSupport: true });
    expect(probability).toBeCloseTo(0.45, 10);
  });

  it("penalizes busy weeks and plans over five hours", () => {
    expect(weeklyAdherenceProbability({ ...NEUTRAL, busyWeek: true })).toBeCloseTo(0.4, 10);
    expect(weeklyAdherenceProbability({ ...NEUTRAL, weeklyHours: 5.0 })).toBeCloseTo(0.5, 10);
    expect(weeklyAdherenceProbability({ ...NEUTRAL, weeklyHours: 5.1 })).toBeCloseTo(0.4, 10);
    expect(weeklyAdherenceProbability({ ...NEUTRAL, lastWeekWin: true })).toBeCloseTo(0.55, 10);
  });

  it("clamps to the adherence band", () => {
    expect(weeklyAdherenceProbability({ ...NEUTRAL, base: 0.1, travel: true, busyWeek: true })).toBe(0.05);
    expect(weeklyAdherenceProbability({ ...NEUTRAL, base: 0.99, paSupport: true })).toBe(0.95);
  });

  it("ships a fixed catalog whose total time cost exceeds five hours", () => {
    const catalog = defaultInterventions();
    expect(catalog).toHaveLength(7);
    expect(totalWeeklyHours(catalog)).toBeCloseTo(5.1, 10);
    expect(catalog.every((intervention) => intervention.baseAdherence === 0.5)).toBe(true);
  });

  it("samples outcomes from the injected random source", () => {
    const rng = makeRng(5);
    expect(bernoulli(rng, 0)).toBe(false);
    expect(bernoulli(rng, 1)).toBe(true);
  });
});
