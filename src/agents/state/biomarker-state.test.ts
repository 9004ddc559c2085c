import { describe, expect, it } from "vitest";
import { makeRng } from "../../sim/rng.js";
import { defaultInterventions } from "../interventions/intervention-catalog.js";
import {
  METRIC_BOUNDS,
  METRIC_KEYS,
  advanceWeek,
  applyInterventionEffects,
  applyTravelPenalty,
  clampToBounds,
  createBiomarkerState,
  isWinningWeek,
  sampleWeeklyHours,
  snapshotState,
} from "./biomarker-state.js";

describe("biomarker-state", () => {
  it("starts from baseline metrics", () => {
    const state = createBiomarkerState();
    expect(snapshotState(state)).toEqual({
      SBP: 134,
      DBP: 86,
      ApoB: 105,
      "LDL-C": 140,
      hsCRP: 2.2,
      HbA1c: 5.7,
      BMI: 26,
      "HRV(ms)": 40,
      "RHR(bpm)": 66,
      "Sleep(h)": 6.25,
    });
    expect(state.weekIndex).toBe(0);
  });

  it("applies effects only when adhered and ignores unknown keys", () => {
    const state = createBiomarkerState();
    applyInterventionEffects(state, { apob: -1.5, vo2max: 3 }, false);
    expect(state.apob).toBe(105);
    applyInterventionEffects(state, { apob: -1.5, vo2max: 3 }, true);
    expect(state.apob).toBe(103.5);
    expect(Object.keys(state)).not.toContain("vo2max");
  });

  it("applies the fixed travel penalty", () => {
    const state = createBiomarkerState();
    applyTravelPenalty(state);
    expect(state.sleepHours).toBeCloseTo(6.05, 10);
    expect(state.hrvMs).toBe(39);
    expect(state.rhrBpm).toBe(67);
    expect(state.systolicBp).toBe(134.5);
    expect(state.diastolicBp).toBeCloseTo(86.3, 10);
  });

  it("clamps every metric into its band", () => {
    const state = createBiomarkerState({ systolicBp: 400, sleepHours: -2, hsCrp: 0 });
    clampToBounds(state);
    expect(state.systolicBp).toBe(170);
    expect(state.sleepHours).toBe(4);
    expect(state.hsCrp).toBe(0.2);
  });

  it("needs two of three thresholds for a win", () => {
    expect(isWinningWeek(createBiomarkerState())).toBe(false);
    expect(isWinningWeek(createBiomarkerState({ hrvMs: 41, apob: 100 }))).toBe(true);
    expect(isWinningWeek(createBiomarkerState({ systolicBp: 120 }))).toBe(false);
  });

  it("keeps metrics inside their bands across many weekly updates", () => {
    const rng = makeRng(42);
    const interventions = defaultInterventions();
    const state = createBiomarkerState({ hba1c: 6.99, sleepHours: 4.01 });
    let lastWeekWin = false;

    for (let week = 1; week <= 120; week += 1) {
      const result = advanceWeek(state, {
        interventions,
        travel: week % 4 === 0,
        busyWeek: week % 6 === 0,
        lastWeekWin,
        rng,
      });
      lastWeekWin = result.win;
      expect(Object.keys(result.adherence)).toHaveLength(interventions.length);
      for (const key of METRIC_KEYS) {
        const [min, max] = METRIC_BOUNDS[key];
        expect(state[key]).toBeGreaterThanOrEqual(min);
        expect(state[key]).toBeLessThanOrEqual(max);
      }
    }
    expect(state.weekIndex).toBe(120);
  });

  it("reproduces the same trajectory for the same seed", () => {
    const run = () => {
      const rng = makeRng(99);
      const state = createBiomarkerState();
      for (let week = 1; week <= 10; week += 1) {
        advanceWeek(state, { interventions: defaultInterventions(), travel: false, busyWeek: false, lastWeekWin: false, rng });
      }
      return snapshotState(state);
    };
    expect(run()).toEqual(run());
  });

  it("samples completed hours inside [2, 7]", () => {
    const rng = makeRng(8);
    const state = createBiomarkerState();
    for (let i = 0; i < 200; i += 1) {
      const hours = sampleWeeklyHours(state, rng);
      expect(hours).toBeGreaterThanOrEqual(2);
      expect(hours).toBeLessThanOrEqual(7);
      expect(state.weeklyHoursCompleted).toBe(hours);
    }
  });
});
