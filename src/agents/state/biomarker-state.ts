import type { Intervention, MetricKey } from "../../contracts.js";
import type { Rng } from "../../sim/rng.js";
import { bernoulli, totalWeeklyHours, weeklyAdherenceProbability } from "../interventions/intervention-catalog.js";

export type BiomarkerState = Record<MetricKey, number> & {
  weekIndex: number;
  adherenceLog: Record<string, boolean>;
  weeklyHoursCommitted: number;
  weeklyHoursCompleted: number;
};

export type StateSnapshot = {
  SBP: number;
  DBP: number;
  ApoB: number;
  "LDL-C": number;
  hsCRP: number;
  HbA1c: number;
  BMI: number;
  "HRV(ms)": number;
  "RHR(bpm)": number;
  "Sleep(h)": number;
};

export type WeeklyUpdateInput = {
  interventions: readonly Intervention[];
  travel: boolean;
  busyWeek: boolean;
  lastWeekWin: boolean;
  paSupport?: boolean;
  rng: Rng;
};

export type WeeklyUpdateResult = {
  adherence: Record<string, boolean>;
  win: boolean;
  hoursAdhered: number;
};

export const BASELINE_METRICS: Readonly<Record<MetricKey, number>> = {
  systolicBp: 134.0,
  diastolicBp: 86.0,
  apob: 105.0,
  ldlC: 140.0,
  hsCrp: 2.2,
  hba1c: 5.7,
  bmi: 26.0,
  hrvMs: 40.0,
  rhrBpm: 66.0,
  sleepHours: 6.25,
};

export const METRIC_BOUNDS: Readonly<Record<MetricKey, readonly [number, number]>> = {
  systolicBp: [95.0, 170.0],
  diastolicBp: [55.0, 110.0],
  apob: [50.0, 200.0],
  ldlC: [40.0, 250.0],
  hsCrp: [0.2, 10.0],
  hba1c: [4.8, 7.0],
  bmi: [18.0, 35.0],
  hrvMs: [20.0, 120.0],
  rhrBpm: [45.0, 90.0],
  sleepHours: [4.0, 9.0],
};

const NOISE_SIGMA: Readonly<Record<MetricKey, number>> = {
  systolicBp: 0.4,
  diastolicBp: 0.3,
  apob: 0.6,
  ldlC: 0.8,
  hsCrp: 0.1,
  hba1c: 0.02,
  bmi: 0.03,
  hrvMs: 0.8,
  rhrBpm: 0.5,
  sleepHours: 0.1,
};

const TRAVEL_PENALTY: Readonly<Record<string, number>> = {
  sleepHours: -0.2,
  hrvMs: -1.0,
  rhrBpm: 1.0,
  systolicBp: 0.5,
  diastolicBp: 0.3,
};

export const METRIC_KEYS: readonly MetricKey[] = [
  "systolicBp",
  "diastolicBp",
  "apob",
  "ldlC",
  "hsCrp",
  "hba1c",
  "bmi",
  "hrvMs",
  "rhrBpm",
  "sleepHours",
];

const WIN_HRV_MS = 40.0;
const WIN_APOB = 105.0;
const WIN_SYSTOLIC = 134.0;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function isMetricKey(key: string): key is MetricKey {
  return Object.prototype.hasOwnProperty.call(BASELINE_METRICS, key);
}

export function createBiomarkerState(overrides: Partial<Record<MetricKey, number>> = {}): BiomarkerState {
  return {
    ...BASELINE_METRICS,
    ...overrides,
    weekIndex: 0,
    adherenceLog: {},
    weeklyHoursCommitted: 5.0,
    weeklyHoursCompleted: 0,
  };
}

// Unknown keys are skipped so effect vectors can carry metrics this model does not track yet.
export function applyDelta(state: BiomarkerState, key: string, delta: number): void {
  if (isMetricKey(key)) {
    state[key] += delta;
  }
}

export function applyInterventionEffects(
  state: BiomarkerState,
  effectVector: Readonly<Record<string, number>>,
  adhered: boolean,
): void {
  if (!adhered) {
    return;
  }
  for (const [key, delta] of Object.entries(effectVector)) {
    applyDelta(state, key, delta);
  }
}

export function applyTravelPenalty(state: BiomarkerState): void {
  for (const [key, delta] of Object.entries(TRAVEL_PENALTY)) {
    applyDelta(state, key, delta);
  }
}

export function addNoise(state: BiomarkerState, rng: Rng): void {
  for (const key of METRIC_KEYS) {
    applyDelta(state, key, rng.gauss(0, NOISE_SIGMA[key]));
  }
}

export function clampToBounds(state: BiomarkerState): void {
  for (const key of METRIC_KEYS) {
    const [min, max] = METRIC_BOUNDS[key];
    state[key] = Math.min(Math.max(state[key], min), max);
  }
}

export function isWinningWeek(state: BiomarkerState): boolean {
  let wins = 0;
  if (state.hrvMs > WIN_HRV_MS) {
    wins += 1;
  }
  if (state.apob < WIN_APOB) {
    wins += 1;
  }
  if (state.systolicBp < WIN_SYSTOLIC) {
    wins += 1;
  }
  return wins >= 2;
}

export function advanceWeek(state: BiomarkerState, input: WeeklyUpdateInput): WeeklyUpdateResult {
  const weeklyHours = totalWeeklyHours(input.interventions);
  const adherence: Record<string, boolean> = {};
  let hoursAdhered = 0;

  for (const intervention of input.interventions) {
    const probability = weeklyAdherenceProbability({
      base: intervention.baseAdherence,
      travel: input.travel,
      paSupport: input.paSupport ?? true,
      busyWeek: input.busyWeek,
      lastWeekWin: input.lastWeekWin,
      weeklyHours,
    });
    const adhered = bernoulli(input.rng, probability);
    adherence[intervention.name] = adhered;
    if (adhered) {
      hoursAdhered += intervention.timeCostHours;
    }
    applyInterventionEffects(state, intervention.effectVector, adhered);
  }

  if (input.travel) {
    applyTravelPenalty(state);
  }

  addNoise(state, input.rng);
  clampToBounds(state);

  state.weekIndex += 1;
  state.adherenceLog = adherence;

  return {
    adherence,
    win: isWinningWeek(state),
    hoursAdhered: round(hoursAdhered, 2),
  };
}

export function snapshotState(state: BiomarkerState): StateSnapshot {
  return {
    SBP: round(state.systolicBp, 1),
    DBP: round(state.diastolicBp, 1),
    ApoB: round(state.apob, 1),
    "LDL-C": round(state.ldlC, 1),
    hsCRP: round(state.hsCrp, 2),
    HbA1c: round(state.hba1c, 2),
    BMI: round(state.bmi, 1),
    "HRV(ms)": round(state.hrvMs, 1),
    "RHR(bpm)": round(state.rhrBpm, 1),
    "Sleep(h)": round(state.sleepHours, 2),
  };
}

export function sampleWeeklyHours(state: BiomarkerState, rng: Rng): number {
  const sampled = Math.max(2.0, Math.min(7.0, rng.gauss(5.0, 1.0)));
  state.weeklyHoursCompleted = round(sampled, 1);
  return state.weeklyHoursCompleted;
}
