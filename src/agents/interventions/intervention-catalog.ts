import type { Intervention } from "../../contracts.js";
import type { Rng } from "../../sim/rng.js";

export type AdherenceModifiers = {
  base: number;
  travel: boolean;
  paSupport: boolean;
  busyWeek: boolean;
  lastWeekWin: boolean;
  weeklyHours: number;
};

const TRAVEL_PENALTY = 0.15;
const BUSY_WEEK_PENALTY = 0.1;
const PA_SUPPORT_BONUS = 0.1;
const LAST_WEEK_WIN_BONUS = 0.05;
const OVER_HOURS_PENALTY = 0.1;
const OVER_HOURS_THRESHOLD = 5.0;
const MIN_ADHERENCE = 0.05;
const MAX_ADHERENCE = 0.95;

const DEFAULT_BASE_ADHERENCE = 0.5;

export function defaultInterventions(): Intervention[] {
  return [
    {
      name: "Mediterranean-pattern meals; reduce refined carbs",
      domain: "Nutrition",
      effectVector: { apob: -0.7, ldlC: -0.9, hsCrp: -0.06, bmi: -0.03 },
      timeCostHours: 1.5,
      recommendedBy: "nutrition",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
    {
      name: "Omega-3 (EPA/DHA) supplementation",
      domain: "Nutrition",
      effectVector: { apob: -0.4, hsCrp: -0.05 },
      timeCostHours: 0.1,
      recommendedBy: "nutrition",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
    {
      name: "Caffeine cutoff at 13:00",
      domain: "Sleep",
      effectVector: { sleepHours: 0.1, hrvMs: 0.5, rhrBpm: -0.2 },
      timeCostHours: 0,
      recommendedBy: "nutrition",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
    {
      name: "Morning light exposure (10-15 min)",
      domain: "Sleep/Stress",
      effectVector: { sleepHours: 0.08, hrvMs: 0.6, rhrBpm: -0.2 },
      timeCostHours: 0.3,
      recommendedBy: "performance",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
    {
      name: "Zone-2 calibration run (1x/wk)",
      domain: "Cardio",
      effectVector: { hrvMs: 0.7, rhrBpm: -0.3, systolicBp: -0.6, diastolicBp: -0.4 },
      timeCostHours: 0.8,
      recommendedBy: "performance",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
    {
      name: "Strength training (2x/wk) + daily 10-min mobility",
      domain: "PT",
      effectVector: { bmi: -0.04, systolicBp: -0.5, diastolicBp: -0.3 },
      timeCostHours: 2.2,
      recommendedBy: "physio",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
    {
      name: "Sodium awareness (restaurant swaps when traveling)",
      domain: "Nutrition/Travel",
      effectVector: { systolicBp: -0.4, diastolicBp: -0.3 },
      timeCostHours: 0.2,
      recommendedBy: "nutrition",
      baseAdherence: DEFAULT_BASE_ADHERENCE,
    },
  ];
}

export function totalWeeklyHours(interventions: readonly Intervention[]): number {
  return interventions.reduce((sum, intervention) => sum + intervention.timeCostHours, 0);
}

export function weeklyAdherenceProbability(modifiers: AdherenceModifiers): number {
  let probability = modifiers.base;
  if (modifiers.travel) {
    probability -= TRAVEL_PENALTY;
  }
  if (modifiers.busyWeek) {
    probability -= BUSY_WEEK_PENALTY;
  }
  if (modifiers.paSupport) {
    probability += PA_SUPPORT_BONUS;
  }
  if (modifiers.lastWeekWin) {
    probability += LAST_WEEK_WIN_BONUS;
  }
  if (modifiers.weeklyHours > OVER_HOURS_THRESHOLD) {
    probability -= OVER_HOURS_PENALTY;
  }
  return Math.max(MIN_ADHERENCE, Math.min(MAX_ADHERENCE, probability));
}

export function bernoulli(rng: Rng, probability: number): boolean {
  return rng.next01() < probability;
}
