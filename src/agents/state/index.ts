export {
  BASELINE_METRICS,
  METRIC_BOUNDS,
  METRIC_KEYS,
  advanceWeek,
  applyDelta,
  applyInterventionEffects,
  applyTravelPenalty,
  clampToBounds,
  createBiomarkerState,
  isWinningWeek,
  sampleWeeklyHours,
  snapshotState,
  type BiomarkerState,
  type StateSnapshot,
  type WeeklyUpdateInput,
  type WeeklyUpdateResult,
} from "./biomarker-state.js";
