export {
  bernoulli,
  defaultInterventions,
  totalWeeklyHours,
  weeklyAdherenceProbability,
  type AdherenceModifiers,
} from "./intervention-catalog.js";
