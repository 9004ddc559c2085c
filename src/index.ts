export type * from "./contracts.js";
export { DEFAULT_RUN_CONFIG, parseRunConfig, type EnhancementConfig, type RunConfig, type RunConfigInput } from "./config.js";
export { ContentEngine, SUPPRESSION_WINDOW_HOURS, type ContentEngineOptions } from "./content/content-engine.js";
export { DEFAULT_ROSTER, type Roster, type RosterEntry } from "./content/roster.js";
export { naturalList, tidyParagraph, toSentence } from "./content/text-style.js";
export {
  exportJsonl,
  exportTranscript,
  renderChatLine,
  renderJsonl,
  renderTranscript,
  toMessageRecord,
  writeRunSummary,
} from "./export/exporters.js";
export { createConsoleLogger, silentLogger, type SimLogger } from "./infra/logger.js";
export { createEnhancer, createOllamaEnhancer, createPassthroughEnhancer } from "./nlg/index.js";
export { runSimulation, type RunSummary, type SimulationResult } from "./orchestrator/simulation.js";
export { createSimClock } from "./sim/clock.js";
export { makeRng, type Rng } from "./sim/rng.js";
export { buildEvents } from "./sim/scheduler.js";
export { buildTravelPlan } from "./sim/travel-plan.js";
export {
  ConversationValidationError,
  tallyConversation,
  validateConversation,
} from "./validators/conversation-validator.js";
