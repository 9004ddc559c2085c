import { getDay, getHours } from "date-fns";
import type { ChatMessage, ConversationTally, SimEvent, TextEnhancer } from "../contracts.js";
import type { RunConfig } from "../config.js";
import { createBiomarkerState, snapshotState, type BiomarkerState, type StateSnapshot } from "../agents/state/index.js";
import { ContentEngine } from "../content/content-engine.js";
import { silentLogger, type SimLogger } from "../infra/logger.js";
import { createEnhancer } from "../nlg/index.js";
import { createSimClock, minutesApart } from "../sim/clock.js";
import { makeRng } from "../sim/rng.js";
import { buildEvents } from "../sim/scheduler.js";
import { buildTravelPlan, destinationForWeek } from "../sim/travel-plan.js";
import { validateConversation } from "../validators/conversation-validator.js";

export type SimulationDeps = {
  enhancer?: TextEnhancer;
  logger?: SimLogger;
  fetchImpl?: typeof fetch;
};

export type RunSummary = {
  seed: number;
  startDate: string;
  timeZone: string;
  weeks: number;
  enhancementMode: string;
  totalEvents: number;
  weeksUpdated: number[];
  tally: ConversationTally;
  finalState: StateSnapshot;
  cumulativePlanHours: number;
};

export type SimulationResult = {
  messages: ChatMessage[];
  events: SimEvent[];
  state: BiomarkerState;
  summary: RunSummary;
};

const BUSY_WEEK_INTERVAL = 6;
const UPDATE_WINDOW_START_HOUR = 8;
const UPDATE_WINDOW_END_HOUR = 12;
const CURIOSITY_REPLY_DELAY_MINUTES = 15;
const SCHEDULING_ACK_DELAY_MINUTES = 20;

const EXPERT_REPLIES = ["nutrition", "medical", "wearable"] as const;

export function isBusyWeek(week: number): boolean {
  return week % BUSY_WEEK_INTERVAL === 0;
}

/**
 * True when the event may carry its week's state update: it falls on the weekday the
 * simulation started on, between 08:00 and 12:59 local time.
 */
export function opensWeek(event: SimEvent, firstWeekday: number): boolean {
  const hour = getHours(event.when);
  return getDay(event.when) === firstWeekday && hour >= UPDATE_WINDOW_START_HOUR && hour <= UPDATE_WINDOW_END_HOUR;
}

export async function runSimulation(config: RunConfig, deps: SimulationDeps = {}): Promise<SimulationResult> {
  const logger = deps.logger ?? silentLogger;
  const rng = makeRng(config.seed);
  const clock = createSimClock({ startDate: config.startDate, timeZone: config.timeZone });
  const travelPlan = buildTravelPlan(config.weeks);
  const enhancer = deps.enhancer ?? createEnhancer(config.enhancement, rng, { fetchImpl: deps.fetchImpl, logger });
  const engine = new ContentEngine({ rng, enhancer, logger });
  const state = createBiomarkerState();
  const events = buildEvents({ clock, travelPlan, totalWeeks: config.weeks, rng });

  const firstWeekday = getDay(clock.start);
  const updatedWeeks = new Set<number>();
  const messages: ChatMessage[] = [];

  logger.info(`scheduled ${events.length} events over ${config.weeks} weeks (enhancement=${enhancer.mode})`);

  for (const event of events) {
    const destination = destinationForWeek(travelPlan, event.week);
    const traveling = destination !== undefined;

    if (!updatedWeeks.has(event.week) && opensWeek(event, firstWeekday)) {
      updatedWeeks.add(event.week);
      engine.beginWeek(state, { travel: traveling, busy: isBusyWeek(event.week) });
      logger.info(`week ${event.week}: state updated (win=${engine.context.lastWeekWin})`);
    }

    switch (event.kind) {
      case "weekly_report":
        messages.push(...(await engine.weeklyReport(event.when, state)));
        break;
      case "exercise_update":
        messages.push(...(await engine.exerciseUpdate(event.when)));
        break;
      case "medical_checkin":
        messages.push(...(await engine.medicalCheckin(event.when, state)));
        break;
      case "nutrition_update":
        messages.push(...(await engine.nutritionUpdate(event.when, traveling)));
        break;
      case "travel_adaptation":
        messages.push(...(await engine.travelAdaptation(event.when, event.meta?.destination ?? destination ?? "")));
        break;
      case "diagnostics_schedule":
        messages.push(...(await engine.diagnosticsSchedule(event.when)));
        messages.push(...(await engine.schedulingAck(minutesApart(event.when, SCHEDULING_ACK_DELAY_MINUTES))));
        break;
      case "diagnostics_results":
        messages.push(...(await engine.diagnosticsResults(event.when, state)));
        break;
      case "wearable_anomaly":
        messages.push(...(await engine.wearableAnomaly(event.when, state, traveling)));
        break;
      case "member_curiosity": {
        messages.push(...(await engine.memberCuriosity(event.when)));
        // The reply is not matched to the question's topic.
        const replyAt = minutesApart(event.when, CURIOSITY_REPLY_DELAY_MINUTES);
        const expert = rng.pick(EXPERT_REPLIES);
        if (expert === "nutrition") {
          messages.push(...(await engine.nutritionUpdate(replyAt, traveling)));
        } else if (expert === "medical") {
          messages.push(...(await engine.medicalCheckin(replyAt, state)));
        } else {
          messages.push(...(await engine.wearableAnomaly(replyAt, state, traveling)));
        }
        break;
      }
    }
  }

  const tally = validateConversation(messages, config.weeks);
  logger.info(`generated ${messages.length} messages; member-initiated ${tally.memberInitiatedPerWeek.toFixed(2)}/week`);

  return {
    messages,
    events,
    state,
    summary: {
      seed: config.seed,
      startDate: config.startDate,
      timeZone: config.timeZone,
      weeks: config.weeks,
      enhancementMode: enhancer.mode,
      totalEvents: events.length,
      weeksUpdated: [...updatedWeeks].sort((a, b) => a - b),
      tally,
      finalState: snapshotState(state),
      cumulativePlanHours: Math.round(engine.context.cumulativePlanHours * 100) / 100,
    },
  };
}
