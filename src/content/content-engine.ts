import type { TZDate } from "@date-fns/tz";
import type {
  ChatMessage,
  EnhancementFacts,
  GenerationContext,
  Intervention,
  MessageKind,
  RoleKey,
  TextEnhancer,
} from "../contracts.js";
import { advanceWeek, sampleWeeklyHours, snapshotState, type BiomarkerState } from "../agents/state/index.js";
import { defaultInterventions } from "../agents/interventions/index.js";
import { silentLogger, type SimLogger } from "../infra/logger.js";
import { createPassthroughEnhancer } from "../nlg/passthrough-enhancer.js";
import type { Rng } from "../sim/rng.js";
import { DEFAULT_ROSTER, type Roster } from "./roster.js";
import {
  PHRASES,
  diagnosticsResultsText,
  diagnosticsScheduleText,
  exerciseUpdateText,
  medicalCheckinText,
  memberCuriosityText,
  nutritionUpdateText,
  travelAdaptationText,
  wearableAnomalyText,
  weeklyReportText,
  type TemplateContext,
} from "./templates.js";
import { extractOpener, tidyParagraph } from "./text-style.js";

export type ContentEngineOptions = {
  rng: Rng;
  enhancer?: TextEnhancer;
  interventions?: readonly Intervention[];
  roster?: Roster;
  logger?: SimLogger;
};

export type WeekConditions = {
  travel: boolean;
  busy: boolean;
};

/** Minimum simulated hours between two messages of the same sender and kind. */
export const SUPPRESSION_WINDOW_HOURS: Readonly<Record<MessageKind, number>> = {
  weekly_report: 4,
  exercise_update: 10,
  medical_checkin: 8,
  nutrition_update: 12,
  travel_adaptation: 10,
  diagnostics_schedule: 24,
  diagnostics_results: 24,
  wearable_anomaly: 10,
  member_curiosity: 4,
  scheduling_ack: 8,
};

const HEADERS: Readonly<Record<MessageKind, string>> = {
  weekly_report: "Weekly report:",
  exercise_update: "Exercise update:",
  medical_checkin: "Medical check-in:",
  nutrition_update: "Nutrition update:",
  travel_adaptation: "Travel adaptation",
  diagnostics_schedule: "Ordering your diagnostic panel",
  diagnostics_results: "Diagnostics results",
  wearable_anomaly: "Wearable note",
  member_curiosity: "Member question",
  scheduling_ack: "Scheduling",
};

const HOUR_MS = 3_600_000;
const HOURS_LINE_CHANCE = 0.35;
const EXTRA_ACTION_CHANCE = 0.35;
const PLAN_CHANGE_CHANCE = 0.5;

const TRAVEL_PLAN =
  "on flight day, shift meal timing; get 10–15 min of morning light on arrival; " +
  "use hotel-gym swaps (DB rows, goblet squats, carries); hydrate with electrolytes";

const PANEL_SCOPE =
  "OGTT+insulin, ApoB/ApoA, Lp(a), FBC, LFT/KFT, hsCRP/ESR, thyroid panel, hormones, " +
  "micronutrients (incl. Omega-3), urinalysis, ECG/Echo/CIMT as indicated, DEXA";

const RESULTS_INTERPRETATION = "improving but still above targets for ApoB and BP; inflammation modestly better";

const RESULTS_OPTIONS = [
  "continue lifestyle emphasis for 12 weeks",
  "discuss lipid-lowering therapy (pros/cons)",
  "tighten sodium and an earlier caffeine cutoff",
];

type Draft = {
  role: RoleKey;
  kind: MessageKind;
  when: TZDate;
  body: string;
  facts: EnhancementFacts;
  planChange?: boolean;
};

function joinFacts(items: readonly string[]): string {
  return items.join("; ");
}

export class ContentEngine {
  readonly context: GenerationContext = {
    lastWeekWin: false,
    cumulativePlanHours: 0,
    exercisePhase: 0,
    lastOpeners: {},
  };

  private readonly rng: Rng;
  private readonly enhancer: TextEnhancer;
  private readonly interventions: readonly Intervention[];
  private readonly roster: Roster;
  private readonly logger: SimLogger;
  private readonly lastEmitted = new Map<string, number>();

  constructor(options: ContentEngineOptions) {
    this.rng = options.rng;
    this.enhancer = options.enhancer ?? createPassthroughEnhancer();
    this.interventions = options.interventions ?? defaultInterventions();
    this.roster = options.roster ?? DEFAULT_ROSTER;
    this.logger = options.logger ?? silentLogger;
  }

  beginWeek(state: BiomarkerState, conditions: WeekConditions): Record<string, boolean> {
    const result = advanceWeek(state, {
      interventions: this.interventions,
      travel: conditions.travel,
      busyWeek: conditions.busy,
      lastWeekWin: this.context.lastWeekWin,
      paSupport: true,
      rng: this.rng,
    });
    this.context.lastWeekWin = result.win;
    this.context.cumulativePlanHours += result.hoursAdhered;
    return result.adherence;
  }

  async weeklyReport(when: TZDate, state: BiomarkerState): Promise<ChatMessage[]> {
    const snap = snapshotState(state);
    const wins: string[] = [];
    const flags: string[] = [];
    if (snap.ApoB < 100) {
      wins.push(`ApoB trending down (${snap.ApoB})`);
    }
    if (snap["HRV(ms)"] > 42) {
      wins.push(`HRV improved (${snap["HRV(ms)"]} ms)`);
    }
    if (snap["Sleep(h)"] >= 6.5) {
      wins.push(`Sleep avg ${snap["Sleep(h)"]} h`);
    }
    if (snap.SBP >= 130 || snap.DBP >= 85) {
      flags.push(`BP still elevated (${snap.SBP}/${snap.DBP})`);
    }
    if (snap.hsCRP >= 1.5) {
      flags.push(`hsCRP ${snap.hsCRP}`);
    }

    const focus = [...PHRASES.focusCore, ...this.rng.pickK(PHRASES.focusExtras, 1)];
    const actions = this.rng.pickK(PHRASES.conciergeActions, 2);
    if (this.rng.chance(EXTRA_ACTION_CHANCE)) {
      actions.push(this.rng.pick(PHRASES.conciergeActions.filter((action) => !actions.includes(action))));
    }

    const hoursDone = sampleWeeklyHours(state, this.rng);
    const hoursTarget = state.weeklyHoursCommitted;

    let body = weeklyReportText(this.templateContext(), { wins, flags, focus, actions });
    if (this.rng.chance(HOURS_LINE_CHANCE)) {
      body +=
        `\nYou logged ~${hoursDone}h this week; target is ${hoursTarget}h. ` +
        `Let’s aim for ≥${hoursTarget}h next week.`;
    }

    return this.emit({
      role: "concierge",
      kind: "weekly_report",
      when,
      body,
      facts: {
        wins: joinFacts(wins),
        flags: joinFacts(flags),
        focus: joinFacts(focus),
        actions: joinFacts(actions),
        ApoB: snap.ApoB,
        BP: `${snap.SBP}/${snap.DBP}`,
        HRV: snap["HRV(ms)"],
        "Sleep(h)": snap["Sleep(h)"],
        hours_completed: hoursDone,
        hours_target: hoursTarget,
        style_hint: this.styleHint(),
      },
    });
  }

  async exerciseUpdate(when: TZDate): Promise<ChatMessage[]> {
    this.context.exercisePhase += 1;
    const phase = this.context.exercisePhase;

    const change = this.rng.chance(PLAN_CHANGE_CHANCE);
    const planChange = change
      ? `move to phase ${phase} with +1 set on compound lifts; keep RPE 7–8 ` +
        "and switch to suitcase carries during travel if your back tightens"
      : "keep the current progression for two more weeks and reassess";
    const cues = this.rng.pick(PHRASES.exerciseCues);

    const body = exerciseUpdateText(this.templateContext(), {
      progress: `Phase ${Math.max(0, phase - 1)} went smoothly; no acute pain`,
      planChange,
      cues,
    });

    return this.emit({
      role: "physio",
      kind: "exercise_update",
      when,
      body,
      planChange: change,
      facts: {
        phase,
        RPE: "7–8",
        plan_change: planChange,
        cues,
        style_hint: this.styleHint(),
      },
    });
  }

  async medicalCheckin(when: TZDate, state: BiomarkerState): Promise<ChatMessage[]> {
    const plan = this.rng.pick(PHRASES.medicalPlans);
    const vitals = `${state.systolicBp.toFixed(0)}/${state.diastolicBp.toFixed(0)}`;
    const apob = state.apob.toFixed(0);
    const hsCrp = state.hsCrp.toFixed(2);

    const body = medicalCheckinText(this.templateContext(), {
      symptoms: "occasional lightheadedness in long meetings; sleep latency a bit better",
      review: `BP ${vitals}, ApoB ${apob}, hsCRP ${hsCrp}`,
      plan,
    });

    return this.emit({
      role: "medical",
      kind: "medical_checkin",
      when,
      body,
      facts: {
        symptoms: "lightheadedness improving; better sleep latency",
        review: `${vitals}, ApoB ${apob}, hsCRP ${hsCrp}`,
        ApoB: apob,
        hsCRP: hsCrp,
        style_hint: this.styleHint(),
      },
    });
  }

  async nutritionUpdate(when: TZDate, traveling: boolean): Promise<ChatMessage[]> {
    const observation = this.rng.pick(
      traveling ? PHRASES.nutritionObservationsTravel : PHRASES.nutritionObservationsHome,
    );
    const recommendation = this.rng.pick(
      traveling ? PHRASES.nutritionRecommendationsTravel : PHRASES.nutritionRecommendationsHome,
    );

    const body = nutritionUpdateText(this.templateContext(), { observation, recommendation });

    return this.emit({
      role: "nutrition",
      kind: "nutrition_update",
      when,
      body,
      facts: {
        observation,
        recommendation,
        traveling,
        style_hint: this.styleHint(),
      },
    });
  }

  async travelAdaptation(when: TZDate, destination: string): Promise<ChatMessage[]> {
    const confirm = this.rng.pick(PHRASES.travelConfirms);
    const draft = travelAdaptationText(this.templateContext(), destination, TRAVEL_PLAN);
    const body = `${draft}\n${confirm.charAt(0).toUpperCase()}${confirm.slice(1)}`;

    return this.emit({
      role: "concierge",
      kind: "travel_adaptation",
      when,
      body,
      facts: {
        destination,
        plan: TRAVEL_PLAN,
        style_hint: this.styleHint(),
      },
    });
  }

  async diagnosticsSchedule(when: TZDate): Promise<ChatMessage[]> {
    const body = diagnosticsScheduleText(this.templateContext(), PANEL_SCOPE);

    return this.emit({
      role: "concierge",
      kind: "diagnostics_schedule",
      when,
      body,
      facts: {
        scope: PANEL_SCOPE,
        style_hint: this.styleHint(),
      },
    });
  }

  async diagnosticsResults(when: TZDate, state: BiomarkerState): Promise<ChatMessage[]> {
    const snap = snapshotState(state);
    const summary = `ApoB ${snap.ApoB}, LDL ${snap["LDL-C"]}, BP ${snap.SBP}/${snap.DBP}, hsCRP ${snap.hsCRP}`;

    const body = diagnosticsResultsText(this.templateContext(), {
      summary,
      interpretation: RESULTS_INTERPRETATION,
      options: RESULTS_OPTIONS,
    });

    return this.emit({
      role: "medical",
      kind: "diagnostics_results",
      when,
      body,
      facts: {
        summary,
        interpretation: RESULTS_INTERPRETATION,
        options: joinFacts(RESULTS_OPTIONS),
        ApoB: snap.ApoB,
        LDL: snap["LDL-C"],
        BP: `${snap.SBP}/${snap.DBP}`,
        hsCRP: snap.hsCRP,
        style_hint: this.styleHint(),
      },
    });
  }

  async wearableAnomaly(when: TZDate, state: BiomarkerState, traveling: boolean): Promise<ChatMessage[]> {
    const brief = this.rng.pick(PHRASES.wearableBriefs);
    const hypothesis = this.rng.pick(
      traveling ? PHRASES.wearableHypothesesTravel : PHRASES.wearableHypothesesHome,
    );
    const nextStep = this.rng.pick(PHRASES.wearableNextSteps);

    const body = wearableAnomalyText(this.templateContext(), { brief, hypothesis, nextStep });

    return this.emit({
      role: "performance",
      kind: "wearable_anomaly",
      when,
      body,
      facts: {
        brief,
        hypothesis,
        next: nextStep,
        HRV: state.hrvMs.toFixed(1),
        RHR: state.rhrBpm.toFixed(1),
        travel: traveling,
        style_hint: this.styleHint(),
      },
    });
  }

  async memberCuriosity(when: TZDate): Promise<ChatMessage[]> {
    const topic = this.rng.pick(PHRASES.curiosityTopics);
    const ask = this.rng.pick(PHRASES.curiosityAsks);
    const message: ChatMessage = {
      timestamp: when,
      sender: this.roster.member.tag,
      text: memberCuriosityText(this.rng, topic, ask),
      initiatedByMember: true,
      meta: { kind: "member_curiosity" },
    };
    return this.admit(message) ? [message] : [];
  }

  async schedulingAck(when: TZDate): Promise<ChatMessage[]> {
    const message: ChatMessage = {
      timestamp: when,
      sender: this.roster.assistant.tag,
      text: this.rng.pick(PHRASES.schedulingAcks),
      initiatedByMember: false,
      meta: { kind: "scheduling_ack" },
    };
    return this.admit(message) ? [message] : [];
  }

  private templateContext(): TemplateContext {
    return { rng: this.rng, memberName: this.roster.member.displayName };
  }

  private styleHint(): string {
    return this.rng.pick(PHRASES.styleHints);
  }

  private async enhance(draft: Draft): Promise<string> {
    const facts: EnhancementFacts = { ...draft.facts };
    const avoid = this.context.lastOpeners[draft.role];
    if (avoid) {
      facts.avoid_opening_like = avoid;
    }
    try {
      const text = await this.enhancer.enhance({
        role: this.roster[draft.role].displayName,
        event: draft.kind,
        header: HEADERS[draft.kind],
        draft: draft.body,
        facts,
      });
      return tidyParagraph(text.trim() ? text : draft.body);
    } catch (error) {
      this.logger.warn(`enhancer failed for ${draft.kind}: ${error instanceof Error ? error.message : String(error)}`);
      return tidyParagraph(draft.body);
    }
  }

  private async emit(draft: Draft): Promise<ChatMessage[]> {
    const text = await this.enhance(draft);
    const message: ChatMessage = {
      timestamp: draft.when,
      sender: this.roster[draft.role].tag,
      text,
      initiatedByMember: false,
      meta: draft.planChange ? { kind: draft.kind, planChange: true } : { kind: draft.kind },
    };
    if (!this.admit(message)) {
      return [];
    }
    const opener = extractOpener(text);
    if (opener) {
      this.context.lastOpeners[draft.role] = opener;
    }
    return [message];
  }

  // Drops a message when the same sender already sent this kind inside its window.
  private admit(message: ChatMessage): boolean {
    const key = `${message.sender}\u0000${message.meta.kind}`;
    const at = message.timestamp.getTime();
    const last = this.lastEmitted.get(key);
    if (last !== undefined && (at - last) / HOUR_MS < SUPPRESSION_WINDOW_HOURS[message.meta.kind]) {
      return false;
    }
    this.lastEmitted.set(key, at);
    return true;
  }
}
