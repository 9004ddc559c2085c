import type { Rng } from "../sim/rng.js";
import pools from "./phrase-pools.json" with { type: "json" };
import { finalizeLines, mapActions, naturalList, tidyParagraph, toSentence, weaveReport } from "./text-style.js";

export const PHRASES = pools;

const GREETING_CHANCE = 0.18;

export type TemplateContext = {
  rng: Rng;
  memberName: string;
};

export type WeeklyReportDraft = {
  wins: readonly string[];
  flags: readonly string[];
  focus: readonly string[];
  actions: readonly string[];
};

export type ExerciseDraft = {
  progress: string;
  planChange: string;
  cues: string;
};

export type MedicalDraft = {
  symptoms: string;
  review: string;
  plan: string;
};

export type NutritionDraft = {
  observation: string;
  recommendation: string;
};

export type ResultsDraft = {
  summary: string;
  interpretation: string;
  options: readonly string[];
};

export type WearableDraft = {
  brief: string;
  hypothesis: string;
  nextStep: string;
};

function fillSlots(template: string, slots: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => slots[key] ?? match);
}

function openingLines(ctx: TemplateContext): string[] {
  if (!ctx.rng.chance(GREETING_CHANCE)) {
    return [];
  }
  return [fillSlots(ctx.rng.pick(PHRASES.greetings), { name: ctx.memberName })];
}

function led(rng: Rng, leads: readonly string[], body: string): string {
  return toSentence(`${rng.pick(leads)} ${body}`);
}

export function weeklyReportText(ctx: TemplateContext, draft: WeeklyReportDraft): string {
  const lines = openingLines(ctx);
  lines.push(...weaveReport(draft.wins, draft.flags, draft.focus, ctx.rng));
  if (draft.actions.length > 0) {
    lines.push(toSentence(`${mapActions(draft.actions)} — ${ctx.rng.pick(PHRASES.confirms)}`));
  } else {
    lines.push("Nothing needed from you right now.");
  }
  return finalizeLines(lines);
}

export function exerciseUpdateText(ctx: TemplateContext, draft: ExerciseDraft): string {
  const lines = openingLines(ctx);
  lines.push(toSentence(draft.progress));
  lines.push(toSentence(`For the next block, ${draft.planChange}`));
  lines.push(toSentence(`Keep an eye on ${draft.cues}`));
  lines.push(ctx.rng.pick(PHRASES.exerciseClosers));
  return finalizeLines(lines);
}

export function medicalCheckinText(ctx: TemplateContext, draft: MedicalDraft): string {
  const lines = openingLines(ctx);
  lines.push(led(ctx.rng, PHRASES.symptomLeads, draft.symptoms));
  lines.push(led(ctx.rng, PHRASES.numbersLeads, draft.review));
  lines.push(led(ctx.rng, PHRASES.medicalPlanLeads, draft.plan));
  return finalizeLines(lines);
}

export function nutritionUpdateText(ctx: TemplateContext, draft: NutritionDraft): string {
  const lines = openingLines(ctx);
  lines.push(led(ctx.rng, PHRASES.observationLeads, draft.observation));
  lines.push(led(ctx.rng, PHRASES.tryLeads, draft.recommendation));
  return finalizeLines(lines);
}

export function travelAdaptationText(ctx: TemplateContext, destination: string, plan: string): string {
  const lines = openingLines(ctx);
  const lead = fillSlots(ctx.rng.pick(PHRASES.travelLeads), { dest: destination });
  lines.push(toSentence(`${lead} ${plan}`));
  return finalizeLines(lines);
}

export function diagnosticsScheduleText(ctx: TemplateContext, scope: string): string {
  const lines = openingLines(ctx);
  lines.push(toSentence(`I’m booking this panel — ${scope}`));
  lines.push("Fasting instructions are in your inbox.");
  return finalizeLines(lines);
}

export function diagnosticsResultsText(ctx: TemplateContext, draft: ResultsDraft): string {
  const lines = openingLines(ctx);
  lines.push(led(ctx.rng, PHRASES.resultsLeads, draft.summary));
  lines.push(led(ctx.rng, PHRASES.interpretLeads, draft.interpretation));
  if (draft.options.length > 0) {
    lines.push(led(ctx.rng, PHRASES.optionsLeads, naturalList(draft.options, "or")));
  }
  return finalizeLines(lines);
}

export function wearableAnomalyText(ctx: TemplateContext, draft: WearableDraft): string {
  const lines = openingLines(ctx);
  lines.push(toSentence(draft.brief));
  lines.push(led(ctx.rng, PHRASES.hypothesisLeads, draft.hypothesis));
  lines.push(led(ctx.rng, PHRASES.nextStepLeads, draft.nextStep));
  return finalizeLines(lines);
}

// Member questions never greet and are a single line.
export function memberCuriosityText(rng: Rng, topic: string, ask: string): string {
  const line = fillSlots(rng.pick(PHRASES.curiosityVariants), { topic, ask });
  return tidyParagraph(line.replace(/\.{2,}$/, "."));
}
