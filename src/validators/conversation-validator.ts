import type { ConversationTally, MessageKind } from "../contracts.js";
import { diagnosticWeeks } from "../sim/scheduler.js";

export type TalliedMessage = {
  text: string;
  initiatedByMember: boolean;
  meta?: { kind?: MessageKind };
};

export const MEMBER_INITIATED_BAND = { min: 3.0, max: 7.0 } as const;

// Only consulted for messages that carry no kind tag.
const LEGACY_PREFIXES: ReadonlyArray<readonly [MessageKind, readonly string[]]> = [
  ["weekly_report", ["weekly report", "wins", "good signs", "progress"]],
  ["exercise_update", ["exercise update"]],
  ["medical_checkin", ["medical check-in"]],
  ["nutrition_update", ["nutrition update"]],
  ["travel_adaptation", ["travel adaptation"]],
  ["diagnostics_schedule", ["ordering your diagnostic panel"]],
  ["diagnostics_results", ["diagnostics results"]],
  ["wearable_anomaly", ["wearable note"]],
];

export class ConversationValidationError extends Error {
  readonly violations: string[];
  readonly tally: ConversationTally;

  constructor(violations: string[], tally: ConversationTally) {
    super(`Conversation failed validation: ${violations.join(" ")}`);
    this.name = "ConversationValidationError";
    this.violations = violations;
    this.tally = tally;
  }
}

export function classifyByPrefix(text: string): MessageKind | undefined {
  const lowered = text.trim().toLowerCase();
  for (const [kind, prefixes] of LEGACY_PREFIXES) {
    if (prefixes.some((prefix) => lowered.startsWith(prefix))) {
      return kind;
    }
  }
  return undefined;
}

export function expectedDiagnosticsCount(totalWeeks: number): number {
  return diagnosticWeeks(totalWeeks).length;
}

export function tallyConversation(messages: readonly TalliedMessage[], totalWeeks: number): ConversationTally {
  const kinds: Partial<Record<MessageKind, number>> = {};
  let memberInitiated = 0;

  for (const message of messages) {
    const kind = message.meta?.kind ?? classifyByPrefix(message.text);
    if (kind) {
      kinds[kind] = (kinds[kind] ?? 0) + 1;
    }
    if (message.initiatedByMember) {
      memberInitiated += 1;
    }
  }

  return {
    kinds,
    memberInitiated,
    memberInitiatedPerWeek: totalWeeks > 0 ? memberInitiated / totalWeeks : 0,
    totalMessages: messages.length,
  };
}

export function validateConversation(messages: readonly TalliedMessage[], totalWeeks: number): ConversationTally {
  const tally = tallyConversation(messages, totalWeeks);
  const count = (kind: MessageKind) => tally.kinds[kind] ?? 0;
  const violations: string[] = [];

  if (count("weekly_report") < totalWeeks) {
    violations.push(`Weekly reports missing (${count("weekly_report")} < ${totalWeeks}).`);
  }

  const minExercise = Math.floor(totalWeeks / 2) - 1;
  if (count("exercise_update") < minExercise) {
    violations.push(`Exercise updates too few (${count("exercise_update")} < ${minExercise}).`);
  }

  const expectedDiagnostics = expectedDiagnosticsCount(totalWeeks);
  if (count("diagnostics_results") !== expectedDiagnostics) {
    violations.push(
      `Expected ${expectedDiagnostics} diagnostics result summaries, found ${count("diagnostics_results")}.`,
    );
  }

  const minTravel = Math.floor(totalWeeks / 4);
  if (count("travel_adaptation") < minTravel) {
    violations.push(`Travel adaptations too few (${count("travel_adaptation")} < ${minTravel}).`);
  }

  const average = tally.memberInitiatedPerWeek;
  if (average < MEMBER_INITIATED_BAND.min || average > MEMBER_INITIATED_BAND.max) {
    violations.push(`Member-initiated average out of band: ${average.toFixed(2)}.`);
  }

  if (violations.length > 0) {
    throw new ConversationValidationError(violations, tally);
  }
  return tally;
}
