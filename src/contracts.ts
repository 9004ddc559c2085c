import type { TZDate } from "@date-fns/tz";

export type EventKind =
  | "weekly_report"
  | "exercise_update"
  | "medical_checkin"
  | "nutrition_update"
  | "travel_adaptation"
  | "diagnostics_schedule"
  | "diagnostics_results"
  | "member_curiosity"
  | "wearable_anomaly";

export type MessageKind = EventKind | "scheduling_ack";

export type SimEvent = Readonly<{
  kind: EventKind;
  week: number;
  when: TZDate;
  meta?: Readonly<{ destination?: string }>;
}>;

export type RoleKey = "concierge" | "medical" | "performance" | "nutrition" | "physio" | "assistant" | "member";

export type MessageMeta = Readonly<{
  kind: MessageKind;
  planChange?: boolean;
}>;

export type ChatMessage = Readonly<{
  timestamp: TZDate;
  sender: string;
  text: string;
  attachments?: readonly string[];
  initiatedByMember: boolean;
  meta: MessageMeta;
}>;

export type MetricKey =
  | "systolicBp"
  | "diastolicBp"
  | "apob"
  | "ldlC"
  | "hsCrp"
  | "hba1c"
  | "bmi"
  | "hrvMs"
  | "rhrBpm"
  | "sleepHours";

export type EffectVector = Readonly<Record<string, number>>;

export type Intervention = Readonly<{
  name: string;
  domain: string;
  effectVector: EffectVector;
  timeCostHours: number;
  recommendedBy: RoleKey;
  baseAdherence: number;
}>;

export type TravelPlan = Readonly<{
  travelWeeks: readonly number[];
  destinations: readonly string[];
}>;

export type GenerationContext = {
  lastWeekWin: boolean;
  cumulativePlanHours: number;
  exercisePhase: number;
  lastOpeners: Partial<Record<RoleKey, string>>;
};

export type EnhancementMode = "disabled" | "rewrite-draft" | "compose-from-facts";

export type EnhancementFacts = Record<string, string | number | boolean>;

export type EnhancementRequest = {
  role: string;
  event: MessageKind;
  header: string;
  draft: string;
  facts: EnhancementFacts;
};

export type TextEnhancer = {
  readonly mode: EnhancementMode;
  enhance(request: EnhancementRequest): Promise<string>;
};

export type ConversationTally = {
  kinds: Partial<Record<MessageKind, number>>;
  memberInitiated: number;
  memberInitiatedPerWeek: number;
  totalMessages: number;
};
