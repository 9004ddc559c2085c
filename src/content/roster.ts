import type { RoleKey } from "../contracts.js";

export type RosterEntry = Readonly<{
  tag: string;
  displayName: string;
  tone: string;
}>;

export type Roster = Readonly<Record<RoleKey, RosterEntry>>;

export const DEFAULT_ROSTER: Roster = {
  concierge: {
    tag: "Maya (Concierge)",
    displayName: "Maya",
    tone: "empathetic, proactive, logistics and confirmations; keeps friction low; hands off to specialists",
  },
  medical: {
    tag: "Dr. Okafor (Medical)",
    displayName: "Dr. Okafor",
    tone: "authoritative, precise, plain-English clinical; short risks and benefits",
  },
  performance: {
    tag: "Tomas (Performance Scientist)",
    displayName: "Tomas",
    tone: "analytical, data trends, short hypothesis plus next action",
  },
  nutrition: {
    tag: "Lena (Nutrition)",
    displayName: "Lena",
    tone: "practical nutrition, behavior change, short why",
  },
  physio: {
    tag: "Priya (PT)",
    displayName: "Priya",
    tone: "direct coaching, form-first cues, regress or progress options",
  },
  assistant: {
    tag: "Jordan Lee (PA)",
    displayName: "Jordan",
    tone: "efficient, scheduling-focused",
  },
  member: {
    tag: "Daniel",
    displayName: "Daniel",
    tone: "analytical, concise",
  },
};

export function findRoleByName(roster: Roster, displayName: string): RosterEntry | undefined {
  const wanted = displayName.trim().toLowerCase();
  return Object.values(roster).find((entry) => entry.displayName.toLowerCase() === wanted);
}
