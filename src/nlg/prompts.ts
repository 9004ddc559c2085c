import type { EnhancementRequest } from "../contracts.js";
import { PHRASES } from "../content/templates.js";
import { dedupeLines, tidyParagraph, varyCommonOpeners } from "../content/text-style.js";
import { findRoleByName, type Roster } from "../content/roster.js";
import type { Rng } from "../sim/rng.js";

const FEW_SHOT_COUNT = 3;
const DEFAULT_TONE = "concise and helpful";

const HEADER_ECHOES = [
  /^\s*weekly report\s*:?\s*/i,
  /^\s*medical check-?in\s*:?\s*/i,
  /^\s*nutrition update\s*:?\s*/i,
  /^\s*exercise update\s*:?\s*/i,
  /^\s*travel adaptation.*?:\s*/i,
  /^\s*diagnostics results\s*:?\s*/i,
  /^\s*ordering your diagnostic panel\s*:?\s*/i,
  /^\s*wearable note\s*:?\s*/i,
];

const LABEL_HEADS = [
  "watch[-\\s]?outs",
  "flags",
  "risks?",
  "focus for next week",
  "what we[’']ll prioritize",
  "next[-\\s]?week focus",
  "actions?",
  "observation",
  "recommendation",
  "symptoms?",
  "review",
  "plan(?: for (?:next|this) week)?",
  "form cues?",
  "hypothesis",
  "next",
  "summary",
  "interpretation",
  "options?",
  "from your log",
  "training update",
  "my read",
  "panel summary",
  "on labs/vitals",
  "on symptoms",
  "on the plus side",
  "i[’']m keeping an eye on",
  "one thing to watch",
  "worth flagging",
  "latest numbers",
];

const LABEL_PATTERNS = LABEL_HEADS.map((head) => new RegExp(`^\\s*${head}\\s*[:—\\-]\\s*`, "gmi"));

const PHRASE_FIXES: ReadonlyArray<readonly [RegExp, string]> = [
  [/let[’']s stick with (?:continue|stay the course)\b/gi, "Let’s stay the course"],
  [/let[’']s go with keep\b/gi, "Let’s keep"],
  [/let[’']s go with ask\b/gi, "Ask"],
  [/put attention on\b/gi, "focus on"],
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isMemberRole(role: string, roster: Roster): boolean {
  const normalized = role.trim().toLowerCase();
  return normalized === "member" || normalized === roster.member.displayName.toLowerCase();
}

function toneFor(role: string, roster: Roster): string {
  return findRoleByName(roster, role)?.tone ?? DEFAULT_TONE;
}

function fewShotExamples(rng: Rng): string {
  return rng
    .pickK(PHRASES.fewShotExamples, FEW_SHOT_COUNT)
    .map((example) => `- ${example}`)
    .join("\n");
}

function factLines(request: EnhancementRequest): string {
  const entries = Object.entries(request.facts);
  if (entries.length === 0) {
    return "-";
  }
  return entries.map(([key, value]) => `- ${key}: ${String(value)}`).join("\n");
}

function styleHint(request: EnhancementRequest, rng: Rng): string {
  const hint = request.facts.style_hint;
  return typeof hint === "string" && hint ? hint : rng.pick(PHRASES.styleHints);
}

function avoidLine(request: EnhancementRequest): string {
  const avoid = request.facts.avoid_opening_like;
  return typeof avoid === "string" && avoid ? `- Do not start with: “${avoid}”. Use a different opening.\n` : "";
}

function senderRule(request: EnhancementRequest, roster: Roster): string {
  if (isMemberRole(request.role, roster)) {
    return "- Sender is the MEMBER. Do NOT greet or use the member’s name. Write 1–2 short sentences max; keep it direct.\n";
  }
  return (
    "- Sender is on the CARE TEAM. Greet the member by name ONLY if it feels natural; avoid greeting " +
    "in every message. If you greet, put the greeting on its own line.\n"
  );
}

export function buildRewritePrompt(request: EnhancementRequest, rng: Rng, roster: Roster): string {
  const rule = senderRule(request, roster);
  const hint = styleHint(request, rng);
  const examples = fewShotExamples(rng);
  return (
    `You are '${request.role}' writing a short chat message for event '${request.event}'.\n` +
    `Style: ${toneFor(request.role, roster)}. Adopt this nuance: ${hint}.\n` +
    rule +
    avoidLine(request) +
    "- Keep it human and brief (2–4 short sentences). Avoid bullet points and labels.\n" +
    "- Avoid colon-led or dash-led fragments (e.g., 'Watch-outs:', 'Focus:', 'Panel summary —'). Use plain sentences.\n" +
    "- Include hand-offs or confirmations only if natural.\n" +
    "- Preserve ALL concrete facts and numbers; do not invent anything.\n" +
    `- DO NOT include the header line '${request.header}'. Output BODY ONLY.\n` +
    "- Do not repeat the same opening across lines; avoid starting two lines with the same 1–2 words.\n" +
    "- If you find yourself repeating a point, drop the repeat.\n\n" +
    "Examples (style only, do not copy facts or exact wording):\n" +
    `${examples}\n\n` +
    "Facts (source of truth):\n" +
    `${factLines(request)}\n\n` +
    "Original body to paraphrase:\n" +
    `${request.draft}\n\n` +
    "Rewrite naturally now (BODY ONLY):"
  );
}

export function buildComposePrompt(request: EnhancementRequest, rng: Rng, roster: Roster): string {
  const rule = senderRule(request, roster);
  const hint = styleHint(request, rng);
  const examples = fewShotExamples(rng);
  return (
    `You are '${request.role}' writing a chat message for '${request.event}'.\n` +
    `Tone: ${toneFor(request.role, roster)}. Adopt this nuance: ${hint}.\n` +
    rule +
    avoidLine(request) +
    "- Output 2–4 short sentences. Use plain language; no bullet points, no labels.\n" +
    "- Mention logistics or confirmations briefly if implied by the facts.\n" +
    "- Base the message ONLY on these facts. Do NOT invent or speculate.\n" +
    `- DO NOT include the header '${request.header}'. Output BODY ONLY.\n` +
    "- Do NOT repeat the same opening across lines; vary transitions.\n" +
    "- If a thought would repeat, omit the repeat.\n\n" +
    "Examples (style only, do not copy facts or exact wording):\n" +
    `${examples}\n\n` +
    "Facts (strict source of truth):\n" +
    `${factLines(request)}\n\n` +
    "Compose the BODY ONLY now:"
  );
}

export function sanitizeReply(text: string, role: string, roster: Roster): string {
  let out = text.trim();

  for (const pattern of HEADER_ECHOES) {
    out = out.replace(pattern, "");
  }

  const names = Object.values(roster)
    .filter((entry) => entry.tag !== roster.member.tag)
    .map((entry) => escapeRegExp(entry.displayName).replace(/\s+/g, "\\s*"));
  out = out.replace(new RegExp(`^(${names.join("|")})\\s*[:\\-–]\\s*`, "i"), "");

  out = out.replace(/^\s*-\s*/gm, "");

  for (const pattern of LABEL_PATTERNS) {
    out = out.replace(pattern, "");
  }
  out = out.replace(/^\s*on\s+(labs\/vitals|symptoms)\s*[:,]\s*/gim, "");

  if (isMemberRole(role, roster)) {
    const self = escapeRegExp(roster.member.displayName);
    out = out.replace(new RegExp(`^\\s*(hi|hello|hey)\\s+${self}\\s*[,–-]*\\s*`, "i"), "");
  }

  return out
    .replace(/([?!])[ \t]*\./g, "$1")
    .replace(/\.{2,}/g, ".")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/[:;][ \t]*$/gm, ".")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function ensureTerminalMark(line: string): string {
  return /[.?!]$/.test(line) ? line : `${line}.`;
}

export function finalizeReply(text: string, rng: Rng): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  if (lines.length === 0) {
    return text.trim();
  }

  const varied = dedupeLines(varyCommonOpeners(dedupeLines(lines), rng));
  let out = tidyParagraph(varied.join("\n"))
    .split("\n")
    .map(ensureTerminalMark)
    .join("\n");
  for (const [pattern, replacement] of PHRASE_FIXES) {
    out = out.replace(pattern, replacement);
  }
  return tidyParagraph(out);
}
