import type { Rng } from "../sim/rng.js";

const LABEL_FRAGMENT =
  /\b(keeping an eye on|watch[-\s]?outs|flags|risks?|plan|next|summary|interpretation|options|on labs\/vitals|on symptoms)\s*:\s*/gi;
const DECORATIVE_QUOTES = /^["'“”‘’\s]+|["'“”‘’\s]+$/g;
const TERMINAL_MARK_AFTER_BANG = /([?!])[ \t]*\./g;
const TRAILING_PUNCTUATION = /[.?!…]+$/;
const TERMINAL_RUN = /[.?!…][\s.?!…]*$/;
const GREETING_LINE = /^(hi|hello|hey)\s+\w+[,\-–]?$/i;

const POSITIVE_TEMPLATES = [
  "Good news—{wins}",
  "Quick positive—{wins}",
  "On the plus side—{wins}",
  "Nice win—{wins}",
];

const FLAG_TEMPLATES = [
  "Still watching {flags}",
  "One thing to watch—{flags}",
  "Worth flagging—{flags}",
  "Still a risk—{flags}",
];

const FOCUS_TEMPLATES = [
  "This week let’s focus on {focus}",
  "For this week, let’s target {focus}",
  "Next week, keep attention on {focus}",
  "Let’s prioritize {focus}",
];

const SHORT_LINE_CHARS = 28;

type OpenerRewrite = {
  pattern: RegExp;
  probability: number;
  replacements: readonly string[];
};

const OPENER_REWRITES: readonly OpenerRewrite[] = [
  { pattern: /^likely\s/i, probability: 0.6, replacements: ["Probably ", "My hunch is ", "Signals point to "] },
  { pattern: /^let['’]s do\s/i, probability: 0.6, replacements: ["Let’s try ", "Let’s go with "] },
  { pattern: /^current numbers are\s/i, probability: 0.6, replacements: ["Latest numbers: ", "Right now: "] },
  {
    pattern: /^results are in\s?[—\-:]\s*/i,
    probability: 0.6,
    replacements: ["Got the results — ", "Panel summary — "],
  },
  { pattern: /^i['’]m noting\s/i, probability: 0.5, replacements: ["Noted ", "From your update, "] },
];

export function naturalList(items: readonly string[], conjunction = "and"): string {
  const cleaned = items.map((item) => item.trim()).filter(Boolean);
  if (cleaned.length === 0) {
    return "";
  }
  if (cleaned.length === 1) {
    return cleaned[0];
  }
  if (cleaned.length === 2) {
    return `${cleaned[0]} ${conjunction} ${cleaned[1]}`;
  }
  return `${cleaned.slice(0, -1).join(", ")}, ${conjunction} ${cleaned[cleaned.length - 1]}`;
}

export function toSentence(input: string): string {
  let text = input.trim().replace(DECORATIVE_QUOTES, "");
  if (!text) {
    return "";
  }
  text = text.replace(LABEL_FRAGMENT, "$1 ").replace(/\s{2,}/g, " ").trim();

  let end = ".";
  const run = TERMINAL_RUN.exec(text);
  if (run) {
    // The last ? or ! in the run wins over any dots.
    end = run[0].replace(/[^?!]/g, "").slice(-1) || ".";
    text = text.slice(0, run.index).trimEnd();
    if (!text) {
      return "";
    }
  }

  return `${text}${end}`.replace(TERMINAL_MARK_AFTER_BANG, "$1");
}

function normalizeAction(action: string): string {
  return action
    .trim()
    .replace(/^i\s+/i, "")
    .replace(/\s*\.\s*$/, "");
}

export function mapActions(actions: readonly string[]): string {
  const bits = actions.map(normalizeAction).filter(Boolean);
  if (bits.length === 0) {
    return "No actions from me right now";
  }
  return `I ${naturalList(bits, "and")}`;
}

function fill(template: string, key: string, value: string): string {
  return template.replace(`{${key}}`, value);
}

function mergeShortLines(parts: readonly string[]): string[] {
  const out: string[] = [];
  let buffer: string[] = [];
  for (const part of parts) {
    if (part.length < SHORT_LINE_CHARS) {
      buffer.push(part);
      continue;
    }
    if (buffer.length > 0) {
      out.push(buffer.join(" "));
      buffer = [];
    }
    out.push(part);
  }
  if (buffer.length > 0) {
    out.push(buffer.join(" "));
  }
  return out;
}

export function weaveReport(
  wins: readonly string[],
  flags: readonly string[],
  focus: readonly string[],
  rng: Rng,
): string[] {
  const lines: string[] = [];

  if (wins.length > 0) {
    lines.push(toSentence(fill(rng.pick(POSITIVE_TEMPLATES), "wins", naturalList(wins))));
  } else {
    lines.push(toSentence("No big wins this week"));
  }

  if (flags.length > 0) {
    lines.push(toSentence(fill(rng.pick(FLAG_TEMPLATES), "flags", naturalList(flags))));
  }

  if (focus.length > 0) {
    lines.push(toSentence(fill(rng.pick(FOCUS_TEMPLATES), "focus", naturalList(focus))));
  }

  return mergeShortLines(lines);
}

export function dedupeKey(line: string): string {
  return line.trim().toLowerCase().replace(TRAILING_PUNCTUATION, "").trim().replace(/\s+/g, " ");
}

export function dedupeLines(lines: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const line of lines) {
    const key = dedupeKey(line);
    if (key && !seen.has(key)) {
      seen.add(key);
      out.push(line);
    }
  }
  return out;
}

function capitalizeLine(line: string): string {
  return line.replace(/^(\s*)([a-z])/, (_match, lead: string, letter: string) => `${lead}${letter.toUpperCase()}`);
}

function tidyLine(line: string): string {
  return line
    .trim()
    .replace(/\s{2,}/g, " ")
    .replace(/\s+([,.;!?])/g, "$1")
    .replace(/([,;])(?=[^\s,.;:!?])/g, "$1 ")
    .replace(/[:;]$/, ".")
    .replace(/\.{2,}/g, ".")
    .replace(TERMINAL_MARK_AFTER_BANG, "$1");
}

export function tidyParagraph(text: string): string {
  if (!text.trim()) {
    return "";
  }
  const lines = text
    .split(/\r?\n/)
    .map((line) => capitalizeLine(tidyLine(line)))
    .filter(Boolean);
  return dedupeLines(lines).join("\n");
}

export function finalizeLines(lines: readonly string[]): string {
  return tidyParagraph(dedupeLines(lines.filter((line) => line.trim())).join("\n"));
}

export function varyCommonOpeners(lines: readonly string[], rng: Rng): string[] {
  return lines.map((line) => {
    let out = line.trim();
    for (const rewrite of OPENER_REWRITES) {
      if (rewrite.pattern.test(out) && rng.chance(rewrite.probability)) {
        out = out.replace(rewrite.pattern, rng.pick(rewrite.replacements));
      }
    }
    return out;
  });
}

export function extractOpener(text: string, maxWords = 4): string {
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || GREETING_LINE.test(line)) {
      continue;
    }
    const words = line.replace(DECORATIVE_QUOTES, "").toLowerCase().match(/[a-z0-9']+/g) ?? [];
    if (words.length > 0) {
      return words.slice(0, maxWords).join(" ");
    }
  }
  return "";
}
