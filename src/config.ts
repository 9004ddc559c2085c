import { z } from "zod";
import type { EnhancementMode } from "./contracts.js";

export type EnhancementConfig = {
  mode: EnhancementMode;
  model: string;
  host: string;
  timeoutMs: number;
};

export type RunConfig = {
  seed: number;
  startDate: string;
  timeZone: string;
  weeks: number;
  outputDir: string;
  enhancement: EnhancementConfig;
};

export type RunConfigInput = {
  seed?: number | string;
  startDate?: string;
  timeZone?: string;
  weeks?: number | string;
  outputDir?: string;
  enhancement?: {
    mode?: string;
    model?: string;
    host?: string;
    timeoutMs?: number | string;
  };
};

export const DEFAULT_RUN_CONFIG: RunConfig = {
  seed: 42,
  startDate: "2025-01-06",
  timeZone: "Asia/Singapore",
  weeks: 34,
  outputDir: "./demo",
  enhancement: {
    mode: "disabled",
    model: "llama3.1:8b",
    host: "http://localhost:11434",
    timeoutMs: 6_000,
  },
};

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match.map(Number);
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

const runConfigSchema = z.object({
  seed: z.coerce.number().int().default(DEFAULT_RUN_CONFIG.seed),
  startDate: z
    .string()
    .trim()
    .refine(isCalendarDate, "startDate must be a calendar date in YYYY-MM-DD form")
    .default(DEFAULT_RUN_CONFIG.startDate),
  timeZone: z.string().trim().refine(isTimeZone, "timeZone must be an IANA zone").default(DEFAULT_RUN_CONFIG.timeZone),
  weeks: z.coerce.number().int().min(1).default(DEFAULT_RUN_CONFIG.weeks),
  outputDir: z.string().trim().min(1).default(DEFAULT_RUN_CONFIG.outputDir),
  enhancement: z
    .object({
      mode: z.enum(["disabled", "rewrite-draft", "compose-from-facts"]).default(DEFAULT_RUN_CONFIG.enhancement.mode),
      model: z.string().trim().min(1).default(DEFAULT_RUN_CONFIG.enhancement.model),
      host: z.string().trim().url().default(DEFAULT_RUN_CONFIG.enhancement.host),
      timeoutMs: z.coerce.number().int().positive().default(DEFAULT_RUN_CONFIG.enhancement.timeoutMs),
    })
    .default({}),
});

function envValue(value: string | undefined): string | undefined {
  return value?.trim() ? value.trim() : undefined;
}

export function runConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunConfigInput {
  return {
    seed: envValue(env.CONCIERGE_SIM_SEED),
    startDate: envValue(env.CONCIERGE_SIM_START),
    timeZone: envValue(env.CONCIERGE_SIM_TZ),
    weeks: envValue(env.CONCIERGE_SIM_WEEKS),
    outputDir: envValue(env.CONCIERGE_SIM_OUTPUT_DIR),
    enhancement: {
      mode: envValue(env.CONCIERGE_SIM_ENHANCE),
      model: envValue(env.CONCIERGE_SIM_MODEL),
      host: envValue(env.CONCIERGE_SIM_OLLAMA_HOST),
      timeoutMs: envValue(env.CONCIERGE_SIM_TIMEOUT_MS),
    },
  };
}

/** Explicit input wins over environment values, which win over defaults. */
export function parseRunConfig(input: RunConfigInput = {}, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const fromEnv = runConfigFromEnv(env);
  const merged = {
    seed: input.seed ?? fromEnv.seed,
    startDate: input.startDate ?? fromEnv.startDate,
    timeZone: input.timeZone ?? fromEnv.timeZone,
    weeks: input.weeks ?? fromEnv.weeks,
    outputDir: input.outputDir ?? fromEnv.outputDir,
    enhancement: {
      mode: input.enhancement?.mode ?? fromEnv.enhancement?.mode,
      model: input.enhancement?.model ?? fromEnv.enhancement?.model,
      host: input.enhancement?.host ?? fromEnv.enhancement?.host,
      timeoutMs: input.enhancement?.timeoutMs ?? fromEnv.enhancement?.timeoutMs,
    },
  };
  const parsed = runConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new Error(`Invalid run config: ${issues.join("; ")}`);
  }
  return parsed.data;
}
