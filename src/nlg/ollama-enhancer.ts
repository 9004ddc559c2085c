import { z } from "zod";
import { DEFAULT_RUN_CONFIG } from "../config.js";
import type { EnhancementMode, EnhancementRequest, TextEnhancer } from "../contracts.js";
import { DEFAULT_ROSTER, type Roster } from "../content/roster.js";
import { silentLogger, type SimLogger } from "../infra/logger.js";
import type { Rng } from "../sim/rng.js";
import { buildComposePrompt, buildRewritePrompt, finalizeReply, sanitizeReply } from "./prompts.js";

export type OllamaEnhancerOptions = {
  model: string;
  mode: Exclude<EnhancementMode, "disabled">;
  rng: Rng;
  host?: string;
  timeoutMs?: number;
  temperature?: number;
  topP?: number;
  numPredict?: number;
  fetchImpl?: typeof fetch;
  roster?: Roster;
  logger?: SimLogger;
};

export type GenerateOptions = {
  temperature: number;
  top_p: number;
  num_predict: number;
};

const generateResponseSchema = z.object({
  response: z.string(),
});

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function uniform(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng.next01();
}

/** Per-call sampling jitter so repeated prompts do not converge on one phrasing. */
export function jitterOptions(
  rng: Rng,
  base: { temperature: number; topP: number; numPredict: number },
): GenerateOptions {
  return {
    temperature: clamp(base.temperature + uniform(rng, -0.15, 0.15), 0.2, 1.2),
    top_p: clamp(base.topP + uniform(rng, -0.03, 0.03), 0.5, 0.99),
    num_predict: Math.trunc(clamp(base.numPredict + rng.int(-16, 24), 96, 240)),
  };
}

export function createOllamaEnhancer(options: OllamaEnhancerOptions): TextEnhancer {
  const fetchImpl = options.fetchImpl ?? fetch;
  const baseUrl = (options.host ?? DEFAULT_RUN_CONFIG.enhancement.host).replace(/\/+$/g, "");
  const timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_RUN_CONFIG.enhancement.timeoutMs);
  const roster = options.roster ?? DEFAULT_ROSTER;
  const logger = options.logger ?? silentLogger;
  const base = {
    temperature: options.temperature ?? 0.7,
    topP: options.topP ?? 0.95,
    numPredict: options.numPredict ?? 160,
  };

  async function generate(prompt: string): Promise<string> {
    const response = await fetchImpl(`${baseUrl}/api/generate`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options.model,
        prompt,
        stream: false,
        options: jitterOptions(options.rng, base),
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Ollama generate failed (${response.status} ${response.statusText})`);
    }
    const parsed = generateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Ollama generate response missing a text body.");
    }
    return parsed.data.response;
  }

  async function enhance(request: EnhancementRequest): Promise<string> {
    try {
      const prompt =
        options.mode === "rewrite-draft"
          ? buildRewritePrompt(request, options.rng, roster)
          : buildComposePrompt(request, options.rng, roster);
      const reply = (await generate(prompt)).trim();
      if (!reply) {
        return request.draft;
      }
      const text = finalizeReply(sanitizeReply(reply, request.role, roster), options.rng);
      return text || request.draft;
    } catch (error) {
      logger.warn(
        `enhancement fell back to draft (${request.event}): ${error instanceof Error ? error.message : String(error)}`,
      );
      return request.draft;
    }
  }

  return {
    mode: options.mode,
    enhance,
  };
}
