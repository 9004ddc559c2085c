import type { EnhancementConfig } from "../config.js";
import type { TextEnhancer } from "../contracts.js";
import type { SimLogger } from "../infra/logger.js";
import type { Rng } from "../sim/rng.js";
import { createOllamaEnhancer } from "./ollama-enhancer.js";
import { createPassthroughEnhancer } from "./passthrough-enhancer.js";

export { createOllamaEnhancer, jitterOptions, type OllamaEnhancerOptions } from "./ollama-enhancer.js";
export { createPassthroughEnhancer } from "./passthrough-enhancer.js";
export { buildComposePrompt, buildRewritePrompt, finalizeReply, sanitizeReply } from "./prompts.js";

export function createEnhancer(
  config: EnhancementConfig,
  rng: Rng,
  deps: { fetchImpl?: typeof fetch; logger?: SimLogger } = {},
): TextEnhancer {
  if (config.mode === "disabled") {
    return createPassthroughEnhancer();
  }
  return createOllamaEnhancer({
    mode: config.mode,
    model: config.model,
    host: config.host,
    timeoutMs: config.timeoutMs,
    rng,
    fetchImpl: deps.fetchImpl,
    logger: deps.logger,
  });
}
