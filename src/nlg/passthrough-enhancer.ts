import type { TextEnhancer } from "../contracts.js";

export function createPassthroughEnhancer(): TextEnhancer {
  return {
    mode: "disabled",
    enhance: async (request) => request.draft,
  };
}
