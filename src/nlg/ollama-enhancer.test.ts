import { describe, expect, it, vi } from "vitest";
import type { EnhancementRequest } from "../contracts.js";
import { makeRng } from "../sim/rng.js";
import { createEnhancer, createOllamaEnhancer, jitterOptions } from "./index.js";

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json",
    },
  });
}

const REQUEST: EnhancementRequest = {
  role: "Maya",
  event: "weekly_report",
  header: "Weekly report:",
  draft: "No big wins this week.\nI blocked your workout slots — good to go?",
  facts: { wins: "", style_hint: "warm & brief", avoid_opening_like: "no big wins this" },
};

describe("ollama-enhancer", () => {
  it("posts a jittered generate request and cleans the reply", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementationOnce(async () =>
      jsonResponse({
        response: "Weekly report: Good news, HRV is up.\n- Keep dinner earlier\n- keep dinner earlier!",
      }),
    );
    const enhancer = createOllamaEnhancer({
      model: "llama3.1:8b",
      mode: "rewrite-draft",
      rng: makeRng(1),
      fetchImpl: fetchMock,
    });

    const text = await enhancer.enhance(REQUEST);

    expect(text).toBe("Good news, HRV is up.\nKeep dinner earlier.");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:11434/api/generate");
    expect(init?.method).toBe("POST");
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe("llama3.1:8b");
    expect(body.stream).toBe(false);
    expect(body.prompt).toContain("Original body to paraphrase:\nNo big wins this week.");
    expect(body.prompt).toContain("Do not start with: “no big wins this”");
    expect(body.prompt).toContain("Adopt this nuance: warm & brief.");
    expect(body.options.temperature).toBeGreaterThanOrEqual(0.2);
    expect(body.options.temperature).toBeLessThanOrEqual(1.2);
    expect(Number.isInteger(body.options.num_predict)).toBe(true);
  });

  it("composes from facts without sending the draft", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementationOnce(async () => jsonResponse({ response: "All set." }));
    const enhancer = createOllamaEnhancer({
      model: "llama3.1:8b",
      mode: "compose-from-facts",
      host: "http://127.0.0.1:9999/",
      rng: makeRng(2),
      fetchImpl: fetchMock,
    });

    expect(await enhancer.enhance(REQUEST)).toBe("All set.");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://127.0.0.1:9999/api/generate");
    const body = JSON.parse(String(init?.body));
    expect(body.prompt).toContain("Compose the BODY ONLY now:");
    expect(body.prompt).not.toContain("I blocked your workout slots");
  });

  it("returns the draft on error status, malformed body, empty reply, or transport failure", async () => {
    const warn = vi.fn();
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockImplementationOnce(async () => new Response("boom", { status: 500, statusText: "Internal Server Error" }))
      .mockImplementationOnce(async () => jsonResponse({ done: true }))
      .mockImplementationOnce(async () => jsonResponse({ response: "   " }))
      .mockImplementationOnce(async () => {
        throw new Error("The operation was aborted due to timeout");
      });
    const enhancer = createOllamaEnhancer({
      model: "llama3.1:8b",
      mode: "rewrite-draft",
      rng: makeRng(3),
      fetchImpl: fetchMock,
      logger: { info: vi.fn(), warn },
    });

    for (let i = 0; i < 4; i += 1) {
      expect(await enhancer.enhance(REQUEST)).toBe(REQUEST.draft);
    }
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      "enhancement fell back to draft (weekly_report): Ollama generate failed (500 Internal Server Error)",
    );
  });

  it("keeps sampling options inside their bounds", () => {
    const rng = makeRng(4);
    for (let i = 0; i < 100; i += 1) {
      const options = jitterOptions(rng, { temperature: 0.7, topP: 0.95, numPredict: 160 });
      expect(options.temperature).toBeGreaterThanOrEqual(0.55);
      expect(options.temperature).toBeLessThanOrEqual(0.85);
      expect(options.top_p).toBeGreaterThanOrEqual(0.92);
      expect(options.top_p).toBeLessThanOrEqual(0.98);
      expect(options.num_predict).toBeGreaterThanOrEqual(144);
      expect(options.num_predict).toBeLessThanOrEqual(184);
    }
  });

  it("selects the implementation from config", () => {
    const base = { model: "llama3.1:8b", host: "http://localhost:11434", timeoutMs: 6_000 };
    expect(createEnhancer({ ...base, mode: "disabled" }, makeRng(5)).mode).toBe("disabled");
    expect(createEnhancer({ ...base, mode: "compose-from-facts" }, makeRng(5)).mode).toBe("compose-from-facts");
  });

  it("passes drafts through when disabled", async () => {
    const enhancer = createEnhancer(
      { mode: "disabled", model: "llama3.1:8b", host: "http://localhost:11434", timeoutMs: 6_000 },
      makeRng(6),
    );
    expect(await enhancer.enhance(REQUEST)).toBe(REQUEST.draft);
  });
});
