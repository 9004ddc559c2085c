import { describe, expect, it } from "vitest";
import { DEFAULT_RUN_CONFIG, parseRunConfig } from "./config.js";

describe("config", () => {
  it("falls back to defaults", () => {
    expect(parseRunConfig({}, {})).toEqual(DEFAULT_RUN_CONFIG);
  });

  it("reads environment values and lets explicit input win", () => {
    const config = parseRunConfig(
      { weeks: "12", enhancement: { model: "phi3:mini" } },
      {
        CONCIERGE_SIM_SEED: "7",
        CONCIERGE_SIM_WEEKS: "20",
        CONCIERGE_SIM_TZ: "America/New_York",
        CONCIERGE_SIM_ENHANCE: "rewrite-draft",
        CONCIERGE_SIM_MODEL: "llama3.1:8b",
        CONCIERGE_SIM_OUTPUT_DIR: "  ",
      },
    );
    expect(config.seed).toBe(7);
    expect(config.weeks).toBe(12);
    expect(config.timeZone).toBe("America/New_York");
    expect(config.outputDir).toBe("./demo");
    expect(config.enhancement).toEqual({
      mode: "rewrite-draft",
      model: "phi3:mini",
      host: "http://localhost:11434",
      timeoutMs: 6_000,
    });
  });

  it("rejects invalid values with every issue named", () => {
    expect(() =>
      parseRunConfig({ startDate: "2025-02-30", timeZone: "Mars/Olympus", weeks: 0 }, {}),
    ).toThrow(
      "Invalid run config: startDate: startDate must be a calendar date in YYYY-MM-DD form; " +
        "timeZone: timeZone must be an IANA zone; weeks: Number must be greater than or equal to 1",
    );
    expect(() => parseRunConfig({ enhancement: { mode: "loud" } }, {})).toThrow(/enhancement\.mode/);
  });
});
