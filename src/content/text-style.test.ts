import { describe, expect, it } from "vitest";
import { makeRng } from "../sim/rng.js";
import {
  dedupeLines,
  extractOpener,
  finalizeLines,
  mapActions,
  naturalList,
  tidyParagraph,
  toSentence,
  varyCommonOpeners,
  weaveReport,
} from "./text-style.js";

describe("text-style", () => {
  it("joins lists naturally", () => {
    expect(naturalList([])).toBe("");
    expect(naturalList(["A"])).toBe("A");
    expect(naturalList(["A", "B"])).toBe("A and B");
    expect(naturalList(["A", "B", "C"])).toBe("A, B, and C");
    expect(naturalList(["A", " ", "B"], "or")).toBe("A or B");
  });

  it("normalizes a fragment into one sentence", () => {
    expect(toSentence("  “keeping an eye on: BP”  ")).toBe("keeping an eye on BP.");
    expect(toSentence("Okay to proceed?")).toBe("Okay to proceed?");
    expect(toSentence("Plan:  hydrate  well")).toBe("Plan hydrate well.");
    expect(toSentence("Great!")).toBe("Great!");
    expect(toSentence("Done?.")).toBe("Done?");
    expect(toSentence("")).toBe("");
  });

  it("collapses a trailing run of marks into one", () => {
    expect(toSentence("Done..")).toBe("Done.");
    expect(toSentence("Really?!")).toBe("Really!");
    expect(toSentence("Sure. ?")).toBe("Sure?");
    expect(toSentence("Wait…")).toBe("Wait.");
    expect(toSentence("?!")).toBe("");
  });

  it("maps actions to a first-person sentence", () => {
    expect(mapActions([])).toBe("No actions from me right now");
    expect(mapActions(["I blocked your workout slots."])).toBe("I blocked your workout slots");
    expect(mapActions(["blocked your workout slots", "looped Jordan in", "held a rack"])).toBe(
      "I blocked your workout slots, looped Jordan in, and held a rack",
    );
  });

  it("cleans punctuation, spacing, and capitalization", () => {
    expect(tidyParagraph("sounds good?.  see you then:\nall set !.")).toBe("Sounds good? see you then.\nAll set!");
    expect(tidyParagraph("hydrate ,then rest;\n\n  keep going..")).toBe("Hydrate, then rest.\nKeep going.");
  });

  it("is idempotent", () => {
    const samples = [
      "sounds good?.  see you then:\nall set !.",
      "hi Daniel,\nlikely late caffeine..\nlikely late caffeine!\n  ok ,, fine;",
      "Results are in — ApoB 98.5, LDL 120.3 ; BP 128/82:\n“quoted”?.",
      "see you then:\u00a0\nall set",
      "booked for 9:\f\nbring water;\u00a0\u00a0",
    ];
    for (const sample of samples) {
      const once = tidyParagraph(sample);
      expect(tidyParagraph(once)).toBe(once);
    }
  });

  it("treats any trailing whitespace before a colon's line end alike", () => {
    expect(tidyParagraph("see you then:\u00a0\nall set")).toBe("See you then.\nAll set");
    expect(tidyParagraph("booked for 9:\f\nbring water;\u00a0\u00a0")).toBe("Booked for 9.\nBring water.");
  });

  it("keeps only the first of lines equal after lowercasing and stripping end punctuation", () => {
    expect(tidyParagraph("Keep dinner earlier.\nkeep dinner earlier!\nMorning light too.")).toBe(
      "Keep dinner earlier.\nMorning light too.",
    );
    expect(dedupeLines(["A b.", "a  B?", "c"])).toEqual(["A b.", "c"]);
  });

  it("finalizes template lines", () => {
    expect(finalizeLines(["", "first line.", "First line", "second: "])).toBe("First line.\nSecond.");
  });

  it("weaves report lines from wins, flags, and focus", () => {
    const lines = weaveReport([], [], [], makeRng(1));
    expect(lines).toEqual(["No big wins this week."]);

    const full = weaveReport(["HRV improved (44 ms)"], ["hsCRP 2.1"], ["morning light", "mobility"], makeRng(2));
    expect(full.join(" ")).toContain("HRV improved (44 ms)");
    expect(full.join(" ")).toContain("hsCRP 2.1");
    expect(full.join(" ")).toContain("morning light and mobility");
  });

  it("extracts the opener after skipping greetings", () => {
    expect(extractOpener("Hi Daniel,\nGood news—HRV improved this week.")).toBe("good news hrv improved");
    expect(extractOpener("\n\n")).toBe("");
    expect(extractOpener("Quick one: creatine?", 2)).toBe("quick one");
  });

  it("rewrites repetitive openers only when they match", () => {
    const rng = makeRng(4);
    let changed = 0;
    for (let i = 0; i < 50; i += 1) {
      const [line] = varyCommonOpeners(["Likely late caffeine."], rng);
      expect(line.endsWith("late caffeine.")).toBe(true);
      if (!line.startsWith("Likely")) {
        changed += 1;
      }
    }
    expect(changed).toBeGreaterThan(0);
    expect(changed).toBeLessThan(50);
    expect(varyCommonOpeners(["Keep dinner earlier."], rng)).toEqual(["Keep dinner earlier."]);
  });
});
