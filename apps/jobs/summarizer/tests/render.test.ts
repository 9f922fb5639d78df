import { describe, it, expect } from "vitest";
import { exitCodeFor, renderCounts, renderOutcome, renderReport } from "../src/render";
import type { EnhancedSummary, SkippedOutcome, SummarizedOutcome } from "../src/types";
import { makeStory } from "./fixtures";

const RULE = "=".repeat(60);

function summarized(overrides: Partial<SummarizedOutcome> = {}): SummarizedOutcome {
  return {
    status: "summarized",
    rank: 1,
    story: makeStory(1, { title: "Test Article", score: 100 }),
    summary: { kind: "plain", lines: ["Line one.", "Line two.", "Line three."] },
    requestedMode: "basic",
    modeUsed: "basic",
    fallbackUsed: false,
    contentExtracted: true,
    commentCount: 0,
    degradations: [],
    states: ["pending", "metadataFetched", "contentExtracted", "summarized", "reported"],
    durationMs: 5,
    ...overrides,
  };
}

const enhanced: EnhancedSummary = {
  kind: "enhanced",
  articleSummary: { value: ["A1", "A2", "A3"], usedDefault: false },
  commentSummary: { value: ["C1"], usedDefault: false },
  keyPoints: { value: ["K1", "K2", "K3"], usedDefault: false },
  relatedLinks: { value: ["https://example.com/x"], usedDefault: false },
};

const skipped: SkippedOutcome = {
  status: "skipped",
  rank: 3,
  storyId: 9,
  error: { kind: "StoryNotFound", message: "Story 9 not found" },
  states: ["pending"],
  durationMs: 1,
};

describe("renderOutcome", () => {
  it("renders a plain summary", () => {
    expect(renderOutcome(summarized())).toEqual([
      "--- Article 1 (Score: 100) ---",
      "Test Article",
      "URL: https://example.com/1",
      "Line one.",
      "Line two.",
      "Line three.",
    ]);
  });

  it("renders every enhanced section", () => {
    const outcome = summarized({
      rank: 2,
      story: makeStory(7, { title: "Enhanced story", score: 70 }),
      summary: enhanced,
      requestedMode: "local-model",
      modeUsed: "local-model",
    });

    expect(renderOutcome(outcome)).toEqual([
      "--- Article 2 (Score: 70) ---",
      "Enhanced story",
      "URL: https://example.com/7",
      "A1",
      "A2",
      "A3",
      "Discussion:",
      "  - C1",
      "Key points:",
      "  - K1",
      "  - K2",
      "  - K3",
      "Related links:",
      "  - https://example.com/x",
    ]);
  });

  it("omits empty discussion and link sections", () => {
    const outcome = summarized({
      summary: {
        ...enhanced,
        commentSummary: { value: [], usedDefault: false },
        relatedLinks: { value: [], usedDefault: false },
      },
    });

    expect(renderOutcome(outcome).slice(3)).toEqual(["A1", "A2", "A3", "Key points:", "  - K1", "  - K2", "  - K3"]);
  });

  it("marks fallback summaries and missing URLs", () => {
    const outcome = summarized({
      story: makeStory(1, { title: "Ask HN", score: 12, url: undefined }),
      requestedMode: "cloud-model",
      modeUsed: "basic",
      fallbackUsed: true,
    });

    expect(renderOutcome(outcome).slice(0, 3)).toEqual([
      "--- Article 1 (Score: 12) [fallback: basic] ---",
      "Ask HN",
      "URL: (none)",
    ]);
  });

  it("renders a skipped story on one line", () => {
    expect(renderOutcome(skipped)).toEqual([
      "--- Article 3 skipped (StoryNotFound: Story 9 not found) ---",
    ]);
  });
});

describe("renderReport", () => {
  it("frames outcomes and appends the counts", () => {
    const text = renderReport({
      outcomes: [summarized(), skipped],
      counts: { listed: 2, summarized: 1, skipped: 1, fallbacks: 0 },
    });

    expect(text).toBe(
      [
        RULE,
        "",
        "--- Article 1 (Score: 100) ---",
        "Test Article",
        "URL: https://example.com/1",
        "Line one.",
        "Line two.",
        "Line three.",
        "",
        "--- Article 3 skipped (StoryNotFound: Story 9 not found) ---",
        "",
        RULE,
        "Summarized: 1/2, skipped: 1, fallbacks: 0",
        "Summary generation complete!",
      ].join("\n") + "\n"
    );
  });

  it("reports an empty listing", () => {
    const text = renderReport({
      outcomes: [],
      counts: { listed: 0, summarized: 0, skipped: 0, fallbacks: 0 },
    });
    expect(text).toBe(`${RULE}\nNo articles found.\n`);
  });
});

describe("renderCounts", () => {
  it("formats the run totals", () => {
    expect(renderCounts({ listed: 5, summarized: 4, skipped: 1, fallbacks: 2 })).toBe(
      "Summarized: 4/5, skipped: 1, fallbacks: 2"
    );
  });
});

describe("exitCodeFor", () => {
  it("fails only when nothing listed could be summarized", () => {
    expect(exitCodeFor({ listed: 2, summarized: 0, skipped: 2, fallbacks: 0 })).toBe(1);
    expect(exitCodeFor({ listed: 2, summarized: 1, skipped: 1, fallbacks: 0 })).toBe(0);
    expect(exitCodeFor({ listed: 0, summarized: 0, skipped: 0, fallbacks: 0 })).toBe(0);
  });
});
