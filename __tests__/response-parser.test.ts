/**
 * Tests for the final strategist's response parser:
 * - splitSentinelBlocks
 * - extractScores
 * - parseStrategyResponse (strategies, preamble, SWOT)
 * - lookupSwot
 * - stripMarkup
 */

import { describe, it, expect } from "vitest";
import {
  parseStrategyResponse,
  splitSentinelBlocks,
  extractScores,
  lookupSwot,
  parseSwotBlock,
  stripMarkup,
  SWOT_START_MARKER,
  SWOT_END_MARKER,
} from "@/lib/strategy/response-parser";
import { rankStrategies } from "@/lib/strategy/ranker";

const SAMPLE = `## Final strategies

Built from internal data, external cases and forecasts.

Ranking by optimality:
1️⃣ Strategy 2

### Strategy 1: Expand online programmes
Launch three online master's tracks.
Scores (0-10): Cost=6; Risk=4; Time=5; Effect=7; Optimality=7

---

### Strategy 2: Corporate partnerships
Co-develop courses with two banks.
Scores (0-10): Cost: 3; Risk: 2; Time: 4; Effect: 8; Optimality: 9

### Strategy 3: Regional campuses
Open hubs in two cities.
Scores (0-10): Cost=8; Risk=6; Time=7; Effect=9; Optimality=9
Ranking: Strategy 2 first, then Strategy 3.
2️⃣ Strategy 3

${SWOT_START_MARKER}
## SWOT
### Strategy 1: Expand online programmes
S:
- Existing LMS
- Brand recognition
W:
- Thin faculty bench
O: - Growing demand
T:
- Price competition
### Strategy 2: Corporate partnerships
S:
- Bank relationships
W:
O:
- Co-funding
T:
- Partner churn
${SWOT_END_MARKER}
Anything after the end marker is ignored.`;

// ---------------------------------------------------------------------------
// splitSentinelBlocks
// ---------------------------------------------------------------------------

describe("splitSentinelBlocks", () => {
  it("separates the main block from the SWOT block", () => {
    const { mainText, swotText } = splitSentinelBlocks(
      `Main part\n${SWOT_START_MARKER}\nSWOT part\n${SWOT_END_MARKER}\ntail`
    );
    expect(mainText).toBe("Main part");
    expect(swotText).toBe("SWOT part");
  });

  it("treats the whole text as main block when the end marker is missing", () => {
    const text = `  Main part\n${SWOT_START_MARKER}\nSWOT part  `;
    expect(splitSentinelBlocks(text)).toEqual({
      mainText: `Main part\n${SWOT_START_MARKER}\nSWOT part`,
      swotText: "",
    });
  });

  it("treats the whole text as main block when the start marker is missing", () => {
    const text = `Main part\nSWOT part\n${SWOT_END_MARKER}`;
    expect(splitSentinelBlocks(text)).toEqual({ mainText: text, swotText: "" });
  });

  it("ignores an end marker that precedes the start marker", () => {
    const text = `${SWOT_END_MARKER}\nMain\n${SWOT_START_MARKER}\nSWOT`;
    expect(splitSentinelBlocks(text).swotText).toBe("");
  });
});

// ---------------------------------------------------------------------------
// extractScores
// ---------------------------------------------------------------------------

describe("extractScores", () => {
  it("yields identical maps for '=' and ':' delimiters", () => {
    expect(extractScores("Cost=3")).toEqual(extractScores("Cost: 3"));
    expect(extractScores("Cost=3")).toEqual({ Cost: 3 });
  });

  it("reads all five criteria", () => {
    expect(
      extractScores("Scores (0-10): Cost=1; Risk=2; Time=3; Effect=4; Optimality=5")
    ).toEqual({ Cost: 1, Risk: 2, Time: 3, Effect: 4, Optimality: 5 });
  });

  it("omits criteria that are not present", () => {
    expect(extractScores("Scores: Cost=2; Effect=9")).toEqual({ Cost: 2, Effect: 9 });
  });

  it("clamps values above 10", () => {
    expect(extractScores("Optimality=14")).toEqual({ Optimality: 10 });
  });

  it("tolerates whitespace around delimiters", () => {
    expect(extractScores("Cost   =   4 ;  Risk :   6")).toEqual({ Cost: 4, Risk: 6 });
  });

  it("returns an empty map for text without scores", () => {
    expect(extractScores("no numbers here")).toEqual({});
  });
});

// ---------------------------------------------------------------------------
// parseStrategyResponse
// ---------------------------------------------------------------------------

describe("parseStrategyResponse", () => {
  const report = parseStrategyResponse(SAMPLE);

  it("extracts three strategies in emission order", () => {
    expect(report.extractable).toBe(true);
    expect(report.strategies.map((s) => s.emissionIndex)).toEqual([1, 2, 3]);
    expect(report.strategies.map((s) => s.title)).toEqual([
      "Expand online programmes",
      "Corporate partnerships",
      "Regional campuses",
    ]);
  });

  it("leaves rank unassigned", () => {
    expect(report.strategies.every((s) => s.rank === null)).toBe(true);
  });

  it("reads scores in either delimiter form", () => {
    expect(report.strategies[0].scores).toEqual({
      Cost: 6,
      Risk: 4,
      Time: 5,
      Effect: 7,
      Optimality: 7,
    });
    expect(report.strategies[1].scores).toEqual({
      Cost: 3,
      Risk: 2,
      Time: 4,
      Effect: 8,
      Optimality: 9,
    });
  });

  it("strips the scores line and rule lines from descriptions", () => {
    expect(report.strategies[0].description).toBe("Launch three online master's tracks.");
    expect(report.strategies[1].description).toBe("Co-develop courses with two banks.");
  });

  it("drops trailing ranking-summary lines from a description", () => {
    expect(report.strategies[2].description).toBe("Open hubs in two cities.");
  });

  it("drops the ranking summary from the preamble", () => {
    expect(report.preamble).toBe(
      "## Final strategies\n\nBuilt from internal data, external cases and forecasts."
    );
  });

  it("parses SWOT entries keyed by strategy index", () => {
    expect(report.swot.get(1)).toEqual({
      strategyIndex: 1,
      S: ["Existing LMS", "Brand recognition"],
      W: ["Thin faculty bench"],
      O: ["Growing demand"],
      T: ["Price competition"],
    });
    expect(report.swot.get(2)).toEqual({
      strategyIndex: 2,
      S: ["Bank relationships"],
      W: [],
      O: ["Co-funding"],
      T: ["Partner churn"],
    });
    expect(report.swot.has(3)).toBe(false);
  });

  it("returns an empty, non-extractable report for empty input", () => {
    const empty = parseStrategyResponse("");
    expect(empty.preamble).toBe("");
    expect(empty.strategies).toEqual([]);
    expect(empty.swot.size).toBe(0);
    expect(empty.extractable).toBe(false);
  });

  it("returns a non-extractable report for free text without headers", () => {
    const result = parseStrategyResponse("I could not produce strategies this time.");
    expect(result.extractable).toBe(false);
    expect(result.preamble).toBe("I could not produce strategies this time.");
  });

  it("keeps a strategy that has no scores line", () => {
    const result = parseStrategyResponse("### Strategy 1: Alpha\nJust a description.");
    expect(result.strategies).toEqual([
      {
        emissionIndex: 1,
        title: "Alpha",
        description: "Just a description.",
        scores: {},
        rank: null,
      },
    ]);
  });

  it("keeps description lines that merely start with the word Scores", () => {
    const result = parseStrategyResponse(
      [
        "### Strategy 1: Benchmarking",
        "Scores of peer universities show strong demand.",
        "Scores (0-10): Cost=4; Optimality=6",
      ].join("\n")
    );
    expect(result.strategies[0].description).toBe(
      "Scores of peer universities show strong demand."
    );
    expect(result.strategies[0].scores).toEqual({ Cost: 4, Optimality: 6 });
  });

  it("tolerates extra whitespace in headers and scores", () => {
    const result = parseStrategyResponse(
      "   ###   Strategy   2 :   Beta  \n   Scores (0-10):  Cost = 4 ;  Optimality :  8  "
    );
    expect(result.strategies).toHaveLength(1);
    expect(result.strategies[0].title).toBe("Beta");
    expect(result.strategies[0].scores).toEqual({ Cost: 4, Optimality: 8 });
    expect(result.strategies[0].description).toBe("");
  });

  it("uses emission order even when the model numbers headers oddly", () => {
    const result = parseStrategyResponse("### Strategy 5: A\n### Strategy 5: B");
    expect(result.strategies.map((s) => [s.emissionIndex, s.title])).toEqual([
      [1, "A"],
      [2, "B"],
    ]);
  });

  it("falls back to a numbered title when the header has none", () => {
    const result = parseStrategyResponse("### Strategy 2:\nBody");
    expect(result.strategies[0].title).toBe("Strategy 2");
  });

  it("removes bold markers from titles", () => {
    const result = parseStrategyResponse("### Strategy 1: **Bold move**");
    expect(result.strategies[0].title).toBe("Bold move");
  });

  it("leaves the SWOT map empty when the markers are missing", () => {
    const result = parseStrategyResponse(
      "### Strategy 1: Alpha\nScores (0-10): Optimality=5\nS:\n- strength"
    );
    expect(result.swot.size).toBe(0);
    expect(result.strategies[0].scores).toEqual({ Optimality: 5 });
  });

  it("handles Windows line endings", () => {
    const result = parseStrategyResponse(
      "### Strategy 1: Alpha\r\nText\r\nScores (0-10): Cost=2; Optimality=6\r\n"
    );
    expect(result.strategies[0].description).toBe("Text");
    expect(result.strategies[0].scores).toEqual({ Cost: 2, Optimality: 6 });
  });
});

// ---------------------------------------------------------------------------
// SWOT block details
// ---------------------------------------------------------------------------

describe("parseSwotBlock", () => {
  it("caps each category at five bullets", () => {
    const swot = parseSwotBlock(
      "### Strategy 1: A\nS:\n- a\n- b\n- c\n- d\n- e\n- f\n- g"
    );
    expect(swot.get(1)?.S).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("keeps only bullet lines", () => {
    const swot = parseSwotBlock("### Strategy 1: A\nS: 2-3 items\nplain prose\n- real item\n• dot item\n* star item");
    expect(swot.get(1)?.S).toEqual(["real item", "dot item", "star item"]);
  });

  it("accepts bold category labels", () => {
    const swot = parseSwotBlock("### Strategy 1: A\n**S:**\n- one\n**W**: - two");
    expect(swot.get(1)?.S).toEqual(["one"]);
    expect(swot.get(1)?.W).toEqual(["two"]);
  });

  it("ends a category at any other capital label", () => {
    const swot = parseSwotBlock("### Strategy 1: A\nS:\n- one\nX: note\n- stray");
    expect(swot.get(1)?.S).toEqual(["one"]);
  });

  it("keeps the first occurrence of a repeated category", () => {
    const swot = parseSwotBlock("### Strategy 1: A\nS:\n- first\nS:\n- second");
    expect(swot.get(1)?.S).toEqual(["first"]);
  });

  it("yields empty lists for categories that never appear", () => {
    const swot = parseSwotBlock("### Strategy 3: C\nT:\n- threat");
    expect(swot.get(3)).toEqual({ strategyIndex: 3, S: [], W: [], O: [], T: ["threat"] });
  });
});

// ---------------------------------------------------------------------------
// lookupSwot
// ---------------------------------------------------------------------------

describe("lookupSwot", () => {
  const report = parseStrategyResponse(SAMPLE);

  it("returns the same bullets for index 2 before and after ranking", () => {
    const before = lookupSwot(report, 2);
    const ranked = rankStrategies(report.strategies);
    expect(ranked.map((s) => s.emissionIndex)).toEqual([2, 3, 1]);

    const after = lookupSwot(report, ranked[0].emissionIndex);
    expect(after).toEqual(before);
    expect(after.S).toEqual(["Bank relationships"]);
  });

  it("returns an empty entry for a strategy without SWOT", () => {
    expect(lookupSwot(report, 3)).toEqual({ strategyIndex: 3, S: [], W: [], O: [], T: [] });
  });
});

// ---------------------------------------------------------------------------
// stripMarkup
// ---------------------------------------------------------------------------

describe("stripMarkup", () => {
  it("turns <br> into spaces and drops other tags", () => {
    expect(stripMarkup("a<br>b<BR/>c <b>bold</b>")).toBe("a b c bold");
  });

  it("leaves plain text alone", () => {
    expect(stripMarkup("no tags here")).toBe("no tags here");
  });
});
