import { describe, it, expect } from "vitest";
import {
  FINAL_STRATEGY_SYSTEM_PROMPT,
  buildFinalStrategyPrompt,
  buildRetrievalPrompt,
} from "@/lib/strategy/agents/prompts";
import { SWOT_END_MARKER, SWOT_START_MARKER } from "@/lib/strategy/response-parser";
import { DOCS } from "./helpers/fakes";

describe("buildRetrievalPrompt", () => {
  it("numbers documents and shows their dates", () => {
    const prompt = buildRetrievalPrompt("How did enrolment change?", DOCS.slice(0, 2));
    expect(prompt).toContain("[1] annual-report.pdf (2025-01-10)\nEnrolment grew 12% in 2024.");
    expect(prompt).toContain("[2] programmes.docx\nOnline courses cover 4 faculties.");
    expect(prompt.endsWith("Question: How did enrolment change?")).toBe(true);
  });
});

describe("buildFinalStrategyPrompt", () => {
  const inputs = {
    retrievalSummary: "Internal summary",
    webSummary: "External summary",
    webBullets: ["Case A", "Case B"],
    forecastText: "Forecast ideas",
  };

  it("joins key facts with semicolons", () => {
    expect(buildFinalStrategyPrompt(inputs)).toContain("Key facts:\nCase A; Case B\n");
  });

  it("marks missing key facts with a dash", () => {
    expect(buildFinalStrategyPrompt({ ...inputs, webBullets: [] })).toContain("Key facts:\n—\n");
  });

  it("includes all three sources", () => {
    const prompt = buildFinalStrategyPrompt(inputs);
    expect(prompt).toContain("Internal summary");
    expect(prompt).toContain("Overview:\nExternal summary");
    expect(prompt).toContain("3) Forecast ideas:\nForecast ideas");
  });
});

describe("FINAL_STRATEGY_SYSTEM_PROMPT", () => {
  it("asks for the SWOT between the parser's markers", () => {
    expect(FINAL_STRATEGY_SYSTEM_PROMPT).toContain(SWOT_START_MARKER);
    expect(FINAL_STRATEGY_SYSTEM_PROMPT).toContain(SWOT_END_MARKER);
    expect(FINAL_STRATEGY_SYSTEM_PROMPT).toContain(
      "Scores (0-10): Cost=X; Risk=Y; Time=Z; Effect=W; Optimality=O"
    );
  });
});
