/**
 * Response parser — turns the final strategist's Markdown into Strategy and
 * SWOT records.
 *
 * The model is instructed to answer with:
 *
 *   ## Final strategies
 *   ### Strategy 1: <title>
 *   <description>
 *   Scores (0-10): Cost=3; Risk=4; Time=5; Effect=8; Optimality=7
 *   ... (three strategies)
 *   <!--SWOT_START-->
 *   ### Strategy 1: <title>
 *   S:
 *   - bullet
 *   W: ...
 *   <!--SWOT_END-->
 *
 * Parsing is a line-oriented state machine and never throws: anything it
 * cannot recognise is dropped, and `extractable` reports whether at least
 * one strategy survived.
 */

import {
  CRITERIA,
  SWOT_CATEGORIES,
  type Strategy,
  type StrategyReport,
  type StrategyScores,
  type SwotCategory,
  type SwotEntry,
} from "./types";

export const SWOT_START_MARKER = "<!--SWOT_START-->";
export const SWOT_END_MARKER = "<!--SWOT_END-->";

export const MAX_SWOT_BULLETS = 5;

const STRATEGY_HEADER = /^#{1,6}\s*Strategy\s*(\d+)\s*:\s*(.*)$/i;
// "Ranking by optimality" heading or keycap medals 1️⃣ 2️⃣ 3️⃣
const RANKING_SUMMARY = /^(?:[#*\s]*Ranking\b|[1-3]\uFE0F?\u20E3)/i;
const RULE_LINE = /^[-*_]{2,}\s*$/;
const CATEGORY_LABEL = /^(?:\*\*)?([A-Z])(?:\*\*)?\s*:(?:\*\*)?\s*(.*)$/;
const BULLET = /^(?:[-•]+|\*\s)\s*(.*)$/;
const SCORES_WORD = /\bscores\b/i;
const SCORE_RANGE = /\(\s*0\s*-\s*10\s*\)/;
const SCORE_PAIRS = /\d+\s*;\s*\d+/;

// ---------------------------------------------------------------------------
// Block splitting
// ---------------------------------------------------------------------------

/**
 * Separate the visible strategy block from the hidden SWOT block. When either
 * marker is missing the whole text is the main block.
 */
export function splitSentinelBlocks(text: string): { mainText: string; swotText: string } {
  const source = typeof text === "string" ? text : "";
  const start = source.indexOf(SWOT_START_MARKER);
  const end = start === -1 ? -1 : source.indexOf(SWOT_END_MARKER, start + SWOT_START_MARKER.length);

  if (start === -1 || end === -1) {
    return { mainText: source.trim(), swotText: "" };
  }

  return {
    mainText: source.slice(0, start).trim(),
    swotText: source.slice(start + SWOT_START_MARKER.length, end).trim(),
  };
}

interface Section {
  declaredIndex: number;
  headerTitle: string;
  body: string[];
}

function splitSections(text: string): { preamble: string[]; sections: Section[] } {
  const preamble: string[] = [];
  const sections: Section[] = [];
  let current: Section | null = null;

  for (const line of text.split(/\r?\n/)) {
    const header = STRATEGY_HEADER.exec(line.trim());
    if (header) {
      current = {
        declaredIndex: Number.parseInt(header[1], 10),
        headerTitle: header[2],
        body: [],
      };
      sections.push(current);
    } else if (current) {
      current.body.push(line);
    } else {
      preamble.push(line);
    }
  }

  return { preamble, sections };
}

function isRankingSummary(trimmed: string): boolean {
  return RANKING_SUMMARY.test(trimmed);
}

/** "Scores" plus a (0-10) range, a criterion with a value, or a run of numbers. */
function isScoresLine(trimmed: string): boolean {
  if (!SCORES_WORD.test(trimmed)) return false;
  return (
    SCORE_RANGE.test(trimmed) ||
    SCORE_PAIRS.test(trimmed) ||
    CRITERIA.some((c) => new RegExp(`\\b${c}\\s*[=:]\\s*\\d`, "i").test(trimmed))
  );
}

/** Lines up to (not including) the first ranking-summary line. */
function dropRankingSummary(lines: string[]): string[] {
  const keep: string[] = [];
  for (const line of lines) {
    if (isRankingSummary(line.trim())) break;
    keep.push(line);
  }
  return keep;
}

// ---------------------------------------------------------------------------
// Scores
// ---------------------------------------------------------------------------

function clampScore(raw: string): number {
  const value = Number.parseInt(raw, 10);
  return Math.min(10, Math.max(0, value));
}

/**
 * Extract criterion scores. Accepts `Cost=3` and `Cost: 3` alike; criteria
 * that are not found are omitted. Values are clamped to 0..10.
 */
export function extractScores(text: string): StrategyScores {
  const scores: StrategyScores = {};
  for (const criterion of CRITERIA) {
    const match =
      new RegExp(`\\b${criterion}\\s*=\\s*(\\d+)`, "i").exec(text) ??
      new RegExp(`\\b${criterion}\\s*:\\s*(\\d+)`, "i").exec(text);
    if (match) {
      scores[criterion] = clampScore(match[1]);
    }
  }
  return scores;
}

function scoresForSection(body: string[]): StrategyScores {
  const scoreLines = body.map((l) => l.trim()).filter(isScoresLine);
  // No recognisable scores line: search the whole block.
  return extractScores(scoreLines.length > 0 ? scoreLines.join("\n") : body.join("\n"));
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

function cleanTitle(raw: string, declaredIndex: number): string {
  const title = raw.replace(/\*\*/g, "").replace(/\s+#+\s*$/, "").trim();
  return title || `Strategy ${declaredIndex}`;
}

function strategyDescription(body: string[]): string {
  const keep: string[] = [];
  for (const line of body) {
    const trimmed = line.trim();
    if (isRankingSummary(trimmed)) break;
    if (isScoresLine(trimmed) || RULE_LINE.test(trimmed)) continue;
    keep.push(line);
  }
  return keep.join("\n").trim();
}

function buildStrategy(section: Section, emissionIndex: number): Strategy {
  return {
    emissionIndex,
    title: cleanTitle(section.headerTitle, section.declaredIndex),
    description: strategyDescription(section.body),
    scores: scoresForSection(section.body),
    rank: null,
  };
}

// ---------------------------------------------------------------------------
// SWOT
// ---------------------------------------------------------------------------

export function emptySwotEntry(strategyIndex: number): SwotEntry {
  return { strategyIndex, S: [], W: [], O: [], T: [] };
}

function isSwotCategory(letter: string): letter is SwotCategory {
  return SWOT_CATEGORIES.some((category) => category === letter);
}

function parseSwotSection(section: Section): SwotEntry {
  const entry = emptySwotEntry(section.declaredIndex);
  const seen = new Set<SwotCategory>();
  let current: SwotCategory | null = null;

  const collect = (text: string) => {
    if (!current) return;
    const bullet = BULLET.exec(text);
    if (!bullet) return;
    const item = bullet[1].trim();
    if (item && entry[current].length < MAX_SWOT_BULLETS) {
      entry[current].push(item);
    }
  };

  for (const line of section.body) {
    const trimmed = line.trim();
    const label = CATEGORY_LABEL.exec(trimmed);
    if (label) {
      const letter = label[1];
      // Any capital label closes the running category; repeats are ignored.
      current = isSwotCategory(letter) && !seen.has(letter) ? letter : null;
      if (current) {
        seen.add(current);
        collect(label[2].trim());
      }
      continue;
    }
    collect(trimmed);
  }

  return entry;
}

export function parseSwotBlock(swotText: string): Map<number, SwotEntry> {
  const swot = new Map<number, SwotEntry>();
  for (const section of splitSections(swotText).sections) {
    swot.set(section.declaredIndex, parseSwotSection(section));
  }
  return swot;
}

/** SWOT for a strategy, or an empty entry when the model gave none. */
export function lookupSwot(report: StrategyReport, emissionIndex: number): SwotEntry {
  return report.swot.get(emissionIndex) ?? emptySwotEntry(emissionIndex);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function parseStrategyResponse(text: string): StrategyReport {
  const { mainText, swotText } = splitSentinelBlocks(text);
  const main = splitSections(mainText);

  const strategies = main.sections.map((section, i) => buildStrategy(section, i + 1));

  return {
    preamble: dropRankingSummary(main.preamble).join("\n").trim(),
    strategies,
    swot: parseSwotBlock(swotText),
    extractable: strategies.length > 0,
  };
}

/** Replace `<br>` with spaces and drop any other HTML tags. */
export function stripMarkup(text: string): string {
  return text.replace(/<br\s*\/?>/gi, " ").replace(/<[^>]+>/g, "");
}
