/**
 * Keyword Classifier
 *
 * Purpose:
 * Keyword-density classification of slide text into a primary label, the
 * label → backend section resolution, and the relevance score used by search.
 *
 * Scores:
 * - label: matched / total keywords, x1.5 when a keyword appears in the theme
 *   name, capped at 1.0, rounded to 3 decimals (halves to even)
 * - search: distinct matched / total query tokens, x1.3 when a token appears
 *   in the theme name, scaled by (0.5 + 0.5 * confidence), capped and rounded
 *
 * Layer: Slide Library (classification)
 */

import type { BackendSection, PrimaryLabel } from "@shared/schema";
import { CLASSIFICATION_CONSTANTS, SEARCH_CONSTANTS } from "../config/constants";
import { LABEL_TO_SECTION, defaultTaxonomy, type Taxonomy } from "./taxonomy";
import type { Classification, SlideEntry } from "./types";

/**
 * Rounds to `decimals` places, exact halves to even. A double lies exactly
 * halfway at d places only when it is an odd multiple of 2^-(d+1).
 */
function roundTo(value: number, decimals: number): number {
  const halves = value * 2 ** (decimals + 1);
  if (Number.isInteger(halves) && halves % 2 !== 0) {
    const scale = 10 ** decimals;
    const floor = Math.floor(value * scale);
    return (floor % 2 === 0 ? floor : floor + 1) / scale;
  }
  return Number(value.toFixed(decimals));
}

const UNCLASSIFIED: Classification = {
  label: "unclassified",
  confidence: 0,
  matchedKeywords: [],
};

/**
 * Classifies slide text. Blank text falls back to the theme name so every
 * slide gets some signal. Ties go to the earlier label.
 */
export function classifyText(
  text: string,
  themeName: string,
  taxonomy: Taxonomy = defaultTaxonomy,
): Classification {
  const source = text.trim() ? text : themeName;
  const lowerTheme = themeName.toLowerCase();
  const combined = `${lowerTheme} ${source.toLowerCase()}`;

  let best: { label: PrimaryLabel; score: number; matched: string[] } | null = null;

  for (const { label, keywords } of taxonomy.labelKeywords) {
    const matched = keywords.filter(kw => combined.includes(kw.toLowerCase()));
    if (matched.length === 0) continue;

    let score = matched.length / keywords.length;
    if (keywords.some(kw => lowerTheme.includes(kw.toLowerCase()))) {
      score *= CLASSIFICATION_CONSTANTS.THEME_MATCH_BOOST;
    }
    score = Math.min(score, CLASSIFICATION_CONSTANTS.MAX_CONFIDENCE);

    if (!best || score > best.score) {
      best = { label, score, matched };
    }
  }

  if (!best) return { ...UNCLASSIFIED, matchedKeywords: [] };

  return {
    label: best.label,
    confidence: roundTo(best.score, CLASSIFICATION_CONSTANTS.CONFIDENCE_DECIMALS),
    matchedKeywords: best.matched,
  };
}

/**
 * Backend section for a label. operational_details fans out to the first
 * refinement section with enough keyword hits in the slide text.
 */
export function resolveSection(
  label: PrimaryLabel,
  text: string,
  taxonomy: Taxonomy = defaultTaxonomy,
): BackendSection {
  if (label !== "operational_details") return LABEL_TO_SECTION[label];

  const lowerText = text.toLowerCase();
  for (const { section, keywords } of taxonomy.sectionRefinement) {
    const hits = keywords.filter(kw => lowerText.includes(kw.toLowerCase()));
    if (hits.length >= CLASSIFICATION_CONSTANTS.REFINEMENT_MIN_MATCHES) {
      return section;
    }
  }
  return LABEL_TO_SECTION.operational_details;
}

/**
 * Lower-cased, whitespace-separated query tokens of at least two characters.
 * Repeats are kept: each one counts toward the match ratio's denominator.
 */
export function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter(token => token.length >= SEARCH_CONSTANTS.MIN_TOKEN_LENGTH);
}

export type SearchScore = {
  score: number;
  matchedTokens: string[];
};

/**
 * Scores one slide against query tokens; null when no token matches.
 */
export function scoreSlide(slide: SlideEntry, tokens: readonly string[]): SearchScore | null {
  if (tokens.length === 0) return null;

  const corpus = `${slide.theme} ${slide.ocrText} ${slide.fileName}`.toLowerCase();
  const matchedTokens = [...new Set(tokens)].filter(token => corpus.includes(token));
  if (matchedTokens.length === 0) return null;

  let score = matchedTokens.length / tokens.length;

  const lowerTheme = slide.theme.toLowerCase();
  if (tokens.some(token => lowerTheme.includes(token))) {
    score *= SEARCH_CONSTANTS.THEME_MATCH_BOOST;
  }

  const floor = SEARCH_CONSTANTS.CONFIDENCE_FLOOR;
  score *= floor + (1 - floor) * slide.confidence;

  return {
    score: roundTo(Math.min(score, SEARCH_CONSTANTS.MAX_SCORE), SEARCH_CONSTANTS.SCORE_DECIMALS),
    matchedTokens,
  };
}
