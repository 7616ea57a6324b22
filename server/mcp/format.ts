import { SEARCH_CONSTANTS } from "../config/constants";
import type { SlideEntry, SlideSearchResult } from "../slideLibrary/types";

export type SlideSummary = {
  id: string;
  theme: string;
  fileName: string;
  primaryLabel: SlideEntry["primaryLabel"];
  backendSection: SlideEntry["backendSection"];
  confidence: number;
  slideCount: number;
  hasThumbnail: boolean;
};

export function summarizeSlide(slide: SlideEntry): SlideSummary {
  return {
    id: slide.id,
    theme: slide.theme,
    fileName: slide.fileName,
    primaryLabel: slide.primaryLabel,
    backendSection: slide.backendSection,
    confidence: slide.confidence,
    slideCount: slide.slideCount,
    hasThumbnail: slide.hasThumbnail,
  };
}

/** First EXCERPT_LENGTH characters of the text, whitespace collapsed. */
export function excerpt(text: string): string {
  return text.replace(/\s+/g, " ").trim().slice(0, SEARCH_CONSTANTS.EXCERPT_LENGTH);
}

export function formatSearchResult(result: SlideSearchResult) {
  return {
    ...summarizeSlide(result.slide),
    score: result.score,
    matchReason: result.matchReason,
    excerpt: excerpt(result.slide.ocrText),
  };
}
