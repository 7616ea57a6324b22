import type { BackendSection, PrimaryLabel } from "@shared/schema";

/**
 * One deck file discovered in the library. Entries are rebuilt on every
 * index run and never mutated afterwards.
 */
export type SlideEntry = {
  id: string;
  theme: string;
  fileName: string;
  pptxPath: string;
  ocrText: string;
  primaryLabel: PrimaryLabel;
  backendSection: BackendSection;
  confidence: number;
  keywordsMatched: string[];
  /** Slides inside the file; at least 1. */
  slideCount: number;
  hasThumbnail: boolean;
  thumbnailPath: string | null;
  metadata: Record<string, unknown>;
};

export type Distribution<K extends string> = Partial<Record<K, number>>;

export type ThemeInfo = {
  name: string;
  path: string;
  slideCount: number;
  labelDistribution: Distribution<PrimaryLabel>;
  sectionDistribution: Distribution<BackendSection>;
  sampleKeywords: string[];
};

export type Classification = {
  label: PrimaryLabel;
  confidence: number;
  matchedKeywords: string[];
};

export type IndexSummary = {
  totalSlides: number;
  totalThemes: number;
  themes: Record<string, number>;
  labelDistribution: Distribution<PrimaryLabel>;
  sectionDistribution: Distribution<BackendSection>;
};

export type SearchOptions = {
  limit?: number;
  themeFilter?: string;
  labelFilter?: PrimaryLabel;
  sectionFilter?: BackendSection;
};

export type SlideSearchResult = {
  slide: SlideEntry;
  score: number;
  matchReason: string;
};

export type LibraryStats = {
  libraryPath: string;
  totalSlides: number;
  totalThemes: number;
  themes: Record<string, {
    slides: number;
    labels: Distribution<PrimaryLabel>;
    sections: Distribution<BackendSection>;
  }>;
  globalLabelDistribution: Distribution<PrimaryLabel>;
  globalSectionDistribution: Distribution<BackendSection>;
};

export type ProposalSelection = Partial<Record<BackendSection, SlideEntry[]>>;
