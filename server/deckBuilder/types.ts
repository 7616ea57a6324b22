import type { BackendSection, SlideContentInput } from "@shared/schema";
import type { CloneReport } from "../pptx/slideCloner";

export type BuildSummary = {
  slideCount: number;
  /** Distinct section types in first-added order. */
  sectionsAdded: BackendSection[];
  sectionsMissing: BackendSection[];
};

export type ClonedSlide = CloneReport & {
  slideIndex: number;
};

export type SectionsContent = Partial<Record<BackendSection, SlideContentInput>>;

export type FullProposalOptions = {
  includeDividers?: boolean;
  title?: string;
  subtitle?: string;
};

export type SlideDescription = {
  index: number;
  layoutName: string;
  title: string;
  texts: string[];
  notes: string;
};
