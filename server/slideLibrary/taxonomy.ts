/**
 * Slide Taxonomy
 *
 * Purpose:
 * Loads the keyword lexicon and the operational-details refinement table
 * from config/slide-taxonomy.json. Label tie-breaks follow PRIMARY_LABELS
 * order; refinement entries are scanned in file order.
 *
 * Layer: Slide Library (configuration)
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import {
  PRIMARY_LABELS,
  backendSectionSchema,
  primaryLabelSchema,
  type BackendSection,
  type PrimaryLabel,
} from "@shared/schema";
import taxonomyData from "../../config/slide-taxonomy.json";

const keywordListSchema = z.array(z.string().min(1)).min(1);

const taxonomySchema = z.object({
  labelKeywords: z.array(z.object({
    label: primaryLabelSchema,
    keywords: keywordListSchema,
  })).min(1),
  sectionRefinement: z.array(z.object({
    section: backendSectionSchema,
    keywords: keywordListSchema,
  })),
});

export type LabelKeywords = {
  label: PrimaryLabel;
  keywords: readonly string[];
};

export type SectionKeywords = {
  section: BackendSection;
  keywords: readonly string[];
};

export type Taxonomy = {
  labelKeywords: readonly LabelKeywords[];
  sectionRefinement: readonly SectionKeywords[];
};

/**
 * Labels without a refinement entry map straight to one section.
 * operational_details maps here only when no refinement reaches the threshold.
 */
export const LABEL_TO_SECTION: Record<PrimaryLabel, BackendSection> = {
  executive_summary: "executive_summary",
  solution_overview: "solution_overview",
  operational_details: "delivery_model",
  case_study: "proof_points",
  compliance_security: "governance_compliance",
  project_plan: "implementation",
  pricing: "executive_summary",
  other: "executive_summary",
  unclassified: "executive_summary",
};

export function parseTaxonomy(data: unknown): Taxonomy {
  const parsed = taxonomySchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid slide taxonomy: ${fromZodError(parsed.error).message}`);
  }

  const seen = new Set<PrimaryLabel>();
  for (const entry of parsed.data.labelKeywords) {
    if (seen.has(entry.label)) {
      throw new Error(`Invalid slide taxonomy: label ${entry.label} is listed twice`);
    }
    if (entry.label === "unclassified") {
      throw new Error("Invalid slide taxonomy: unclassified is the no-match fallback and takes no keywords");
    }
    seen.add(entry.label);
  }

  const labelKeywords = [...parsed.data.labelKeywords].sort(
    (a, b) => PRIMARY_LABELS.indexOf(a.label) - PRIMARY_LABELS.indexOf(b.label),
  );
  return { labelKeywords, sectionRefinement: parsed.data.sectionRefinement };
}

export const defaultTaxonomy: Taxonomy = parseTaxonomy(taxonomyData);
