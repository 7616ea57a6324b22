import { z } from "zod";
import { backendSectionSchema } from "@shared/schema";
import { SEARCH_CONSTANTS } from "../../config/constants";
import type { Capability } from "../types";
import { summarizeSlide, type SlideSummary } from "../format";

const inputSchema = z.object({
  sections: z.array(backendSectionSchema).optional().describe("Backend sections to fill; all nine when omitted"),
  maxPerSection: z.number().int().min(1).default(SEARCH_CONSTANTS.DEFAULT_MAX_PER_SECTION),
});

/**
 * Sections with no candidate slides are absent from the result.
 */
export const selectSlidesForProposal: Capability<typeof inputSchema> = {
  name: "select_slides_for_proposal",
  description:
    "Pick the most confidently classified library slides for each proposal section. Sections without any candidate are omitted.",
  inputSchema,
  handler: async ({ library }, { sections, maxPerSection }) => {
    const selection = library.get().selectSlidesForProposal(sections, maxPerSection);
    const result: Record<string, SlideSummary[]> = {};
    for (const [section, slides] of Object.entries(selection)) {
      if (slides) result[section] = slides.map(summarizeSlide);
    }
    return result;
  },
};
