import { z } from "zod";
import { backendSectionSchema, primaryLabelSchema } from "@shared/schema";
import { SEARCH_CONSTANTS } from "../../config/constants";
import type { Capability } from "../types";
import { formatSearchResult } from "../format";

const inputSchema = z.object({
  query: z.string().describe("Free-text keywords"),
  limit: z.number().int().min(1).default(SEARCH_CONSTANTS.DEFAULT_LIMIT),
  themeFilter: z.string().optional().describe("Theme folder name, case-insensitive"),
  labelFilter: primaryLabelSchema.optional(),
  sectionFilter: backendSectionSchema.optional(),
});

export const searchSlideLibrary: Capability<typeof inputSchema> = {
  name: "search_slide_library",
  description:
    "Keyword search over slide OCR text, theme and file names. Filters combine with AND. Results are ranked by token match, theme match and classification confidence.",
  inputSchema,
  handler: async ({ library }, { query, limit, themeFilter, labelFilter, sectionFilter }) => {
    const results = library.get().search(query, { limit, themeFilter, labelFilter, sectionFilter });
    return {
      query,
      count: results.length,
      results: results.map(formatSearchResult),
    };
  },
};
