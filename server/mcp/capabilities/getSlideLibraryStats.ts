import { z } from "zod";
import type { Capability } from "../types";

const inputSchema = z.object({});

export const getSlideLibraryStats: Capability<typeof inputSchema> = {
  name: "get_slide_library_stats",
  description: "Slide and theme totals plus label and section distributions, per theme and overall.",
  inputSchema,
  handler: async ({ library }) => library.get().getLibraryStats(),
};
