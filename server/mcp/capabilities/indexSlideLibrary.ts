import { z } from "zod";
import type { Capability } from "../types";

const inputSchema = z.object({
  libraryPath: z.string().min(1).optional().describe("Library root; defaults to the configured or last indexed path"),
});

/**
 * index_slide_library
 *
 * Full rescan of the slide library. A new path replaces the library the
 * other slide capabilities read from.
 */
export const indexSlideLibrary: Capability<typeof inputSchema> = {
  name: "index_slide_library",
  description:
    "Scan the theme-organized slide library, classify every deck file and rebuild the search index. Returns slide, theme, label and section counts.",
  inputSchema,
  handler: async ({ library }, { libraryPath }) => library.index(libraryPath),
};
