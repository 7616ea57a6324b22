import { z } from "zod";
import type { Capability } from "../types";
import { summarizeSlide } from "../format";

const inputSchema = z.object({
  slideId: z.string().min(1).describe("Library slide id, e.g. slide_0007"),
  sourceSlideIndex: z.number().int().min(0).default(0),
  speakerNotes: z.string().optional().describe("Appended after the source slide's own notes"),
});

export const cloneLibrarySlide: Capability<typeof inputSchema> = {
  name: "clone_library_slide",
  description:
    "Copy one slide of a library deck into the active proposal deck. Shapes that cannot be copied are reduced to text boxes.",
  inputSchema,
  handler: async ({ library, decks }, { slideId, sourceSlideIndex, speakerNotes }) => {
    const slide = library.get().getSlide(slideId);
    const cloned = await decks.addSlideFromLibrary(slide.pptxPath, sourceSlideIndex, speakerNotes);
    return {
      source: summarizeSlide(slide),
      ...cloned,
    };
  },
};
