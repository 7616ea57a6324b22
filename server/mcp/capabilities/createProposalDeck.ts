import { z } from "zod";
import type { Capability } from "../types";

const inputSchema = z.object({
  templatePath: z.string().min(1).optional().describe("Template .pptx/.potx; the built-in blank deck when omitted"),
  title: z.string().optional(),
  subtitle: z.string().optional(),
});

/**
 * create_proposal_deck
 *
 * Replaces the active deck. With a title, the first slide is a title slide
 * on layout 0.
 */
export const createProposalDeck: Capability<typeof inputSchema> = {
  name: "create_proposal_deck",
  description:
    "Start a new proposal deck from a template or a blank 4:3 deck, optionally with a title slide. Returns the template's layouts when one is used.",
  inputSchema,
  handler: async ({ decks }, { templatePath, title, subtitle }) => {
    const analysis = templatePath ? await decks.createFromTemplate(templatePath) : null;
    if (!templatePath) {
      await decks.createBlank();
    }

    if (title) {
      decks.addTitleSlide(title, subtitle);
    }

    return {
      source: templatePath ?? "blank",
      layouts: analysis?.layouts ?? null,
      summary: decks.getBuildSummary(),
    };
  },
};
