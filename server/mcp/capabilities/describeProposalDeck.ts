import { z } from "zod";
import type { Capability } from "../types";

const inputSchema = z.object({});

export const describeProposalDeck: Capability<typeof inputSchema> = {
  name: "describe_proposal_deck",
  description: "Read back every slide of the active deck: layout, title, visible text and speaker notes.",
  inputSchema,
  handler: async ({ decks }) => ({
    slides: decks.describeSlides(),
    summary: decks.getBuildSummary(),
  }),
};
