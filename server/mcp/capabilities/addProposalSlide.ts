import { z } from "zod";
import { backendSectionSchema, tableCellSchema } from "@shared/schema";
import { parseFormattedText } from "../../pptx/text";
import type { Capability } from "../types";

const inputSchema = z.object({
  sectionType: backendSectionSchema,
  title: z.string(),
  body: z.string().default("").describe("Body text; <b>, <i>, <u> and <br> are honoured"),
  speakerNotes: z.string().optional().describe("Evidence ids and proof tiers; kept out of the visible slide"),
  tableData: z.array(z.array(tableCellSchema)).optional(),
  addDivider: z.boolean().default(false),
});

export const addProposalSlide: Capability<typeof inputSchema> = {
  name: "add_proposal_slide",
  description:
    "Add a content slide for a proposal section to the active deck, with formatted body text, an optional table and speaker notes. Can insert a section divider first.",
  inputSchema,
  handler: async ({ decks }, { sectionType, title, body, speakerNotes, tableData, addDivider }) => {
    const dividerIndex = addDivider ? decks.addSectionDivider(sectionType) : null;
    const slideIndex = await decks.addSectionSlide({
      sectionType,
      title,
      bodySegments: parseFormattedText(body),
      tableData,
      speakerNotes,
    });

    return {
      slideIndex,
      dividerIndex,
      summary: decks.getBuildSummary(),
    };
  },
};
