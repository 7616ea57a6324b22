import { z } from "zod";
import { backendSectionSchema, tableCellSchema } from "@shared/schema";
import type { SectionsContent } from "../../deckBuilder/types";
import { parseFormattedText } from "../../pptx/text";
import type { Capability } from "../types";

const sectionInputSchema = z.object({
  title: z.string(),
  body: z.string().default(""),
  speakerNotes: z.string().optional(),
  tableData: z.array(z.array(tableCellSchema)).optional(),
});

const inputSchema = z.object({
  sections: z.record(backendSectionSchema, sectionInputSchema).describe("Backend section id → slide content"),
  includeDividers: z.boolean().default(true),
  title: z.string().optional(),
  subtitle: z.string().optional(),
});

export const buildFullProposal: Capability<typeof inputSchema> = {
  name: "build_full_proposal",
  description:
    "Add a title slide and one content slide per supplied section, in canonical section order, with optional numbered dividers. Reports which sections are still missing.",
  inputSchema,
  handler: async ({ decks }, { sections, includeDividers, title, subtitle }) => {
    const content: SectionsContent = {};
    for (const section of backendSectionSchema.options) {
      const input = sections[section];
      if (!input) continue;
      content[section] = {
        sectionType: section,
        title: input.title,
        bodySegments: parseFormattedText(input.body),
        speakerNotes: input.speakerNotes,
        tableData: input.tableData,
      };
    }
    return decks.buildFullProposal(content, { includeDividers, title, subtitle });
  },
};
