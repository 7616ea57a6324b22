import { z } from "zod";
import { analyzeTemplate } from "../../deckBuilder/proposalDeckBuilder";
import type { Capability } from "../types";

const inputSchema = z.object({
  filePath: z.string().min(1).describe("Path to a .pptx or .potx file"),
});

export const analyzePptxTemplate: Capability<typeof inputSchema> = {
  name: "analyze_pptx_template",
  description:
    "List the slide layouts of a template with each placeholder's index, name, type and position, so layouts can be chosen by index.",
  inputSchema,
  handler: async (_ctx, { filePath }) => analyzeTemplate(filePath),
};
