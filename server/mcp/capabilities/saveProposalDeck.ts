import * as path from "path";
import { z } from "zod";
import type { Capability } from "../types";

const inputSchema = z.object({
  outputPath: z.string().min(1).optional().describe("Defaults to <DECK_OUTPUT_DIR>/proposal-<date>.pptx"),
});

function defaultOutputPath(outputDir: string): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(outputDir, `proposal-${date}.pptx`);
}

export const saveProposalDeck: Capability<typeof inputSchema> = {
  name: "save_proposal_deck",
  description: "Write the active deck to disk and report the build summary, including sections still missing.",
  inputSchema,
  handler: async ({ decks, config }, { outputPath }) => {
    const savedPath = await decks.save(outputPath ?? defaultOutputPath(config.deckOutputDir));
    return {
      path: savedPath,
      summary: decks.getBuildSummary(),
    };
  },
};
