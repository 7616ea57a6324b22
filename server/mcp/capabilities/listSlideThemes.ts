import { z } from "zod";
import type { Capability } from "../types";

const inputSchema = z.object({});

export const listSlideThemes: Capability<typeof inputSchema> = {
  name: "list_slide_themes",
  description: "List library themes, largest first, with label/section distributions and sample keywords.",
  inputSchema,
  handler: async ({ library }) => library.get().listThemes(),
};
