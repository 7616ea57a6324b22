import type { z } from "zod";
import type { JsonSchema7Type } from "zod-to-json-schema";
import type { RuntimeConfig } from "../config/runtime";
import type { ProposalDeckBuilder } from "../deckBuilder/proposalDeckBuilder";
import type { SlideLibrarySession } from "./context";

/**
 * Everything a capability may touch. Built once by the caller and passed in;
 * capabilities hold no state of their own.
 */
export type MCPContext = {
  library: SlideLibrarySession;
  decks: ProposalDeckBuilder;
  config: RuntimeConfig;
};

export type Capability<S extends z.ZodTypeAny = z.ZodTypeAny, R = unknown> = {
  name: string;
  description: string;
  inputSchema: S;
  handler: (ctx: MCPContext, input: z.output<S>) => Promise<R>;
};

export type CapabilityDescriptor = {
  name: string;
  description: string;
  inputSchema: JsonSchema7Type;
};
