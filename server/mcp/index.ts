/**
 * MCP Runtime
 * 
 * Purpose:
 * Creates an MCP instance that can run the slide library and deck building
 * capabilities by name.
 * 
 * Usage:
 * - createMCP(ctx).run("search_slide_library", { query: "transition plan" })
 * - createMCP(ctx).list() to get available capabilities
 * 
 * Layer: MCP (orchestration)
 */

import { zodToJsonSchema } from "zod-to-json-schema";
import { NotFoundError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import type { CapabilityDescriptor, MCPContext } from "./types";
import { capabilities } from "./capabilities";

const log = createLogger("MCP");

export function createMCP(ctx: MCPContext) {
  return {
    async run(name: string, input: unknown): Promise<unknown> {
      const capability = capabilities.find(c => c.name === name);

      if (!capability) {
        throw new NotFoundError(`Capability ${name}`);
      }

      const parsedInput = capability.inputSchema.parse(input ?? {});
      const started = Date.now();
      const result = await capability.handler(ctx, parsedInput);
      log.debug(`Ran ${name}`, { duration: Date.now() - started });
      return result;
    },

    list(): CapabilityDescriptor[] {
      return capabilities.map(c => ({
        name: c.name,
        description: c.description,
        inputSchema: zodToJsonSchema(c.inputSchema),
      }));
    },
  };
}

export type MCP = ReturnType<typeof createMCP>;
export { makeMCPContext, SlideLibrarySession } from "./context";
export type { MCPContext, Capability, CapabilityDescriptor } from "./types";
