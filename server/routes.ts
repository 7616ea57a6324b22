import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { createMCP } from "./mcp";
import type { MCPContext } from "./mcp/types";
import { commonSchemas, validate } from "./middleware/validation";
import { handleRouteError } from "./utils/errorHandler";
import { RequestLogger } from "./utils/logger";

const PPTX_MIME = "application/vnd.openxmlformats-officedocument.presentationml.presentation";

export async function registerRoutes(app: Express, ctx: MCPContext): Promise<Server> {
  const mcp = createMCP(ctx);

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      libraryPath: ctx.library.libraryPath,
      deckActive: ctx.decks.isActive,
    });
  });

  app.get("/api/capabilities", (_req, res) => {
    res.json(mcp.list());
  });

  app.post(
    "/api/capabilities/:name",
    validate({ params: commonSchemas.capabilityName, body: commonSchemas.capabilityInput }),
    async (req, res) => {
      const name = req.params.name;
      const logger = new RequestLogger(`POST /api/capabilities/${name}`);
      try {
        const result = await mcp.run(name, req.body);
        logger.info(`Capability ${name} completed`);
        res.json({ capability: name, result });
      } catch (error) {
        logger.error(`Capability ${name} failed`, error);
        handleRouteError(res, error, "Capabilities", { correlationId: logger.getCorrelationId() });
      }
    },
  );

  // Download the deck being built without writing it to disk
  app.get("/api/decks/active", async (_req, res) => {
    try {
      const data = await ctx.decks.saveToBytes();
      res.setHeader("Content-Type", PPTX_MIME);
      res.setHeader("Content-Disposition", 'attachment; filename="proposal.pptx"');
      res.send(data);
    } catch (error) {
      handleRouteError(res, error, "Decks");
    }
  });

  // Errors passed on by middleware (validation, body parsing)
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, error, "HTTP");
  });

  return createServer(app);
}
