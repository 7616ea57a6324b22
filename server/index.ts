/**
 * Server Entry Point
 *
 * Loads configuration, indexes the configured slide library (when one is
 * set) and serves the capability API.
 */

import express from "express";
import { loadRuntimeConfig } from "./config/runtime";
import { makeMCPContext } from "./mcp/context";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes } from "./routes";
import { createLogger } from "./utils/logger";

const log = createLogger("Server");

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const ctx = makeMCPContext(config);

  if (config.slideLibraryPath) {
    try {
      const summary = await ctx.library.index();
      log.info(`Indexed ${summary.totalSlides} slides from ${config.slideLibraryPath}`);
    } catch (error) {
      // The API still starts; index_slide_library can retry with a corrected path
      log.error("Startup indexing failed", error);
    }
  }

  const app = express();
  app.use(addSecurityHeaders);
  app.use(express.json({ limit: "5mb" }));

  const server = await registerRoutes(app, ctx);
  server.listen(config.port, () => {
    log.info(`Serving on port ${config.port}`);
  });
}

main().catch(error => {
  log.error("Server failed to start", error);
  process.exit(1);
});
