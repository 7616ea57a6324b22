import { describe, it, expect, beforeAll, afterAll } from "vitest";
import express from "express";
import type { Server } from "http";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { makeMCPContext } from "../mcp/context";
import { addSecurityHeaders } from "../middleware/security";
import { registerRoutes } from "../routes";

describe("HTTP routes", () => {
  let server: Server;
  let baseUrl: string;
  let workDir: string;

  beforeAll(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "routes-"));
    const app = express();
    app.use(addSecurityHeaders);
    app.use(express.json());
    server = await registerRoutes(app, makeMCPContext({
      port: 0,
      deckOutputDir: workDir,
      logLevel: "error",
    }));
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    await fs.rm(workDir, { recursive: true, force: true });
  });

  function post(name: string, body: unknown) {
    return fetch(`${baseUrl}/api/capabilities/${name}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("reports health with security headers", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(res.headers.get("x-content-type-options")).toBe("nosniff");
    expect(await res.json()).toEqual({ status: "ok", libraryPath: null, deckActive: false });
  });

  it("lists capabilities", async () => {
    const res = await fetch(`${baseUrl}/api/capabilities`);
    const body: unknown = await res.json();
    expect(Array.isArray(body) ? body.length : 0).toBe(12);
    expect(body).toEqual(expect.arrayContaining([
      expect.objectContaining({ name: "index_slide_library" }),
      expect.objectContaining({ name: "save_proposal_deck" }),
    ]));
  });

  it("maps application errors to status codes", async () => {
    const notIndexed = await post("search_slide_library", { query: "audit" });
    expect(notIndexed.status).toBe(409);
    expect(await notIndexed.json()).toMatchObject({
      error: "Slide library has not been indexed yet; call index() first",
    });

    const unknown = await post("summon_slides", {});
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toMatchObject({ error: "Capability summon_slides not found" });

    const invalid = await post("search_slide_library", { limit: 5 });
    expect(invalid.status).toBe(400);
  });

  it("rejects malformed capability names", async () => {
    const res = await post("Not-A-Name", {});
    expect(res.status).toBe(400);
  });

  it("has no deck to download before one is created", async () => {
    const res = await fetch(`${baseUrl}/api/decks/active`);
    expect(res.status).toBe(409);
  });

  it("runs capabilities and downloads the active deck", async () => {
    const created = await post("create_proposal_deck", { title: "Proposal" });
    expect(created.status).toBe(200);
    expect(await created.json()).toMatchObject({
      capability: "create_proposal_deck",
      result: { source: "blank", summary: { slideCount: 1 } },
    });

    const res = await fetch(`${baseUrl}/api/decks/active`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(
      "application/vnd.openxmlformats-officedocument.presentationml.presentation",
    );
    const bytes = new Uint8Array(await res.arrayBuffer());
    // zip local file header
    expect(Array.from(bytes.slice(0, 4))).toEqual([0x50, 0x4b, 0x03, 0x04]);
  });
});
