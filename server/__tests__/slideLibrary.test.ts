import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { SlideLibraryManager } from "../slideLibrary/libraryManager";
import type { SearchOptions } from "../slideLibrary/types";
import { NotFoundError, NotIndexedError, ParseError } from "../utils/errorHandler";
import { corruptZipEntry, writeBlankDeck } from "./pptxFixtures";

const COMPLIANCE_TEXT = "SOC 2 and ISO 27001 certification with annual audit and risk reviews";
const SUMMARY_TEXT = "Executive summary of our strategic partnership with the client";
const STAFFING_TEXT = "Staffing model: 120 FTE across two sites, onshore and offshore headcount by shift";
const TOOLING_TEXT = "Workforce scheduling and quality scorecard dashboard with IVR and CRM analytics";

const SLIDE_COUNTS: Record<string, number> = {
  "security-controls.pptx": 3,
  "summary.pptx": 0,
  "staffing.pptx": 2,
  "tooling.pptx": 1,
};

async function countSlides(filePath: string): Promise<number> {
  const name = path.basename(filePath);
  if (name === "closing.pptx") {
    throw new ParseError(filePath, "not a zip package");
  }
  return SLIDE_COUNTS[name] ?? 1;
}

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const full = path.join(root, relative);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content);
  }
}

describe("SlideLibraryManager", () => {
  let root: string;
  let library: SlideLibraryManager;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "slide-library-"));
    await writeFiles(root, {
      "Compliance/security-controls.pptx": "deck",
      "Compliance/security-controls.txt": COMPLIANCE_TEXT,
      "Compliance/security-controls.png": "png",
      "Compliance/security-controls.json": JSON.stringify({ owner: "risk-team" }),
      "Exec Decks/summary.pptx": "deck",
      "Exec Decks/summary.txt": SUMMARY_TEXT,
      "Exec Decks/closing.pptx": "deck",
      "Operations/staffing.pptx": "deck",
      "Operations/staffing.txt": STAFFING_TEXT,
      "Operations/staffing.jpg": "jpg",
      "Operations/tooling.pptx": "deck",
      "Operations/tooling.txt": TOOLING_TEXT,
      "Operations/tooling.json": "{not json",
      "Empty/notes.txt": "no decks here",
      "readme.md": "not a theme",
    });
    library = new SlideLibraryManager(root, { countSlides });
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("rejects reads before indexing", () => {
    const fresh = new SlideLibraryManager(root);
    expect(fresh.isIndexed).toBe(false);
    expect(() => fresh.search("audit")).toThrow(NotIndexedError);
    expect(() => fresh.listThemes()).toThrow(NotIndexedError);
  });

  it("rejects a missing library path", async () => {
    const missing = new SlideLibraryManager(path.join(root, "does-not-exist"));
    await expect(missing.index()).rejects.toThrow(NotFoundError);
  });

  it("indexes themes and classifies each deck file", async () => {
    const summary = await library.index();

    expect(summary).toEqual({
      totalSlides: 5,
      totalThemes: 3,
      themes: { Compliance: 1, "Exec Decks": 2, Operations: 2 },
      labelDistribution: {
        compliance_security: 1,
        unclassified: 1,
        executive_summary: 1,
        operational_details: 2,
      },
      sectionDistribution: {
        governance_compliance: 1,
        executive_summary: 2,
        delivery_model: 1,
        technology: 1,
      },
    });
  });

  it("assigns ids in theme then file name order", () => {
    const ids = ["slide_0001", "slide_0002", "slide_0003", "slide_0004", "slide_0005"];
    expect(ids.map(id => library.getSlide(id).fileName)).toEqual([
      "security-controls.pptx",
      "closing.pptx",
      "summary.pptx",
      "staffing.pptx",
      "tooling.pptx",
    ]);
  });

  it("records companion files and slide counts", () => {
    const compliance = library.getSlide("slide_0001");
    expect(compliance.primaryLabel).toBe("compliance_security");
    expect(compliance.backendSection).toBe("governance_compliance");
    expect(compliance.confidence).toBe(0.692);
    expect(compliance.ocrText).toBe(COMPLIANCE_TEXT);
    expect(compliance.hasThumbnail).toBe(true);
    expect(compliance.thumbnailPath).toBe(path.join(root, "Compliance", "security-controls.png"));
    expect(compliance.metadata).toEqual({ owner: "risk-team" });
    expect(compliance.slideCount).toBe(3);

    const staffing = library.getSlide("slide_0004");
    expect(staffing.thumbnailPath).toBe(path.join(root, "Operations", "staffing.jpg"));
    expect(staffing.backendSection).toBe("delivery_model");
    expect(staffing.confidence).toBe(0.25);
  });

  it("degrades unreadable companions instead of failing", () => {
    const closing = library.getSlide("slide_0002");
    expect(closing.ocrText).toBe("");
    expect(closing.primaryLabel).toBe("unclassified");
    expect(closing.slideCount).toBe(1);
    expect(closing.hasThumbnail).toBe(false);
    expect(closing.thumbnailPath).toBeNull();

    expect(library.getSlide("slide_0003").slideCount).toBe(1);
    expect(library.getSlide("slide_0005").metadata).toEqual({});
  });

  it("throws NotFound for unknown slide ids", () => {
    expect(() => library.getSlide("slide_0099")).toThrow("Slide slide_0099 not found");
  });

  describe("search", () => {
    it("ranks by score and applies the limit", () => {
      const results = library.search("and");
      expect(results.map(r => [r.slide.id, r.score])).toEqual([
        ["slide_0001", 0.846],
        ["slide_0004", 0.625],
        ["slide_0005", 0.6],
      ]);
      expect(library.search("and", { limit: 2 }).map(r => r.slide.id)).toEqual(["slide_0001", "slide_0004"]);
    });

    it("explains the match", () => {
      const [result] = library.search("Audit reviews");
      expect(result.slide.id).toBe("slide_0001");
      expect(result.matchReason).toBe("Matched: audit, reviews");
      expect(result.score).toBe(0.846);
    });

    it("boosts theme matches", () => {
      const results = library.search("compliance pricing");
      expect(results).toHaveLength(1);
      expect(results[0].score).toBe(0.55);
    });

    it("filters by theme case-insensitively", () => {
      expect(library.search("and", { themeFilter: "operations" }).map(r => r.slide.id)).toEqual([
        "slide_0004",
        "slide_0005",
      ]);
      expect(library.search("and", { themeFilter: "" })).toHaveLength(3);
    });

    it("filters by label and section", () => {
      expect(library.search("and", { labelFilter: "compliance_security" }).map(r => r.slide.id)).toEqual(["slide_0001"]);
      expect(library.search("and", { sectionFilter: "technology" }).map(r => r.slide.id)).toEqual(["slide_0005"]);
      expect(library.search("and", { themeFilter: "Compliance", sectionFilter: "technology" })).toEqual([]);
    });

    it("only narrows results as filters are added", () => {
      const ids = (options: SearchOptions) => library.search("and", { ...options, limit: 100 }).map(r => r.slide.id);
      const pairs: Array<[SearchOptions, SearchOptions]> = [
        [{ themeFilter: "Operations", sectionFilter: "technology" }, { themeFilter: "Operations" }],
        [{ themeFilter: "Operations", sectionFilter: "technology" }, { sectionFilter: "technology" }],
        [{ themeFilter: "Operations", labelFilter: "operational_details" }, {}],
        [{ labelFilter: "compliance_security", sectionFilter: "governance_compliance" }, { labelFilter: "compliance_security" }],
      ];
      for (const [narrow, wide] of pairs) {
        expect(ids(wide)).toEqual(expect.arrayContaining(ids(narrow)));
      }
      expect(ids({ themeFilter: "Operations", sectionFilter: "technology" })).toEqual(["slide_0005"]);
    });

    it("returns nothing for queries without usable tokens", () => {
      expect(library.search("a")).toEqual([]);
      expect(library.search("   ")).toEqual([]);
    });
  });

  describe("retrieval", () => {
    it("orders section and label matches by confidence", () => {
      expect(library.getSlidesForSection("executive_summary").map(s => s.id)).toEqual(["slide_0003", "slide_0002"]);
      expect(library.getSlidesForLabel("operational_details").map(s => s.id)).toEqual(["slide_0004", "slide_0005"]);
      expect(library.getSlidesForLabel("operational_details", 1).map(s => s.id)).toEqual(["slide_0004"]);
    });

    it("lists a theme's slides case-insensitively", () => {
      expect(library.getThemeSlides("exec decks").map(s => s.id)).toEqual(["slide_0002", "slide_0003"]);
      expect(library.getThemeSlides("Unknown")).toEqual([]);
    });

    it("lists themes largest first with keyword samples", () => {
      const themes = library.listThemes();
      expect(themes.map(t => [t.name, t.slideCount])).toEqual([
        ["Exec Decks", 2],
        ["Operations", 2],
        ["Compliance", 1],
      ]);
      const compliance = themes[2];
      expect(compliance.path).toBe(path.join(root, "Compliance"));
      expect(compliance.sampleKeywords).toEqual(["compliance", "certification", "SOC"]);
      expect(compliance.labelDistribution).toEqual({ compliance_security: 1 });
    });

    it("reports per-theme and global distributions", () => {
      const stats = library.getLibraryStats();
      expect(stats.libraryPath).toBe(root);
      expect(stats.totalSlides).toBe(5);
      expect(stats.themes.Operations).toEqual({
        slides: 2,
        labels: { operational_details: 2 },
        sections: { delivery_model: 1, technology: 1 },
      });
      expect(stats.globalSectionDistribution.executive_summary).toBe(2);
    });

    it("selects slides per requested section and omits empty sections", () => {
      const selection = library.selectSlidesForProposal(["technology", "proof_points"]);
      expect(Object.keys(selection)).toEqual(["technology"]);
      expect(selection.technology?.map(s => s.id)).toEqual(["slide_0005"]);
    });

    it("selects across all sections when none are named", () => {
      const selection = library.selectSlidesForProposal([], 1);
      expect(Object.keys(selection)).toEqual([
        "executive_summary",
        "delivery_model",
        "technology",
        "governance_compliance",
      ]);
      expect(selection.executive_summary?.map(s => s.id)).toEqual(["slide_0003"]);
    });
  });

  it("keeps the previous index when re-indexing fails", async () => {
    const temp = await fs.mkdtemp(path.join(os.tmpdir(), "slide-library-gone-"));
    await writeFiles(temp, { "Case Studies/win.pptx": "deck" });
    const manager = new SlideLibraryManager(temp, { countSlides });
    await manager.index();

    await fs.rm(temp, { recursive: true, force: true });
    await expect(manager.index()).rejects.toThrow(NotFoundError);
    expect(manager.getThemeSlides("Case Studies")).toHaveLength(1);
  });
});

describe("SlideLibraryManager with deck files", () => {
  const roots: string[] = [];

  afterAll(async () => {
    for (const root of roots) {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  async function libraryRoot(themes: string[]): Promise<string> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "slide-library-decks-"));
    roots.push(root);
    for (const theme of themes) {
      await fs.mkdir(path.join(root, theme));
    }
    return root;
  }

  it("classifies and searches a two-theme library", async () => {
    const root = await libraryRoot(["Exec Decks", "Compliance"]);
    await writeBlankDeck(path.join(root, "Exec Decks", "why-us.pptx"), 2);
    await fs.writeFile(path.join(root, "Exec Decks", "why-us.txt"), "Executive Summary: Why Foundever overview");
    await writeBlankDeck(path.join(root, "Compliance", "controls.pptx"));
    await fs.writeFile(path.join(root, "Compliance", "controls.txt"), "SOC 2 certification and PCI audit");

    const library = new SlideLibraryManager(root);
    const summary = await library.index();
    expect(summary.totalSlides).toBe(2);

    const [exec] = library.getThemeSlides("Exec Decks");
    expect(exec.primaryLabel).toBe("executive_summary");
    expect(exec.backendSection).toBe("executive_summary");
    expect(exec.confidence).toBe(0.429);
    expect(exec.slideCount).toBe(2);

    const [compliance] = library.getThemeSlides("Compliance");
    expect(compliance.primaryLabel).toBe("compliance_security");
    expect(compliance.backendSection).toBe("governance_compliance");
    expect(compliance.confidence).toBe(0.577);
    expect(compliance.slideCount).toBe(1);

    const audit = library.search("audit");
    expect(audit.map(r => r.slide.id)).toEqual([compliance.id]);
    expect(audit[0].score).toBeGreaterThan(0);
    expect(library.search("foundever").map(r => r.slide.id)).toEqual([exec.id]);
  });

  it("gives identical results when indexed twice", async () => {
    const root = await libraryRoot(["Exec Decks", "Compliance"]);
    await writeBlankDeck(path.join(root, "Exec Decks", "why-us.pptx"));
    await fs.writeFile(path.join(root, "Exec Decks", "why-us.txt"), "Executive Summary: Why Foundever overview");
    await writeBlankDeck(path.join(root, "Compliance", "controls.pptx"));
    await fs.writeFile(path.join(root, "Compliance", "controls.txt"), "SOC 2 certification and PCI audit");

    const library = new SlideLibraryManager(root);
    const classifications = () => ["slide_0001", "slide_0002"].map(id => {
      const slide = library.getSlide(id);
      return [slide.fileName, slide.primaryLabel, slide.confidence, slide.backendSection];
    });

    await library.index();
    const first = classifications();
    await library.index();
    expect(classifications()).toEqual(first);
    expect(first).toEqual([
      ["controls.pptx", "compliance_security", 0.577, "governance_compliance"],
      ["why-us.pptx", "executive_summary", 0.429, "executive_summary"],
    ]);
  });

  it("counts a corrupt deck as one slide and keeps indexing", async () => {
    const root = await libraryRoot(["Archive"]);
    const data = await writeBlankDeck(path.join(root, "Archive", "current.pptx"), 3);
    await fs.writeFile(path.join(root, "Archive", "legacy.pptx"), corruptZipEntry(data, "ppt/presentation.xml"));

    const library = new SlideLibraryManager(root);
    const summary = await library.index();

    expect(summary.totalSlides).toBe(2);
    expect(library.getThemeSlides("Archive").map(s => [s.fileName, s.slideCount])).toEqual([
      ["current.pptx", 3],
      ["legacy.pptx", 1],
    ]);
  });

  it("skips dangling deck links and ignores unreadable companions", async () => {
    const root = await libraryRoot(["Team"]);
    await writeBlankDeck(path.join(root, "Team", "leads.pptx"), 2);
    await fs.mkdir(path.join(root, "Team", "leads.txt"));
    await fs.mkdir(path.join(root, "Team", "leads.json"));
    await fs.symlink(path.join(root, "missing.pptx"), path.join(root, "Team", "ghost.pptx"));

    const library = new SlideLibraryManager(root);
    const summary = await library.index();

    expect(summary.totalSlides).toBe(1);
    const leads = library.getSlide("slide_0001");
    expect(leads.fileName).toBe("leads.pptx");
    expect(leads.ocrText).toBe("");
    expect(leads.metadata).toEqual({});
    expect(leads.slideCount).toBe(2);
  });
});
