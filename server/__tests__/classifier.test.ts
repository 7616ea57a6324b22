import { describe, it, expect } from "vitest";
import { classifyText, resolveSection, scoreSlide, tokenizeQuery } from "../slideLibrary/classifier";
import { defaultTaxonomy, parseTaxonomy } from "../slideLibrary/taxonomy";
import type { SlideEntry } from "../slideLibrary/types";

function entry(overrides: Partial<SlideEntry>): SlideEntry {
  return {
    id: "slide_0001",
    theme: "Misc",
    fileName: "deck.pptx",
    pptxPath: "/library/Misc/deck.pptx",
    ocrText: "",
    primaryLabel: "unclassified",
    backendSection: "executive_summary",
    confidence: 0,
    keywordsMatched: [],
    slideCount: 1,
    hasThumbnail: false,
    thumbnailPath: null,
    metadata: {},
    ...overrides,
  };
}

describe("classifyText", () => {
  it("scores by keyword density", () => {
    const result = classifyText("Executive summary of our strategic partnership with the client", "Exec Decks");
    expect(result).toEqual({
      label: "executive_summary",
      confidence: 0.429,
      matchedKeywords: ["executive summary", "strategic", "partnership"],
    });
  });

  it("boosts labels whose keywords appear in the theme name", () => {
    const result = classifyText("SOC 2 and ISO 27001 certification with annual audit and risk reviews", "Compliance");
    expect(result.label).toBe("compliance_security");
    // 6 of 13 keywords, x1.5 for the theme
    expect(result.confidence).toBe(0.692);
    expect(result.matchedKeywords).toEqual(["compliance", "certification", "SOC", "audit", "risk", "ISO"]);
  });

  it("falls back to the theme name when the text is blank", () => {
    const result = classifyText("   \n", "Pricing");
    expect(result).toEqual({ label: "pricing", confidence: 0.214, matchedKeywords: ["pricing"] });
  });

  it("returns unclassified when nothing matches", () => {
    expect(classifyText("Thank you", "Misc")).toEqual({
      label: "unclassified",
      confidence: 0,
      matchedKeywords: [],
    });
  });

  it("caps confidence at 1", () => {
    const taxonomy = parseTaxonomy({
      labelKeywords: [{ label: "pricing", keywords: ["fee"] }],
      sectionRefinement: [],
    });
    expect(classifyText("fee", "Fee Schedules", taxonomy).confidence).toBe(1);
  });

  it("rounds exact halves to even", () => {
    const taxonomy = parseTaxonomy({
      labelKeywords: [
        { label: "pricing", keywords: ["fee", "cost", "rate", "budget", "invoice", "discount", "tariff", "quote"] },
      ],
      sectionRefinement: [],
    });
    // 3/8 x 1.5 = 0.5625
    expect(classifyText("fee cost rate", "Fee Schedule", taxonomy).confidence).toBe(0.562);
    // 1/8 x 1.5 = 0.1875
    expect(classifyText("fee", "Fee", taxonomy).confidence).toBe(0.188);
  });

  it("breaks ties by label order regardless of file order", () => {
    const taxonomy = parseTaxonomy({
      labelKeywords: [
        { label: "case_study", keywords: ["alpha"] },
        { label: "executive_summary", keywords: ["beta"] },
      ],
      sectionRefinement: [],
    });
    expect(classifyText("alpha beta", "X", taxonomy).label).toBe("executive_summary");
  });
});

describe("resolveSection", () => {
  it("maps fixed labels directly", () => {
    expect(resolveSection("case_study", "")).toBe("proof_points");
    expect(resolveSection("compliance_security", "")).toBe("governance_compliance");
    expect(resolveSection("project_plan", "")).toBe("implementation");
    expect(resolveSection("pricing", "")).toBe("executive_summary");
    expect(resolveSection("unclassified", "")).toBe("executive_summary");
  });

  it("refines operational details by the first table entry with two hits", () => {
    const text = "Workforce scheduling and quality scorecard dashboard with IVR and CRM analytics";
    expect(classifyText(text, "Operations").label).toBe("operational_details");
    expect(resolveSection("operational_details", text)).toBe("technology");
  });

  it("prefers team leadership over later entries", () => {
    expect(resolveSection("operational_details", "Org chart with account manager and FTE staffing")).toBe("team_leadership");
  });

  it("needs two hits to refine", () => {
    expect(resolveSection("operational_details", "Escalation path only")).toBe("delivery_model");
  });
});

describe("tokenizeQuery", () => {
  it("lowercases, drops one-letter tokens and keeps repeats", () => {
    expect(tokenizeQuery("  Audit a AUDIT   Risk ")).toEqual(["audit", "audit", "risk"]);
  });

  it("returns nothing for blank queries", () => {
    expect(tokenizeQuery("")).toEqual([]);
  });
});

describe("scoreSlide", () => {
  const compliance = entry({
    theme: "Compliance",
    fileName: "security-controls.pptx",
    ocrText: "SOC 2 and ISO 27001 certification with annual audit and risk reviews",
    confidence: 0.692,
  });

  it("scales the match ratio by confidence", () => {
    expect(scoreSlide(compliance, ["audit"])).toEqual({ score: 0.846, matchedTokens: ["audit"] });
  });

  it("boosts when a token matches the theme", () => {
    // 1/2 x 1.3 x 0.846
    expect(scoreSlide(compliance, ["compliance", "pricing"])).toEqual({
      score: 0.55,
      matchedTokens: ["compliance"],
    });
  });

  it("matches file names", () => {
    expect(scoreSlide(compliance, ["controls"])?.matchedTokens).toEqual(["controls"]);
  });

  it("returns null without a match", () => {
    expect(scoreSlide(compliance, ["pricing"])).toBeNull();
    expect(scoreSlide(compliance, [])).toBeNull();
  });

  it("counts repeated query tokens in the denominator only", () => {
    const report = entry({ ocrText: "annual audit report", confidence: 1 });
    expect(scoreSlide(report, tokenizeQuery("audit audit zzzz"))).toEqual({
      score: 0.333,
      matchedTokens: ["audit"],
    });
  });

  it("gives unclassified slides half weight", () => {
    expect(scoreSlide(entry({ ocrText: "Thank you" }), ["thank"])?.score).toBe(0.5);
  });
});

describe("parseTaxonomy", () => {
  it("loads the bundled taxonomy in label order", () => {
    expect(defaultTaxonomy.labelKeywords.map(l => l.label)).toEqual([
      "executive_summary",
      "solution_overview",
      "operational_details",
      "case_study",
      "compliance_security",
      "project_plan",
      "pricing",
    ]);
    expect(defaultTaxonomy.sectionRefinement.map(s => s.section)).toEqual([
      "team_leadership",
      "technology",
      "delivery_model",
      "solution_overview",
    ]);
  });

  it("rejects duplicate labels", () => {
    expect(() => parseTaxonomy({
      labelKeywords: [
        { label: "pricing", keywords: ["fee"] },
        { label: "pricing", keywords: ["cost"] },
      ],
      sectionRefinement: [],
    })).toThrow("label pricing is listed twice");
  });

  it("rejects keywords for unclassified", () => {
    expect(() => parseTaxonomy({
      labelKeywords: [{ label: "unclassified", keywords: ["misc"] }],
      sectionRefinement: [],
    })).toThrow("unclassified is the no-match fallback");
  });

  it("rejects unknown sections", () => {
    expect(() => parseTaxonomy({
      labelKeywords: [{ label: "pricing", keywords: ["fee"] }],
      sectionRefinement: [{ section: "appendix", keywords: ["misc"] }],
    })).toThrow("Invalid slide taxonomy");
  });
});
