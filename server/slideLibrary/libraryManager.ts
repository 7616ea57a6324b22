/**
 * Slide Library Manager
 *
 * Purpose:
 * Scans a theme-organized directory of deck files, classifies each file,
 * and serves keyword search and section-based retrieval over the result.
 *
 * Layout:
 *   <root>/<Theme>/<stem>.pptx   required
 *   <root>/<Theme>/<stem>.txt    OCR text
 *   <root>/<Theme>/<stem>.png|.jpg|.jpeg  thumbnail, first found wins
 *   <root>/<Theme>/<stem>.json   metadata object
 *
 * index() builds the new slide list and theme map completely before
 * swapping them in, so a failed run leaves the previous index intact.
 * Callers must not run index() concurrently with reads.
 *
 * Layer: Slide Library (index)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { BACKEND_SECTIONS, type BackendSection, type PrimaryLabel } from "@shared/schema";
import { LIBRARY_FILES, SEARCH_CONSTANTS } from "../config/constants";
import { NotFoundError, NotIndexedError, getErrorMessage, isFileSystemError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { countSlides, isDeckReadError } from "../pptx/presentation";
import { classifyText, resolveSection, scoreSlide, tokenizeQuery } from "./classifier";
import { defaultTaxonomy, type Taxonomy } from "./taxonomy";
import type {
  Distribution,
  IndexSummary,
  LibraryStats,
  ProposalSelection,
  SearchOptions,
  SlideEntry,
  SlideSearchResult,
  ThemeInfo,
} from "./types";

const log = createLogger("SlideLibrary");

type LibraryIndex = {
  slides: SlideEntry[];
  themes: Map<string, ThemeInfo>;
};

export type SlideCounter = (filePath: string) => Promise<number>;

export type SlideLibraryOptions = {
  taxonomy?: Taxonomy;
  /** Replaceable for tests; defaults to reading the deck's slide list. */
  countSlides?: SlideCounter;
};

function distribution<K extends string>(values: K[]): Distribution<K> {
  const dist: Distribution<K> = {};
  for (const value of values) {
    dist[value] = (dist[value] ?? 0) + 1;
  }
  return dist;
}

function formatSlideId(n: number): string {
  return `${LIBRARY_FILES.SLIDE_ID_PREFIX}${String(n).padStart(LIBRARY_FILES.SLIDE_ID_DIGITS, "0")}`;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isFileSystemError(error) && error.code === "ENOENT") return false;
    throw error;
  }
}

async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch (error) {
    if (isFileSystemError(error) && error.code === "ENOENT") return false;
    throw error;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SlideLibraryManager {
  readonly libraryPath: string;
  private readonly taxonomy: Taxonomy;
  private readonly countSlides: SlideCounter;
  private current: LibraryIndex | null = null;

  constructor(libraryPath: string, options: SlideLibraryOptions = {}) {
    this.libraryPath = path.resolve(libraryPath);
    this.taxonomy = options.taxonomy ?? defaultTaxonomy;
    this.countSlides = options.countSlides ?? countSlides;
  }

  get isIndexed(): boolean {
    return this.current !== null;
  }

  private requireIndex(): LibraryIndex {
    if (!this.current) {
      throw new NotIndexedError(`Slide library ${this.libraryPath} has not been indexed yet; call index() first`);
    }
    return this.current;
  }

  // ---------------------------------------------------------------------------
  // Indexing
  // ---------------------------------------------------------------------------

  async index(): Promise<IndexSummary> {
    if (!(await isDirectory(this.libraryPath))) {
      throw new NotFoundError(`Library path ${this.libraryPath}`);
    }

    const slides: SlideEntry[] = [];
    const themes = new Map<string, ThemeInfo>();

    const entries = (await fs.readdir(this.libraryPath)).sort();
    for (const themeName of entries) {
      const themeDir = path.join(this.libraryPath, themeName);
      if (!(await isDirectory(themeDir))) continue;

      const themeSlides: SlideEntry[] = [];
      for (const fileName of await this.deckFiles(themeDir)) {
        const entry = await this.buildEntry(formatSlideId(slides.length + 1), themeName, themeDir, fileName);
        themeSlides.push(entry);
        slides.push(entry);
      }

      if (themeSlides.length > 0) {
        themes.set(themeName, this.buildThemeInfo(themeName, themeDir, themeSlides));
      }
    }

    this.current = { slides, themes };
    const summary = this.summarize(this.current);
    log.info(`Indexed slide library: ${summary.totalSlides} slides across ${summary.totalThemes} themes`, {
      libraryPath: this.libraryPath,
    });
    return summary;
  }

  private async deckFiles(themeDir: string): Promise<string[]> {
    const names = (await fs.readdir(themeDir)).sort();
    const files: string[] = [];
    for (const name of names) {
      if (path.extname(name) !== LIBRARY_FILES.DECK_EXTENSION) continue;
      const filePath = path.join(themeDir, name);
      try {
        if ((await fs.stat(filePath)).isFile()) files.push(name);
      } catch (error) {
        if (!isFileSystemError(error)) throw error;
        log.warn(`Skipping unreadable deck file ${filePath}`, { error: error.message });
      }
    }
    return files;
  }

  private async buildEntry(id: string, theme: string, themeDir: string, fileName: string): Promise<SlideEntry> {
    const pptxPath = path.join(themeDir, fileName);
    const stem = path.join(themeDir, path.basename(fileName, LIBRARY_FILES.DECK_EXTENSION));

    const ocrText = await this.readText(`${stem}${LIBRARY_FILES.TEXT_EXTENSION}`);
    const thumbnailPath = await this.findThumbnail(stem);
    const classification = classifyText(ocrText, theme, this.taxonomy);

    return {
      id,
      theme,
      fileName,
      pptxPath,
      ocrText,
      primaryLabel: classification.label,
      backendSection: resolveSection(classification.label, ocrText, this.taxonomy),
      confidence: classification.confidence,
      keywordsMatched: classification.matchedKeywords,
      slideCount: await this.safeSlideCount(pptxPath),
      hasThumbnail: thumbnailPath !== null,
      thumbnailPath,
      metadata: await this.readMetadata(`${stem}${LIBRARY_FILES.METADATA_EXTENSION}`),
    };
  }

  /**
   * Companion file text; "" when the file is absent or cannot be read.
   */
  private async readText(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (!isFileSystemError(error)) throw error;
      if (error.code !== "ENOENT") {
        log.warn(`Ignoring unreadable file ${filePath}`, { error: error.message });
      }
      return "";
    }
  }

  private async findThumbnail(stem: string): Promise<string | null> {
    for (const ext of LIBRARY_FILES.THUMBNAIL_EXTENSIONS) {
      const candidate = `${stem}${ext}`;
      if (await pathExists(candidate)) return candidate;
    }
    return null;
  }

  private async safeSlideCount(pptxPath: string): Promise<number> {
    try {
      return Math.max(1, await this.countSlides(pptxPath));
    } catch (error) {
      if (!isDeckReadError(error)) throw error;
      log.warn(`Could not count slides in ${pptxPath}; assuming 1`, { error: getErrorMessage(error) });
      return 1;
    }
  }

  private async readMetadata(filePath: string): Promise<Record<string, unknown>> {
    const raw = await this.readText(filePath);
    if (!raw) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      log.warn(`Ignoring malformed metadata ${filePath}`, { error: error.message });
      return {};
    }

    if (!isPlainObject(parsed)) {
      log.warn(`Ignoring metadata ${filePath}: expected a JSON object`);
      return {};
    }
    return parsed;
  }

  private buildThemeInfo(name: string, themeDir: string, slides: SlideEntry[]): ThemeInfo {
    const sample: string[] = [];
    for (const slide of slides) {
      for (const keyword of slide.keywordsMatched.slice(0, LIBRARY_FILES.KEYWORDS_PER_SLIDE_SAMPLE)) {
        if (!sample.includes(keyword)) sample.push(keyword);
      }
    }

    return {
      name,
      path: themeDir,
      slideCount: slides.length,
      labelDistribution: distribution(slides.map(s => s.primaryLabel)),
      sectionDistribution: distribution(slides.map(s => s.backendSection)),
      sampleKeywords: sample.slice(0, LIBRARY_FILES.THEME_SAMPLE_KEYWORDS),
    };
  }

  private summarize(index: LibraryIndex): IndexSummary {
    const themes: Record<string, number> = {};
    for (const [name, info] of index.themes) themes[name] = info.slideCount;

    return {
      totalSlides: index.slides.length,
      totalThemes: index.themes.size,
      themes,
      labelDistribution: distribution(index.slides.map(s => s.primaryLabel)),
      sectionDistribution: distribution(index.slides.map(s => s.backendSection)),
    };
  }

  // ---------------------------------------------------------------------------
  // Search and retrieval
  // ---------------------------------------------------------------------------

  search(query: string, options: SearchOptions = {}): SlideSearchResult[] {
    const { slides } = this.requireIndex();
    const limit = options.limit ?? SEARCH_CONSTANTS.DEFAULT_LIMIT;
    const tokens = tokenizeQuery(query);
    const themeFilter = options.themeFilter ? options.themeFilter.toLowerCase() : undefined;

    const results: SlideSearchResult[] = [];
    for (const slide of slides) {
      if (themeFilter !== undefined && slide.theme.toLowerCase() !== themeFilter) continue;
      if (options.labelFilter && slide.primaryLabel !== options.labelFilter) continue;
      if (options.sectionFilter && slide.backendSection !== options.sectionFilter) continue;

      const scored = scoreSlide(slide, tokens);
      if (!scored) continue;

      results.push({
        slide,
        score: scored.score,
        matchReason: `Matched: ${scored.matchedTokens.join(", ")}`,
      });
    }

    // Stable: equal scores keep index order.
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, limit);
  }

  private byConfidence(predicate: (slide: SlideEntry) => boolean, limit: number): SlideEntry[] {
    return this.requireIndex().slides
      .filter(predicate)
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, limit);
  }

  getSlidesForSection(section: BackendSection, limit: number = SEARCH_CONSTANTS.DEFAULT_RETRIEVAL_LIMIT): SlideEntry[] {
    return this.byConfidence(slide => slide.backendSection === section, limit);
  }

  getSlidesForLabel(label: PrimaryLabel, limit: number = SEARCH_CONSTANTS.DEFAULT_RETRIEVAL_LIMIT): SlideEntry[] {
    return this.byConfidence(slide => slide.primaryLabel === label, limit);
  }

  getSlide(id: string): SlideEntry {
    const slide = this.requireIndex().slides.find(s => s.id === id);
    if (!slide) {
      throw new NotFoundError(`Slide ${id}`);
    }
    return slide;
  }

  getThemeSlides(theme: string): SlideEntry[] {
    const wanted = theme.toLowerCase();
    return this.requireIndex().slides.filter(s => s.theme.toLowerCase() === wanted);
  }

  listThemes(): ThemeInfo[] {
    return [...this.requireIndex().themes.values()].sort((a, b) => b.slideCount - a.slideCount);
  }

  getLibraryStats(): LibraryStats {
    const index = this.requireIndex();
    const themes: LibraryStats["themes"] = {};
    for (const [name, info] of index.themes) {
      themes[name] = {
        slides: info.slideCount,
        labels: info.labelDistribution,
        sections: info.sectionDistribution,
      };
    }

    return {
      libraryPath: this.libraryPath,
      totalSlides: index.slides.length,
      totalThemes: index.themes.size,
      themes,
      globalLabelDistribution: distribution(index.slides.map(s => s.primaryLabel)),
      globalSectionDistribution: distribution(index.slides.map(s => s.backendSection)),
    };
  }

  /**
   * Best slides per section by confidence. Sections without candidates are
   * left out of the result rather than mapped to an empty list.
   */
  selectSlidesForProposal(
    sections: readonly BackendSection[] = BACKEND_SECTIONS,
    maxPerSection: number = SEARCH_CONSTANTS.DEFAULT_MAX_PER_SECTION,
  ): ProposalSelection {
    this.requireIndex();
    const targets = sections.length > 0 ? sections : BACKEND_SECTIONS;
    const selection: ProposalSelection = {};
    for (const section of targets) {
      const candidates = this.getSlidesForSection(section, maxPerSection);
      if (candidates.length > 0) selection[section] = candidates;
    }
    return selection;
  }
}
