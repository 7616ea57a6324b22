/**
 * Proposal Deck Builder
 *
 * Purpose:
 * Assembles a proposal deck from a template (or the built-in blank deck):
 * title and divider slides, section content slides with rich text, tables
 * and speaker notes, and slides cloned from the slide library. Tracks which
 * backend sections have been covered for the build summary.
 *
 * States: no deck → active deck. save() and saveToBytes() do not end the
 * active state; a deck may be saved any number of times.
 *
 * One builder owns one deck. Builders are not safe for concurrent use.
 *
 * Layer: Deck Builder
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  BACKEND_SECTIONS,
  SECTION_DISPLAY_NAMES,
  slideContentSchema,
  type BackendSection,
  type SlideContentInput,
} from "@shared/schema";
import { DECK_CONSTANTS, LAYOUT_NAME_HINTS } from "../config/constants";
import { NotActiveError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { getNotesText, setNotesText } from "../pptx/notes";
import { PresentationDocument, type SlideRef, type TemplateAnalysis } from "../pptx/presentation";
import { addTable, findPlaceholder, findPlaceholderByTypes, shapesOf } from "../pptx/shapes";
import { applySlideClone, prepareSlideClone } from "../pptx/slideCloner";
import { setShapeRichText, setShapeText, shapeText } from "../pptx/text";
import type {
  BuildSummary,
  ClonedSlide,
  FullProposalOptions,
  SectionsContent,
  SlideDescription,
} from "./types";

const log = createLogger("DeckBuilder");

const TITLE_PLACEHOLDER_IDX = 0;
const BODY_PLACEHOLDER_IDX = 1;
const TITLE_TYPES = ["title", "ctrTitle"] as const;

/**
 * Layouts and placeholders of a template, without keeping it open.
 */
export async function analyzeTemplate(filePath: string): Promise<TemplateAnalysis> {
  const deck = await PresentationDocument.open(filePath);
  return deck.analyze();
}

export class ProposalDeckBuilder {
  private deck: PresentationDocument | null = null;
  private sectionsAdded: BackendSection[] = [];
  private templateAnalysis: TemplateAnalysis | null = null;

  get isActive(): boolean {
    return this.deck !== null;
  }

  get analysis(): TemplateAnalysis | null {
    return this.templateAnalysis;
  }

  private requireDeck(): PresentationDocument {
    if (!this.deck) {
      throw new NotActiveError();
    }
    return this.deck;
  }

  private activate(deck: PresentationDocument, analysis: TemplateAnalysis | null): void {
    this.deck = deck;
    this.templateAnalysis = analysis;
    this.sectionsAdded = [];
  }

  // ---------------------------------------------------------------------------
  // Opening decks
  // ---------------------------------------------------------------------------

  async createBlank(): Promise<void> {
    this.activate(await PresentationDocument.createBlank(), null);
    log.info("Created blank deck");
  }

  /**
   * Opens a .pptx or .potx as the working deck and returns its layouts.
   * The previous deck stays active if the template cannot be opened.
   */
  async createFromTemplate(templatePath: string): Promise<TemplateAnalysis> {
    const deck = await PresentationDocument.open(templatePath);
    const analysis = deck.analyze();
    this.activate(deck, analysis);
    log.info(`Opened template ${templatePath}`, { layouts: analysis.layoutCount });
    return analysis;
  }

  /**
   * Opens an existing deck for further editing; returns its slide count.
   */
  async openExisting(filePath: string): Promise<number> {
    const deck = await PresentationDocument.open(filePath);
    this.activate(deck, null);
    return deck.slideCount;
  }

  findLayoutByName(pattern: string): number | null {
    return this.requireDeck().findLayoutByName(pattern);
  }

  // ---------------------------------------------------------------------------
  // Adding slides
  // ---------------------------------------------------------------------------

  /**
   * Adds a slide on the given layout with the title in placeholder 0 and the
   * subtitle in placeholder 1. Missing placeholders are left alone.
   */
  addTitleSlide(title: string, subtitle?: string, layoutIndex = 0): number {
    const deck = this.requireDeck();
    const slide = deck.addSlide(layoutIndex);
    const spTree = deck.slideSpTree(slide);

    const titleShape = findPlaceholder(spTree, TITLE_PLACEHOLDER_IDX);
    if (titleShape) setShapeText(titleShape, title);

    if (subtitle) {
      const subtitleShape = findPlaceholder(spTree, BODY_PLACEHOLDER_IDX);
      if (subtitleShape) setShapeText(subtitleShape, subtitle);
    }
    return slide.index;
  }

  /**
   * Divider titled with the section's display name, numbered when given.
   */
  addSectionDivider(sectionType: BackendSection, sectionNumber?: number): number {
    const displayName = SECTION_DISPLAY_NAMES[sectionType];
    const title = sectionNumber !== undefined ? `Section ${sectionNumber}: ${displayName}` : displayName;
    const layoutIndex = this.findLayoutByName(LAYOUT_NAME_HINTS.SECTION) ?? 0;
    return this.addTitleSlide(title, undefined, layoutIndex);
  }

  private contentLayoutIndex(deck: PresentationDocument): number {
    const byName = deck.findLayoutByName(LAYOUT_NAME_HINTS.CONTENT);
    if (byName !== null) return byName;
    return deck.layoutCount > 1 ? 1 : 0;
  }

  async addSectionSlide(input: SlideContentInput): Promise<number> {
    const content = slideContentSchema.parse(input);
    const deck = this.requireDeck();
    const slide = deck.addSlide(this.contentLayoutIndex(deck));
    const spTree = deck.slideSpTree(slide);

    const titleShape = findPlaceholder(spTree, TITLE_PLACEHOLDER_IDX);
    if (titleShape) setShapeText(titleShape, content.title);

    if (content.bodySegments.length > 0) {
      const bodyShape = findPlaceholder(spTree, BODY_PLACEHOLDER_IDX);
      if (bodyShape) setShapeRichText(bodyShape, content.bodySegments);
    }

    const table = content.tableData ?? [];
    const columns = Math.max(0, ...table.map(row => row.length));
    if (table.length > 0 && columns > 0) {
      addTable(spTree, table, {
        left: DECK_CONSTANTS.TABLE_LEFT,
        top: DECK_CONSTANTS.TABLE_TOP,
        width: DECK_CONSTANTS.TABLE_WIDTH,
        height: DECK_CONSTANTS.TABLE_ROW_HEIGHT * table.length,
      });
    }

    if (content.speakerNotes) {
      await setNotesText(deck, slide, content.speakerNotes);
    }

    this.sectionsAdded.push(content.sectionType);
    return slide.index;
  }

  /**
   * Clones one slide of a library deck onto a new slide that uses the
   * target's blank layout (or its last layout). Existing notes are kept and
   * `notesAppend` is added after a blank line.
   */
  async addSlideFromLibrary(sourcePath: string, sourceSlideIndex = 0, notesAppend?: string): Promise<ClonedSlide> {
    const deck = this.requireDeck();
    const source = await PresentationDocument.open(sourcePath);
    const sourceSlide = source.slide(sourceSlideIndex);

    // Everything read from the source happens before the target changes.
    const prepared = await prepareSlideClone(source, sourceSlide);
    const sourceNotes = getNotesText(source, sourceSlide);

    const layoutIndex = deck.findLayoutByName(LAYOUT_NAME_HINTS.BLANK) ?? deck.layoutCount - 1;
    const slide = deck.addSlide(layoutIndex);
    const report = applySlideClone(prepared, deck, slide);

    if (notesAppend) {
      const combined = `${sourceNotes}${DECK_CONSTANTS.NOTES_SEPARATOR}${notesAppend}`.trim();
      await setNotesText(deck, slide, combined);
    } else if (sourceNotes.trim()) {
      await setNotesText(deck, slide, sourceNotes);
    }

    log.debug(`Cloned slide ${sourceSlideIndex} of ${sourcePath}`, { ...report });
    return { slideIndex: slide.index, ...report };
  }

  /**
   * Optional title slide, then each present section in canonical order,
   * each optionally preceded by a numbered divider.
   */
  async buildFullProposal(sectionsContent: SectionsContent, options: FullProposalOptions = {}): Promise<BuildSummary> {
    this.requireDeck();
    const includeDividers = options.includeDividers ?? true;

    if (options.title) {
      this.addTitleSlide(options.title, options.subtitle);
    }

    for (const [i, section] of BACKEND_SECTIONS.entries()) {
      const content = sectionsContent[section];
      if (!content) continue;

      if (includeDividers) {
        this.addSectionDivider(section, i + 1);
      }
      await this.addSectionSlide(content);
    }
    return this.getBuildSummary();
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  /**
   * Writes the deck, creating parent directories. Returns the absolute path.
   */
  async save(outputPath: string): Promise<string> {
    const deck = this.requireDeck();
    const absolutePath = path.resolve(outputPath);
    const data = await deck.toBuffer();

    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, data);

    log.info(`Saved proposal deck: ${absolutePath} (${deck.slideCount} slides)`);
    return absolutePath;
  }

  saveToBytes(): Promise<Buffer> {
    return this.requireDeck().toBuffer();
  }

  getBuildSummary(): BuildSummary {
    const sectionsAdded = [...new Set(this.sectionsAdded)];
    return {
      slideCount: this.deck?.slideCount ?? 0,
      sectionsAdded,
      sectionsMissing: BACKEND_SECTIONS.filter(section => !sectionsAdded.includes(section)),
    };
  }

  /**
   * Layout, title, visible text and notes of every slide, in order.
   */
  describeSlides(): SlideDescription[] {
    const deck = this.requireDeck();
    return deck.slides().map(slide => describeSlide(deck, slide));
  }
}

function describeSlide(deck: PresentationDocument, slide: SlideRef): SlideDescription {
  const spTree = deck.slideSpTree(slide);
  const layoutPart = deck.slideLayoutPart(slide);
  const titleShape = findPlaceholderByTypes(spTree, TITLE_TYPES);

  return {
    index: slide.index,
    layoutName: layoutPart ? deck.layoutName(layoutPart) : "",
    title: titleShape ? shapeText(titleShape) : "",
    texts: shapesOf(spTree).map(shapeText).filter(text => text.trim() !== ""),
    notes: getNotesText(deck, slide),
  };
}
