/**
 * Speaker notes: reading and writing the notes text of a slide, and adding
 * a notes master to decks that were saved without one.
 *
 * Layer: PPTX (slide content)
 */

import { ParseError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { BLANK_DECK_PARTS, blankDeckAssetText } from "./blankDeck";
import { CONTENT_TYPES, REL_TYPES } from "./opcPackage";
import { AFTER_NOTES_MASTER_ID_LST, type PresentationDocument, type SlideRef } from "./presentation";
import { findPlaceholderByTypes, nextShapeId, spTreeOf } from "./shapes";
import { setShapeText, shapeText } from "./text";
import { NS, ROOT_NAMESPACES, XML_DECLARATION, createElement, insertBeforeAny } from "./xml";

const log = createLogger("PptxNotes");

const NOTES_BODY_TYPES = ["body"] as const;

const NOTES_SLIDE_TEMPLATE =
  `${XML_DECLARATION}\n<p:notes ${ROOT_NAMESPACES}><p:cSld><p:spTree>` +
  `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>` +
  `<p:sp><p:nvSpPr><p:cNvPr id="2" name="Slide Image Placeholder 1"/>` +
  `<p:cNvSpPr><a:spLocks noGrp="1" noRot="1" noChangeAspect="1"/></p:cNvSpPr>` +
  `<p:nvPr><p:ph type="sldImg"/></p:nvPr></p:nvSpPr><p:spPr/></p:sp>` +
  `<p:sp><p:nvSpPr><p:cNvPr id="3" name="Notes Placeholder 2"/>` +
  `<p:cNvSpPr><a:spLocks noGrp="1"/></p:cNvSpPr>` +
  `<p:nvPr><p:ph type="body" idx="1"/></p:nvPr></p:nvSpPr><p:spPr/>` +
  `<p:txBody><a:bodyPr/><a:lstStyle/><a:p/></p:txBody></p:sp>` +
  `</p:spTree></p:cSld><p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr></p:notes>`;

function notesPartOf(deck: PresentationDocument, slide: SlideRef): string | null {
  return deck.pkg.relatedPart(slide.partName, REL_TYPES.NOTES_SLIDE);
}

export function hasNotes(deck: PresentationDocument, slide: SlideRef): boolean {
  return notesPartOf(deck, slide) !== null;
}

/**
 * Text of the slide's notes body placeholder; "" when the slide has no notes.
 */
export function getNotesText(deck: PresentationDocument, slide: SlideRef): string {
  const notesPart = notesPartOf(deck, slide);
  if (!notesPart) return "";

  const spTree = spTreeOf(deck.pkg.getXml(notesPart));
  const body = spTree ? findPlaceholderByTypes(spTree, NOTES_BODY_TYPES) : null;
  return body ? shapeText(body) : "";
}

/**
 * Returns the deck's notes master part, copying the built-in one (and its
 * theme) into the package when the deck has none.
 */
export async function ensureNotesMaster(deck: PresentationDocument): Promise<string> {
  const pkg = deck.pkg;
  const existing = pkg.relatedPart(deck.presentationPart, REL_TYPES.NOTES_MASTER);
  if (existing) return existing;

  const masterXml = await blankDeckAssetText(BLANK_DECK_PARTS.NOTES_MASTER);
  const themeXml = await blankDeckAssetText(BLANK_DECK_PARTS.NOTES_THEME);

  const themePart = pkg.nextPartName("ppt/theme/theme", ".xml");
  const masterPart = pkg.nextPartName("ppt/notesMasters/notesMaster", ".xml");
  pkg.addXmlPart(themePart, themeXml, CONTENT_TYPES.THEME);
  pkg.addXmlPart(masterPart, masterXml, CONTENT_TYPES.NOTES_MASTER);
  pkg.addRelationship(masterPart, REL_TYPES.THEME, themePart);

  const rId = pkg.addRelationship(deck.presentationPart, REL_TYPES.NOTES_MASTER, masterPart);
  const root = deck.presentationRoot();
  const doc = root.ownerDocument;
  const list = createElement(doc, "p:notesMasterIdLst", {}, [
    createElement(doc, "p:notesMasterId", { "r:id": rId }),
  ]);
  insertBeforeAny(root, list, NS.P, AFTER_NOTES_MASTER_ID_LST);

  log.debug(`Added notes master ${masterPart} to ${deck.sourceLabel}`);
  return masterPart;
}

async function ensureNotesSlide(deck: PresentationDocument, slide: SlideRef): Promise<string> {
  const existing = notesPartOf(deck, slide);
  if (existing) return existing;

  const masterPart = await ensureNotesMaster(deck);
  const pkg = deck.pkg;
  const notesPart = pkg.nextPartName("ppt/notesSlides/notesSlide", ".xml");
  pkg.addXmlPart(notesPart, NOTES_SLIDE_TEMPLATE, CONTENT_TYPES.NOTES_SLIDE);
  pkg.addRelationship(notesPart, REL_TYPES.NOTES_MASTER, masterPart);
  pkg.addRelationship(notesPart, REL_TYPES.SLIDE, slide.partName);
  pkg.addRelationship(slide.partName, REL_TYPES.NOTES_SLIDE, notesPart);
  return notesPart;
}

/**
 * Replaces the slide's notes text, creating the notes slide when needed.
 */
export async function setNotesText(deck: PresentationDocument, slide: SlideRef, text: string): Promise<void> {
  const notesPart = await ensureNotesSlide(deck, slide);
  const notesDoc = deck.pkg.getXml(notesPart);
  const spTree = spTreeOf(notesDoc);
  if (!spTree) {
    throw new ParseError(deck.sourceLabel, `${notesPart} has no shape tree`);
  }

  let body = findPlaceholderByTypes(spTree, NOTES_BODY_TYPES);
  if (!body) {
    body = createElement(notesDoc, "p:sp", {}, [
      createElement(notesDoc, "p:nvSpPr", {}, [
        createElement(notesDoc, "p:cNvPr", { id: nextShapeId(spTree), name: "Notes Placeholder" }),
        createElement(notesDoc, "p:cNvSpPr", {}, [createElement(notesDoc, "a:spLocks", { noGrp: 1 })]),
        createElement(notesDoc, "p:nvPr", {}, [createElement(notesDoc, "p:ph", { type: "body", idx: 1 })]),
      ]),
      createElement(notesDoc, "p:spPr"),
    ]);
    spTree.appendChild(body);
  }
  setShapeText(body, text);
}
