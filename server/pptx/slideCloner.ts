/**
 * Slide Cloner
 *
 * Purpose:
 * Copies the shapes of one slide into a slide of another deck. Each shape is
 * copied structurally, together with the picture and media parts and the
 * external hyperlinks it references. A shape that cannot be copied that way
 * is recreated as a plain text box with its text and position; a shape with
 * neither text nor explicit position is skipped.
 *
 * Cloning runs in two phases. prepareSlideClone reads and checks everything
 * the source slide needs, including media bytes; applySlideClone then writes
 * into the target without further I/O, so a source that cannot be read
 * leaves the target untouched.
 *
 * Only ShapeCopyError selects the fallback path. Anything else propagates.
 *
 * Layer: PPTX (slide content)
 */

import * as path from "path";
import { ParseError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { REL_TYPES, type Relationship } from "./opcPackage";
import type { PresentationDocument, SlideRef } from "./presentation";
import { addTextBox, nextShapeId, shapeGeometry, shapeName, shapesOf } from "./shapes";
import { shapeParagraphs } from "./text";
import { NS, attributes, descendants, insertBeforeAny, rootElement } from "./xml";

const log = createLogger("SlideCloner");

/** Relationship types whose target parts are copied along with the shape. */
const COPYABLE_PART_TYPES = new Set<string>([
  REL_TYPES.IMAGE,
  REL_TYPES.MEDIA,
  REL_TYPES.AUDIO,
  REL_TYPES.VIDEO,
]);

export class ShapeCopyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShapeCopyError";
  }
}

export type CloneReport = {
  copied: number;
  fallbacks: number;
  skipped: number;
};

type PlannedRef =
  | { kind: "part"; rId: string; relType: string; sourcePart: string; contentType: string; data: Uint8Array }
  | { kind: "external"; rId: string; relationship: Relationship };

type PreparedShape =
  | { kind: "copy"; shape: Element; refs: PlannedRef[] }
  | { kind: "fallback"; shape: Element; reason: string };

export type PreparedSlide = {
  sourceLabel: string;
  sourcePart: string;
  /** xmlns declarations of the source slide root. */
  namespaces: Array<[string, string]>;
  shapes: PreparedShape[];
};

type CloneTarget = {
  deck: PresentationDocument;
  slide: SlideRef;
  spTree: Element;
  /** Source part name → part name already copied into the target. */
  copiedParts: Map<string, string>;
};

function relationshipIds(shape: Element): string[] {
  const ids = new Set<string>();
  const elements = [shape, ...descendants(shape, "*", "*")];
  for (const el of elements) {
    for (const attr of attributes(el)) {
      if (attr.namespaceURI === NS.R && attr.value) ids.add(attr.value);
    }
  }
  return [...ids];
}

async function readPart(source: PresentationDocument, partName: string, cache: Map<string, Uint8Array>): Promise<Uint8Array> {
  const cached = cache.get(partName);
  if (cached) return cached;
  try {
    const data = await source.pkg.readBinary(partName);
    cache.set(partName, data);
    return data;
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ShapeCopyError(`part ${partName} could not be read`);
    }
    throw error;
  }
}

/**
 * Checks and loads every relationship the shape references.
 */
async function planRelationships(
  source: PresentationDocument,
  sourceSlide: SlideRef,
  shape: Element,
  cache: Map<string, Uint8Array>,
): Promise<PlannedRef[]> {
  const plan: PlannedRef[] = [];
  for (const rId of relationshipIds(shape)) {
    const rel = source.pkg.findRelationship(sourceSlide.partName, rId);
    if (!rel) {
      throw new ShapeCopyError(`relationship ${rId} is missing from ${sourceSlide.partName}`);
    }

    if (rel.type === REL_TYPES.HYPERLINK && rel.external) {
      plan.push({ kind: "external", rId, relationship: rel });
      continue;
    }

    if (!COPYABLE_PART_TYPES.has(rel.type)) {
      throw new ShapeCopyError(`relationship ${rId} has unsupported type ${rel.type}`);
    }
    if (!rel.targetPart || !source.pkg.hasPart(rel.targetPart)) {
      throw new ShapeCopyError(`relationship ${rId} points at a missing part ${rel.target}`);
    }
    const contentType = source.pkg.contentTypeOf(rel.targetPart);
    if (!contentType) {
      throw new ShapeCopyError(`part ${rel.targetPart} has no content type`);
    }
    const data = await readPart(source, rel.targetPart, cache);
    plan.push({ kind: "part", rId, relType: rel.type, sourcePart: rel.targetPart, contentType, data });
  }
  return plan;
}

function copyPart(target: CloneTarget, ref: PlannedRef & { kind: "part" }): string {
  const already = target.copiedParts.get(ref.sourcePart);
  if (already) return already;

  const pkg = target.deck.pkg;
  const ext = path.posix.extname(ref.sourcePart);
  const stem = path.posix.basename(ref.sourcePart, ext).replace(/\d+$/, "");
  const partName = pkg.nextPartName(`ppt/media/${stem}`, ext);

  pkg.addBinaryPart(partName, ref.data);
  const extension = ext.slice(1);
  if (extension && !pkg.hasDefaultContentType(extension)) {
    pkg.addDefaultContentType(extension, ref.contentType);
  } else if (pkg.contentTypeOf(partName) !== ref.contentType) {
    pkg.setOverride(partName, ref.contentType);
  }

  target.copiedParts.set(ref.sourcePart, partName);
  return partName;
}

function copyShape(shape: Element, refs: PlannedRef[], target: CloneTarget): void {
  const idMap = new Map<string, string>();
  for (const ref of refs) {
    if (ref.kind === "external") {
      idMap.set(ref.rId, target.deck.pkg.addRelationship(
        target.slide.partName, ref.relationship.type, ref.relationship.target, true,
      ));
    } else {
      const partName = copyPart(target, ref);
      idMap.set(ref.rId, target.deck.pkg.addRelationship(target.slide.partName, ref.relType, partName));
    }
  }

  const clone = target.spTree.ownerDocument.importNode(shape, true);
  for (const el of [clone, ...descendants(clone, "*", "*")]) {
    for (const attr of attributes(el)) {
      if (attr.namespaceURI !== NS.R) continue;
      const mapped = idMap.get(attr.value);
      if (mapped) el.setAttributeNS(NS.R, attr.name, mapped);
    }
  }

  let nextId = nextShapeId(target.spTree);
  for (const cNvPr of descendants(clone, NS.P, "cNvPr")) {
    cNvPr.setAttribute("id", String(nextId++));
  }

  insertBeforeAny(target.spTree, clone, NS.P, ["extLst"]);
}

function copyAsTextBox(shape: Element, target: CloneTarget, reason: string): boolean {
  const paragraphs = shapeParagraphs(shape);
  const geometry = shapeGeometry(shape);
  const label = shapeName(shape) || shape.localName;

  if (!geometry || paragraphs.join("").trim() === "") {
    log.debug(`Skipping shape "${label}": ${reason}; no text or position to fall back on`);
    return false;
  }

  log.debug(`Shape "${label}" copied as text box: ${reason}`);
  addTextBox(target.spTree, geometry, paragraphs);
  return true;
}

/**
 * Parses the source slide and its relationships and loads referenced media.
 * Throws ParseError when the slide or its relationship part is malformed.
 */
export async function prepareSlideClone(source: PresentationDocument, sourceSlide: SlideRef): Promise<PreparedSlide> {
  const root = rootElement(source.slideDocument(sourceSlide));
  const namespaces: Array<[string, string]> = attributes(root)
    .filter(attr => attr.name.startsWith("xmlns:"))
    .map((attr): [string, string] => [attr.name, attr.value]);

  const cache = new Map<string, Uint8Array>();
  const shapes: PreparedShape[] = [];
  for (const shape of shapesOf(source.slideSpTree(sourceSlide))) {
    try {
      shapes.push({ kind: "copy", shape, refs: await planRelationships(source, sourceSlide, shape, cache) });
    } catch (error) {
      if (!(error instanceof ShapeCopyError)) throw error;
      shapes.push({ kind: "fallback", shape, reason: error.message });
    }
  }

  return { sourceLabel: source.sourceLabel, sourcePart: sourceSlide.partName, namespaces, shapes };
}

export function applySlideClone(
  prepared: PreparedSlide,
  targetDeck: PresentationDocument,
  targetSlide: SlideRef,
): CloneReport {
  const target: CloneTarget = {
    deck: targetDeck,
    slide: targetSlide,
    spTree: targetDeck.slideSpTree(targetSlide),
    copiedParts: new Map(),
  };

  // Prefixes used inside copied shapes (and in mc:Ignorable lists) must resolve.
  const targetRoot = rootElement(targetDeck.slideDocument(targetSlide));
  for (const [name, value] of prepared.namespaces) {
    if (!targetRoot.hasAttribute(name)) targetRoot.setAttribute(name, value);
  }

  const report: CloneReport = { copied: 0, fallbacks: 0, skipped: 0 };
  for (const entry of prepared.shapes) {
    if (entry.kind === "copy") {
      copyShape(entry.shape, entry.refs, target);
      report.copied++;
    } else if (copyAsTextBox(entry.shape, target, entry.reason)) {
      report.fallbacks++;
    } else {
      report.skipped++;
    }
  }

  if (report.fallbacks > 0 || report.skipped > 0) {
    log.warn(`Cloned ${prepared.sourcePart} from ${prepared.sourceLabel} with degraded shapes`, {
      copied: report.copied,
      fallbacks: report.fallbacks,
      skipped: report.skipped,
    });
  }
  return report;
}
