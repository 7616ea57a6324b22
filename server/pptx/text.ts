/**
 * Text bodies: plain and rich-text paragraph construction, reading text
 * back out of shapes, and the HTML-like markup accepted by the tool layer.
 *
 * Layer: PPTX (slide content)
 */

import type { TextSegment } from "@shared/schema";
import { createLogger } from "../utils/logger";
import { NS, childElements, createElement, descendants, firstChild, removeChildren } from "./xml";

const log = createLogger("PptxText");

const HEX_COLOR = /^#?([0-9a-fA-F]{6})$/;

function buildRun(doc: Document, text: string, segment?: TextSegment): Element {
  const rPrAttrs: Record<string, string | number | undefined> = { lang: "en-US" };
  const rPrChildren: Element[] = [];

  if (segment) {
    if (segment.fontSize) rPrAttrs.sz = segment.fontSize * 100;
    rPrAttrs.b = segment.bold ? 1 : 0;
    rPrAttrs.i = segment.italic ? 1 : 0;
    rPrAttrs.u = segment.underline ? "sng" : "none";

    if (segment.color) {
      const match = HEX_COLOR.exec(segment.color);
      if (match) {
        rPrChildren.push(createElement(doc, "a:solidFill", {}, [
          createElement(doc, "a:srgbClr", { val: match[1].toUpperCase() }),
        ]));
      } else {
        log.warn(`Ignoring invalid run color "${segment.color}"`);
      }
    }
  }

  return createElement(doc, "a:r", {}, [
    createElement(doc, "a:rPr", rPrAttrs, rPrChildren),
    createElement(doc, "a:t", {}, [text]),
  ]);
}

export function buildParagraph(doc: Document, text: string): Element {
  return createElement(doc, "a:p", {}, text ? [buildRun(doc, text)] : []);
}

/** One paragraph per line of `text`. */
export function buildPlainParagraphs(doc: Document, text: string): Element[] {
  return text.split("\n").map(line => buildParagraph(doc, line));
}

/**
 * Segments become consecutive runs; a newline inside a segment closes the
 * current paragraph and starts a new one. Each run carries only its own
 * segment's formatting.
 */
export function buildRichParagraphs(doc: Document, segments: TextSegment[]): Element[] {
  let paragraph = createElement(doc, "a:p");
  const paragraphs = [paragraph];

  for (const segment of segments) {
    const parts = segment.text.split("\n");
    parts.forEach((part, index) => {
      if (index > 0) {
        paragraph = createElement(doc, "a:p");
        paragraphs.push(paragraph);
      }
      if (part) paragraph.appendChild(buildRun(doc, part, segment));
    });
  }
  return paragraphs;
}

/**
 * Returns the shape's p:txBody, creating an empty one when missing.
 */
export function ensureTextBody(shape: Element): Element {
  const existing = firstChild(shape, NS.P, "txBody");
  if (existing) return existing;

  const doc = shape.ownerDocument;
  const txBody = createElement(doc, "p:txBody", {}, [
    createElement(doc, "a:bodyPr"),
    createElement(doc, "a:lstStyle"),
  ]);
  shape.appendChild(txBody);
  return txBody;
}

function replaceParagraphs(txBody: Element, paragraphs: Element[]): void {
  removeChildren(txBody, NS.A, "p");
  for (const paragraph of paragraphs) txBody.appendChild(paragraph);
}

export function setShapeText(shape: Element, text: string): void {
  const txBody = ensureTextBody(shape);
  replaceParagraphs(txBody, buildPlainParagraphs(shape.ownerDocument, text));
}

export function setShapeRichText(shape: Element, segments: TextSegment[]): void {
  if (segments.length === 0) return;
  const txBody = ensureTextBody(shape);
  replaceParagraphs(txBody, buildRichParagraphs(shape.ownerDocument, segments));
}

function paragraphText(paragraph: Element): string {
  let text = "";
  for (const child of childElements(paragraph, NS.A)) {
    if (child.localName === "br") {
      text += "\n";
    } else if (child.localName === "r" || child.localName === "fld") {
      text += descendants(child, NS.A, "t").map(t => t.textContent ?? "").join("");
    }
  }
  return text;
}

/** Paragraph texts of every text body in the shape, in document order. */
export function shapeParagraphs(shape: Element): string[] {
  return descendants(shape, NS.A, "p").map(paragraphText);
}

export function shapeText(shape: Element): string {
  return shapeParagraphs(shape).join("\n");
}

// ---------------------------------------------------------------------------
// HTML-like markup
// ---------------------------------------------------------------------------

const TAG_PATTERN = /<(\/?)(\w+)(?:\s+[^>]*)?\/?>/g;

/**
 * Converts <b>, <i>, <u> and <br> markup into text segments. Other tags are
 * dropped; their text is kept.
 */
export function parseFormattedText(html: string): TextSegment[] {
  const segments: TextSegment[] = [];
  let bold = false;
  let italic = false;
  let underline = false;
  let pos = 0;

  const pushText = (text: string) => {
    if (text) segments.push({ text, bold, italic, underline });
  };

  for (const match of html.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0;
    pushText(html.slice(pos, index));

    const closing = match[1] === "/";
    switch (match[2].toLowerCase()) {
      case "b":
        bold = !closing;
        break;
      case "i":
        italic = !closing;
        break;
      case "u":
        underline = !closing;
        break;
      case "br":
        segments.push({ text: "\n", bold: false, italic: false, underline: false });
        break;
    }

    pos = index + match[0].length;
  }

  pushText(html.slice(pos));
  return segments;
}
