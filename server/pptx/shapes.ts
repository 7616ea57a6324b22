/**
 * Shape-level helpers for slide trees: placeholder lookup, geometry,
 * shape ids, and the table/text-box shapes the builder adds.
 *
 * Layer: PPTX (slide content)
 */

import type { TableCell } from "@shared/schema";
import {
  NS,
  childElements,
  childPath,
  createElement,
  descendants,
  firstChild,
  getAttr,
  getIntAttr,
} from "./xml";
import { buildParagraph, buildPlainParagraphs } from "./text";

export type Geometry = {
  left: number;
  top: number;
  width: number;
  height: number;
};

const PLACEHOLDER_TYPE_NAMES: Record<string, string> = {
  title: "TITLE",
  body: "BODY",
  ctrTitle: "CENTER_TITLE",
  subTitle: "SUBTITLE",
  dt: "DATE",
  sldNum: "SLIDE_NUMBER",
  ftr: "FOOTER",
  hdr: "HEADER",
  obj: "OBJECT",
  chart: "CHART",
  tbl: "TABLE",
  clipArt: "CLIP_ART",
  dgm: "ORG_CHART",
  media: "MEDIA_CLIP",
  sldImg: "SLIDE_IMAGE",
  pic: "PICTURE",
};

// Placeholder types that are not carried onto new slides.
export const FOOTER_PLACEHOLDER_TYPES = new Set(["dt", "ftr", "sldNum"]);

/** Shape elements that can appear directly in a p:spTree. */
const SHAPE_ELEMENTS = new Set(["sp", "grpSp", "graphicFrame", "cxnSp", "pic", "contentPart", "AlternateContent"]);

export function placeholderTypeName(rawType: string): string {
  return PLACEHOLDER_TYPE_NAMES[rawType] ?? "UNKNOWN";
}

export function spTreeOf(doc: Document): Element | null {
  const root = doc.documentElement;
  return root ? childPath(root, [NS.P, "cSld"], [NS.P, "spTree"]) : null;
}

export function shapesOf(spTree: Element): Element[] {
  return childElements(spTree).filter(el => SHAPE_ELEMENTS.has(el.localName));
}

/** The non-visual properties block (p:nvSpPr, p:nvPicPr, ...) of a shape. */
function nonVisualProps(shape: Element): Element | null {
  return childElements(shape, NS.P).find(el => el.localName.startsWith("nv")) ?? null;
}

export function placeholderOf(shape: Element): Element | null {
  const nv = nonVisualProps(shape);
  return nv ? childPath(nv, [NS.P, "nvPr"], [NS.P, "ph"]) : null;
}

export function placeholderType(ph: Element): string {
  return getAttr(ph, "type") ?? "obj";
}

export function placeholderIdx(ph: Element): number {
  return getIntAttr(ph, "idx", 0);
}

export function shapeName(shape: Element): string {
  const nv = nonVisualProps(shape);
  const cNvPr = nv ? firstChild(nv, NS.P, "cNvPr") : null;
  return cNvPr ? getAttr(cNvPr, "name") ?? "" : "";
}

export function findPlaceholder(spTree: Element, idx: number): Element | null {
  return shapesOf(spTree).find(shape => {
    const ph = placeholderOf(shape);
    return ph !== null && placeholderIdx(ph) === idx;
  }) ?? null;
}

export function findPlaceholderByTypes(spTree: Element, types: readonly string[]): Element | null {
  return shapesOf(spTree).find(shape => {
    const ph = placeholderOf(shape);
    return ph !== null && types.includes(placeholderType(ph));
  }) ?? null;
}

function xfrmGeometry(xfrm: Element | null): Geometry | null {
  if (!xfrm) return null;
  const off = firstChild(xfrm, NS.A, "off");
  const ext = firstChild(xfrm, NS.A, "ext");
  if (!off || !ext) return null;
  return {
    left: getIntAttr(off, "x", 0),
    top: getIntAttr(off, "y", 0),
    width: getIntAttr(ext, "cx", 0),
    height: getIntAttr(ext, "cy", 0),
  };
}

/**
 * Explicit geometry of a shape, or null when it inherits its position.
 */
export function shapeGeometry(shape: Element): Geometry | null {
  switch (shape.localName) {
    case "graphicFrame":
      return xfrmGeometry(firstChild(shape, NS.P, "xfrm"));
    case "grpSp":
      return xfrmGeometry(childPath(shape, [NS.P, "grpSpPr"], [NS.A, "xfrm"]));
    default:
      return xfrmGeometry(childPath(shape, [NS.P, "spPr"], [NS.A, "xfrm"]));
  }
}

export function nextShapeId(spTree: Element): number {
  const ids = descendants(spTree, NS.P, "cNvPr").map(el => getIntAttr(el, "id", 0));
  return Math.max(1, ...ids) + 1;
}

function xfrmElement(doc: Document, qname: "a:xfrm" | "p:xfrm", geometry: Geometry): Element {
  return createElement(doc, qname, {}, [
    createElement(doc, "a:off", { x: geometry.left, y: geometry.top }),
    createElement(doc, "a:ext", { cx: geometry.width, cy: geometry.height }),
  ]);
}

export function addTable(spTree: Element, data: TableCell[][], geometry: Geometry): Element {
  const doc = spTree.ownerDocument;
  const rows = data.length;
  const cols = Math.max(...data.map(row => row.length));
  const id = nextShapeId(spTree);
  const colWidth = Math.floor(geometry.width / cols);
  const rowHeight = Math.floor(geometry.height / rows);

  const grid = createElement(doc, "a:tblGrid", {}, Array.from({ length: cols }, () =>
    createElement(doc, "a:gridCol", { w: colWidth }),
  ));

  const tableRows = data.map(row =>
    createElement(doc, "a:tr", { h: rowHeight }, Array.from({ length: cols }, (_, c) => {
      const value = c < row.length ? String(row[c]) : "";
      return createElement(doc, "a:tc", {}, [
        createElement(doc, "a:txBody", {}, [
          createElement(doc, "a:bodyPr"),
          createElement(doc, "a:lstStyle"),
          ...buildPlainParagraphs(doc, value),
        ]),
        createElement(doc, "a:tcPr"),
      ]);
    })),
  );

  const frame = createElement(doc, "p:graphicFrame", {}, [
    createElement(doc, "p:nvGraphicFramePr", {}, [
      createElement(doc, "p:cNvPr", { id, name: `Table ${id - 1}` }),
      createElement(doc, "p:cNvGraphicFramePr", {}, [
        createElement(doc, "a:graphicFrameLocks", { noGrp: 1 }),
      ]),
      createElement(doc, "p:nvPr"),
    ]),
    xfrmElement(doc, "p:xfrm", geometry),
    createElement(doc, "a:graphic", {}, [
      createElement(doc, "a:graphicData", { uri: "http://schemas.openxmlformats.org/drawingml/2006/table" }, [
        createElement(doc, "a:tbl", {}, [
          createElement(doc, "a:tblPr", { firstRow: 1, bandRow: 1 }),
          grid,
          ...tableRows,
        ]),
      ]),
    ]),
  ]);

  spTree.appendChild(frame);
  return frame;
}

/**
 * Plain text box, used when a shape cannot be copied structurally.
 */
export function addTextBox(spTree: Element, geometry: Geometry, paragraphs: string[]): Element {
  const doc = spTree.ownerDocument;
  const id = nextShapeId(spTree);

  const box = createElement(doc, "p:sp", {}, [
    createElement(doc, "p:nvSpPr", {}, [
      createElement(doc, "p:cNvPr", { id, name: `TextBox ${id - 1}` }),
      createElement(doc, "p:cNvSpPr", { txBox: 1 }),
      createElement(doc, "p:nvPr"),
    ]),
    createElement(doc, "p:spPr", {}, [
      xfrmElement(doc, "a:xfrm", geometry),
      createElement(doc, "a:prstGeom", { prst: "rect" }, [createElement(doc, "a:avLst")]),
      createElement(doc, "a:noFill"),
    ]),
    createElement(doc, "p:txBody", {}, [
      createElement(doc, "a:bodyPr", { wrap: "square", rtlCol: 0 }, [createElement(doc, "a:spAutoFit")]),
      createElement(doc, "a:lstStyle"),
      ...paragraphs.map(text => buildParagraph(doc, text)),
    ]),
  ]);

  spTree.appendChild(box);
  return box;
}
