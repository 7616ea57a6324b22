/**
 * Presentation Document
 *
 * Purpose:
 * PresentationML view over an OpcPackage: slide order, layouts of the first
 * slide master, adding slides from a layout, and template analysis.
 *
 * Layer: PPTX (document model)
 */

import { NotFoundError, OutOfRangeError, ParseError, isFileSystemError } from "../utils/errorHandler";
import { DECK_CONSTANTS } from "../config/constants";
import { blankDeckBytes } from "./blankDeck";
import { CONTENT_TYPES, OpcPackage, REL_TYPES } from "./opcPackage";
import {
  FOOTER_PLACEHOLDER_TYPES,
  type Geometry,
  findPlaceholderByTypes,
  placeholderIdx,
  placeholderOf,
  placeholderType,
  placeholderTypeName,
  shapeGeometry,
  shapeName,
  shapesOf,
  spTreeOf,
} from "./shapes";
import {
  NS,
  ROOT_NAMESPACES,
  XML_DECLARATION,
  childElements,
  childPath,
  createElement,
  firstChild,
  getAttr,
  getIntAttr,
  insertBeforeAny,
  rootElement,
} from "./xml";

export type PlaceholderInfo = {
  idx: number;
  name: string;
  placeholderType: string;
  left: number | null;
  top: number | null;
  width: number | null;
  height: number | null;
};

export type LayoutInfo = {
  name: string;
  index: number;
  placeholders: PlaceholderInfo[];
};

export type TemplateAnalysis = {
  filePath: string;
  slideWidth: number;
  slideHeight: number;
  layoutCount: number;
  layouts: LayoutInfo[];
};

type LayoutRef = {
  index: number;
  partName: string;
};

export type SlideRef = {
  index: number;
  partName: string;
};

/** presentation.xml children that follow p:sldIdLst, in schema order. */
const AFTER_SLD_ID_LST = [
  "sldSz", "notesSz", "smartTags", "embeddedFontLst", "custShowLst", "photoAlbum",
  "custDataLst", "kinsoku", "defaultTextStyle", "modifyVerifier", "extLst",
];

/** presentation.xml children that follow p:notesMasterIdLst. */
export const AFTER_NOTES_MASTER_ID_LST = ["handoutMasterIdLst", "sldIdLst", ...AFTER_SLD_ID_LST];

/**
 * Layout placeholder types and the master placeholder they inherit
 * geometry from.
 */
const MASTER_PLACEHOLDER_TYPE: Record<string, string> = {
  title: "title",
  ctrTitle: "title",
  body: "body",
  subTitle: "body",
  obj: "body",
  chart: "body",
  tbl: "body",
  clipArt: "body",
  dgm: "body",
  media: "body",
  pic: "body",
  dt: "dt",
  ftr: "ftr",
  sldNum: "sldNum",
};

const SLIDE_TEMPLATE =
  `${XML_DECLARATION}\n<p:sld ${ROOT_NAMESPACES}><p:cSld><p:spTree>` +
  `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
  `<p:grpSpPr/></p:spTree></p:cSld><p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr></p:sld>`;

export class PresentationDocument {
  private constructor(
    readonly pkg: OpcPackage,
    readonly presentationPart: string,
  ) {}

  private static fromPackage(pkg: OpcPackage): PresentationDocument {
    const sourceLabel = pkg.sourceLabel;
    const main = pkg.mainPartName();
    const contentType = pkg.contentTypeOf(main);

    if (contentType === CONTENT_TYPES.TEMPLATE) {
      pkg.setOverride(main, CONTENT_TYPES.PRESENTATION);
    } else if (contentType !== CONTENT_TYPES.PRESENTATION) {
      throw new ParseError(sourceLabel, `main part ${main} is not a presentation (${contentType ?? "no content type"})`);
    }

    const presentation = new PresentationDocument(pkg, main);
    // Surfaces malformed presentation.xml at open time rather than on first use.
    presentation.presentationRoot();
    return presentation;
  }

  static async fromBuffer(data: Uint8Array, sourceLabel: string): Promise<PresentationDocument> {
    return PresentationDocument.fromPackage(await OpcPackage.fromBuffer(data, sourceLabel));
  }

  static async open(filePath: string): Promise<PresentationDocument> {
    return PresentationDocument.fromPackage(await OpcPackage.open(filePath));
  }

  static async createBlank(): Promise<PresentationDocument> {
    return PresentationDocument.fromBuffer(await blankDeckBytes(), "blank deck");
  }

  get sourceLabel(): string {
    return this.pkg.sourceLabel;
  }

  presentationRoot(): Element {
    return rootElement(this.pkg.getXml(this.presentationPart));
  }

  // ---------------------------------------------------------------------------
  // Slides
  // ---------------------------------------------------------------------------

  private slideIdList(): Element | null {
    return firstChild(this.presentationRoot(), NS.P, "sldIdLst");
  }

  slides(): SlideRef[] {
    const list = this.slideIdList();
    if (!list) return [];

    const refs: SlideRef[] = [];
    for (const sldId of childElements(list, NS.P, "sldId")) {
      const rId = sldId.getAttributeNS(NS.R, "id") ?? "";
      const rel = this.pkg.findRelationship(this.presentationPart, rId);
      if (!rel?.targetPart) {
        throw new ParseError(this.sourceLabel, `slide list references unknown relationship ${rId}`);
      }
      refs.push({ index: refs.length, partName: rel.targetPart });
    }
    return refs;
  }

  get slideCount(): number {
    return this.slides().length;
  }

  slide(index: number): SlideRef {
    const slides = this.slides();
    if (!Number.isInteger(index) || index < 0 || index >= slides.length) {
      throw new OutOfRangeError(
        `${this.sourceLabel} has ${slides.length} slides, requested index ${index}`,
      );
    }
    return slides[index];
  }

  slideDocument(slide: SlideRef): Document {
    return this.pkg.getXml(slide.partName);
  }

  slideSpTree(slide: SlideRef): Element {
    const spTree = spTreeOf(this.slideDocument(slide));
    if (!spTree) {
      throw new ParseError(this.sourceLabel, `${slide.partName} has no shape tree`);
    }
    return spTree;
  }

  slideSize(): { width: number; height: number } {
    const sldSz = firstChild(this.presentationRoot(), NS.P, "sldSz");
    return {
      width: sldSz ? getIntAttr(sldSz, "cx", DECK_CONSTANTS.DEFAULT_SLIDE_WIDTH) : DECK_CONSTANTS.DEFAULT_SLIDE_WIDTH,
      height: sldSz ? getIntAttr(sldSz, "cy", DECK_CONSTANTS.DEFAULT_SLIDE_HEIGHT) : DECK_CONSTANTS.DEFAULT_SLIDE_HEIGHT,
    };
  }

  // ---------------------------------------------------------------------------
  // Masters and layouts
  // ---------------------------------------------------------------------------

  masterPart(): string {
    const sldMasterId = childPath(this.presentationRoot(), [NS.P, "sldMasterIdLst"], [NS.P, "sldMasterId"]);
    const rId = sldMasterId?.getAttributeNS(NS.R, "id") ?? "";
    const rel = this.pkg.findRelationship(this.presentationPart, rId);
    if (!rel?.targetPart) {
      throw new ParseError(this.sourceLabel, "presentation has no slide master");
    }
    return rel.targetPart;
  }

  private layoutRefs(): LayoutRef[] {
    const master = this.masterPart();
    const list = firstChild(rootElement(this.pkg.getXml(master)), NS.P, "sldLayoutIdLst");
    if (!list) return [];

    return childElements(list, NS.P, "sldLayoutId").map((el, index) => {
      const rId = el.getAttributeNS(NS.R, "id") ?? "";
      const rel = this.pkg.findRelationship(master, rId);
      if (!rel?.targetPart) {
        throw new ParseError(this.sourceLabel, `slide master references unknown layout ${rId}`);
      }
      return { index, partName: rel.targetPart };
    });
  }

  get layoutCount(): number {
    return this.layoutRefs().length;
  }

  layoutName(layoutPart: string): string {
    const cSld = firstChild(rootElement(this.pkg.getXml(layoutPart)), NS.P, "cSld");
    return cSld ? getAttr(cSld, "name") ?? "" : "";
  }

  layoutNames(): string[] {
    return this.layoutRefs().map(ref => this.layoutName(ref.partName));
  }

  /**
   * Index of the first layout whose name contains `pattern`, case-insensitively.
   */
  findLayoutByName(pattern: string): number | null {
    const wanted = pattern.toLowerCase();
    const index = this.layoutNames().findIndex(name => name.toLowerCase().includes(wanted));
    return index === -1 ? null : index;
  }

  slideLayoutPart(slide: SlideRef): string | null {
    return this.pkg.relatedPart(slide.partName, REL_TYPES.SLIDE_LAYOUT);
  }

  /**
   * Appends a slide based on the given layout. Layout placeholders other
   * than date, footer and slide number are carried onto the slide empty.
   */
  addSlide(layoutIndex: number): SlideRef {
    const layouts = this.layoutRefs();
    if (!Number.isInteger(layoutIndex) || layoutIndex < 0 || layoutIndex >= layouts.length) {
      throw new OutOfRangeError(
        `Layout index ${layoutIndex} is out of range; ${this.sourceLabel} has ${layouts.length} layouts`,
      );
    }
    const layoutPart = layouts[layoutIndex].partName;

    const partName = this.pkg.nextPartName("ppt/slides/slide", ".xml");
    const doc = this.pkg.addXmlPart(partName, SLIDE_TEMPLATE, CONTENT_TYPES.SLIDE);
    const spTree = spTreeOf(doc);
    const layoutSpTree = spTreeOf(this.pkg.getXml(layoutPart));
    if (spTree && layoutSpTree) {
      let nextId = 2;
      for (const shape of shapesOf(layoutSpTree)) {
        const ph = placeholderOf(shape);
        if (!ph || FOOTER_PLACEHOLDER_TYPES.has(placeholderType(ph))) continue;
        spTree.appendChild(this.placeholderShape(doc, shape, ph, nextId++));
      }
    }
    this.pkg.addRelationship(partName, REL_TYPES.SLIDE_LAYOUT, layoutPart);

    const rId = this.pkg.addRelationship(this.presentationPart, REL_TYPES.SLIDE, partName);
    const list = this.slideIdList() ?? this.createSlideIdList();
    const usedIds = childElements(list, NS.P, "sldId").map(el => getIntAttr(el, "id", 0));
    const id = Math.max(DECK_CONSTANTS.MIN_SLIDE_ID - 1, ...usedIds) + 1;
    list.appendChild(createElement(list.ownerDocument, "p:sldId", { id, "r:id": rId }));

    return { index: childElements(list, NS.P, "sldId").length - 1, partName };
  }

  private createSlideIdList(): Element {
    const root = this.presentationRoot();
    const list = createElement(root.ownerDocument, "p:sldIdLst");
    insertBeforeAny(root, list, NS.P, AFTER_SLD_ID_LST);
    return list;
  }

  private placeholderShape(doc: Document, layoutShape: Element, layoutPh: Element, id: number): Element {
    const ph = createElement(doc, "p:ph", {
      type: getAttr(layoutPh, "type"),
      orient: getAttr(layoutPh, "orient"),
      sz: getAttr(layoutPh, "sz"),
      idx: getAttr(layoutPh, "idx"),
    });
    const name = shapeName(layoutShape) || `Placeholder ${id - 1}`;

    return createElement(doc, "p:sp", {}, [
      createElement(doc, "p:nvSpPr", {}, [
        createElement(doc, "p:cNvPr", { id, name }),
        createElement(doc, "p:cNvSpPr", {}, [createElement(doc, "a:spLocks", { noGrp: 1 })]),
        createElement(doc, "p:nvPr", {}, [ph]),
      ]),
      createElement(doc, "p:spPr"),
    ]);
  }

  // ---------------------------------------------------------------------------
  // Analysis
  // ---------------------------------------------------------------------------

  private masterGeometry(layoutType: string): Geometry | null {
    const spTree = spTreeOf(this.pkg.getXml(this.masterPart()));
    const masterType = MASTER_PLACEHOLDER_TYPE[layoutType];
    if (!spTree || !masterType) return null;
    const shape = findPlaceholderByTypes(spTree, [masterType]);
    return shape ? shapeGeometry(shape) : null;
  }

  analyze(): TemplateAnalysis {
    const { width, height } = this.slideSize();
    const layouts = this.layoutRefs().map(ref => {
      const spTree = spTreeOf(this.pkg.getXml(ref.partName));
      const placeholders: PlaceholderInfo[] = [];
      for (const shape of spTree ? shapesOf(spTree) : []) {
        const ph = placeholderOf(shape);
        if (!ph) continue;
        const type = placeholderType(ph);
        const geometry = shapeGeometry(shape) ?? this.masterGeometry(type);
        placeholders.push({
          idx: placeholderIdx(ph),
          name: shapeName(shape),
          placeholderType: placeholderTypeName(type),
          left: geometry?.left ?? null,
          top: geometry?.top ?? null,
          width: geometry?.width ?? null,
          height: geometry?.height ?? null,
        });
      }
      return { name: this.layoutName(ref.partName), index: ref.index, placeholders };
    });

    return {
      filePath: this.sourceLabel,
      slideWidth: width,
      slideHeight: height,
      layoutCount: layouts.length,
      layouts,
    };
  }

  toBuffer(): Promise<Buffer> {
    return this.pkg.toBuffer();
  }
}

/**
 * Number of slides in a deck file. Callers decide how to treat failures.
 */
export async function countSlides(filePath: string): Promise<number> {
  const deck = await PresentationDocument.open(filePath);
  return deck.slideCount;
}

/**
 * True for the failures a single unreadable deck file can produce.
 */
export function isDeckReadError(error: unknown): boolean {
  return error instanceof NotFoundError || error instanceof ParseError || isFileSystemError(error);
}
