/**
 * OPC Package
 *
 * Purpose:
 * Read/modify/write access to an Open Packaging Conventions zip (.pptx/.potx):
 * XML parts, binary parts, relationships and content types.
 *
 * XML parts are read eagerly at load so that later edits are synchronous;
 * parsed documents are cached and written back on serialization.
 *
 * Layer: PPTX (package plumbing)
 */

import * as fs from "fs/promises";
import * as path from "path";
import JSZip from "jszip";
import { NotFoundError, ParseError, getErrorMessage, isFileSystemError } from "../utils/errorHandler";
import {
  NS,
  XML_DECLARATION,
  XmlSyntaxError,
  childElements,
  getAttr,
  parseXml,
  rootElement,
  serializeXml,
} from "./xml";

export const CONTENT_TYPES_PART = "[Content_Types].xml";
const ROOT_RELS_PART = "_rels/.rels";

export const REL_TYPES = {
  OFFICE_DOCUMENT: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument",
  SLIDE: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide",
  SLIDE_LAYOUT: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideLayout",
  SLIDE_MASTER: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideMaster",
  NOTES_SLIDE: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/notesSlide",
  NOTES_MASTER: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/notesMaster",
  THEME: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/theme",
  IMAGE: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image",
  HYPERLINK: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink",
  AUDIO: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/audio",
  VIDEO: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/video",
  MEDIA: "http://schemas.microsoft.com/office/2007/relationships/media",
  CHART: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/chart",
} as const;

export const CONTENT_TYPES = {
  PRESENTATION: "application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml",
  TEMPLATE: "application/vnd.openxmlformats-officedocument.presentationml.template.main+xml",
  SLIDE: "application/vnd.openxmlformats-officedocument.presentationml.slide+xml",
  NOTES_SLIDE: "application/vnd.openxmlformats-officedocument.presentationml.notesSlide+xml",
  NOTES_MASTER: "application/vnd.openxmlformats-officedocument.presentationml.notesMaster+xml",
  THEME: "application/vnd.openxmlformats-officedocument.theme+xml",
  RELATIONSHIPS: "application/vnd.openxmlformats-package.relationships+xml",
} as const;

export type Relationship = {
  id: string;
  type: string;
  target: string;
  external: boolean;
  /** Package part the relationship points at; null for external targets. */
  targetPart: string | null;
};

function partDir(partName: string): string {
  const dir = path.posix.dirname(partName);
  return dir === "." ? "" : dir;
}

export function relsPartFor(partName: string): string {
  if (partName === "") return ROOT_RELS_PART;
  const dir = partDir(partName);
  const base = path.posix.basename(partName);
  return dir ? `${dir}/_rels/${base}.rels` : `_rels/${base}.rels`;
}

export function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith("/")) return target.slice(1);
  return path.posix.normalize(path.posix.join(partDir(sourcePart) || ".", target));
}

export function relativeTarget(sourcePart: string, targetPart: string): string {
  return path.posix.relative(partDir(sourcePart) || ".", targetPart);
}

function isXmlPartName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.endsWith(".xml") || lower.endsWith(".rels");
}

export class OpcPackage {
  private readonly docs = new Map<string, Document>();

  private constructor(
    private readonly zip: JSZip,
    private readonly xmlText: Map<string, string>,
    readonly sourceLabel: string,
  ) {}

  static async fromBuffer(data: Uint8Array, sourceLabel: string): Promise<OpcPackage> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      throw new ParseError(sourceLabel, `not a zip package (${getErrorMessage(error)})`);
    }

    const xmlText = new Map<string, string>();
    for (const file of Object.values(zip.files)) {
      if (file.dir || !isXmlPartName(file.name)) continue;
      try {
        xmlText.set(file.name, await file.async("string"));
      } catch (error) {
        throw new ParseError(sourceLabel, `could not read ${file.name} (${getErrorMessage(error)})`);
      }
    }

    if (!xmlText.has(CONTENT_TYPES_PART)) {
      throw new ParseError(sourceLabel, `missing ${CONTENT_TYPES_PART}`);
    }
    return new OpcPackage(zip, xmlText, sourceLabel);
  }

  static async open(filePath: string): Promise<OpcPackage> {
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (error) {
      if (isFileSystemError(error) && error.code === "ENOENT") {
        throw new NotFoundError(`File ${filePath}`);
      }
      if (isFileSystemError(error) && error.code === "EISDIR") {
        throw new ParseError(filePath, "path is a directory");
      }
      throw error;
    }
    return OpcPackage.fromBuffer(data, filePath);
  }

  hasPart(partName: string): boolean {
    return this.docs.has(partName) || this.xmlText.has(partName) || this.zip.file(partName) !== null;
  }

  partNames(): string[] {
    const names = new Set<string>();
    for (const file of Object.values(this.zip.files)) {
      if (!file.dir) names.add(file.name);
    }
    for (const name of this.docs.keys()) names.add(name);
    return [...names].sort();
  }

  getXml(partName: string): Document {
    const cached = this.docs.get(partName);
    if (cached) return cached;

    const text = this.xmlText.get(partName);
    if (text === undefined) {
      throw new ParseError(this.sourceLabel, `missing package part ${partName}`);
    }

    try {
      const doc = parseXml(text);
      this.docs.set(partName, doc);
      return doc;
    } catch (error) {
      if (error instanceof XmlSyntaxError) {
        throw new ParseError(this.sourceLabel, `malformed XML in ${partName} (${error.message})`);
      }
      throw error;
    }
  }

  /**
   * Registers a new XML part and its content type override.
   */
  addXmlPart(partName: string, xml: string | Document, contentType?: string): Document {
    const doc = typeof xml === "string" ? parseXml(xml) : xml;
    this.docs.set(partName, doc);
    if (contentType) this.setOverride(partName, contentType);
    return doc;
  }

  async readBinary(partName: string): Promise<Uint8Array> {
    const file = this.zip.file(partName);
    if (!file) {
      throw new ParseError(this.sourceLabel, `missing package part ${partName}`);
    }
    try {
      return await file.async("uint8array");
    } catch (error) {
      throw new ParseError(this.sourceLabel, `could not read ${partName} (${getErrorMessage(error)})`);
    }
  }

  addBinaryPart(partName: string, data: Uint8Array): void {
    this.zip.file(partName, data);
  }

  // ---------------------------------------------------------------------------
  // Relationships
  // ---------------------------------------------------------------------------

  relationships(sourcePart: string): Relationship[] {
    const relsPart = relsPartFor(sourcePart);
    if (!this.hasPart(relsPart)) return [];

    const root = rootElement(this.getXml(relsPart));
    return childElements(root, NS.PKG_REL, "Relationship").map(el => {
      const target = getAttr(el, "Target") ?? "";
      const external = getAttr(el, "TargetMode") === "External";
      return {
        id: getAttr(el, "Id") ?? "",
        type: getAttr(el, "Type") ?? "",
        target,
        external,
        targetPart: external ? null : resolveTarget(sourcePart, target),
      };
    });
  }

  findRelationship(sourcePart: string, id: string): Relationship | undefined {
    return this.relationships(sourcePart).find(rel => rel.id === id);
  }

  relatedPart(sourcePart: string, type: string): string | null {
    const rel = this.relationships(sourcePart).find(r => r.type === type && r.targetPart !== null);
    return rel?.targetPart ?? null;
  }

  /**
   * Adds a relationship and returns its new id. `target` is a part name for
   * internal relationships and a URL for external ones.
   */
  addRelationship(sourcePart: string, type: string, target: string, external = false): string {
    const relsPart = relsPartFor(sourcePart);
    const doc = this.hasPart(relsPart)
      ? this.getXml(relsPart)
      : this.addXmlPart(
          relsPart,
          `${XML_DECLARATION}\n<Relationships xmlns="${NS.PKG_REL}"></Relationships>`,
        );
    const root = rootElement(doc);

    const usedIds = this.relationships(sourcePart)
      .map(rel => /^rId(\d+)$/.exec(rel.id))
      .map(match => (match ? Number.parseInt(match[1], 10) : 0));
    const id = `rId${Math.max(0, ...usedIds) + 1}`;

    const el = doc.createElementNS(NS.PKG_REL, "Relationship");
    el.setAttribute("Id", id);
    el.setAttribute("Type", type);
    el.setAttribute("Target", external ? target : relativeTarget(sourcePart, target));
    if (external) el.setAttribute("TargetMode", "External");
    root.appendChild(el);
    return id;
  }

  // ---------------------------------------------------------------------------
  // Content types
  // ---------------------------------------------------------------------------

  private contentTypesRoot(): Element {
    return rootElement(this.getXml(CONTENT_TYPES_PART));
  }

  contentTypeOf(partName: string): string | undefined {
    const root = this.contentTypesRoot();
    const wanted = `/${partName}`.toLowerCase();
    const override = childElements(root, NS.CT, "Override")
      .find(el => (getAttr(el, "PartName") ?? "").toLowerCase() === wanted);
    if (override) return getAttr(override, "ContentType");

    const ext = path.posix.extname(partName).slice(1).toLowerCase();
    const fallback = childElements(root, NS.CT, "Default")
      .find(el => (getAttr(el, "Extension") ?? "").toLowerCase() === ext);
    return fallback ? getAttr(fallback, "ContentType") : undefined;
  }

  hasDefaultContentType(extension: string): boolean {
    const ext = extension.toLowerCase();
    return childElements(this.contentTypesRoot(), NS.CT, "Default")
      .some(el => (getAttr(el, "Extension") ?? "").toLowerCase() === ext);
  }

  addDefaultContentType(extension: string, contentType: string): void {
    if (this.hasDefaultContentType(extension)) return;
    const root = this.contentTypesRoot();
    const el = root.ownerDocument.createElementNS(NS.CT, "Default");
    el.setAttribute("Extension", extension.toLowerCase());
    el.setAttribute("ContentType", contentType);
    const firstOverride = childElements(root, NS.CT, "Override")[0];
    if (firstOverride) {
      root.insertBefore(el, firstOverride);
    } else {
      root.appendChild(el);
    }
  }

  setOverride(partName: string, contentType: string): void {
    const root = this.contentTypesRoot();
    const wanted = `/${partName}`.toLowerCase();
    const existing = childElements(root, NS.CT, "Override")
      .find(el => (getAttr(el, "PartName") ?? "").toLowerCase() === wanted);
    if (existing) {
      existing.setAttribute("ContentType", contentType);
      return;
    }
    const el = root.ownerDocument.createElementNS(NS.CT, "Override");
    el.setAttribute("PartName", `/${partName}`);
    el.setAttribute("ContentType", contentType);
    root.appendChild(el);
  }

  // ---------------------------------------------------------------------------
  // Naming and serialization
  // ---------------------------------------------------------------------------

  mainPartName(): string {
    const main = this.relationships("").find(rel => rel.type === REL_TYPES.OFFICE_DOCUMENT);
    if (!main?.targetPart) {
      throw new ParseError(this.sourceLabel, "package has no main document relationship");
    }
    return main.targetPart;
  }

  /**
   * First unused name of the form `${prefix}${n}${suffix}`, counting from 1.
   */
  nextPartName(prefix: string, suffix: string): string {
    const existing = new Set(this.partNames().map(name => name.toLowerCase()));
    let n = 1;
    while (existing.has(`${prefix}${n}${suffix}`.toLowerCase())) n++;
    return `${prefix}${n}${suffix}`;
  }

  async toBuffer(): Promise<Buffer> {
    for (const [partName, doc] of this.docs) {
      this.zip.file(partName, serializeXml(doc));
    }
    return this.zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  }
}
