/**
 * OOXML DOM helpers
 *
 * Thin layer over @xmldom/xmldom: parsing with hard failures, namespace-aware
 * child lookups, and element construction by qualified name.
 *
 * xmldom returns "" rather than null for missing attributes, so attribute
 * reads go through getAttr().
 *
 * Layer: PPTX (package plumbing)
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

export const NS = {
  A: "http://schemas.openxmlformats.org/drawingml/2006/main",
  P: "http://schemas.openxmlformats.org/presentationml/2006/main",
  R: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  PKG_REL: "http://schemas.openxmlformats.org/package/2006/relationships",
  CT: "http://schemas.openxmlformats.org/package/2006/content-types",
} as const;

const PREFIX_NS: Record<string, string> = {
  a: NS.A,
  p: NS.P,
  r: NS.R,
};

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export const ROOT_NAMESPACES =
  `xmlns:a="${NS.A}" xmlns:r="${NS.R}" xmlns:p="${NS.P}"`;

export class XmlSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "XmlSyntaxError";
  }
}

export function parseXml(source: string): Document {
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => {
        throw new XmlSyntaxError(msg);
      },
      fatalError: (msg: string) => {
        throw new XmlSyntaxError(msg);
      },
    },
  });
  const doc = parser.parseFromString(source.replace(/^\uFEFF/, ""), "text/xml");
  if (!doc || !doc.documentElement) {
    throw new XmlSyntaxError("document has no root element");
  }
  return doc;
}

export function serializeXml(doc: Document): string {
  const xml = new XMLSerializer().serializeToString(doc);
  return xml.startsWith("<?xml") ? xml : `${XML_DECLARATION}\n${xml}`;
}

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === 1;
}

export function rootElement(doc: Document): Element {
  const root = doc.documentElement;
  if (!root) {
    throw new XmlSyntaxError("document has no root element");
  }
  return root;
}

export function childElements(parent: Element | Document, ns?: string, localName?: string): Element[] {
  const result: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (!isElement(node)) continue;
    if (ns !== undefined && node.namespaceURI !== ns) continue;
    if (localName !== undefined && node.localName !== localName) continue;
    result.push(node);
  }
  return result;
}

export function firstChild(parent: Element | Document, ns: string, localName: string): Element | null {
  return childElements(parent, ns, localName)[0] ?? null;
}

/**
 * Follows a path of direct children, e.g. childPath(sp, [NS.P, "nvSpPr"], [NS.P, "nvPr"]).
 */
export function childPath(start: Element, ...steps: Array<[string, string]>): Element | null {
  let current: Element | null = start;
  for (const [ns, localName] of steps) {
    if (!current) return null;
    current = firstChild(current, ns, localName);
  }
  return current;
}

export function descendants(parent: Element | Document, ns: string, localName: string): Element[] {
  const list = parent.getElementsByTagNameNS(ns, localName);
  const result: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const item = list.item(i);
    if (item) result.push(item);
  }
  return result;
}

export function getAttr(el: Element, name: string): string | undefined {
  if (!el.hasAttribute(name)) return undefined;
  return el.getAttribute(name) ?? undefined;
}

export function getIntAttr(el: Element, name: string, fallback: number): number {
  const raw = getAttr(el, name);
  if (raw === undefined) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export function attributes(el: Element): Attr[] {
  const result: Attr[] = [];
  for (let i = 0; i < el.attributes.length; i++) {
    const attr = el.attributes.item(i);
    if (attr) result.push(attr);
  }
  return result;
}

function namespaceForQName(qname: string): string {
  const prefix = qname.includes(":") ? qname.split(":")[0] : "";
  const ns = PREFIX_NS[prefix];
  if (!ns) {
    throw new Error(`Unknown namespace prefix in ${qname}`);
  }
  return ns;
}

/**
 * Builds an a:/p:/r: element. Attribute names may carry the r: prefix.
 */
export function createElement(
  doc: Document,
  qname: string,
  attrs: Record<string, string | number | undefined> = {},
  children: Array<Element | string> = [],
): Element {
  const el = doc.createElementNS(namespaceForQName(qname), qname);
  for (const [name, value] of Object.entries(attrs)) {
    if (value === undefined) continue;
    if (name.includes(":")) {
      el.setAttributeNS(namespaceForQName(name), name, String(value));
    } else {
      el.setAttribute(name, String(value));
    }
  }
  for (const child of children) {
    el.appendChild(typeof child === "string" ? doc.createTextNode(child) : child);
  }
  return el;
}

export function removeChildren(parent: Element, ns: string, localName: string): void {
  for (const child of childElements(parent, ns, localName)) {
    parent.removeChild(child);
  }
}

/**
 * Inserts `child` before the first existing child whose local name is in
 * `before`, or appends it. Keeps schema element order intact.
 */
export function insertBeforeAny(parent: Element, child: Element, ns: string, before: readonly string[]): void {
  const anchor = childElements(parent, ns).find(el => before.includes(el.localName));
  if (anchor) {
    parent.insertBefore(child, anchor);
  } else {
    parent.appendChild(child);
  }
}
