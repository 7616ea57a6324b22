import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import JSZip from "jszip";
import { PresentationDocument, countSlides, isDeckReadError } from "../pptx/presentation";
import { NS, childElements, getAttr } from "../pptx/xml";
import { NotFoundError, OutOfRangeError, ParseError, ValidationError } from "../utils/errorHandler";
import { corruptZipEntry } from "./pptxFixtures";

describe("PresentationDocument", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    for (const dir of tempDirs.splice(0)) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  async function tempFile(name: string, data: Uint8Array | string): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "presentation-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, data);
    return filePath;
  }

  it("numbers slide ids from 256", async () => {
    const deck = await PresentationDocument.createBlank();
    deck.addSlide(0);
    deck.addSlide(4);

    const list = childElements(deck.presentationRoot(), NS.P, "sldIdLst")[0];
    expect(childElements(list, NS.P, "sldId").map(el => getAttr(el, "id"))).toEqual(["256", "257"]);
    expect(deck.slides().map(s => s.partName)).toEqual(["ppt/slides/slide1.xml", "ppt/slides/slide2.xml"]);
  });

  it("carries layout placeholders except footers onto new slides", async () => {
    const deck = await PresentationDocument.createBlank();
    const slide = deck.addSlide(1);
    const phs = childElements(deck.slideSpTree(slide), NS.P, "sp").map(sp => {
      const [nvSpPr] = childElements(sp, NS.P, "nvSpPr");
      const [nvPr] = childElements(nvSpPr, NS.P, "nvPr");
      const [ph] = childElements(nvPr, NS.P, "ph");
      return [getAttr(ph, "type") ?? null, getAttr(ph, "idx") ?? null];
    });
    expect(phs).toEqual([["title", null], [null, "1"]]);
  });

  it("rejects out-of-range slide and layout indexes", async () => {
    const deck = await PresentationDocument.createBlank();
    expect(() => deck.slide(0)).toThrow(OutOfRangeError);
    expect(() => deck.addSlide(5)).toThrow(OutOfRangeError);
    expect(() => deck.addSlide(-1)).toThrow(OutOfRangeError);
  });

  it("finds layouts by name fragment", async () => {
    const deck = await PresentationDocument.createBlank();
    expect(deck.findLayoutByName("CONTENT")).toBe(1);
    expect(deck.findLayoutByName("blank")).toBe(4);
    expect(deck.findLayoutByName("comparison")).toBeNull();
  });

  it("counts slides in a saved deck", async () => {
    const deck = await PresentationDocument.createBlank();
    deck.addSlide(0);
    deck.addSlide(1);
    deck.addSlide(1);
    const filePath = await tempFile("three.pptx", await deck.toBuffer());
    expect(await countSlides(filePath)).toBe(3);
  });

  it("reports missing files as NotFound", async () => {
    await expect(PresentationDocument.open("/nonexistent/deck.pptx")).rejects.toThrow(NotFoundError);
  });

  it("rejects zips that are not presentations", async () => {
    const zip = new JSZip();
    zip.file("[Content_Types].xml",
      '<?xml version="1.0"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/></Types>');
    zip.file("_rels/.rels",
      '<?xml version="1.0"?><Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/></Relationships>');
    zip.file("word/document.xml", "<document/>");
    const filePath = await tempFile("letter.pptx", await zip.generateAsync({ type: "uint8array" }));

    await expect(PresentationDocument.open(filePath)).rejects.toThrow(ParseError);
  });

  it("rejects malformed presentation XML", async () => {
    const deck = await PresentationDocument.createBlank();
    const zip = await JSZip.loadAsync(await deck.toBuffer());
    zip.file("ppt/presentation.xml", "not xml");
    const filePath = await tempFile("broken.pptx", await zip.generateAsync({ type: "uint8array" }));

    await expect(PresentationDocument.open(filePath)).rejects.toThrow("malformed XML in ppt/presentation.xml");
  });

  it("reports corrupt compressed entries as parse failures", async () => {
    const deck = await PresentationDocument.createBlank();
    deck.addSlide(0);
    const corrupt = corruptZipEntry(await deck.toBuffer(), "ppt/presentation.xml");
    const filePath = await tempFile("corrupt.pptx", corrupt);

    await expect(PresentationDocument.open(filePath)).rejects.toThrow(ParseError);
    await expect(PresentationDocument.open(filePath)).rejects.toThrow("could not read ppt/presentation.xml");
    await expect(countSlides(filePath)).rejects.toSatisfy(isDeckReadError);
  });

  it("classifies deck read errors", () => {
    expect(isDeckReadError(new NotFoundError("File x.pptx"))).toBe(true);
    expect(isDeckReadError(new ParseError("x.pptx", "bad"))).toBe(true);
    expect(isDeckReadError(Object.assign(new Error("denied"), { code: "EACCES", syscall: "open" }))).toBe(true);
    expect(isDeckReadError(new ValidationError("x"))).toBe(false);
    expect(isDeckReadError(new TypeError("bug"))).toBe(false);
  });
});
