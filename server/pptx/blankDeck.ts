/**
 * Blank deck assets
 *
 * The built-in 4:3 deck (five layouts, a notes master and two themes) lives
 * as plain XML under assets/blank-deck/ and is zipped on demand.
 *
 * Layer: PPTX (package plumbing)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { fileURLToPath } from "url";
import JSZip from "jszip";

const ASSET_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../assets/blank-deck");

export const BLANK_DECK_PARTS = {
  NOTES_MASTER: "ppt/notesMasters/notesMaster1.xml",
  NOTES_THEME: "ppt/theme/theme2.xml",
} as const;

async function listAssetFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...await listAssetFiles(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

let cachedDeck: Promise<Uint8Array> | null = null;

async function zipBlankDeck(): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const file of await listAssetFiles(ASSET_DIR)) {
    const partName = path.relative(ASSET_DIR, file).split(path.sep).join("/");
    zip.file(partName, await fs.readFile(file));
  }
  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
}

/**
 * Bytes of the blank deck package. The archive is built once per process.
 */
export function blankDeckBytes(): Promise<Uint8Array> {
  if (!cachedDeck) {
    cachedDeck = zipBlankDeck().catch(error => {
      cachedDeck = null;
      throw error;
    });
  }
  return cachedDeck;
}

export async function blankDeckAssetText(partName: string): Promise<string> {
  return fs.readFile(path.join(ASSET_DIR, ...partName.split("/")), "utf8");
}
