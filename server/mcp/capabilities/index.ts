/**
 * Capability registry. Order is the order list() reports.
 *
 * Capabilities validate input and call into the slide library or the deck
 * builder; they hold no logic of their own beyond shaping results.
 *
 * Layer: MCP (tool layer)
 */

import { indexSlideLibrary } from "./indexSlideLibrary";
import { searchSlideLibrary } from "./searchSlideLibrary";
import { getSlideLibraryStats } from "./getSlideLibraryStats";
import { listSlideThemes } from "./listSlideThemes";
import { selectSlidesForProposal } from "./selectSlidesForProposal";
import { analyzePptxTemplate } from "./analyzePptxTemplate";
import { createProposalDeck } from "./createProposalDeck";
import { addProposalSlide } from "./addProposalSlide";
import { cloneLibrarySlide } from "./cloneLibrarySlide";
import { buildFullProposal } from "./buildFullProposal";
import { describeProposalDeck } from "./describeProposalDeck";
import { saveProposalDeck } from "./saveProposalDeck";
import type { Capability } from "../types";

export const capabilities: Capability[] = [
  indexSlideLibrary,
  searchSlideLibrary,
  getSlideLibraryStats,
  listSlideThemes,
  selectSlidesForProposal,
  analyzePptxTemplate,
  createProposalDeck,
  addProposalSlide,
  cloneLibrarySlide,
  buildFullProposal,
  describeProposalDeck,
  saveProposalDeck,
];
