/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Keyword classification policy.
 * Downstream ranking and the section refinement threshold are tuned against
 * these exact values; change them together or not at all.
 */
export const CLASSIFICATION_CONSTANTS = {
  /** Multiplier applied when a matched keyword also appears in the theme name. */
  THEME_MATCH_BOOST: 1.5,
  MAX_CONFIDENCE: 1.0,
  CONFIDENCE_DECIMALS: 3,
  /** operational_details fans out to a refined section only at this many hits. */
  REFINEMENT_MIN_MATCHES: 2,
} as const;

export const SEARCH_CONSTANTS = {
  MIN_TOKEN_LENGTH: 2,
  /** Multiplier applied when any query token appears in the theme name. */
  THEME_MATCH_BOOST: 1.3,
  /** Score is scaled by (CONFIDENCE_FLOOR + (1 - CONFIDENCE_FLOOR) * confidence). */
  CONFIDENCE_FLOOR: 0.5,
  MAX_SCORE: 1.0,
  SCORE_DECIMALS: 3,
  DEFAULT_LIMIT: 10,
  DEFAULT_RETRIEVAL_LIMIT: 20,
  DEFAULT_MAX_PER_SECTION: 5,
  EXCERPT_LENGTH: 200,
} as const;

/**
 * Slide library directory conventions.
 */
export const LIBRARY_FILES = {
  DECK_EXTENSION: ".pptx",
  TEXT_EXTENSION: ".txt",
  METADATA_EXTENSION: ".json",
  /** Checked in this order; the first existing file wins. */
  THUMBNAIL_EXTENSIONS: [".png", ".jpg", ".jpeg"],
  SLIDE_ID_PREFIX: "slide_",
  SLIDE_ID_DIGITS: 4,
  THEME_SAMPLE_KEYWORDS: 10,
  KEYWORDS_PER_SLIDE_SAMPLE: 3,
} as const;

/**
 * Deck geometry, in EMU (914400 per inch).
 */
export const DECK_CONSTANTS = {
  EMU_PER_INCH: 914400,
  TABLE_LEFT: 457200,
  TABLE_TOP: 1371600,
  TABLE_WIDTH: 8229600,
  TABLE_ROW_HEIGHT: 274320,
  DEFAULT_SLIDE_WIDTH: 9144000,
  DEFAULT_SLIDE_HEIGHT: 6858000,
  /** p:sldId values below this are reserved by the format. */
  MIN_SLIDE_ID: 256,
  NOTES_SEPARATOR: "\n\n",
} as const;

export const LAYOUT_NAME_HINTS = {
  CONTENT: "content",
  SECTION: "section",
  BLANK: "blank",
} as const;
