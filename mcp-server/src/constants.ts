/**
 * Fixed tables shared by the engine. Immutable after load.
 */

// ============================================================
// Image placeholders
// ============================================================

export type ImageWidthTable = Readonly<Record<string, number>>;

/** Image placeholder → target width in inches; height follows the aspect ratio */
export const IMAGE_WIDTHS: ImageWidthTable = Object.freeze({
  IMAGE_SOURCES_USES: 6.5,
  IMAGE_CAPITAL_STACK_CLOSING: 6.5,
  IMAGE_LOAN_TO_COST: 6.0,
  IMAGE_LTV_LTC: 6.0,
  IMAGE_AERIAL_MAP: 5.0,
  IMAGE_LOCATION_MAP: 5.0,
  IMAGE_REGIONAL_MAP: 5.0,
  IMAGE_SITE_PLAN: 5.5,
  IMAGE_PILOT_SCHEDULE: 6.0,
  IMAGE_TAKEOUT_SIZING: 6.0,
});

/** 1 inch = 914400 EMU */
export const EMU_PER_INCH = 914400;

// ============================================================
// Package parts and namespaces
// ============================================================

export const CONTENT_TYPES_PATH = '[Content_Types].xml';
export const DEFAULT_MAIN_DOCUMENT_PATH = 'word/document.xml';
export const RELS_CONTENT_TYPE = 'application/vnd.openxmlformats-package.relationships+xml';

export const NAMESPACES = {
  WP: 'http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing',
  A: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  PIC: 'http://schemas.openxmlformats.org/drawingml/2006/picture',
  R: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  RELS: 'http://schemas.openxmlformats.org/package/2006/relationships',
} as const;

/** Relationship kinds, matched on the last segment of the relationship type */
export const RELATIONSHIP_KINDS = {
  OFFICE_DOCUMENT: 'officeDocument',
  HEADER: 'header',
  FOOTER: 'footer',
  FOOTNOTES: 'footnotes',
  ENDNOTES: 'endnotes',
  IMAGE: 'image',
} as const;

export const IMAGE_RELATIONSHIP_TYPE = `${NAMESPACES.R}/${RELATIONSHIP_KINDS.IMAGE}`;

/** Parts besides the main document whose paragraphs are filled */
export const TEXT_PART_KINDS: readonly string[] = [
  RELATIONSHIP_KINDS.HEADER,
  RELATIONSHIP_KINDS.FOOTER,
  RELATIONSHIP_KINDS.FOOTNOTES,
  RELATIONSHIP_KINDS.ENDNOTES,
];
