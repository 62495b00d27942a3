// ============================================================
// Run model
// ============================================================

/**
 * Markup that belongs to a run but is never interpreted: copied as-is onto
 * every run cut from the original one.
 */
export interface RunFormatting {
  /** Opening `<w:r ...>` tag */
  open: string;
  /** `<w:rPr>` block, or empty */
  properties: string;
  /** Opening `<w:t ...>` tag of the first text element */
  textOpen: string;
}

export interface Run {
  kind: 'run';
  /** Stable within its container; only used for ordering and identity */
  id: number;
  text: string;
  formatting: RunFormatting;
}

export interface Markup {
  kind: 'markup';
  xml: string;
  /** Renders content of its own (tab, break, drawing, field); tokens cannot span it */
  barrier: boolean;
}

export type ContainerNode = Run | Markup;

/** One `<w:p>` element */
export interface FormattedContainer {
  /** Opening tag plus `<w:pPr>` */
  head: string;
  nodes: ContainerNode[];
  /** Closing `</w:p>` tag (empty for a self-closing paragraph) */
  tail: string;
  /** Next free run id */
  nextRunId: number;
}

/** Half-open range over the container's runs covering exactly one token */
export interface Span {
  startRun: number;
  startOffset: number;
  endRun: number;
  endOffset: number;
}

export type TokenKind = 'text' | 'image';

export interface TokenMatch {
  name: string;
  kind: TokenKind;
  span: Span;
}

// ============================================================
// Package model
// ============================================================

export interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

export interface DecodedImage {
  bytes: Buffer;
  mimeType: string;
  extension: string;
  /** Native size in pixels */
  width: number;
  height: number;
}

export interface Placement {
  widthEmu: number;
  heightEmu: number;
  widthInches: number;
  heightInches: number;
}

export interface MediaAsset {
  token: string;
  partPath: string;
  mediaPath: string;
  relationshipId: string;
  mimeType: string;
  widthEmu: number;
  heightEmu: number;
}

// ============================================================
// Fill request / result
// ============================================================

export interface FillRequest {
  /** Placeholder name → replacement text */
  placeholders?: Record<string, string>;
  /** Image placeholder name → base64 image (plain or data URI) */
  images?: Record<string, string>;
}

export interface FillReport {
  replacedTokens: string[];
  unresolvedTokens: string[];
  insertedImages: MediaAsset[];
  ignoredImages: string[];
  unusedValues: string[];
  discardedImageTokens: string[];
}

export interface FillResult {
  document: Buffer;
  report: FillReport;
}

export interface PlaceholderInfo {
  name: string;
  kind: TokenKind;
  parts: string[];
  occurrences: number;
}
