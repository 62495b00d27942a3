import { ImageWidthTable, IMAGE_WIDTHS } from './constants';
import { FormattedContainer, Span, TokenKind, TokenMatch } from './types';

/** Token syntax: `{{NAME}}` with NAME drawn from [A-Z0-9_] */
export const TOKEN_PATTERN = /\{\{([A-Z0-9_]+)\}\}/g;

/** Stands in for barrier markup in the logical text; never part of a name */
export const BARRIER_CHAR = '\uFFFC';

export interface CharPosition {
  run: number;
  offset: number;
}

export interface LogicalText {
  text: string;
  /** Source of each character; null for barrier placeholders */
  positions: Array<CharPosition | null>;
}

/**
 * Concatenate the text of every run in the container, recording where each
 * character came from.
 */
export function buildLogicalText(container: FormattedContainer): LogicalText {
  let text = '';
  const positions: Array<CharPosition | null> = [];
  let runIndex = 0;

  for (const node of container.nodes) {
    if (node.kind === 'markup') {
      if (node.barrier) {
        text += BARRIER_CHAR;
        positions.push(null);
      }
      continue;
    }
    for (let offset = 0; offset < node.text.length; offset++) {
      positions.push({ run: runIndex, offset });
    }
    text += node.text;
    runIndex++;
  }

  return { text, positions };
}

export function classifyToken(name: string, widths: ImageWidthTable = IMAGE_WIDTHS): TokenKind {
  return Object.prototype.hasOwnProperty.call(widths, name) ? 'image' : 'text';
}

/**
 * Map a [start, end) range of the logical text back to a Span.
 */
export function toSpan(logical: LogicalText, start: number, end: number): Span {
  const first = logical.positions[start];
  const last = logical.positions[end - 1];
  if (!first || !last) {
    throw new RangeError(`Range ${start}..${end} touches a barrier`);
  }
  return {
    startRun: first.run,
    startOffset: first.offset,
    endRun: last.run,
    endOffset: last.offset + 1,
  };
}

/**
 * Find every token in the container, left to right and non-overlapping.
 * Run boundaries may fall anywhere inside a token.
 */
export function scanTokens(container: FormattedContainer, widths: ImageWidthTable = IMAGE_WIDTHS): TokenMatch[] {
  const logical = buildLogicalText(container);
  if (!logical.text.includes('{{')) return [];

  const matches: TokenMatch[] = [];
  for (const match of logical.text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    const name = match[1];
    matches.push({
      name,
      kind: classifyToken(name, widths),
      span: toSpan(logical, start, start + match[0].length),
    });
  }
  return matches;
}
