import { containerRuns, createRun } from './RunModel';
import { ContainerNode, FormattedContainer, Span, TokenMatch } from './types';

export interface SubstitutionOutcome {
  /** Names replaced, in document order */
  applied: string[];
  /** Names found without a supplied value */
  unresolved: string[];
}

/**
 * Replace the text covered by `span` with `value`.
 *
 * The inserted run copies the start run's formatting. Text before the span in
 * the start run and after it in the end run stays in runs carrying their
 * original formatting. Runs fully inside the span are dropped; markup between
 * them (bookmarks, proofing marks, wrapper tags) is kept in place.
 */
export function replaceSpan(container: FormattedContainer, span: Span, value: string): void {
  const runs = containerRuns(container);
  const startRun = runs[span.startRun];
  const endRun = runs[span.endRun];
  if (!startRun || !endRun) {
    throw new RangeError(`Span ${span.startRun}..${span.endRun} is outside the container (${runs.length} runs)`);
  }

  const startNode = container.nodes.indexOf(startRun);
  const endNode = container.nodes.indexOf(endRun);

  const prefix = startRun.text.substring(0, span.startOffset);
  const suffix = endRun.text.substring(span.endOffset);

  const replacement: ContainerNode[] = [];
  if (prefix.length > 0) {
    replacement.push({ ...startRun, text: prefix });
  }
  replacement.push(createRun(container, value, startRun.formatting));
  for (const node of container.nodes.slice(startNode + 1, endNode)) {
    if (node.kind === 'markup') replacement.push(node);
  }
  if (suffix.length > 0) {
    // The suffix keeps the end run's identity unless that run also became the prefix
    const id = span.startRun === span.endRun && prefix.length > 0 ? container.nextRunId++ : endRun.id;
    replacement.push({ ...endRun, id, text: suffix });
  }

  container.nodes.splice(startNode, endNode - startNode + 1, ...replacement);
}

/**
 * Apply every text token that has a value. Matches are applied from last to
 * first so that earlier spans keep pointing at the same runs.
 */
export function substituteTextTokens(
  container: FormattedContainer,
  matches: TokenMatch[],
  values: ReadonlyMap<string, string>
): SubstitutionOutcome {
  const applied: string[] = [];
  const unresolved: string[] = [];

  for (let i = matches.length - 1; i >= 0; i--) {
    const match = matches[i];
    if (match.kind !== 'text') continue;
    const value = values.get(match.name);
    if (value === undefined) {
      unresolved.unshift(match.name);
      continue;
    }
    replaceSpan(container, match.span, value);
    applied.unshift(match.name);
  }

  return { applied, unresolved };
}
