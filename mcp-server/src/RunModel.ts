import { FillError, FillErrorCode } from './errors';
import { ContainerNode, FormattedContainer, Markup, Run, RunFormatting } from './types';
import {
  XmlElement,
  escapeXml,
  findAllElementsWithDepth,
  listChildElements,
  readElementAt,
  unescapeXml,
} from './XmlScanner';

/**
 * Run children that render something on their own. A token can never be
 * matched across one of these.
 */
const BARRIER_PATTERN =
  /<(?:w:tab|w:ptab|w:br|w:cr|w:drawing|w:pict|w:object|w:fldChar|w:instrText|w:sym|w:noBreakHyphen|w:softHyphen|w:footnoteReference|w:endnoteReference|w:commentReference|w:ruby|m:oMath|m:oMathPara)(?=[\s/>])/;

const DEFAULT_TEXT_OPEN = '<w:t>';

// ============================================================
// Parse
// ============================================================

/**
 * Parse one `<w:p>` element into a FormattedContainer.
 */
export function parseContainer(xml: string): FormattedContainer {
  const openMatch = /^<w:p(?=[\s/>])[^>]*>/.exec(xml);
  if (!openMatch) {
    throw new FillError('Container does not start with <w:p>', FillErrorCode.CORRUPT_ARCHIVE, {
      fragment: xml.substring(0, 80),
    });
  }
  const openTag = openMatch[0];
  if (openTag.endsWith('/>')) {
    return { head: openTag, nodes: [], tail: '', nextRunId: 0 };
  }
  if (!xml.endsWith('</w:p>')) {
    throw new FillError('Container does not end with </w:p>', FillErrorCode.CORRUPT_ARCHIVE, {
      fragment: xml.substring(0, 80),
    });
  }

  const inner = xml.substring(openTag.length, xml.length - '</w:p>'.length);
  let bodyStart = 0;
  const leading = /^\s*/.exec(inner)?.[0] ?? '';
  if (inner.startsWith('<w:pPr', leading.length)) {
    bodyStart = readElementAt(inner, leading.length).endIndex;
  }

  const container: FormattedContainer = {
    head: openTag + inner.substring(0, bodyStart),
    nodes: [],
    tail: '</w:p>',
    nextRunId: 0,
  };

  const body = inner.substring(bodyStart);
  let cursor = 0;
  for (const runElement of findAllElementsWithDepth(body, 'w:r')) {
    pushMarkup(container.nodes, body.substring(cursor, runElement.startIndex));
    container.nodes.push(...parseRunElement(runElement, container));
    cursor = runElement.endIndex;
  }
  pushMarkup(container.nodes, body.substring(cursor));

  return container;
}

function pushMarkup(nodes: ContainerNode[], xml: string): void {
  if (xml.length === 0) return;
  nodes.push({ kind: 'markup', xml, barrier: BARRIER_PATTERN.test(xml) });
}

/**
 * Split a `<w:r>` element into nodes. Consecutive `<w:t>` children form one
 * Run; any other children are kept as Markup wrapped in a copy of the run.
 */
function parseRunElement(element: XmlElement, container: FormattedContainer): ContainerNode[] {
  if (element.selfClosing) {
    return [{ kind: 'markup', xml: element.xml, barrier: false }];
  }

  let properties = '';
  let content = element.inner;
  const leading = /^\s*/.exec(content)?.[0] ?? '';
  if (content.startsWith('<w:rPr', leading.length)) {
    const rPr = readElementAt(content, leading.length);
    properties = content.substring(0, rPr.endIndex);
    content = content.substring(rPr.endIndex);
  }

  const children = listChildElements(content);
  if (children.length === 0) {
    return [{ kind: 'markup', xml: element.xml, barrier: false }];
  }

  const nodes: ContainerNode[] = [];
  let group: typeof children = [];
  const flush = (): void => {
    if (group.length === 0) return;
    const first = group[0];
    const last = group[group.length - 1];
    if (first.name === 'w:t') {
      const formatting: RunFormatting = {
        open: element.openTag,
        properties,
        textOpen: first.selfClosing ? DEFAULT_TEXT_OPEN : first.openTag,
      };
      nodes.push({
        kind: 'run',
        id: container.nextRunId++,
        text: group.map(child => unescapeXml(child.inner)).join(''),
        formatting,
      });
    } else {
      const childXml = content.substring(first.startIndex, last.endIndex);
      nodes.push({
        kind: 'markup',
        xml: `${element.openTag}${properties}${childXml}</w:r>`,
        barrier: BARRIER_PATTERN.test(childXml),
      });
    }
    group = [];
  };

  for (const child of children) {
    const isText = child.name === 'w:t';
    if (group.length > 0 && (group[0].name === 'w:t') !== isText) flush();
    group.push(child);
  }
  flush();

  return nodes;
}

// ============================================================
// Serialize
// ============================================================

export function serializeContainer(container: FormattedContainer): string {
  return container.head + container.nodes.map(serializeNode).join('') + container.tail;
}

export function serializeNode(node: ContainerNode): string {
  return node.kind === 'run' ? serializeRun(node) : node.xml;
}

/**
 * Write a run back out. Line endings (`\r\n`, `\r` or `\n`) become one
 * `<w:br/>` each and tabs become `<w:tab/>`; an empty run keeps an empty `<w:t>`.
 */
export function serializeRun(run: Run): string {
  const { open, properties, textOpen } = run.formatting;
  const pieces = run.text.split(/(\r\n|\r|\n|\t)/);
  const content =
    run.text.length === 0
      ? `${textOpen}</w:t>`
      : pieces
          .map(piece => {
            if (piece === '\r\n' || piece === '\r' || piece === '\n') return '<w:br/>';
            if (piece === '\t') return '<w:tab/>';
            if (piece.length === 0) return '';
            return `${textOpenFor(piece, textOpen)}${escapeXml(piece)}</w:t>`;
          })
          .join('');
  return `${open}${properties}${content}</w:r>`;
}

function textOpenFor(text: string, textOpen: string): string {
  if (text === text.trim() || /xml:space=/.test(textOpen)) return textOpen;
  return textOpen.replace(/^<w:t/, '<w:t xml:space="preserve"');
}

// ============================================================
// Queries
// ============================================================

export function containerRuns(container: FormattedContainer): Run[] {
  return container.nodes.filter((node): node is Run => node.kind === 'run');
}

export function containerText(container: FormattedContainer): string {
  return containerRuns(container)
    .map(run => run.text)
    .join('');
}

export function createRun(container: FormattedContainer, text: string, formatting: RunFormatting): Run {
  return { kind: 'run', id: container.nextRunId++, text, formatting: { ...formatting } };
}

export function createMarkup(xml: string, barrier: boolean): Markup {
  return { kind: 'markup', xml, barrier };
}
