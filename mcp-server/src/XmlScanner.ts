import { FillError, FillErrorCode } from './errors';

/**
 * String-level XML helpers. Parts are edited by splicing their text rather
 * than through a DOM so that every byte outside an edited element survives.
 */

export interface XmlElement {
  /** Full element text, opening tag through closing tag */
  xml: string;
  startIndex: number;
  endIndex: number;
  openTag: string;
  /** Content between the opening and closing tags ('' when self-closing) */
  inner: string;
  selfClosing: boolean;
}

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

export function unescapeXml(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (entity, body: string) => {
    if (body.startsWith('#x')) return fromCharacterReference(entity, parseInt(body.slice(2), 16));
    if (body.startsWith('#')) return fromCharacterReference(entity, parseInt(body.slice(1), 10));
    return NAMED_ENTITIES[body] ?? entity;
  });
}

function fromCharacterReference(entity: string, codePoint: number): string {
  if (codePoint > MAX_CODE_POINT) {
    throw new FillError(`Character reference out of range: ${entity}`, FillErrorCode.CORRUPT_ARCHIVE, { entity });
  }
  return String.fromCodePoint(codePoint);
}

// Control characters other than tab, LF and CR, the two noncharacters at the
// end of the BMP, and unpaired surrogates.
const ILLEGAL_XML_CHAR =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * First character XML 1.0 cannot represent, as `U+XXXX`, or null when the
 * text is safe to write.
 */
export function findIllegalXmlChar(text: string): string | null {
  const match = ILLEGAL_XML_CHAR.exec(text);
  if (!match) return null;
  return `U+${match[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Read the attributes of an opening tag into a map keyed by qualified name.
 */
export function readAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>();
  const attrRegex = /([\w:.-]+)\s*=\s*("([^"]*)"|'([^']*)')/g;
  let match: RegExpExecArray | null;
  while ((match = attrRegex.exec(tag)) !== null) {
    attributes.set(match[1], unescapeXml(match[3] ?? match[4] ?? ''));
  }
  return attributes;
}

/**
 * Find every outermost element with the given qualified name, tracking depth
 * so that an element nested inside another of the same name (a paragraph in
 * a text box, a run inside that paragraph) stays part of its host.
 * @param xml The XML string to search in
 * @param qualifiedName Element name with prefix (e.g. 'w:p')
 */
export function findAllElementsWithDepth(xml: string, qualifiedName: string): XmlElement[] {
  const elements: XmlElement[] = [];
  const tagPattern = new RegExp(`<(/?)${escapeRegex(qualifiedName)}(?=[\\s/>])[^>]*>`, 'g');

  let depth = 0;
  let startIndex = -1;
  let openTag = '';
  let match: RegExpExecArray | null;

  while ((match = tagPattern.exec(xml)) !== null) {
    const tag = match[0];
    if (match[1] === '/') {
      if (depth === 0) {
        throw new FillError(`Unexpected </${qualifiedName}> at offset ${match.index}`, FillErrorCode.CORRUPT_ARCHIVE, {
          element: qualifiedName,
          offset: match.index,
        });
      }
      depth--;
      if (depth === 0) {
        const endIndex = match.index + tag.length;
        elements.push({
          xml: xml.substring(startIndex, endIndex),
          startIndex,
          endIndex,
          openTag,
          inner: xml.substring(startIndex + openTag.length, match.index),
          selfClosing: false,
        });
      }
      continue;
    }

    const selfClosing = tag.endsWith('/>');
    if (depth === 0) {
      if (selfClosing) {
        elements.push({
          xml: tag,
          startIndex: match.index,
          endIndex: match.index + tag.length,
          openTag: tag,
          inner: '',
          selfClosing: true,
        });
        continue;
      }
      startIndex = match.index;
      openTag = tag;
    }
    if (!selfClosing) depth++;
  }

  if (depth !== 0) {
    throw new FillError(`Unclosed <${qualifiedName}> at offset ${startIndex}`, FillErrorCode.CORRUPT_ARCHIVE, {
      element: qualifiedName,
      offset: startIndex,
    });
  }

  return elements;
}

/**
 * Read the element (or comment) that starts at `start`.
 */
export function readElementAt(xml: string, start: number): XmlElement & { name: string } {
  if (xml.startsWith('<!--', start)) {
    const close = xml.indexOf('-->', start);
    if (close === -1) {
      throw new FillError(`Unclosed comment at offset ${start}`, FillErrorCode.CORRUPT_ARCHIVE, { offset: start });
    }
    const endIndex = close + 3;
    const text = xml.substring(start, endIndex);
    return { name: '#comment', xml: text, startIndex: start, endIndex, openTag: text, inner: '', selfClosing: true };
  }

  const nameMatch = /^<([\w:.-]+)/.exec(xml.substring(start, start + 256));
  if (!nameMatch) {
    throw new FillError(`Expected an element at offset ${start}`, FillErrorCode.CORRUPT_ARCHIVE, { offset: start });
  }
  const name = nameMatch[1];
  const tagPattern = new RegExp(`<(/?)${escapeRegex(name)}(?=[\\s/>])[^>]*>`, 'g');
  tagPattern.lastIndex = start;

  let depth = 0;
  let openTag = '';
  let match: RegExpExecArray | null;
  while ((match = tagPattern.exec(xml)) !== null) {
    const tag = match[0];
    if (match[1] === '/') {
      depth--;
      if (depth === 0) {
        const endIndex = match.index + tag.length;
        return {
          name,
          xml: xml.substring(start, endIndex),
          startIndex: start,
          endIndex,
          openTag,
          inner: xml.substring(start + openTag.length, match.index),
          selfClosing: false,
        };
      }
      continue;
    }
    if (depth === 0) {
      openTag = tag;
      if (tag.endsWith('/>')) {
        return { name, xml: tag, startIndex: start, endIndex: start + tag.length, openTag: tag, inner: '', selfClosing: true };
      }
    }
    if (!tag.endsWith('/>')) depth++;
  }

  throw new FillError(`Unclosed <${name}> at offset ${start}`, FillErrorCode.CORRUPT_ARCHIVE, {
    element: name,
    offset: start,
  });
}

/**
 * List the direct child elements of an element's content, skipping the
 * whitespace between them.
 */
export function listChildElements(xml: string): Array<XmlElement & { name: string }> {
  const children: Array<XmlElement & { name: string }> = [];
  let pos = 0;
  while (pos < xml.length) {
    const next = xml.indexOf('<', pos);
    if (next === -1) break;
    const child = readElementAt(xml, next);
    children.push(child);
    pos = child.endIndex;
  }
  return children;
}

/**
 * Replace elements found by findAllElementsWithDepth. The callback returns
 * the new element text, or null to keep the original bytes.
 */
export function replaceElements(
  xml: string,
  qualifiedName: string,
  replace: (element: XmlElement, index: number) => string | null
): string {
  const elements = findAllElementsWithDepth(xml, qualifiedName);
  let result = '';
  let cursor = 0;
  elements.forEach((element, index) => {
    const replacement = replace(element, index);
    if (replacement === null) return;
    result += xml.substring(cursor, element.startIndex) + replacement;
    cursor = element.endIndex;
  });
  return cursor === 0 ? xml : result + xml.substring(cursor);
}
