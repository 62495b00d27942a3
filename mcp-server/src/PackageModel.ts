import * as path from 'path';
import { NAMESPACES } from './constants';
import { FillError, FillErrorCode } from './errors';
import { Relationship } from './types';
import { escapeXml, readAttributes } from './XmlScanner';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

// ============================================================
// Part paths
// ============================================================

/** `word/document.xml` → `word/_rels/document.xml.rels`; `''` → `_rels/.rels` */
export function relsPathFor(partPath: string): string {
  const dir = path.posix.dirname(partPath);
  const base = path.posix.basename(partPath);
  return dir === '.' ? `_rels/${base}.rels` : `${dir}/_rels/${base}.rels`;
}

/** Resolve a relationship target against the directory of its source part */
export function resolveTarget(sourcePath: string, target: string): string {
  if (target.startsWith('/')) return target.substring(1);
  return path.posix.normalize(path.posix.join(path.posix.dirname(sourcePath), target));
}

/** Inverse of resolveTarget */
export function relativeTarget(sourcePath: string, targetPath: string): string {
  return path.posix.relative(path.posix.dirname(sourcePath), targetPath);
}

/** Kind of a relationship: the last path segment of its type URI */
export function relationshipKind(type: string): string {
  return type.substring(type.lastIndexOf('/') + 1);
}

/**
 * Insert entries before the closing tag of the root element, expanding a
 * self-closing root if needed. Every original byte is kept.
 */
function insertBeforeRootClose(xml: string, rootName: string, entries: string): string {
  const closeTag = `</${rootName}>`;
  const closeIndex = xml.lastIndexOf(closeTag);
  if (closeIndex !== -1) {
    return xml.substring(0, closeIndex) + entries + xml.substring(closeIndex);
  }
  const selfClosing = new RegExp(`<${rootName}(\\s[^>]*)?/>`).exec(xml);
  if (!selfClosing) {
    throw new FillError(`Missing <${rootName}> root element`, FillErrorCode.CORRUPT_ARCHIVE, { root: rootName });
  }
  const openTag = selfClosing[0].replace(/\s*\/>$/, '>');
  return (
    xml.substring(0, selfClosing.index) +
    openTag +
    entries +
    closeTag +
    xml.substring(selfClosing.index + selfClosing[0].length)
  );
}

// ============================================================
// Relationships
// ============================================================

/**
 * Relationships of one source part. Entries added during a fill are kept
 * apart so that rendering can append them to the original XML untouched.
 */
export class RelationshipSet {
  private readonly _entries: Relationship[];
  private readonly _added: Relationship[] = [];

  private constructor(
    readonly sourcePath: string,
    readonly relsPath: string,
    private readonly _originalXml: string | null,
    entries: Relationship[]
  ) {
    this._entries = entries;
  }

  static parse(sourcePath: string, xml: string | null): RelationshipSet {
    const entries: Relationship[] = [];
    if (xml !== null) {
      for (const match of xml.matchAll(/<Relationship\b[^>]*>/g)) {
        const attributes = readAttributes(match[0]);
        entries.push({
          id: attributes.get('Id') ?? '',
          type: attributes.get('Type') ?? '',
          target: attributes.get('Target') ?? '',
          external: attributes.get('TargetMode') === 'External',
        });
      }
    }
    return new RelationshipSet(sourcePath, relsPathFor(sourcePath), xml, entries);
  }

  get entries(): readonly Relationship[] {
    return this._entries;
  }

  get isModified(): boolean {
    return this._added.length > 0;
  }

  get exists(): boolean {
    return this._originalXml !== null;
  }

  /** Parts (resolved paths) targeted by internal relationships of this kind */
  targetsOfKind(kind: string): string[] {
    return this._entries
      .filter(entry => !entry.external && relationshipKind(entry.type) === kind)
      .map(entry => resolveTarget(this.sourcePath, entry.target));
  }

  /** Append a relationship with a fresh `rIdN` id */
  add(type: string, target: string): Relationship {
    const ids = new Set(this._entries.map(entry => entry.id));
    let next = 1;
    for (const id of ids) {
      const match = /^rId(\d+)$/.exec(id);
      if (match) next = Math.max(next, parseInt(match[1], 10) + 1);
    }
    while (ids.has(`rId${next}`)) next++;

    const relationship: Relationship = { id: `rId${next}`, type, target, external: false };
    this._entries.push(relationship);
    this._added.push(relationship);
    return relationship;
  }

  render(): string {
    const added = this._added
      .map(entry => `<Relationship Id="${escapeXml(entry.id)}" Type="${escapeXml(entry.type)}" Target="${escapeXml(entry.target)}"/>`)
      .join('');
    if (this._originalXml === null) {
      return `${XML_DECLARATION}\n<Relationships xmlns="${NAMESPACES.RELS}">${added}</Relationships>`;
    }
    return added.length === 0 ? this._originalXml : insertBeforeRootClose(this._originalXml, 'Relationships', added);
  }
}

// ============================================================
// Content types
// ============================================================

export class ContentTypeRegistry {
  private readonly _defaults = new Map<string, string>();
  private readonly _overrides = new Map<string, string>();
  private readonly _added: string[] = [];

  private constructor(private readonly _originalXml: string) {}

  static parse(xml: string): ContentTypeRegistry {
    const registry = new ContentTypeRegistry(xml);
    for (const match of xml.matchAll(/<(Default|Override)\b[^>]*>/g)) {
      const attributes = readAttributes(match[0]);
      const contentType = attributes.get('ContentType') ?? '';
      if (match[1] === 'Default') {
        registry._defaults.set((attributes.get('Extension') ?? '').toLowerCase(), contentType);
      } else {
        registry._overrides.set((attributes.get('PartName') ?? '').replace(/^\//, ''), contentType);
      }
    }
    return registry;
  }

  get isModified(): boolean {
    return this._added.length > 0;
  }

  contentTypeFor(partPath: string): string | null {
    const override = this._overrides.get(partPath);
    if (override !== undefined) return override;
    const extension = path.posix.extname(partPath).substring(1).toLowerCase();
    return this._defaults.get(extension) ?? null;
  }

  hasDefault(extension: string): boolean {
    return this._defaults.has(extension.toLowerCase());
  }

  /** Register a Default for the extension unless one exists */
  ensureDefault(extension: string, contentType: string): void {
    const key = extension.toLowerCase();
    if (this._defaults.has(key)) return;
    this._defaults.set(key, contentType);
    this._added.push(`<Default Extension="${escapeXml(key)}" ContentType="${escapeXml(contentType)}"/>`);
  }

  render(): string {
    return this._added.length === 0
      ? this._originalXml
      : insertBeforeRootClose(this._originalXml, 'Types', this._added.join(''));
  }
}
