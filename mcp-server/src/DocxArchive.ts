import JSZip from 'jszip';
import * as path from 'path';
import {
  CONTENT_TYPES_PATH,
  DEFAULT_MAIN_DOCUMENT_PATH,
  RELATIONSHIP_KINDS,
  RELS_CONTENT_TYPE,
} from './constants';
import { FillError, FillErrorCode } from './errors';
import { ContentTypeRegistry, RelationshipSet, relativeTarget, relsPathFor } from './PackageModel';
import { Relationship } from './types';

interface EntryInfo {
  name: string;
  dir: boolean;
  date: Date;
}

const MIME_EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpeg',
  'image/jpg': 'jpeg',
  'image/gif': 'gif',
  'image/bmp': 'bmp',
  'image/tiff': 'tiff',
  'image/webp': 'webp',
};

/**
 * In-memory document archive: every zip entry as raw bytes plus the
 * relationship and content-type models. Nothing is written back to the
 * caller's buffer; serialize() produces a fresh archive in which every part
 * that was not set keeps its original bytes.
 */
export class DocxArchive {
  private readonly _parts = new Map<string, Uint8Array>();
  private readonly _dirty = new Set<string>();
  private readonly _addedParts: string[] = [];
  private readonly _relationships = new Map<string, RelationshipSet>();
  private _mainDocumentPath = DEFAULT_MAIN_DOCUMENT_PATH;

  private constructor(
    private readonly _entries: EntryInfo[],
    private readonly _contentTypes: ContentTypeRegistry
  ) {}

  // ============================================================
  // Open
  // ============================================================

  public static async open(data: Uint8Array): Promise<DocxArchive> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (err) {
      throw new FillError(
        `Template is not a valid zip archive: ${err instanceof Error ? err.message : String(err)}`,
        FillErrorCode.CORRUPT_ARCHIVE
      );
    }

    const entries: EntryInfo[] = [];
    const files: Array<{ name: string; file: JSZip.JSZipObject }> = [];
    zip.forEach((relativePath, file) => {
      entries.push({ name: relativePath, dir: file.dir, date: file.date });
      if (!file.dir) files.push({ name: relativePath, file });
    });

    const contents = await Promise.all(files.map(({ file }) => file.async('uint8array')));

    const contentTypesIndex = files.findIndex(({ name }) => name === CONTENT_TYPES_PATH);
    if (contentTypesIndex === -1) {
      throw new FillError(`Missing required part: ${CONTENT_TYPES_PATH}`, FillErrorCode.CORRUPT_ARCHIVE, {
        part: CONTENT_TYPES_PATH,
      });
    }

    const archive = new DocxArchive(
      entries,
      ContentTypeRegistry.parse(Buffer.from(contents[contentTypesIndex]).toString('utf8'))
    );
    files.forEach(({ name }, i) => archive._parts.set(name, contents[i]));

    const [mainPath] = archive.getRelationshipSet('').targetsOfKind(RELATIONSHIP_KINDS.OFFICE_DOCUMENT);
    archive._mainDocumentPath = mainPath ?? DEFAULT_MAIN_DOCUMENT_PATH;
    if (!archive._parts.has(archive._mainDocumentPath)) {
      throw new FillError(
        `Missing required part: ${archive._mainDocumentPath}`,
        FillErrorCode.CORRUPT_ARCHIVE,
        { part: archive._mainDocumentPath }
      );
    }

    return archive;
  }

  // ============================================================
  // Parts
  // ============================================================

  get mainDocumentPath(): string {
    return this._mainDocumentPath;
  }

  listParts(): string[] {
    return [...this._parts.keys()];
  }

  hasPart(partPath: string): boolean {
    return this._parts.has(partPath);
  }

  getPart(partPath: string): Uint8Array | null {
    return this._parts.get(partPath) ?? null;
  }

  getPartText(partPath: string): string | null {
    const bytes = this._parts.get(partPath);
    return bytes ? Buffer.from(bytes).toString('utf8') : null;
  }

  /** Replace or add a part. Writing identical bytes leaves the part clean. */
  setPart(partPath: string, bytes: Uint8Array): void {
    const current = this._parts.get(partPath);
    if (current && Buffer.compare(Buffer.from(current), Buffer.from(bytes)) === 0) return;
    if (!current) this._addedParts.push(partPath);
    this._parts.set(partPath, bytes);
    this._dirty.add(partPath);
  }

  setPartText(partPath: string, text: string): void {
    this.setPart(partPath, Buffer.from(text, 'utf8'));
  }

  isDirty(partPath: string): boolean {
    return this._dirty.has(partPath);
  }

  get dirtyParts(): string[] {
    return [...this._dirty];
  }

  contentTypeFor(partPath: string): string | null {
    return this._contentTypes.contentTypeFor(partPath);
  }

  // ============================================================
  // Media and relationships
  // ============================================================

  /**
   * Store image bytes under the main document's media directory and make
   * sure the extension has a content type.
   * @returns The new part path (e.g. `word/media/image3.png`)
   */
  addMediaPart(bytes: Uint8Array, mimeType: string): string {
    const extension = MIME_EXTENSIONS[mimeType.toLowerCase()] ?? mimeType.split('/').pop() ?? 'bin';
    const mediaDir = path.posix.join(path.posix.dirname(this._mainDocumentPath), 'media');

    let index = 1;
    while (this._parts.has(`${mediaDir}/image${index}.${extension}`)) index++;
    const mediaPath = `${mediaDir}/image${index}.${extension}`;

    this.setPart(mediaPath, bytes);
    if (this._contentTypes.contentTypeFor(mediaPath) === null) {
      this._contentTypes.ensureDefault(extension, mimeType);
    }
    return mediaPath;
  }

  /**
   * Append a relationship from one part to another.
   * @returns The new relationship id, unique within the source part's list
   */
  addRelationship(fromPartPath: string, targetPath: string, type: string): string {
    if (!this._parts.has(targetPath)) {
      throw new FillError(`Relationship target does not exist: ${targetPath}`, FillErrorCode.FILL_FAILED, {
        from: fromPartPath,
        target: targetPath,
      });
    }
    const set = this.getRelationshipSet(fromPartPath);
    if (!set.exists && !this._contentTypes.hasDefault('rels')) {
      this._contentTypes.ensureDefault('rels', RELS_CONTENT_TYPE);
    }
    return set.add(type, relativeTarget(fromPartPath, targetPath)).id;
  }

  getRelationships(fromPartPath: string): readonly Relationship[] {
    return this.getRelationshipSet(fromPartPath).entries;
  }

  /** Resolved paths of existing parts related to `fromPartPath` by kind (e.g. 'header') */
  getRelatedParts(fromPartPath: string, kind: string): string[] {
    return this.getRelationshipSet(fromPartPath)
      .targetsOfKind(kind)
      .filter(partPath => this._parts.has(partPath));
  }

  private getRelationshipSet(fromPartPath: string): RelationshipSet {
    let set = this._relationships.get(fromPartPath);
    if (!set) {
      set = RelationshipSet.parse(fromPartPath, this.getPartText(relsPathFor(fromPartPath)));
      this._relationships.set(fromPartPath, set);
    }
    return set;
  }

  // ============================================================
  // Serialize
  // ============================================================

  /**
   * Re-pack the archive. Entries keep their original order; parts added
   * during the fill follow. Relationship and content-type parts are only
   * regenerated when their model changed.
   */
  async serialize(): Promise<Buffer> {
    for (const set of this._relationships.values()) {
      if (set.isModified) this.setPartText(set.relsPath, set.render());
    }
    if (this._contentTypes.isModified) {
      this.setPartText(CONTENT_TYPES_PATH, this._contentTypes.render());
    }

    const zip = new JSZip();
    for (const entry of this._entries) {
      if (entry.dir) {
        zip.file(entry.name, null, { dir: true, date: entry.date });
        continue;
      }
      const bytes = this._parts.get(entry.name);
      if (bytes) zip.file(entry.name, bytes, { date: entry.date, createFolders: false });
    }
    for (const partPath of this._addedParts) {
      const bytes = this._parts.get(partPath);
      if (bytes) zip.file(partPath, bytes, { createFolders: false });
    }

    return await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }
}
