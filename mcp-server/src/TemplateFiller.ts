import { IMAGE_WIDTHS, ImageWidthTable, TEXT_PART_KINDS } from './constants';
import { DocxArchive } from './DocxArchive';
import { FillError, FillErrorCode, withErrorContext, withErrorContextSync } from './errors';
import { DrawingIdAllocator, injectImage } from './ImageInjection';
import { parseContainer, serializeContainer } from './RunModel';
import { substituteTextTokens } from './TextSubstitution';
import { scanTokens } from './TokenScanner';
import { FillReport, FillRequest, FillResult, MediaAsset, PlaceholderInfo, TokenMatch } from './types';
import { findIllegalXmlChar, replaceElements } from './XmlScanner';

export type FillStage = 'loaded' | 'scanning' | 'serialized' | 'done';

export interface TemplateFillerOptions {
  /** Image placeholder widths in inches (defaults to IMAGE_WIDTHS) */
  imageWidths?: ImageWidthTable;
}

/**
 * Rewrite every `<w:p>` in a part. Paragraphs nested in text boxes are
 * handled before the paragraph hosting them. The callback returns new
 * paragraph XML or null to keep it.
 */
export function rewriteParagraphs(xml: string, rewrite: (paragraphXml: string) => string | null): string {
  return replaceElements(xml, 'w:p', element => {
    if (element.selfClosing) return null;
    const inner = rewriteParagraphs(element.inner, rewrite);
    const paragraph = inner === element.inner ? element.xml : `${element.openTag}${inner}</w:p>`;
    const rewritten = rewrite(paragraph);
    if (rewritten !== null) return rewritten;
    return paragraph === element.xml ? null : paragraph;
  });
}

/**
 * Parts whose paragraphs take part in a fill: the main document, then the
 * headers, footers, footnotes and endnotes it references.
 */
export function textBearingParts(archive: DocxArchive): string[] {
  const main = archive.mainDocumentPath;
  const parts = [main];
  for (const kind of TEXT_PART_KINDS) {
    for (const partPath of archive.getRelatedParts(main, kind)) {
      if (!parts.includes(partPath)) parts.push(partPath);
    }
  }
  return parts;
}

/** Values end up in `<w:t>`, so each must be representable in XML. */
function assertWritableValues(placeholders: Record<string, string>): void {
  for (const [token, value] of Object.entries(placeholders)) {
    const character = findIllegalXmlChar(value);
    if (character !== null) {
      throw new FillError(
        `Value for ${token} contains ${character}, which cannot be written to a document`,
        FillErrorCode.INVALID_ARGUMENTS,
        { token, character }
      );
    }
  }
}

/**
 * State of one fill. Owns the archive for the duration of the fill; nothing
 * here outlives it.
 */
class FillSession {
  stage: FillStage = 'loaded';

  private readonly _replaced: string[] = [];
  private readonly _unresolved = new Set<string>();
  private readonly _inserted: MediaAsset[] = [];
  private readonly _discarded: string[] = [];
  private readonly _drawingIds: DrawingIdAllocator;

  constructor(
    private readonly _archive: DocxArchive,
    private readonly _values: ReadonlyMap<string, string>,
    private readonly _images: ReadonlyMap<string, string>,
    private readonly _widths: ImageWidthTable,
    private readonly _parts: string[]
  ) {
    this._drawingIds = DrawingIdAllocator.fromParts(
      _parts.map(partPath => _archive.getPartText(partPath) ?? '')
    );
  }

  run(): void {
    this.stage = 'scanning';
    for (const partPath of this._parts) {
      const xml = this._archive.getPartText(partPath);
      if (xml === null) continue;

      let containerIndex = 0;
      const rewritten = withErrorContextSync(
        () =>
          rewriteParagraphs(xml, paragraphXml => {
            const index = containerIndex++;
            return withErrorContextSync(() => this.fillContainer(paragraphXml, partPath), {
              stage: this.stage,
              part: partPath,
              container: index,
            });
          }),
        { stage: this.stage, part: partPath }
      );

      if (rewritten !== xml) this._archive.setPartText(partPath, rewritten);
    }
  }

  private fillContainer(paragraphXml: string, partPath: string): string | null {
    if (!paragraphXml.includes('{')) return null;

    const container = parseContainer(paragraphXml);
    const matches = scanTokens(container, this._widths);
    if (matches.length === 0) return null;

    const imageMatch = matches.find(match => match.kind === 'image' && this._images.has(match.name));
    if (imageMatch) {
      const payload = this._images.get(imageMatch.name) ?? '';
      this._inserted.push(
        injectImage(container, imageMatch, payload, {
          archive: this._archive,
          partPath,
          widthInches: this._widths[imageMatch.name],
          drawingIds: this._drawingIds,
        })
      );
      for (const other of matches) {
        if (other !== imageMatch && other.kind === 'image') this._discarded.push(other.name);
      }
      return serializeContainer(container);
    }

    const outcome = substituteTextTokens(container, matches, this._values);
    for (const name of outcome.unresolved) this._unresolved.add(name);
    for (const match of matches) {
      if (match.kind === 'image') this._unresolved.add(match.name);
    }
    if (outcome.applied.length === 0) return null;

    this._replaced.push(...outcome.applied);
    return serializeContainer(container);
  }

  report(): FillReport {
    const used = new Set(this._replaced);
    return {
      replacedTokens: [...this._replaced],
      unresolvedTokens: [...this._unresolved].sort(),
      insertedImages: [...this._inserted],
      ignoredImages: [...this._images.keys()].filter(key => !Object.prototype.hasOwnProperty.call(this._widths, key)),
      unusedValues: [...this._values.keys()].filter(key => !used.has(key)),
      discardedImageTokens: [...this._discarded],
    };
  }
}

/**
 * Fills `{{NAME}}` placeholders in a document archive with text and images.
 *
 * A fill works on an in-memory copy: the template buffer is never touched
 * and any error aborts the whole fill, so a partially filled document is
 * never returned.
 */
export class TemplateFiller {
  private readonly _imageWidths: ImageWidthTable;

  constructor(options: TemplateFillerOptions = {}) {
    this._imageWidths = Object.freeze({ ...(options.imageWidths ?? IMAGE_WIDTHS) });
  }

  get imageWidths(): ImageWidthTable {
    return this._imageWidths;
  }

  async fill(template: Uint8Array, request: FillRequest = {}): Promise<FillResult> {
    assertWritableValues(request.placeholders ?? {});
    const archive = await withErrorContext(() => DocxArchive.open(template), { stage: 'loaded' });
    const session = new FillSession(
      archive,
      new Map(Object.entries(request.placeholders ?? {})),
      new Map(Object.entries(request.images ?? {})),
      this._imageWidths,
      textBearingParts(archive)
    );

    session.run();

    session.stage = 'serialized';
    const document = await withErrorContext(() => archive.serialize(), { stage: session.stage });
    session.stage = 'done';

    return { document, report: session.report() };
  }

  /**
   * List the placeholders a template contains without filling it.
   */
  async inspect(template: Uint8Array): Promise<PlaceholderInfo[]> {
    const archive = await withErrorContext(() => DocxArchive.open(template), { stage: 'loaded' });
    const found = new Map<string, { info: PlaceholderInfo; parts: Set<string> }>();

    for (const partPath of textBearingParts(archive)) {
      const xml = archive.getPartText(partPath);
      if (xml === null) continue;
      const record = (match: TokenMatch): void => {
        let entry = found.get(match.name);
        if (!entry) {
          entry = { info: { name: match.name, kind: match.kind, parts: [], occurrences: 0 }, parts: new Set() };
          found.set(match.name, entry);
        }
        entry.info.occurrences++;
        if (!entry.parts.has(partPath)) {
          entry.parts.add(partPath);
          entry.info.parts.push(partPath);
        }
      };

      withErrorContextSync(
        () =>
          rewriteParagraphs(xml, paragraphXml => {
            if (paragraphXml.includes('{')) {
              scanTokens(parseContainer(paragraphXml), this._imageWidths).forEach(record);
            }
            return null;
          }),
        { stage: 'scanning', part: partPath }
      );
    }

    return [...found.values()].map(entry => entry.info);
  }
}

/** Fill with the default image widths */
export async function fillTemplate(
  template: Uint8Array,
  placeholders: Record<string, string> = {},
  images: Record<string, string> = {}
): Promise<FillResult> {
  return new TemplateFiller().fill(template, { placeholders, images });
}
