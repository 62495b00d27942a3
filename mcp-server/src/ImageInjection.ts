import { EMU_PER_INCH, IMAGE_RELATIONSHIP_TYPE, NAMESPACES } from './constants';
import { DocxArchive } from './DocxArchive';
import { decodeImagePayload } from './ImagePayload';
import { containerRuns, createMarkup } from './RunModel';
import { DecodedImage, FormattedContainer, MediaAsset, Placement, TokenMatch } from './types';
import { escapeXml } from './XmlScanner';

/**
 * Hands out `wp:docPr` ids, which must be unique across the document.
 */
export class DrawingIdAllocator {
  private _next: number;

  constructor(start = 1) {
    this._next = start;
  }

  /** Continue after the highest `wp:docPr`/`pic:cNvPr` id found in the given XML parts */
  static fromParts(xmlParts: Iterable<string>): DrawingIdAllocator {
    let max = 0;
    for (const xml of xmlParts) {
      for (const match of xml.matchAll(/<(?:wp:docPr|pic:cNvPr)\b[^>]*\bid="(\d+)"/g)) {
        max = Math.max(max, parseInt(match[1], 10));
      }
    }
    return new DrawingIdAllocator(max + 1);
  }

  next(): number {
    return this._next++;
  }
}

export interface InjectionContext {
  archive: DocxArchive;
  /** Part holding the container; the image relationship is scoped to it */
  partPath: string;
  /** Target width in inches */
  widthInches: number;
  drawingIds: DrawingIdAllocator;
}

/**
 * Scale an image to a fixed width, keeping its native aspect ratio.
 */
export function computePlacement(widthInches: number, image: Pick<DecodedImage, 'width' | 'height'>): Placement {
  const widthEmu = Math.round(widthInches * EMU_PER_INCH);
  const heightEmu = Math.round((widthEmu * image.height) / image.width);
  return {
    widthEmu,
    heightEmu,
    widthInches,
    heightInches: heightEmu / EMU_PER_INCH,
  };
}

/**
 * Inline DrawingML picture referencing an image relationship. Namespaces are
 * declared locally so the fragment is valid whatever the part root declares.
 */
export function buildDrawingXml(options: {
  relationshipId: string;
  placement: Placement;
  drawingId: number;
  name: string;
}): string {
  const { relationshipId, placement, drawingId } = options;
  const name = escapeXml(options.name);
  const { widthEmu: cx, heightEmu: cy } = placement;

  return (
    '<w:drawing>' +
    `<wp:inline distT="0" distB="0" distL="0" distR="0" xmlns:wp="${NAMESPACES.WP}">` +
    `<wp:extent cx="${cx}" cy="${cy}"/>` +
    '<wp:effectExtent l="0" t="0" r="0" b="0"/>' +
    `<wp:docPr id="${drawingId}" name="${name}"/>` +
    `<wp:cNvGraphicFramePr><a:graphicFrameLocks xmlns:a="${NAMESPACES.A}" noChangeAspect="1"/></wp:cNvGraphicFramePr>` +
    `<a:graphic xmlns:a="${NAMESPACES.A}">` +
    `<a:graphicData uri="${NAMESPACES.PIC}">` +
    `<pic:pic xmlns:pic="${NAMESPACES.PIC}">` +
    `<pic:nvPicPr><pic:cNvPr id="${drawingId}" name="${name}"/><pic:cNvPicPr/></pic:nvPicPr>` +
    `<pic:blipFill><a:blip r:embed="${escapeXml(relationshipId)}" xmlns:r="${NAMESPACES.R}"/><a:stretch><a:fillRect/></a:stretch></pic:blipFill>` +
    `<pic:spPr><a:xfrm><a:off x="0" y="0"/><a:ext cx="${cx}" cy="${cy}"/></a:xfrm><a:prstGeom prst="rect"><a:avLst/></a:prstGeom></pic:spPr>` +
    '</pic:pic>' +
    '</a:graphicData>' +
    '</a:graphic>' +
    '</wp:inline>' +
    '</w:drawing>'
  );
}

/**
 * Replace the whole container content with one run holding the image.
 *
 * The payload is decoded first, so a bad payload fails before anything is
 * registered. The drawing run takes the token's start run formatting;
 * paragraph properties stay, every other node in the container is dropped.
 */
export function injectImage(
  container: FormattedContainer,
  match: TokenMatch,
  payload: string,
  context: InjectionContext
): MediaAsset {
  const image = decodeImagePayload(payload, match.name);
  const startRun = containerRuns(container)[match.span.startRun];
  if (!startRun) {
    throw new RangeError(`Span start ${match.span.startRun} is outside the container`);
  }

  const { archive, partPath } = context;
  const mediaPath = archive.addMediaPart(image.bytes, image.mimeType);
  const relationshipId = archive.addRelationship(partPath, mediaPath, IMAGE_RELATIONSHIP_TYPE);
  const placement = computePlacement(context.widthInches, image);

  const drawing = buildDrawingXml({
    relationshipId,
    placement,
    drawingId: context.drawingIds.next(),
    name: match.name,
  });
  const { open, properties } = startRun.formatting;
  container.nodes = [createMarkup(`${open}${properties}${drawing}</w:r>`, true)];

  return {
    token: match.name,
    partPath,
    mediaPath,
    relationshipId,
    mimeType: image.mimeType,
    widthEmu: placement.widthEmu,
    heightEmu: placement.heightEmu,
  };
}
