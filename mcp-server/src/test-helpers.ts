/**
 * In-memory DOCX fixtures for tests.
 */
import JSZip from 'jszip';
import { containerText, parseContainer } from './RunModel';
import { escapeXml, findAllElementsWithDepth } from './XmlScanner';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

// Simple 1x1 red PNG (base64)
export const ONE_PIXEL_PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8DwHwAFBQIAX8jx0gAAAABJRU5ErkJggg==';

/** PNG signature plus an IHDR chunk: enough for size detection */
export function pngHeader(width: number, height: number): Buffer {
  const buffer = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buffer, 0);
  buffer.writeUInt32BE(13, 8);
  buffer.write('IHDR', 12, 'ascii');
  buffer.writeUInt32BE(width, 16);
  buffer.writeUInt32BE(height, 20);
  buffer[24] = 8; // bit depth
  buffer[25] = 2; // truecolor
  return buffer;
}

export function pngBase64(width: number, height: number): string {
  return pngHeader(width, height).toString('base64');
}

/** A run with optional `<w:rPr>` content */
export function run(text: string, properties = ''): string {
  const rPr = properties ? `<w:rPr>${properties}</w:rPr>` : '';
  return `<w:r>${rPr}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

export function paragraph(...content: string[]): string {
  return `<w:p>${content.join('')}</w:p>`;
}

/** One-cell table wrapping the given paragraphs */
export function table(...cellParagraphs: string[]): string {
  return `<w:tbl><w:tblPr/><w:tblGrid><w:gridCol w:w="9000"/></w:tblGrid><w:tr><w:tc><w:tcPr/>${cellParagraphs.join('')}</w:tc></w:tr></w:tbl>`;
}

export function documentXml(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}"><w:body>${body}<w:sectPr/></w:body></w:document>`;
}

export function headerXml(content: string, root: 'hdr' | 'ftr' = 'hdr'): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<w:${root} xmlns:w="${W_NS}" xmlns:r="${R_NS}">${content}</w:${root}>`;
}

export const STYLES_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<w:styles xmlns:w="${W_NS}"><w:style w:type="paragraph" w:styleId="Normal"><w:name w:val="Normal"/></w:style></w:styles>`;

export interface DocxFixture {
  /** Body content of word/document.xml */
  body: string;
  /** Paragraph content of word/header1.xml */
  header?: string;
  /** Paragraph content of word/footer1.xml */
  footer?: string;
  /** Additional parts, e.g. existing media */
  extraParts?: Record<string, string | Buffer>;
}

export function contentTypesXml(fixture: Pick<DocxFixture, 'header' | 'footer'>): string {
  const overrides = [
    '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>',
    '<Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>',
  ];
  if (fixture.header !== undefined) {
    overrides.push('<Override PartName="/word/header1.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml"/>');
  }
  if (fixture.footer !== undefined) {
    overrides.push('<Override PartName="/word/footer1.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.footer+xml"/>');
  }
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
    '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
    '<Default Extension="xml" ContentType="application/xml"/>' +
    overrides.join('') +
    '</Types>'
  );
}

export const PACKAGE_RELS_XML =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
  '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
  '</Relationships>';

/** rId1 styles, rId2 header, rId3 footer */
export function documentRelsXml(fixture: Pick<DocxFixture, 'header' | 'footer'>): string {
  const entries = [`<Relationship Id="rId1" Type="${R_NS}/styles" Target="styles.xml"/>`];
  if (fixture.header !== undefined) entries.push(`<Relationship Id="rId2" Type="${R_NS}/header" Target="header1.xml"/>`);
  if (fixture.footer !== undefined) entries.push(`<Relationship Id="rId3" Type="${R_NS}/footer" Target="footer1.xml"/>`);
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
    entries.join('') +
    '</Relationships>'
  );
}

export async function buildDocx(fixture: DocxFixture): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('[Content_Types].xml', contentTypesXml(fixture));
  zip.file('_rels/.rels', PACKAGE_RELS_XML);
  zip.file('word/document.xml', documentXml(fixture.body));
  zip.file('word/_rels/document.xml.rels', documentRelsXml(fixture));
  zip.file('word/styles.xml', STYLES_XML);
  if (fixture.header !== undefined) zip.file('word/header1.xml', headerXml(fixture.header, 'hdr'));
  if (fixture.footer !== undefined) zip.file('word/footer1.xml', headerXml(fixture.footer, 'ftr'));
  for (const [partPath, content] of Object.entries(fixture.extraParts ?? {})) {
    zip.file(partPath, content);
  }
  return await zip.generateAsync({ type: 'nodebuffer' });
}

export async function readPart(document: Buffer, partPath: string): Promise<string | undefined> {
  const zip = await JSZip.loadAsync(document);
  return await zip.file(partPath)?.async('string');
}

export async function readAllParts(document: Buffer): Promise<Map<string, Buffer>> {
  const zip = await JSZip.loadAsync(document);
  const parts = new Map<string, Buffer>();
  for (const [name, file] of Object.entries(zip.files)) {
    if (!file.dir) parts.set(name, await file.async('nodebuffer'));
  }
  return parts;
}

/** Text of every outermost paragraph in a part, in document order */
export function paragraphTexts(xml: string): string[] {
  return findAllElementsWithDepth(xml, 'w:p').map(element => containerText(parseContainer(element.xml)));
}
