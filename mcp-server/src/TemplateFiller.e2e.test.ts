/**
 * End-to-end fill of a loan memo template: split tokens, tables, header and
 * footer, and an image placeholder.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import { TemplateFiller } from './TemplateFiller';
import {
  buildDocx,
  paragraph,
  paragraphTexts,
  pngBase64,
  pngHeader,
  readAllParts,
  readPart,
  run,
  table,
} from './test-helpers';
import { FillResult } from './types';

const BOLD = '<w:b/>';
const ITALIC = '<w:i/>';

const BODY =
  `<w:p><w:pPr><w:pStyle w:val="Title"/></w:pPr>${run('Credit Memo: {{DEAL_', BOLD)}${run('NAME}}', BOLD)}</w:p>` +
  paragraph(
    run('Loan: {{LOAN_', BOLD),
    '<w:proofErr w:type="spellStart"/>',
    run('AMOUNT}} at {{PROPERTY_', ITALIC),
    '<w:proofErr w:type="spellEnd"/>',
    run('ADDRESS}}')
  ) +
  table(paragraph(run('Sponsor')), paragraph(run('{{SPONSOR}}'))) +
  `<w:p><w:pPr><w:jc w:val="center"/></w:pPr>${run('{{IMAGE_SITE_PLAN}}')}</w:p>` +
  paragraph(run('Closing: {{CLOSING_DATE}}'));

const VALUES = {
  DEAL_NAME: 'Montauk Highway Bridge Loan',
  LOAN_AMOUNT: '$25,650,000',
  PROPERTY_ADDRESS: '89 Montauk Highway',
  SPONSOR: 'Harbor & Dune Partners',
  CLOSING_DATE: 'June 30, 2025',
};

describe('TemplateFiller e2e - loan memo', () => {
  const filler = new TemplateFiller();
  let template: Buffer;
  let result: FillResult;
  let documentXml: string;

  beforeAll(async () => {
    template = await buildDocx({
      body: BODY,
      header: paragraph(run('{{DEAL_NAME}}', ITALIC)),
      footer: paragraph(run('Confidential - {{SPONSOR}}')),
    });
    result = await filler.fill(template, {
      placeholders: VALUES,
      images: { IMAGE_SITE_PLAN: pngBase64(640, 480) },
    });
    documentXml = (await readPart(result.document, 'word/document.xml')) ?? '';
  });

  it('resolves every text placeholder in the body', () => {
    expect(paragraphTexts(documentXml)).toEqual([
      'Credit Memo: Montauk Highway Bridge Loan',
      'Loan: $25,650,000 at 89 Montauk Highway',
      'Sponsor',
      'Harbor & Dune Partners',
      '',
      'Closing: June 30, 2025',
    ]);
  });

  it('keeps the formatting of the runs around each placeholder', () => {
    expect(documentXml).toContain(
      '<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Loan: </w:t></w:r>' +
        '<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">$25,650,000</w:t></w:r>' +
        '<w:proofErr w:type="spellStart"/>' +
        '<w:r><w:rPr><w:i/></w:rPr><w:t xml:space="preserve"> at </w:t></w:r>' +
        '<w:r><w:rPr><w:i/></w:rPr><w:t xml:space="preserve">89 Montauk Highway</w:t></w:r>' +
        '<w:proofErr w:type="spellEnd"/>'
    );
    expect(documentXml).toContain('<w:pStyle w:val="Title"/>');
    expect(documentXml).toContain('Harbor &amp; Dune Partners');
  });

  it('places the site plan at 5.5 inches with its aspect ratio', () => {
    expect(documentXml).toContain(
      '<w:p><w:pPr><w:jc w:val="center"/></w:pPr><w:r><w:drawing><wp:inline distT="0" distB="0" distL="0" distR="0"'
    );
    expect(documentXml).toContain('<wp:extent cx="5029200" cy="3771900"/>');
    expect(result.report.insertedImages).toEqual([
      {
        token: 'IMAGE_SITE_PLAN',
        partPath: 'word/document.xml',
        mediaPath: 'word/media/image1.png',
        relationshipId: 'rId4',
        mimeType: 'image/png',
        widthEmu: 5029200,
        heightEmu: 3771900,
      },
    ]);
  });

  it('stores the image and references it from the document', async () => {
    const parts = await readAllParts(result.document);
    expect(parts.get('word/media/image1.png')).toEqual(pngHeader(640, 480));
    expect(parts.get('word/_rels/document.xml.rels')?.toString('utf8')).toContain(
      '<Relationship Id="rId4" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/image" Target="media/image1.png"/>'
    );
  });

  it('fills the header and footer', async () => {
    expect(paragraphTexts((await readPart(result.document, 'word/header1.xml')) ?? '')).toEqual([
      'Montauk Highway Bridge Loan',
    ]);
    expect(paragraphTexts((await readPart(result.document, 'word/footer1.xml')) ?? '')).toEqual([
      'Confidential - Harbor & Dune Partners',
    ]);
  });

  it('reports what was filled', () => {
    expect(result.report.replacedTokens).toEqual([
      'DEAL_NAME',
      'LOAN_AMOUNT',
      'PROPERTY_ADDRESS',
      'SPONSOR',
      'CLOSING_DATE',
      'DEAL_NAME',
      'SPONSOR',
    ]);
    expect(result.report.unresolvedTokens).toEqual([]);
    expect(result.report.unusedValues).toEqual([]);
    expect(result.report.ignoredImages).toEqual([]);
  });

  it('leaves parts without placeholders untouched', async () => {
    const before = await readAllParts(template);
    const after = await readAllParts(result.document);
    expect(after.get('word/styles.xml')).toEqual(before.get('word/styles.xml'));
    expect(after.get('_rels/.rels')).toEqual(before.get('_rels/.rels'));
  });

  it('produces a document with no placeholders left that refills unchanged', async () => {
    expect(await filler.inspect(result.document)).toEqual([]);

    const refilled = await filler.fill(result.document, { placeholders: VALUES });
    const first = await readAllParts(result.document);
    const second = await readAllParts(refilled.document);
    for (const [name, bytes] of first) {
      expect(second.get(name)).toEqual(bytes);
    }
    expect(refilled.report.unusedValues).toEqual(Object.keys(VALUES));
  });
});
