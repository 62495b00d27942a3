import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { IMAGE_RELATIONSHIP_TYPE } from './constants';
import { DocxArchive } from './DocxArchive';
import { FillErrorCode, isFillError } from './errors';
import {
  PACKAGE_RELS_XML,
  buildDocx,
  contentTypesXml,
  documentXml,
  paragraph,
  pngHeader,
  readAllParts,
  readPart,
  run,
} from './test-helpers';

async function openError(data: Uint8Array): Promise<unknown> {
  try {
    await DocxArchive.open(data);
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('DocxArchive', () => {
  describe('open', () => {
    it('rejects data that is not a zip archive', async () => {
      const err = await openError(Buffer.from('not a zip'));
      expect(isFillError(err, FillErrorCode.CORRUPT_ARCHIVE)).toBe(true);
    });

    it('rejects an archive without [Content_Types].xml', async () => {
      const zip = new JSZip();
      zip.file('word/document.xml', documentXml(''));
      const err = await openError(await zip.generateAsync({ type: 'nodebuffer' }));

      expect(isFillError(err, FillErrorCode.CORRUPT_ARCHIVE)).toBe(true);
      expect(err).toMatchObject({ context: { part: '[Content_Types].xml' } });
    });

    it('rejects an archive without its main document', async () => {
      const zip = new JSZip();
      zip.file('[Content_Types].xml', contentTypesXml({}));
      zip.file('_rels/.rels', PACKAGE_RELS_XML);
      const err = await openError(await zip.generateAsync({ type: 'nodebuffer' }));

      expect(isFillError(err, FillErrorCode.CORRUPT_ARCHIVE)).toBe(true);
      expect(err).toMatchObject({ context: { part: 'word/document.xml' } });
    });

    it('finds the main document through the package relationships', async () => {
      const zip = new JSZip();
      zip.file('[Content_Types].xml', contentTypesXml({}));
      zip.file('_rels/.rels', PACKAGE_RELS_XML.replace('Target="word/document.xml"', 'Target="/word/main.xml"'));
      zip.file('word/main.xml', documentXml(''));
      const archive = await DocxArchive.open(await zip.generateAsync({ type: 'nodebuffer' }));

      expect(archive.mainDocumentPath).toBe('word/main.xml');
    });
  });

  describe('parts', () => {
    it('reads parts and tracks changes', async () => {
      const archive = await DocxArchive.open(await buildDocx({ body: paragraph(run('Hello')) }));
      const original = archive.getPartText('word/document.xml') ?? '';

      expect(archive.getPart('word/missing.xml')).toBeNull();
      expect(archive.listParts()).toContain('word/styles.xml');

      archive.setPartText('word/document.xml', original);
      expect(archive.isDirty('word/document.xml')).toBe(false);

      archive.setPartText('word/document.xml', original.replace('Hello', 'Bye'));
      expect(archive.dirtyParts).toEqual(['word/document.xml']);
    });

    it('resolves related parts by relationship kind', async () => {
      const archive = await DocxArchive.open(await buildDocx({ body: '', header: '<w:p/>', footer: '<w:p/>' }));

      expect(archive.getRelatedParts('word/document.xml', 'header')).toEqual(['word/header1.xml']);
      expect(archive.getRelatedParts('word/document.xml', 'footer')).toEqual(['word/footer1.xml']);
      expect(archive.getRelatedParts('word/document.xml', 'footnotes')).toEqual([]);
      expect(archive.contentTypeFor('word/header1.xml')).toBe(
        'application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml'
      );
    });
  });

  describe('media and relationships', () => {
    it('names new media after the lowest free index', async () => {
      const archive = await DocxArchive.open(
        await buildDocx({ body: '', extraParts: { 'word/media/image1.png': pngHeader(1, 1) } })
      );

      expect(archive.addMediaPart(pngHeader(2, 2), 'image/png')).toBe('word/media/image2.png');
      expect(archive.addMediaPart(Buffer.from([0xff, 0xd8]), 'image/jpeg')).toBe('word/media/image1.jpeg');
      expect(archive.contentTypeFor('word/media/image1.jpeg')).toBe('image/jpeg');
    });

    it('continues relationship ids after the highest existing one', async () => {
      const archive = await DocxArchive.open(await buildDocx({ body: '', header: '<w:p/>', footer: '<w:p/>' }));
      const media = archive.addMediaPart(pngHeader(1, 1), 'image/png');

      expect(archive.addRelationship('word/document.xml', media, IMAGE_RELATIONSHIP_TYPE)).toBe('rId4');
      expect(archive.addRelationship('word/document.xml', media, IMAGE_RELATIONSHIP_TYPE)).toBe('rId5');
    });

    it('creates a relationship part for a part that has none', async () => {
      const archive = await DocxArchive.open(await buildDocx({ body: '', header: '<w:p/>' }));
      const media = archive.addMediaPart(pngHeader(1, 1), 'image/png');

      expect(archive.addRelationship('word/header1.xml', media, IMAGE_RELATIONSHIP_TYPE)).toBe('rId1');

      const output = await archive.serialize();
      expect(await readPart(output, 'word/_rels/header1.xml.rels')).toBe(
        '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
          '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
          `<Relationship Id="rId1" Type="${IMAGE_RELATIONSHIP_TYPE}" Target="media/image1.png"/>` +
          '</Relationships>'
      );
    });

    it('refuses a relationship to a missing part', async () => {
      const archive = await DocxArchive.open(await buildDocx({ body: '' }));
      expect(() => archive.addRelationship('word/document.xml', 'word/media/none.png', IMAGE_RELATIONSHIP_TYPE)).toThrow(
        'Relationship target does not exist: word/media/none.png'
      );
    });
  });

  describe('serialize', () => {
    it('keeps untouched parts byte for byte', async () => {
      const input = await buildDocx({ body: paragraph(run('Hello')), header: paragraph(run('Head')) });
      const archive = await DocxArchive.open(input);
      const output = await archive.serialize();

      const before = await readAllParts(input);
      const after = await readAllParts(output);
      expect([...after.keys()]).toEqual([...before.keys()]);
      for (const [name, bytes] of before) {
        expect(after.get(name)).toEqual(bytes);
      }
    });

    it('appends new entries to content types and relationships without rewriting them', async () => {
      const input = await buildDocx({ body: paragraph(run('Hello')) });
      const before = await readAllParts(input);
      const archive = await DocxArchive.open(input);

      const media = archive.addMediaPart(pngHeader(1, 1), 'image/png');
      archive.addRelationship('word/document.xml', media, IMAGE_RELATIONSHIP_TYPE);
      const after = await readAllParts(await archive.serialize());

      expect([...after.keys()]).toEqual([...before.keys(), 'word/media/image1.png']);

      const contentTypes = before.get('[Content_Types].xml')?.toString('utf8') ?? '';
      expect(after.get('[Content_Types].xml')?.toString('utf8')).toBe(
        contentTypes.replace('</Types>', '<Default Extension="png" ContentType="image/png"/></Types>')
      );

      const rels = before.get('word/_rels/document.xml.rels')?.toString('utf8') ?? '';
      expect(after.get('word/_rels/document.xml.rels')?.toString('utf8')).toBe(
        rels.replace(
          '</Relationships>',
          `<Relationship Id="rId2" Type="${IMAGE_RELATIONSHIP_TYPE}" Target="media/image1.png"/></Relationships>`
        )
      );

      expect(after.get('word/document.xml')).toEqual(before.get('word/document.xml'));
      expect(after.get('word/styles.xml')).toEqual(before.get('word/styles.xml'));
    });
  });
});
