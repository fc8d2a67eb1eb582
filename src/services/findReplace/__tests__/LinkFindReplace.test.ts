/**
 * Test Suite for LinkFindReplace
 */

import { existsSync, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  fieldHyperlink,
  hyperlink,
  paragraph,
  run,
  simpleField,
  writeDocx,
} from '@/__tests__/helpers/docxFixture';
import { DocxDocument } from '@/services/document/DocxDocument';
import { FIND_REPLACE_STATUS } from '@/types/find-replace';
import { findReplaceLinks } from '../LinkFindReplace';

const PORTAL = 'https://old.example.com/portal';
const GUIDE = 'https://old.example.com/guide';

describe('findReplaceLinks', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'link-replace-'));
    filePath = await writeDocx(path.join(dir, 'links.docx'), {
      body:
        paragraph(hyperlink('rId1', 'Portal')) +
        paragraph(hyperlink('rId2', 'Price list')) +
        paragraph(run('See '), fieldHyperlink(`HYPERLINK "${GUIDE}"`, 'guide')),
      relationships: [
        { id: 'rId1', target: PORTAL },
        { id: 'rId2', target: 'prices/price.docx', external: false },
      ],
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should report no find text', async () => {
    expect(await findReplaceLinks(filePath, '')).toEqual({
      matches: 0,
      status: FIND_REPLACE_STATUS.NO_FIND_TEXT,
      snippets: [],
    });
  });

  it('should find in both text and URL without touching the file', async () => {
    const before = await fs.readFile(filePath);

    const result = await findReplaceLinks(filePath, 'price');

    expect(result).toEqual({
      matches: 3,
      status: FIND_REPLACE_STATUS.FOUND,
      snippets: ['text: Price list', 'url: prices/price.docx'],
      foundUrls: ['prices/price.docx'],
      foundTexts: ['Price list'],
      didReplace: false,
    });
    expect(await fs.readFile(filePath)).toEqual(before);
  });

  it('should replace whole URLs of relationship and field hyperlinks', async () => {
    const replacement = 'https://new.example.com';

    const result = await findReplaceLinks(filePath, 'OLD.example.com', { replaceText: replacement, target: 'url' });

    expect(result).toEqual({
      matches: 2,
      status: FIND_REPLACE_STATUS.REPLACED,
      snippets: [
        `url: ${PORTAL}`,
        `replaced-url: ${PORTAL} -> ${replacement} (rId=rId3)`,
        `field-url: ${GUIDE}`,
        `replaced-field-url: ${GUIDE} -> ${replacement}`,
      ],
      foundUrls: [PORTAL, GUIDE],
      didReplace: true,
    });

    const doc = await DocxDocument.open(filePath);
    const [portal, , field] = doc.readParagraphs();
    expect(portal.hyperlinks()[0].getRelationshipId()).toBe('rId3');
    expect(doc.getRelationship('rId3')).toMatchObject({ target: replacement, external: true });
    expect(doc.getRelationship('rId1')).toMatchObject({ target: PORTAL });
    expect(field.fieldInstructions()[0].getInstruction()).toBe(`HYPERLINK "${replacement}"`);
    expect(field.getText()).toBe('See guide');
  });

  it('should replace display text only when scoped to names', async () => {
    const result = await findReplaceLinks(filePath, 'price', { replaceText: 'Pricing', target: 'name' });

    expect(result.matches).toBe(1);
    expect(result.snippets).toEqual(['text: Price list']);
    expect(result.foundTexts).toEqual(['Price list']);
    expect(result.foundUrls).toBeUndefined();

    const doc = await DocxDocument.open(filePath);
    const link = doc.readParagraphs()[1].hyperlinks()[0];
    expect(link.getText()).toBe('Pricing list');
    expect(link.getRelationshipId()).toBe('rId2');
    expect(doc.getRelationship('rId2')).toMatchObject({ target: 'prices/price.docx', external: false });
  });

  it('should replace the visible text of a field hyperlink', async () => {
    const fieldPath = await writeDocx(path.join(dir, 'field.docx'), {
      body: paragraph(run('Open '), fieldHyperlink('HYPERLINK "https://example.com/a"', 'the manual')),
    });

    const result = await findReplaceLinks(fieldPath, 'manual', { replaceText: 'handbook', target: 'name' });

    expect(result.snippets).toEqual(['field-text: Open the manual']);
    const [p] = (await DocxDocument.open(fieldPath)).readParagraphs();
    expect(p.getText()).toBe('Open the handbook');
    expect(p.fieldInstructions()[0].getInstruction()).toBe('HYPERLINK "https://example.com/a"');
  });

  it('should rewrite the instruction of a simple field', async () => {
    const fieldPath = await writeDocx(path.join(dir, 'simple.docx'), {
      body: paragraph(simpleField('HYPERLINK "https://old.example.com/x"', 'X')),
    });

    await findReplaceLinks(fieldPath, 'old.example', { replaceText: 'https://new.example.com/x', target: 'url' });

    const [instruction] = (await DocxDocument.open(fieldPath)).readParagraphs()[0].fieldInstructions();
    expect(instruction.kind).toBe('simple');
    expect(instruction.getInstruction()).toBe('HYPERLINK "https://new.example.com/x"');
  });

  it('should record a failed URL rewrite and keep the old relationship', async () => {
    const result = await findReplaceLinks(filePath, 'portal', { replaceText: '', target: 'url' });

    expect(result.snippets).toEqual([`url: ${PORTAL}`, 'replace-url-failed: Hyperlink target must not be empty']);
    const doc = await DocxDocument.open(filePath);
    expect(doc.readParagraphs()[0].hyperlinks()[0].getRelationshipId()).toBe('rId1');
  });

  it('should list each matching URL once', async () => {
    const dupPath = await writeDocx(path.join(dir, 'dup.docx'), {
      body: paragraph(hyperlink('rId1', 'one')) + paragraph(hyperlink('rId1', 'two')),
      relationships: [{ id: 'rId1', target: PORTAL }],
    });

    const result = await findReplaceLinks(dupPath, 'portal', { target: 'url' });

    expect(result.matches).toBe(2);
    expect(result.foundUrls).toEqual([PORTAL]);
  });

  it('should back up the original only when there is something to rewrite', async () => {
    const original = await fs.readFile(filePath);
    const missPath = path.join(dir, 'backups', 'miss.docx');
    const hitPath = path.join(dir, 'backups', 'hit.docx');

    await findReplaceLinks(filePath, 'nowhere', { replaceText: 'x', backupPath: missPath });
    const result = await findReplaceLinks(filePath, 'portal', { replaceText: 'Home', backupPath: hitPath });

    expect(existsSync(missPath)).toBe(false);
    expect(result.copyPath).toBe(hitPath);
    expect(await fs.readFile(hitPath)).toEqual(original);
  });
});
