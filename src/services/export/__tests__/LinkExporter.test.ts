/**
 * Test Suite for LinkExporter
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { describe, it, expect } from 'vitest';
import { LINK_SHEET_NAME, buildLinkRows, buildLinksWorkbook, writeLinksWorkbook } from '../LinkExporter';

function readRows(data: Buffer): unknown[][] {
  const workbook = XLSX.read(data, { type: 'buffer' });
  expect(workbook.SheetNames).toEqual([LINK_SHEET_NAME]);
  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[LINK_SHEET_NAME], { header: 1, defval: '' });
}

describe('LinkExporter', () => {
  it('should build one row per link and one per failed file', () => {
    const rows = buildLinkRows([
      {
        path: '/corpus/a.docx',
        links: [
          { text: 'Home', rawHref: 'home.docx', normalizedTarget: 'team/home.docx', type: 'internal' },
          { text: 'Mail', rawHref: 'mailto:a@example.com', normalizedTarget: 'mailto:a@example.com', type: 'email' },
        ],
      },
      { path: '/corpus/b.docx', links: [], error: 'Failed to open document' },
    ]);

    expect(rows).toEqual([
      ['/corpus/a.docx', 'Home', 'team/home.docx', 'internal', ''],
      ['/corpus/a.docx', 'Mail', 'mailto:a@example.com', 'email', ''],
      ['/corpus/b.docx', '', '', '', 'Failed to open document'],
    ]);
  });

  it('should write a header row and fit ragged rows to five columns', () => {
    const data = buildLinksWorkbook([
      ['/corpus/a.docx', 'Home', 'team/home.docx', 'internal', ''],
      ['/corpus/b.docx'],
      ['/corpus/c.docx', 'x', 'y', 'z', 'err', 'extra'],
      ['/corpus/d.docx', 42, true, null, undefined],
    ]);

    expect(readRows(data)).toEqual([
      ['File', 'Text', 'URL', 'Type', 'Error'],
      ['/corpus/a.docx', 'Home', 'team/home.docx', 'internal', ''],
      ['/corpus/b.docx', '', '', '', ''],
      ['/corpus/c.docx', 'x', 'y', 'z', 'err'],
      ['/corpus/d.docx', 42, true, '', ''],
    ]);
  });

  it('should write only the header for no rows', () => {
    expect(readRows(buildLinksWorkbook([]))).toEqual([['File', 'Text', 'URL', 'Type', 'Error']]);
  });

  it('should save the workbook, creating the folder', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'export-'));
    try {
      const outPath = path.join(dir, 'reports', 'links.xlsx');

      expect(await writeLinksWorkbook([['/corpus/a.docx', 'Home', 'x', 'external', '']], outPath)).toBe(outPath);
      expect(readRows(await fs.readFile(outPath))[1]).toEqual(['/corpus/a.docx', 'Home', 'x', 'external', '']);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
