/**
 * LinkExporter - tabular export of extracted hyperlinks
 *
 * One row per link plus one row per file whose extraction failed. Workbooks
 * have a single "Links" sheet with a fixed five-column header.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as XLSX from 'xlsx';
import type { FileLinks } from '@/types/hyperlink';
import { logger } from '@/utils/logger';

const log = logger.namespace('LinkExporter');

export const LINK_SHEET_NAME = 'Links';
export const LINK_SHEET_HEADER = ['File', 'Text', 'URL', 'Type', 'Error'] as const;

/** Cell values as they come from callers; rows may be ragged */
export type LinkRow = Array<string | number | boolean | null | undefined>;

export function buildLinkRows(linkData: FileLinks[]): string[][] {
  const rows: string[][] = [];
  for (const item of linkData) {
    for (const link of item.links) {
      rows.push([item.path, link.text, link.normalizedTarget, link.type, '']);
    }
    if (item.error) {
      rows.push([item.path, '', '', '', item.error]);
    }
  }
  return rows;
}

/** Pad or truncate a row to the header width; missing cells become '' */
function fitRow(row: LinkRow): Array<string | number | boolean> {
  return LINK_SHEET_HEADER.map((_, i) => row[i] ?? '');
}

/** Serialised .xlsx workbook */
export function buildLinksWorkbook(rows: LinkRow[]): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([[...LINK_SHEET_HEADER], ...rows.map(fitRow)]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, LINK_SHEET_NAME);

  const data: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(data)) {
    throw new Error('Workbook serialisation did not produce a buffer');
  }
  return data;
}

export async function writeLinksWorkbook(rows: LinkRow[], outPath: string): Promise<string> {
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, buildLinksWorkbook(rows));
  log.info(`Wrote ${rows.length} link row(s) to ${outPath}`);
  return outPath;
}
