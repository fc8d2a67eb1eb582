/**
 * TextFindReplace - literal, case-insensitive find/replace over body text
 *
 * Scans every body paragraph and every table-cell paragraph (nested tables
 * included). Replacement works on the paragraph's concatenated text but
 * writes back into the existing text nodes: the replacement goes into the
 * node where a match starts and the rest of the match is removed from the
 * nodes it spans, so runs keep their formatting and hyperlinks stay intact.
 */

import { FIND_REPLACE_STATUS, type FindReplaceResult } from '@/types/find-replace';
import { LiteralPattern } from '@/utils/literalPattern';
import { logger } from '@/utils/logger';
import { captureOriginal } from '../backup/BackupService';
import type { TextNode } from '../document/DocumentNodes';
import { DocxDocument } from '../document/DocxDocument';

const log = logger.namespace('TextFindReplace');

/**
 * Replace every match across a sequence of text nodes
 *
 * @returns number of replaced matches
 */
export function replaceAcrossNodes(nodes: TextNode[], pattern: LiteralPattern, replacement: string): number {
  const texts = nodes.map((node) => node.getText());
  const starts: number[] = [];
  let offset = 0;
  for (const text of texts) {
    starts.push(offset);
    offset += text.length;
  }

  const locate = (position: number): number => {
    for (let i = texts.length - 1; i >= 0; i--) {
      if (starts[i] <= position && (position < starts[i] + texts[i].length || i === texts.length - 1)) {
        return i;
      }
    }
    return 0;
  };

  const spans = pattern.spans(texts.join(''));
  // Right to left, so the offsets of earlier matches stay valid
  for (let s = spans.length - 1; s >= 0; s--) {
    const { start, end } = spans[s];
    const first = locate(start);
    const last = locate(end - 1);

    if (first === last) {
      const local = start - starts[first];
      const current = texts[first];
      texts[first] = current.slice(0, local) + replacement + current.slice(local + (end - start));
      continue;
    }

    texts[first] = texts[first].slice(0, start - starts[first]) + replacement;
    for (let i = first + 1; i < last; i++) {
      texts[i] = '';
    }
    texts[last] = texts[last].slice(end - starts[last]);
  }

  nodes.forEach((node, i) => {
    if (node.getText() !== texts[i]) {
      node.setText(texts[i]);
    }
  });
  return spans.length;
}

/**
 * Find (and optionally replace) `findText` in a document's body text
 *
 * @param replaceText - when given, matches are replaced and the file is saved
 * @param backupPath - copy of the original, written only when there were matches
 * @throws DocumentOpenError / DocumentParseError / DocumentSaveError
 */
export async function findReplaceText(
  filePath: string,
  findText: string,
  replaceText?: string,
  backupPath?: string
): Promise<FindReplaceResult> {
  if (!findText) {
    return { matches: 0, status: FIND_REPLACE_STATUS.NO_FIND_TEXT, snippets: [] };
  }

  const pattern = new LiteralPattern(findText);
  const doc = await DocxDocument.open(filePath);
  let matches = 0;
  const snippets: string[] = [];

  for (const paragraph of doc.allParagraphs()) {
    const text = paragraph.getText();
    const found = pattern.count(text);
    if (found === 0) continue;

    matches += found;
    snippets.push(pattern.snippet(text));

    if (replaceText !== undefined) {
      replaceAcrossNodes(paragraph.textNodes(), pattern, replaceText);
    }
  }

  let copyPath: string | undefined;
  if (matches > 0 && backupPath) {
    copyPath = await captureOriginal(filePath, backupPath);
  }

  let status: FindReplaceResult['status'] = FIND_REPLACE_STATUS.FOUND;
  if (replaceText !== undefined && matches > 0) {
    await doc.save();
    status = FIND_REPLACE_STATUS.REPLACED;
    log.info(`Replaced ${matches} match(es) of "${findText}" in ${filePath}`);
  }

  const result: FindReplaceResult = { matches, status, snippets };
  if (copyPath) {
    result.copyPath = copyPath;
  }
  return result;
}
