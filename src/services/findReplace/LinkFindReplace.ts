/**
 * LinkFindReplace - find/replace restricted to hyperlinks
 *
 * Handles two hyperlink representations:
 * - relationship hyperlinks (`w:hyperlink r:id=...`): display text is the
 *   concatenation of the nested text runs, the URL comes from the part's
 *   relationship table;
 * - field-code hyperlinks (`HYPERLINK "url"` instructions): the URL lives in
 *   the instruction, the visible text is the paragraph text.
 *
 * A URL match is replaced as a whole: the entire target becomes the
 * replacement string, not just the matched substring. Relationship hyperlinks
 * get a fresh relationship (same external/internal mode) and are repointed
 * to it; the original relationship is left in place.
 */

import {
  FIND_REPLACE_STATUS,
  type FindReplaceResult,
  type LinkTargetScope,
} from '@/types/find-replace';
import { getErrorMessage } from '@/types/errors';
import { LiteralPattern } from '@/utils/literalPattern';
import { logger } from '@/utils/logger';
import { OrderedSet } from '@/utils/OrderedSet';
import { captureOriginal } from '../backup/BackupService';
import type { FieldInstruction, HyperlinkNode, ParagraphNode } from '../document/DocumentNodes';
import { DocxDocument } from '../document/DocxDocument';
import { parseFieldHyperlinkUrl } from '../links/LinkExtractor';

const log = logger.namespace('LinkFindReplace');

export interface LinkFindReplaceOptions {
  replaceText?: string;
  target?: LinkTargetScope;
  backupPath?: string;
}

/** Mutable per-call scan state; one instance per invocation */
class LinkScan {
  matches = 0;
  readonly snippets: string[] = [];
  readonly foundUrls = new OrderedSet<string>();
  readonly foundTexts = new OrderedSet<string>();

  constructor(
    private readonly doc: DocxDocument,
    private readonly pattern: LiteralPattern,
    private readonly target: LinkTargetScope,
    private readonly replaceText: string | undefined
  ) {}

  private get includesName(): boolean {
    return this.target === 'name' || this.target === 'both';
  }

  private get includesUrl(): boolean {
    return this.target === 'url' || this.target === 'both';
  }

  paragraph(paragraph: ParagraphNode): void {
    for (const field of paragraph.fieldInstructions()) {
      if (field.isHyperlink()) {
        this.fieldHyperlink(paragraph, field);
      }
    }
    for (const hyperlink of paragraph.hyperlinks()) {
      this.relationshipHyperlink(hyperlink);
    }
  }

  private relationshipHyperlink(hyperlink: HyperlinkNode): void {
    const id = hyperlink.getRelationshipId();
    const rel = id ? this.doc.getRelationship(id) : undefined;
    const url = rel?.target;
    const linkText = hyperlink.getText();

    if (this.includesName && linkText && this.pattern.test(linkText)) {
      this.matches += this.pattern.count(linkText);
      this.snippets.push(`text: ${linkText}`);
      this.foundTexts.add(linkText);

      if (this.replaceText !== undefined) {
        for (const node of hyperlink.textNodes()) {
          const current = node.getText();
          if (current) {
            node.setText(this.pattern.replace(current, this.replaceText));
          }
        }
      }
    }

    if (this.includesUrl && rel && url && this.pattern.test(url)) {
      this.matches += this.pattern.count(url);
      this.snippets.push(`url: ${url}`);
      this.foundUrls.add(url);

      if (this.replaceText !== undefined) {
        try {
          const newId = this.doc.createRelationship(this.replaceText, rel.external);
          hyperlink.setRelationshipId(newId);
          this.snippets.push(`replaced-url: ${url} -> ${this.replaceText} (rId=${newId})`);
        } catch (error) {
          log.warn(`Could not rewrite hyperlink ${id}: ${getErrorMessage(error)}`);
          this.snippets.push(`replace-url-failed: ${getErrorMessage(error)}`);
        }
      }
    }
  }

  private fieldHyperlink(paragraph: ParagraphNode, field: FieldInstruction): void {
    const instruction = field.getInstruction();
    const url = parseFieldHyperlinkUrl(instruction);
    const linkText = paragraph.getText();

    if (this.includesUrl && url && this.pattern.test(url)) {
      this.matches += this.pattern.count(url);
      this.snippets.push(`field-url: ${url}`);
      this.foundUrls.add(url);

      if (this.replaceText !== undefined) {
        try {
          field.setInstruction(instruction.split(url).join(this.replaceText));
          this.snippets.push(`replaced-field-url: ${url} -> ${this.replaceText}`);
        } catch (error) {
          log.warn(`Could not rewrite field hyperlink: ${getErrorMessage(error)}`);
          this.snippets.push(`replace-field-url-failed: ${getErrorMessage(error)}`);
        }
      }
    }

    if (this.includesName && linkText && this.pattern.test(linkText)) {
      this.matches += this.pattern.count(linkText);
      this.snippets.push(`field-text: ${linkText}`);
      this.foundTexts.add(linkText);

      if (this.replaceText !== undefined) {
        for (const run of paragraph.readRuns()) {
          for (const node of run.textNodes()) {
            const current = node.getText();
            if (current) {
              node.setText(this.pattern.replace(current, this.replaceText));
            }
          }
        }
      }
    }
  }
}

/**
 * Find (and optionally replace) `findText` in hyperlink text and/or targets
 *
 * @throws DocumentOpenError / DocumentParseError / DocumentSaveError
 */
export async function findReplaceLinks(
  filePath: string,
  findText: string,
  options: LinkFindReplaceOptions = {}
): Promise<FindReplaceResult> {
  if (!findText) {
    return { matches: 0, status: FIND_REPLACE_STATUS.NO_FIND_TEXT, snippets: [] };
  }

  const { replaceText, target = 'both', backupPath } = options;
  const doc = await DocxDocument.open(filePath);
  const scan = new LinkScan(doc, new LiteralPattern(findText), target, replaceText);

  for (const paragraph of doc.allParagraphs()) {
    scan.paragraph(paragraph);
  }

  let copyPath: string | undefined;
  if (scan.matches > 0 && backupPath) {
    copyPath = await captureOriginal(filePath, backupPath);
  }

  const didReplace = replaceText !== undefined && scan.matches > 0;
  if (didReplace) {
    await doc.save();
    log.info(`Rewrote ${scan.matches} hyperlink match(es) in ${filePath}`);
  }

  const result: FindReplaceResult = {
    matches: scan.matches,
    status: didReplace ? FIND_REPLACE_STATUS.REPLACED : FIND_REPLACE_STATUS.FOUND,
    snippets: scan.snippets,
  };
  if (copyPath) {
    result.copyPath = copyPath;
  }
  if (scan.foundUrls.size > 0) {
    result.foundUrls = scan.foundUrls.toArray();
  }
  if (scan.foundTexts.size > 0) {
    result.foundTexts = scan.foundTexts.toArray();
  }
  result.didReplace = didReplace;
  return result;
}
