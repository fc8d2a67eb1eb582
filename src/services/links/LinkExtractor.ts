/**
 * LinkExtractor - read-only hyperlink extraction
 *
 * Collects relationship hyperlinks and field-code hyperlinks from body and
 * table paragraphs, and classifies each target with the LinkNormalizer.
 */

import * as path from 'path';
import type { AppConfig } from '@/config/appConfig';
import type { FileLinks, Link } from '@/types/hyperlink';
import { getErrorMessage } from '@/types/errors';
import { logger } from '@/utils/logger';
import { DocxDocument } from '../document/DocxDocument';
import { normalizeTarget } from './LinkNormalizer';

const log = logger.namespace('LinkExtractor');

export const OBJECT_LINK_TEXT = '[Image/Object]';

export type ClassifierOptions = Pick<AppConfig, 'hubDomain' | 'orgKeyword'>;

export interface ExtractOptions extends ClassifierOptions {
  docPath?: string;
  baseDir?: string;
}

/**
 * URL of a field instruction such as `HYPERLINK "https://..." \o "tip"`.
 * Double quotes, then single quotes, then the first bare token.
 */
export function parseFieldHyperlinkUrl(instruction: string): string | undefined {
  const match =
    /HYPERLINK\s+"([^"]+)"/.exec(instruction) ??
    /HYPERLINK\s+'([^']+)'/.exec(instruction) ??
    /HYPERLINK\s+([^\s]+)/.exec(instruction);
  return match ? match[1] : undefined;
}

export function getLinks(doc: DocxDocument, options: ExtractOptions): Link[] {
  const targets = new Map<string, string>();
  for (const rel of doc.readRelationships('hyperlink')) {
    targets.set(rel.id, rel.target);
  }

  const toLink = (text: string, rawHref: string): Link => {
    const { type, normalized } = normalizeTarget(rawHref, options);
    return { text, rawHref, normalizedTarget: normalized, type };
  };

  const links: Link[] = [];
  for (const paragraph of doc.allParagraphs()) {
    for (const field of paragraph.fieldInstructions()) {
      if (!field.isHyperlink()) continue;
      const url = parseFieldHyperlinkUrl(field.getInstruction());
      if (url) {
        links.push(toLink(paragraph.getText() || OBJECT_LINK_TEXT, url));
      }
    }

    for (const hyperlink of paragraph.hyperlinks()) {
      const id = hyperlink.getRelationshipId();
      const url = id ? targets.get(id) : undefined;
      if (url) {
        links.push(toLink(hyperlink.getText() || OBJECT_LINK_TEXT, url));
      }
    }
  }
  return links;
}

/**
 * Extract links from every file; a file that cannot be read is reported with
 * its error and an empty link list.
 *
 * @param baseDir - defaults to each file's own folder
 */
export async function collectLinksForFiles(
  filePaths: string[],
  options: ClassifierOptions & { baseDir?: string }
): Promise<FileLinks[]> {
  const results: FileLinks[] = [];
  for (const filePath of filePaths) {
    try {
      const doc = await DocxDocument.open(filePath);
      const links = getLinks(doc, {
        ...options,
        docPath: filePath,
        baseDir: options.baseDir ?? path.dirname(filePath),
      });
      results.push({ path: filePath, links });
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn(`Link extraction failed for ${filePath}: ${message}`);
      results.push({ path: filePath, links: [], error: message });
    }
  }
  return results;
}
