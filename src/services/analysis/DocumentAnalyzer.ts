/**
 * DocumentAnalyzer - single-file inspection
 */

import * as path from 'path';
import type { Link } from '@/types/hyperlink';
import { DocxDocument } from '../document/DocxDocument';
import { type ClassifierOptions, getLinks } from '../links/LinkExtractor';

export interface DocumentAnalysis {
  /** Whether the document records revisions (trackRevisions setting) */
  trackedChanges: boolean;
  /** Links normalised against the file's own folder */
  links: Link[];
  path: string;
}

export async function analyzeFile(filePath: string, options: ClassifierOptions): Promise<DocumentAnalysis> {
  const doc = await DocxDocument.open(filePath);
  const baseDir = path.dirname(filePath);
  return {
    trackedChanges: doc.hasSetting('trackRevisions'),
    links: getLinks(doc, { ...options, docPath: filePath, baseDir }),
    path: filePath,
  };
}
