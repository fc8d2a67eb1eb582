/**
 * Find/replace result types shared by the text and link engines
 */

export const FIND_REPLACE_STATUS = {
  FOUND: 'Found',
  REPLACED: 'Replaced & Saved',
  NO_FIND_TEXT: 'No find text provided',
  ERROR: 'error',
} as const;

export type FindReplaceStatus = (typeof FIND_REPLACE_STATUS)[keyof typeof FIND_REPLACE_STATUS];

/** Which part of a hyperlink the link engine searches */
export type LinkTargetScope = 'name' | 'url' | 'both';

export interface FindReplaceResult {
  matches: number;
  status: FindReplaceStatus;
  snippets: string[];
  /** Backup written before the save; absent when none was produced */
  copyPath?: string;
  /** Link mode: distinct matching URLs, first-seen order */
  foundUrls?: string[];
  /** Link mode: distinct matching display texts, first-seen order */
  foundTexts?: string[];
  /** Link mode: whether the document was rewritten */
  didReplace?: boolean;
}

export interface FileFindReplaceResult extends FindReplaceResult {
  path: string;
  error?: string;
}

export interface BulkFindReplaceResult {
  totalMatches: number;
  files: FileFindReplaceResult[];
  mode: 'find' | 'replace';
  /** Link mode only */
  target?: LinkTargetScope;
  /** Where pre-mutation copies go, when copies were requested */
  saveRoot?: string;
}

/** Per-call bulk configuration; never held as shared state */
export interface BulkRunConfig {
  /** Scan root; backup paths mirror each file's path relative to it */
  baseDir: string;
  backupRoot?: string;
}
