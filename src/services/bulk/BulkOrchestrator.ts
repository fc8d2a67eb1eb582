/**
 * BulkOrchestrator - runs the find/replace engines across a file set
 *
 * Files are processed one at a time; each file's open/scan/save cycle
 * finishes before the next starts. A failing file is recorded with
 * `status: 'error'` and zero matches and the batch carries on.
 */

import {
  FIND_REPLACE_STATUS,
  type BulkFindReplaceResult,
  type BulkRunConfig,
  type FileFindReplaceResult,
  type FindReplaceResult,
  type LinkTargetScope,
} from '@/types/find-replace';
import { getErrorMessage } from '@/types/errors';
import { logger, startTimer } from '@/utils/logger';
import { computeBackupPath, excludeBackupCopies } from '../backup/BackupService';
import { findReplaceLinks } from '../findReplace/LinkFindReplace';
import { findReplaceText } from '../findReplace/TextFindReplace';

const log = logger.namespace('BulkOrchestrator');

type FileRunner = (filePath: string, backupPath: string | undefined) => Promise<FindReplaceResult>;

async function runBatch(
  files: string[],
  config: BulkRunConfig,
  runFile: FileRunner
): Promise<{ totalMatches: number; files: FileFindReplaceResult[] }> {
  const { baseDir, backupRoot } = config;
  const eligible = backupRoot ? excludeBackupCopies(files, baseDir, backupRoot) : files;

  let totalMatches = 0;
  const results: FileFindReplaceResult[] = [];

  for (const filePath of eligible) {
    const backupPath = backupRoot ? computeBackupPath(filePath, baseDir, backupRoot) : undefined;
    try {
      const result = await runFile(filePath, backupPath);
      totalMatches += result.matches;
      results.push({ path: filePath, ...result });
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn(`Skipping ${filePath}: ${message}`);
      results.push({
        path: filePath,
        matches: 0,
        status: FIND_REPLACE_STATUS.ERROR,
        snippets: [],
        error: message,
      });
    }
  }

  return { totalMatches, files: results };
}

/**
 * Body-text find/replace over every file
 *
 * @param replaceText - `undefined` runs in find mode
 */
export async function bulkFindReplaceText(
  files: string[],
  findText: string,
  replaceText: string | undefined,
  config: BulkRunConfig
): Promise<BulkFindReplaceResult> {
  const timer = startTimer('bulkFindReplaceText');
  const batch = await runBatch(files, config, (filePath, backupPath) =>
    findReplaceText(filePath, findText, replaceText, backupPath)
  );
  timer.end();

  const result: BulkFindReplaceResult = {
    ...batch,
    mode: replaceText !== undefined ? 'replace' : 'find',
  };
  if (config.backupRoot) {
    result.saveRoot = config.backupRoot;
  }
  log.info(`Text ${result.mode}: ${result.totalMatches} match(es) in ${batch.files.length} file(s)`);
  return result;
}

/**
 * Hyperlink find/replace over every file
 *
 * Each file is scanned without a backup path first; the mutating pass (the
 * only one that may write a backup) runs only for files with matches, and
 * only when a replacement was given.
 */
export async function bulkFindReplaceLinks(
  files: string[],
  findText: string,
  replaceText: string | undefined,
  target: LinkTargetScope,
  config: BulkRunConfig
): Promise<BulkFindReplaceResult> {
  const timer = startTimer('bulkFindReplaceLinks');
  const batch = await runBatch(files, config, async (filePath, backupPath) => {
    const detected = await findReplaceLinks(filePath, findText, { target });
    if (detected.matches === 0 || replaceText === undefined) {
      return detected;
    }
    return findReplaceLinks(filePath, findText, { replaceText, target, backupPath });
  });
  timer.end();

  const result: BulkFindReplaceResult = {
    ...batch,
    mode: replaceText !== undefined ? 'replace' : 'find',
    target,
  };
  if (config.backupRoot) {
    result.saveRoot = config.backupRoot;
  }
  log.info(`Link ${result.mode} (${target}): ${result.totalMatches} match(es) in ${batch.files.length} file(s)`);
  return result;
}
