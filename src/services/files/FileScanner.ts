/**
 * FileScanner - enumerates eligible documents under a root folder
 *
 * Lock/temporary files (~$name.docx) are never eligible. A subdirectory that
 * cannot be read is skipped without aborting the scan.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { AppConfig } from '@/config/appConfig';
import { getErrorMessage } from '@/types/errors';
import { logger } from '@/utils/logger';

const log = logger.namespace('FileScanner');

export type ScanOptions = Pick<AppConfig, 'documentExtension' | 'lockFilePrefix'>;

export interface FileNode {
  name: string;
  type: 'file';
  path: string;
}

export interface FolderNode {
  name: string;
  type: 'folder';
  path: string;
  children: Array<FolderNode | FileNode>;
}

export function isEligibleDocument(fileName: string, options: ScanOptions): boolean {
  return (
    fileName.toLowerCase().endsWith(options.documentExtension.toLowerCase()) &&
    !fileName.startsWith(options.lockFilePrefix)
  );
}

async function readEntries(dir: string) {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    log.warn(`Skipping unreadable folder ${dir}: ${getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Flat list of eligible document paths, depth-first in name order
 */
export async function listDocxFiles(rootPath: string, options: ScanOptions): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readEntries(rootPath)) {
    const entryPath = path.join(rootPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listDocxFiles(entryPath, options)));
    } else if (entry.isFile() && isEligibleDocument(entry.name, options)) {
      files.push(entryPath);
    }
  }
  return files;
}

/**
 * Folder tree containing every subfolder and the eligible documents in it
 */
export async function scanFolderStructure(rootPath: string, options: ScanOptions): Promise<FolderNode> {
  const tree: FolderNode = {
    name: path.basename(rootPath),
    type: 'folder',
    path: rootPath,
    children: [],
  };

  for (const entry of await readEntries(rootPath)) {
    const entryPath = path.join(rootPath, entry.name);
    if (entry.isDirectory()) {
      tree.children.push(await scanFolderStructure(entryPath, options));
    } else if (entry.isFile() && isEligibleDocument(entry.name, options)) {
      tree.children.push({ name: entry.name, type: 'file', path: entryPath });
    }
  }
  return tree;
}
