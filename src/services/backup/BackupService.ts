/**
 * BackupService - pre-mutation copies for find/replace runs
 *
 * Backups mirror each file's location relative to the scan root underneath a
 * backup root. The engines call captureOriginal() at most once per file and
 * per invocation, only when the file had matches, and always before the
 * document is saved in place.
 */

import { createHash } from 'crypto';
import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { AppConfig } from '@/config/appConfig';
import { BackupError } from '@/types/errors';
import { logger } from '@/utils/logger';
import { isInsideDirectory } from '@/utils/pathUtils';

const log = logger.namespace('BackupService');

/**
 * Backup root for a scan: `<desktop>/<folder>` when the desktop folder exists,
 * otherwise `<scanRoot>/<folder>`.
 */
export function resolveBackupRoot(
  scanRoot: string,
  config: Pick<AppConfig, 'desktopDir' | 'backupFolderName'>
): string {
  if (existsSync(config.desktopDir)) {
    return path.join(config.desktopDir, config.backupFolderName);
  }
  return path.join(scanRoot, config.backupFolderName);
}

/** `<backupRoot>/<file relative to baseDir>`; files outside baseDir keep only their name */
export function computeBackupPath(filePath: string, baseDir: string, backupRoot: string): string {
  const relative = path.relative(baseDir, filePath);
  const mirrored =
    relative === '' || relative.startsWith('..') || path.isAbsolute(relative)
      ? path.basename(filePath)
      : relative;
  return path.join(backupRoot, mirrored);
}

/**
 * Drop files that are themselves previous backups, when the backup root is
 * nested inside the scan root.
 */
export function excludeBackupCopies(files: string[], scanRoot: string, backupRoot: string): string[] {
  if (!isInsideDirectory(backupRoot, scanRoot)) {
    return files;
  }
  const kept = files.filter((file) => !isInsideDirectory(file, backupRoot));
  if (kept.length !== files.length) {
    log.debug(`Excluded ${files.length - kept.length} file(s) under backup root ${backupRoot}`);
  }
  return kept;
}

function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Copy the untouched file to `backupPath`, creating parent folders and keeping
 * its timestamps. Failures are logged and reported as `undefined`.
 */
export async function captureOriginal(sourcePath: string, backupPath: string): Promise<string | undefined> {
  try {
    await fs.mkdir(path.dirname(backupPath), { recursive: true });
    const data = await fs.readFile(sourcePath);
    await fs.writeFile(backupPath, data);

    const stats = await fs.stat(sourcePath);
    await fs.utimes(backupPath, stats.atime, stats.mtime);

    const written = await fs.readFile(backupPath);
    if (sha256(written) !== sha256(data)) {
      throw new Error('Backup integrity check failed');
    }

    log.debug(`Backed up ${sourcePath} -> ${backupPath}`);
    return backupPath;
  } catch (error) {
    const failure = new BackupError(sourcePath, backupPath, error);
    log.warn(failure.message);
    return undefined;
  }
}
