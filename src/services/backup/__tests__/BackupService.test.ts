/**
 * Test Suite for BackupService
 */

import { existsSync, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { captureOriginal, computeBackupPath, excludeBackupCopies, resolveBackupRoot } from '../BackupService';

describe('BackupService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'backup-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('resolveBackupRoot', () => {
    it('should prefer the desktop folder when it exists', async () => {
      const desktopDir = path.join(dir, 'Desktop');
      await fs.mkdir(desktopDir);

      expect(resolveBackupRoot('/corpus', { desktopDir, backupFolderName: 'bulk_found' })).toBe(
        path.join(desktopDir, 'bulk_found')
      );
    });

    it('should fall back to a folder inside the scan root', () => {
      const desktopDir = path.join(dir, 'no-desktop');

      expect(resolveBackupRoot('/corpus', { desktopDir, backupFolderName: 'bulk_found' })).toBe(
        path.join('/corpus', 'bulk_found')
      );
    });
  });

  describe('computeBackupPath', () => {
    it('should mirror the path relative to the scan root', () => {
      expect(computeBackupPath('/corpus/team/a.docx', '/corpus', '/backups')).toBe(
        path.join('/backups', 'team', 'a.docx')
      );
    });

    it('should keep only the file name for files outside the scan root', () => {
      expect(computeBackupPath('/elsewhere/a.docx', '/corpus', '/backups')).toBe(path.join('/backups', 'a.docx'));
    });
  });

  describe('excludeBackupCopies', () => {
    const files = ['/corpus/a.docx', '/corpus/bulk_found/a.docx', '/corpus/bulk_found_old/b.docx'];

    it('should drop earlier copies when the backup root is inside the scan root', () => {
      expect(excludeBackupCopies(files, '/corpus', '/corpus/bulk_found')).toEqual([
        '/corpus/a.docx',
        '/corpus/bulk_found_old/b.docx',
      ]);
    });

    it('should keep everything when the backup root is elsewhere', () => {
      expect(excludeBackupCopies(files, '/corpus', '/home/user/Desktop/bulk_found')).toEqual(files);
    });
  });

  describe('captureOriginal', () => {
    it('should copy the bytes and modification time into new folders', async () => {
      const source = path.join(dir, 'a.docx');
      await fs.writeFile(source, 'original bytes');
      const mtime = new Date('2024-01-02T03:04:05Z');
      await fs.utimes(source, mtime, mtime);
      const target = path.join(dir, 'copies', 'team', 'a.docx');

      expect(await captureOriginal(source, target)).toBe(target);
      expect(await fs.readFile(target, 'utf-8')).toBe('original bytes');
      expect((await fs.stat(target)).mtime.getTime()).toBe(mtime.getTime());
    });

    it('should report undefined when the source cannot be read', async () => {
      const target = path.join(dir, 'copies', 'missing.docx');

      expect(await captureOriginal(path.join(dir, 'missing.docx'), target)).toBeUndefined();
      expect(existsSync(target)).toBe(false);
    });
  });
});
