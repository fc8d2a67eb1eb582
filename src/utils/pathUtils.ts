/**
 * Path helpers shared by link normalisation, backups and the dependency graph.
 *
 * Drive-letter paths (C:\..., C:/...) are handled with Windows semantics on
 * every platform. Every path handed back to callers uses forward slashes.
 */

import * as path from 'path';

const DRIVE_PATH = /^[a-zA-Z]:[\\/]/;

export function toPosix(value: string): string {
  return value.replace(/\\/g, '/');
}

export function isDrivePath(value: string): boolean {
  return DRIVE_PATH.test(value);
}

function driveOf(value: string): string | null {
  return isDrivePath(value) ? value.charAt(0).toLowerCase() : null;
}

function flavourFor(...values: string[]): path.PlatformPath {
  if (process.platform === 'win32' || values.some(isDrivePath)) {
    return path.win32;
  }
  return path.posix;
}

/** Normalise `.`/`..` segments and separators; output uses `/` */
export function normalizePath(value: string): string {
  return toPosix(flavourFor(value).normalize(value));
}

/**
 * Express an absolute target relative to a base directory. Falls back to the
 * normalised absolute target when no relative form exists (different drive,
 * or a drive path against a drive-less base). The base itself is `.`.
 */
export function relativeOrAbsolute(target: string, baseDir: string): string {
  const normalizedTarget = normalizePath(target);
  const targetDrive = driveOf(target);
  const baseDrive = driveOf(baseDir);

  if (targetDrive !== baseDrive && process.platform !== 'win32') {
    return normalizedTarget;
  }
  if (targetDrive && baseDrive && targetDrive !== baseDrive) {
    return normalizedTarget;
  }

  const flavour = flavourFor(target, baseDir);
  const relative = flavour.relative(flavour.resolve(baseDir), flavour.resolve(target));
  return relative === '' ? '.' : toPosix(relative);
}

/** Resolve `href` against the directory holding `docPath` */
export function resolveAgainstDocument(docPath: string, href: string): string {
  const flavour = flavourFor(docPath, href);
  const portable = flavour === path.posix ? toPosix(href) : href;
  return toPosix(flavour.resolve(flavour.dirname(docPath), portable));
}

/** Root-relative path of a file, with forward slashes */
export function relativeTo(root: string, filePath: string): string {
  return toPosix(path.relative(root, filePath));
}

function caseKey(value: string): string {
  const resolved = path.resolve(value);
  return process.platform === 'win32' ? resolved.toLowerCase() : resolved;
}

/** True when `filePath` is `dir` itself or lives somewhere beneath it */
export function isInsideDirectory(filePath: string, dir: string): boolean {
  const file = caseKey(filePath);
  const parent = caseKey(dir);
  return file === parent || file.startsWith(parent.endsWith(path.sep) ? parent : parent + path.sep);
}

/** Lower-cased file name without extension */
export function baseNameKey(filePath: string): string {
  const name = path.posix.basename(toPosix(filePath));
  return path.posix.parse(name).name.toLowerCase();
}
