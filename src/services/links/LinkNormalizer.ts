/**
 * LinkNormalizer - classifies a hyperlink target and normalises it
 *
 * Rules are evaluated in order, first match wins:
 * 1. mailto                      -> email
 * 2. hub domain token            -> document (URL mentions "document") / internal
 * 3. organisation keyword token  -> internal
 * 4. http/https/ftp or //host    -> external
 * 5. file: URL                   -> internal, path relative to baseDir
 * 6. drive-letter absolute path  -> internal, path relative to baseDir
 * 7. path relative to the doc    -> internal, re-relativised against baseDir
 *    (a blank target resolves to the document's own folder)
 * 8. anything else               -> unknown
 *
 * The keyword checks deliberately run before the scheme checks: hub links use
 * https:// and must still count as internal. An external URL that merely
 * contains the organisation keyword is therefore classified internal too.
 */

import type { NormalizedTarget } from '@/types/hyperlink';
import {
  isDrivePath,
  normalizePath,
  relativeOrAbsolute,
  resolveAgainstDocument,
} from '@/utils/pathUtils';

export interface NormalizeOptions {
  /** Path of the document that contains the link */
  docPath?: string;
  /** Directory that internal targets are expressed relative to */
  baseDir?: string;
  hubDomain: string;
  orgKeyword: string;
}

const SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;
const WEB_SCHEMES = new Set(['http', 'https', 'ftp']);

function schemeOf(href: string): string {
  const match = SCHEME.exec(href);
  return match ? match[1].toLowerCase() : '';
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** file://host/path and file:/path -> path, percent-decoded */
function filePathFromUrl(href: string): string {
  const withoutScheme = href.replace(/^file:/i, '');
  const withoutAuthority = withoutScheme.startsWith('//')
    ? withoutScheme.slice(2).replace(/^[^/]*/, '')
    : withoutScheme;
  let decoded = safeDecode(withoutAuthority);
  // /C:/dir/file.docx -> C:/dir/file.docx
  if (/^\/[a-zA-Z]:/.test(decoded)) {
    decoded = decoded.slice(1);
  }
  return decoded;
}

function internalPath(absolute: string, baseDir?: string): NormalizedTarget {
  if (!baseDir) {
    return { type: 'internal', normalized: normalizePath(absolute) };
  }
  return { type: 'internal', normalized: relativeOrAbsolute(absolute, baseDir) };
}

export function normalizeTarget(rawHref: string, options: NormalizeOptions): NormalizedTarget {
  const href = rawHref.trim();
  const lower = href.toLowerCase();
  const scheme = schemeOf(href);

  if (scheme === 'mailto' || lower.includes('mailto:')) {
    return { type: 'email', normalized: href };
  }

  if (lower.includes(options.hubDomain.toLowerCase())) {
    return { type: lower.includes('document') ? 'document' : 'internal', normalized: href };
  }

  if (lower.includes(options.orgKeyword.toLowerCase())) {
    return { type: 'internal', normalized: href };
  }

  if (WEB_SCHEMES.has(scheme) || href.startsWith('//')) {
    return { type: 'external', normalized: href };
  }

  if (scheme === 'file') {
    const filePath = filePathFromUrl(href);
    if (filePath) {
      return internalPath(filePath, options.baseDir);
    }
  }

  if (isDrivePath(href)) {
    return internalPath(href, options.baseDir);
  }

  if (options.docPath && scheme !== 'file') {
    const candidate = resolveAgainstDocument(options.docPath, safeDecode(href));
    return internalPath(candidate, options.baseDir);
  }

  return { type: 'unknown', normalized: href };
}
