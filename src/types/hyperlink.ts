/**
 * Hyperlink classification types
 */

export type LinkType = 'email' | 'internal' | 'document' | 'external' | 'unknown';

/** Hyperlink extracted from a document; produced fresh on every scan */
export interface Link {
  /** Display text (or "[Image/Object]" when the link wraps no text) */
  readonly text: string;
  /** Target exactly as stored in the document */
  readonly rawHref: string;
  /** Root-relative path for internal links, otherwise the raw target */
  readonly normalizedTarget: string;
  readonly type: LinkType;
}

export interface NormalizedTarget {
  type: LinkType;
  normalized: string;
}

/** Link extraction result for one file */
export interface FileLinks {
  path: string;
  links: Link[];
  error?: string;
}
