/**
 * Literal, case-insensitive matching
 *
 * Search text is always escaped; callers never get to pass a regular expression.
 */

const SNIPPET_MAX_LENGTH = 100;
const SNIPPET_CONTEXT = 40;
const ELLIPSIS = '...';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class LiteralPattern {
  readonly source: string;
  private readonly regex: RegExp;

  constructor(findText: string) {
    if (!findText) {
      throw new RangeError('LiteralPattern requires a non-empty search string');
    }
    this.source = findText;
    this.regex = new RegExp(escapeRegExp(findText), 'gi');
  }

  /** Fresh global regex so lastIndex state never leaks between calls */
  private global(): RegExp {
    return new RegExp(this.regex.source, this.regex.flags);
  }

  test(text: string): boolean {
    return this.count(text) > 0;
  }

  /** Number of non-overlapping matches */
  count(text: string): number {
    return text.match(this.global())?.length ?? 0;
  }

  /** Start/end offsets of every non-overlapping match */
  spans(text: string): Array<{ start: number; end: number }> {
    const spans: Array<{ start: number; end: number }> = [];
    for (const match of text.matchAll(this.global())) {
      const start = match.index ?? 0;
      spans.push({ start, end: start + match[0].length });
    }
    return spans;
  }

  /** Replace every match; the replacement is inserted verbatim */
  replace(text: string, replacement: string): string {
    return text.replace(this.global(), () => replacement);
  }

  /**
   * Human-readable context for a matching paragraph: the trimmed text, or a
   * window of 40 characters either side of the first match when it is long.
   */
  snippet(text: string): string {
    const trimmed = text.trim();
    if (trimmed.length <= SNIPPET_MAX_LENGTH) {
      return trimmed;
    }

    const first = this.spans(trimmed)[0];
    const index = first ? first.start : trimmed.toLowerCase().indexOf(this.source.toLowerCase());
    const matchLength = first ? first.end - first.start : this.source.length;
    const start = Math.max(0, index - SNIPPET_CONTEXT);
    const end = Math.min(trimmed.length, index + matchLength + SNIPPET_CONTEXT);
    return `${ELLIPSIS}${trimmed.slice(start, end)}${ELLIPSIS}`;
  }
}
