export interface SentenceSpan {
  /** Offset of the first character. */
  start: number;
  /** Offset one past the last character (terminal punctuation included). */
  end: number;
}

/**
 * Terminal punctuation, optional closing quotes/brackets, then whitespace or
 * end of text. A newline (paragraph break) also ends a sentence.
 */
const BOUNDARY_SOURCE = String.raw`[.!?]+["'\u201D\u2019)\]]*(?=\s|$)|\n`;

export function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && isWhitespace(text[i])) i++;
  return i;
}

function trimEnd(text: string, start: number, end: number): number {
  let e = end;
  while (e > start && isWhitespace(text[e - 1])) e--;
  return e;
}

/**
 * Locate sentences as offset spans, in reading order. Whitespace between
 * sentences belongs to no span.
 */
export function findSentences(text: string): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  const boundary = new RegExp(BOUNDARY_SOURCE, "g");

  let cursor = skipWhitespace(text, 0);
  while (cursor < text.length) {
    boundary.lastIndex = cursor;
    const match = boundary.exec(text);

    let end: number;
    let next: number;
    if (!match) {
      end = text.length;
      next = text.length;
    } else if (match[0] === "\n") {
      end = match.index;
      next = match.index + 1;
    } else {
      end = match.index + match[0].length;
      next = end;
    }

    end = trimEnd(text, cursor, end);
    if (end > cursor) {
      spans.push({ start: cursor, end });
    }
    cursor = skipWhitespace(text, next);
  }

  return spans;
}

/**
 * Break every span longer than `maxLength` into pieces of at most
 * `maxLength` characters, cutting at the last space that fits, or
 * mid-word when a single word is too long.
 */
export function splitOversized(
  text: string,
  spans: SentenceSpan[],
  maxLength: number,
): SentenceSpan[] {
  const out: SentenceSpan[] = [];

  for (const span of spans) {
    let start = span.start;
    while (span.end - start > maxLength) {
      const limit = start + maxLength;
      const space = text.lastIndexOf(" ", limit);
      const cut = space > start ? space : limit;

      out.push({ start, end: trimEnd(text, start, cut) });
      start = skipWhitespace(text, cut);
    }
    if (start < span.end) {
      out.push({ start, end: span.end });
    }
  }

  return out;
}

/**
 * Index of the first span whose start is >= `offset` (spans.length when none).
 */
export function firstSpanStartingAt(spans: SentenceSpan[], offset: number): number {
  let lo = 0;
  let hi = spans.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const span = spans[mid];
    if (span !== undefined && span.start < offset) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
