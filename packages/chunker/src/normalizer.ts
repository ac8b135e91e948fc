/**
 * C0 controls other than tab, newline, form feed and carriage return, DEL,
 * C1 controls, and zero-width characters.
 */
const NON_PRINTABLE = /[\u0000-\u0008\u000B\u000E-\u001F\u007F-\u009F\u200B-\u200D\u2060\uFEFF]/g;

const PARAGRAPH_BREAK = /\n\s*\n/;

/**
 * Clean raw extracted document text.
 *
 * Paragraphs (separated by a blank line or a form feed) are kept, joined by a
 * single `\n`; every other whitespace run collapses to one space. Never
 * throws: empty or whitespace-only input yields `""`.
 */
export function normalize(raw: string): string {
  if (typeof raw !== "string" || raw.length === 0) return "";

  const text = raw.replace(/\r\n?/g, "\n").replace(/\f/g, "\n\n").replace(NON_PRINTABLE, "");

  return text
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.replace(/\s+/g, " ").trim())
    .filter((paragraph) => paragraph.length > 0)
    .join("\n");
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}
