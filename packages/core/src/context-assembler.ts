import type { ContextFormat, ScoredChunk } from "@quarry/types";

export const NO_CONTEXT_MESSAGE =
  "No relevant context found in the uploaded document. The document may not contain information related to your query.";

/**
 * Render ranked passages as a context block for a downstream answer generator.
 *
 * - plain: numbered sections
 * - markdown: headed sections separated by rules
 * - xml: `<document>` elements inside `<context>`
 */
export function assembleContext(
  chunks: readonly ScoredChunk[],
  filename: string,
  format: ContextFormat = "plain",
): string {
  if (chunks.length === 0) return NO_CONTEXT_MESSAGE;

  switch (format) {
    case "xml":
      return assembleXml(chunks, filename);
    case "markdown":
      return assembleMarkdown(chunks, filename);
    case "plain":
    default:
      return assemblePlain(chunks, filename);
  }
}

function relevance(score: number): string {
  return score.toFixed(3);
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function assembleXml(chunks: readonly ScoredChunk[], filename: string): string {
  const parts = chunks.map(
    (scored, i) =>
      `<document index="${String(i + 1)}" source="${escapeXml(filename)}" relevance="${relevance(scored.score)}">\n${escapeXml(scored.chunk.content)}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: readonly ScoredChunk[], filename: string): string {
  const parts = chunks.map(
    (scored, i) =>
      `### Source ${String(i + 1)} (${filename}, relevance ${relevance(scored.score)})\n\n${scored.chunk.content}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(chunks: readonly ScoredChunk[], filename: string): string {
  const parts = chunks.map(
    (scored, i) =>
      `[${String(i + 1)}] (Source: ${filename}, relevance ${relevance(scored.score)})\n${scored.chunk.content}`,
  );

  return parts.join("\n\n");
}
