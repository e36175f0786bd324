import type { ContextFormat, ScoredChunk } from "@benchrag/types";

/**
 * Serializes ranked chunks for the prompt. Every entry carries its rank,
 * chunk id and source so an answer can be traced back to the benchmark text.
 *
 * - xml: `<document>` elements inside `<context>`
 * - markdown: one `###` section per chunk, separated by rules
 * - plain: numbered sections
 */
export function assembleContext(chunks: ScoredChunk[], format: ContextFormat): string {
  if (chunks.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(chunks);
    case "markdown":
      return assembleMarkdown(chunks);
    case "plain":
    default:
      return assemblePlain(chunks);
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

function assembleXml(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) =>
      `<document index="${String(i + 1)}" id="${escapeAttribute(chunk.chunkId)}" source="${escapeAttribute(chunk.source)}">\n${chunk.content}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) => `### Source ${String(i + 1)}: ${chunk.source} (${chunk.chunkId})\n\n${chunk.content}`,
  );

  return parts.join("\n\n---\n\n");
}

function assemblePlain(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) => `[${String(i + 1)}] (Source: ${chunk.source}, id: ${chunk.chunkId})\n${chunk.content}`,
  );

  return parts.join("\n\n");
}
