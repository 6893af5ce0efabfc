import type { ContextFormat } from "@lexrag/types";

/**
 * Lay out retrieved chunk texts (best match first) as the context block of a
 * prompt.
 *
 * - plain: chunks separated by blank lines
 * - xml: numbered `<document>` elements inside `<context>`
 * - markdown: numbered `### Source` sections
 */
export function formatContext(chunks: readonly string[], format: ContextFormat = "plain"): string {
  if (chunks.length === 0) return "";

  switch (format) {
    case "xml":
      return formatXml(chunks);
    case "markdown":
      return formatMarkdown(chunks);
    case "plain":
      return chunks.join("\n\n");
  }
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function formatXml(chunks: readonly string[]): string {
  const parts = chunks.map(
    (chunk, i) => `<document index="${String(i + 1)}">\n${escapeXml(chunk)}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function formatMarkdown(chunks: readonly string[]): string {
  const parts = chunks.map((chunk, i) => `### Source ${String(i + 1)}\n\n${chunk}`);

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}
