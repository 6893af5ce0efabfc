import type { ContextFormat } from "@lexrag/types";
import { formatContext } from "./context-format.js";

const DEFAULT_INSTRUCTION =
  "You are a legal assistant AI. A user is asking a question based on a legal document.";

export const JSON_DIRECTIVE =
  "Respond strictly in JSON format as 'answer', 'source_clause_excerpt'";

export const NATURAL_DIRECTIVE = "Respond naturally.";

export interface PromptInput {
  query: string;
  /** Retrieved chunk texts, best match first. */
  chunks: readonly string[];
  /** Ask for `{answer, source_clause_excerpt}` JSON instead of prose. */
  formatJson: boolean;
  contextFormat?: ContextFormat;
  instruction?: string;
}

/**
 * Grounded prompt: instruction, delimited context, the question, then the
 * output directive. The model is told to answer only from the context.
 */
export function buildPrompt(input: PromptInput): string {
  const context = formatContext(input.chunks, input.contextFormat);

  return [
    input.instruction ?? DEFAULT_INSTRUCTION,
    "Here is the relevant content extracted from the document:",
    "",
    "--- START OF CONTEXT ---",
    context,
    "--- END OF CONTEXT ---",
    "",
    "Now answer the following question based only on the above context:",
    `"${input.query}"`,
    "",
    input.formatJson ? JSON_DIRECTIVE : NATURAL_DIRECTIVE,
  ].join("\n");
}
