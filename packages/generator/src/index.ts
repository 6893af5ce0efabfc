/**
 * @lexrag/generator
 *
 * Language-model boundary and grounded prompt composition.
 */

export type { IGenerator } from "./generator.interface.js";
export { GeminiGenerator, DEFAULT_GEMINI_MODEL } from "./gemini-generator.js";
export type { GeminiGeneratorConfig } from "./gemini-generator.js";
export { formatContext } from "./context-format.js";
export {
  buildPrompt,
  JSON_DIRECTIVE,
  NATURAL_DIRECTIVE,
} from "./prompt-builder.js";
export type { PromptInput } from "./prompt-builder.js";
