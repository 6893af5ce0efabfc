/**
 * A generative language model reached through a single prompt-in,
 * text-out call.
 */
export interface IGenerator {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}
