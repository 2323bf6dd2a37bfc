export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Text generation backend. Receives prompts that have already been scrubbed of PII.
 */
export interface GenerationProvider {
  readonly model: string;
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
}
