/**
 * Single-shot text generation. Implementations own timeouts and transport
 * retries; the pipeline calls `generate` once per stage and never retries.
 */
export interface TextGenerator {
  generate(systemInstruction: string, userContent: string): Promise<string>;
}

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly errorType?: string
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}
