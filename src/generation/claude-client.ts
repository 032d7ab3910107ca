import Anthropic from '@anthropic-ai/sdk';
import { GenerationError } from './types.js';
import type { TextGenerator } from './types.js';
import { logger } from '../observability/logger.js';

const TIMEOUT_MS = 60000;
const MAX_RETRIES = 1;
const TEMPERATURE = 0.1;

export interface ClaudeClientOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export class ClaudeClient implements TextGenerator {
  private client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: ClaudeClientOptions) {
    if (!options.apiKey) {
      throw new GenerationError('Anthropic API key is required');
    }

    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: TIMEOUT_MS,
      maxRetries: MAX_RETRIES,
    });
  }

  async generate(systemInstruction: string, userContent: string): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: TEMPERATURE,
        system: systemInstruction,
        messages: [
          {
            role: 'user',
            content: userContent,
          },
        ],
      });

      logger.info('generation_response', 'Claude API response received', {
        model: this.model,
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
        stop_reason: response.stop_reason,
      });

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          parts.push(block.text);
        }
      }

      if (parts.length === 0) {
        throw new GenerationError('No text content in Claude response');
      }

      return parts.join('');
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        logger.error('generation_error', 'Claude API error', {
          status: error.status,
          message: error.message,
        });
        throw new GenerationError(`Claude API failed: ${error.message}`, error.status, error.name);
      }
      throw error;
    }
  }
}
