/**
 * LLM integration layer using Vercel AI SDK.
 * Supports multiple providers: Groq, OpenAI, Anthropic.
 */

import { APICallError, generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import type { LLMProvider } from '../config.js';
import { logger } from '../utils/logger.js';
import { LLMError } from '../types/errors.js';

export interface GenerationMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * One call to the generation service.
 */
export interface GenerationRequest {
  system: string;
  messages: GenerationMessage[];
  temperature: number;
  maxOutputTokens: number;
}

/**
 * Anything that turns a request into free text. The analyzer only depends
 * on this, so tests can substitute a scripted implementation.
 */
export interface GenerationService {
  generate(request: GenerationRequest): Promise<string>;
}

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
}

/**
 * Generation service backed by the AI SDK.
 *
 * Requests are sent once: the SDK's own retries are disabled and every
 * failure surfaces as LLMError.
 */
export class AiSdkGenerationService implements GenerationService {
  private modelPromise: Promise<LanguageModel> | null = null;

  constructor(private readonly config: LLMConfig) {}

  /**
   * Lazy initialization of the language model.
   */
  private getModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel();
    }
    return this.modelPromise;
  }

  private async loadModel(): Promise<LanguageModel> {
    const { provider, model, apiKey } = this.config;
    if (!apiKey) {
      throw new LLMError(`No API key configured for LLM provider ${provider}`);
    }

    logger.info(`Initializing LLM: ${provider}/${model}`);

    switch (provider) {
      case 'groq': {
        const { createGroq } = await import('@ai-sdk/groq');
        return createGroq({ apiKey })(model);
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(model);
      }

      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(model);
      }

      default:
        throw new LLMError(`Unsupported LLM provider: ${provider}`);
    }
  }

  async generate(request: GenerationRequest): Promise<string> {
    const model = await this.getModel();
    const messages: ModelMessage[] = request.messages.map((message): ModelMessage =>
      message.role === 'user'
        ? { role: 'user', content: message.content }
        : { role: 'assistant', content: message.content }
    );

    try {
      const result = await generateText({
        model,
        system: request.system,
        messages,
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        maxRetries: 0,
      });

      logger.info(
        `LLM API call successful - ` +
          `Input: ${result.usage.inputTokens}, ` +
          `Output: ${result.usage.outputTokens}`
      );

      return result.text;
    } catch (error) {
      throw toLLMError(error);
    }
  }
}

/**
 * Wrap a provider failure, keeping the upstream status and body when the
 * service answered with an error response.
 */
export function toLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const body = error.responseBody;
    return new LLMError(
      `LLM error: ${status ?? 'no status'} - ${body ?? error.message}`,
      status,
      body
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LLMError(`LLM error: ${message}`);
}
