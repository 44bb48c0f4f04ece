import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { TextGenerator } from '../chain/types';
import { DEFAULT_MODEL, DEFAULT_SYSTEM_PROMPT } from '../config';
import { GenerationError } from '../errors';
import { logger } from '../utils/logger';

export type ChatCompletionResult = {
  choices: Array<{ message: { content: string | null } }>;
};

// The slice of the OpenAI client this generator calls.
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionResult>;
    };
  };
}

export type OpenAIGeneratorOptions = {
  apiKey?: string;
  model?: string;
  systemPrompt?: string;
  timeoutMs?: number;
  client?: ChatCompletionClient;
};

/**
 * Chat-completions backed generator. Failed calls are not retried; they surface as
 * GenerationError and the resolver decides what happens to the run.
 */
export class OpenAIGenerator implements TextGenerator {
  public readonly model: string;
  private readonly systemPrompt: string;
  private readonly client: ChatCompletionClient;

  constructor({
    apiKey,
    model = DEFAULT_MODEL,
    systemPrompt = DEFAULT_SYSTEM_PROMPT,
    timeoutMs,
    client
  }: OpenAIGeneratorOptions = {}) {
    this.model = model;
    this.systemPrompt = systemPrompt;
    this.client = client ?? new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
  }

  async generate(prompt: string): Promise<string> {
    let completion: ChatCompletionResult;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: prompt }
        ]
      });
    } catch (error) {
      logger.warn(`Chat completion request failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new GenerationError(error);
    }

    const content = completion.choices[0]?.message.content?.trim();
    if (!content) {
      throw new GenerationError(`Model ${this.model} returned an empty response`);
    }
    return content;
  }
}
