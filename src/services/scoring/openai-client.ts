// OpenAI chat-completion client for the remote scorer

import OpenAI from 'openai';
import type { AiCompletionClient, CompletionRequest } from './types.js';

export interface OpenAiClientConfig {
  apiKey: string;
  baseURL?: string;
}

export class OpenAiCompletionClient implements AiCompletionClient {
  private client: OpenAI;

  constructor(config: OpenAiClientConfig) {
    // No retries: the scoring policy owns timeout and fallback
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal: request.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }
    return content;
  }
}
