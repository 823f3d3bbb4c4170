/**
 * OpenAI provider adapter
 *
 * Chat Completions in JSON mode. SDK retries are disabled: the generation
 * client owns deadlines and retry policy.
 */

import OpenAI from 'openai';
import { GenerationProvider, ProviderError, ProviderRequest, ProviderResponse } from './generation-client.js';
import { estimateTokens } from './token-ledger.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
  temperature?: number;
}

export class OpenAIProvider implements GenerationProvider {
  readonly name = 'openai';
  private openai: OpenAI;

  constructor(private readonly config: OpenAIProviderConfig) {
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0
    });
  }

  async complete(request: ProviderRequest): Promise<ProviderResponse> {
    const { prompt } = request;

    try {
      const completion = await this.openai.chat.completions.create(
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user }
          ],
          max_tokens: request.maxTokens,
          temperature: this.config.temperature ?? 0.3,
          response_format: { type: 'json_object' }
        },
        {
          signal: request.signal,
          timeout: request.timeoutSeconds * 1000
        }
      );

      const choice = completion.choices[0];
      const text = choice?.message?.content ?? '';
      // Some compatible endpoints omit usage; fall back to the local estimate
      const tokensConsumed = completion.usage?.total_tokens
        ?? estimateTokens(`${prompt.system}\n${prompt.user}`) + estimateTokens(text);

      return {
        text,
        tokensConsumed,
        finishReason: choice?.finish_reason ?? 'unknown'
      };
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
        throw new ProviderError(`OpenAI request for ${prompt.label} timed out`, 'timeout', 0, { cause: error });
      }
      if (error instanceof OpenAI.APIError) {
        throw new ProviderError(
          `OpenAI API error${error.status ? ` ${error.status}` : ''}: ${error.message}`,
          'upstream',
          0,
          { cause: error }
        );
      }
      throw new ProviderError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        'upstream',
        0,
        { cause: error }
      );
    }
  }
}
