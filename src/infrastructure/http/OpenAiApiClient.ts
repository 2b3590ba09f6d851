import fetch from 'node-fetch';
import { z } from 'zod';
import type { IGenerationClient } from '../../core/interfaces/IGenerationClient.js';
import type { ContextEntry } from '../../core/entities/Context.js';
import { withRetry, CircuitBreaker, DEFAULT_RETRY_CONFIG, type RetryConfig } from '../../utils/retry.js';

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      })
    )
    .optional(),
});

/**
 * OpenAI-compatible chat completion client
 *
 * `baseUrl` is the proxy or API root, e.g. `https://api.openai.com/v1`.
 */
export class OpenAiApiClient implements IGenerationClient {
  private baseUrl: string;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;

  constructor(
    baseUrl: string,
    private apiKey: string,
    circuitBreaker?: CircuitBreaker,
    retryConfig?: RetryConfig
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.circuitBreaker = circuitBreaker || new CircuitBreaker(5, 60000);
    this.retryConfig = retryConfig || DEFAULT_RETRY_CONFIG;
  }

  async generate(context: ContextEntry[], model: string): Promise<string> {
    const data = await this.circuitBreaker.execute(() =>
      withRetry(async () => {
        const res = await fetch(`${this.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify({
            model,
            messages: context.map(({ role, content }) => ({ role, content })),
          }),
        });

        if (!res.ok) {
          throw new Error(`HTTP error! status: ${res.status}`);
        }

        return ChatCompletionResponseSchema.parse(await res.json());
      }, this.retryConfig)
    );

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Chat completion response has no message content');
    }
    return content.trim();
  }
}
