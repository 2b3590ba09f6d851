import fetch from 'node-fetch';
import { z } from 'zod';
import type { IClassifierClient } from '../../core/interfaces/IClassifierClient.js';
import { withRetry, CircuitBreaker, DEFAULT_RETRY_CONFIG, type RetryConfig } from '../../utils/retry.js';

export interface ZeroShotLabels {
  bot: string;
  human: string;
}

const ZeroShotResponseSchema = z.object({
  labels: z.array(z.string()).optional(),
  scores: z.array(z.number()).optional(),
});

/**
 * Client for a zero-shot classification endpoint
 * (`{ inputs, parameters: { candidate_labels } }` in, `{ labels, scores }` out).
 */
export class ZeroShotClassifierClient implements IClassifierClient {
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;

  constructor(
    private url: string,
    private labels: ZeroShotLabels = { bot: 'bot', human: 'human' },
    circuitBreaker?: CircuitBreaker,
    retryConfig?: RetryConfig
  ) {
    this.circuitBreaker = circuitBreaker || new CircuitBreaker(5, 60000);
    this.retryConfig = retryConfig || DEFAULT_RETRY_CONFIG;
  }

  async classify(text: string): Promise<number> {
    const data = await this.circuitBreaker.execute(() =>
      withRetry(async () => {
        const res = await fetch(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            inputs: text,
            parameters: { candidate_labels: [this.labels.bot, this.labels.human] },
          }),
        });

        if (!res.ok) {
          throw new Error(`HTTP error! status: ${res.status}`);
        }

        return ZeroShotResponseSchema.parse(await res.json());
      }, this.retryConfig)
    );

    const index = data.labels?.indexOf(this.labels.bot) ?? -1;
    const score = index >= 0 ? data.scores?.[index] : undefined;
    if (typeof score !== 'number' || !Number.isFinite(score)) {
      throw new Error(`Classifier response has no finite score for label "${this.labels.bot}"`);
    }

    return score;
  }
}
