import { z } from 'zod';
import { describeIssues } from '../common/describe-issues';
import type { FeatureVector, PriceModel } from './model.types';

const ModelResponseZ = z.union([
  z.object({ price: z.number().finite() }),
  z.object({ predictions: z.array(z.number().finite()).min(1) }),
]);

/**
 * Posts the feature vector to a model-serving endpoint. A failed inference
 * is not transient, so there are no retries.
 */
export class HttpPriceModel implements PriceModel {
  readonly name = 'http';

  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async predict(features: FeatureVector): Promise<number> {
    const res = await fetch(this.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ features }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`Model server responded with status ${res.status}`);
    }

    const parsed = ModelResponseZ.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Unexpected model response: ${describeIssues(parsed.error)}`);
    }
    return 'price' in parsed.data ? parsed.data.price : parsed.data.predictions[0];
  }
}
