import { FEATURE_NAMES, type FeatureVector, type PriceModel } from './model.types';

export type LinearModelParams = {
  intercept: number;
  /** One weight per entry of FEATURE_NAMES, in order */
  coefficients: number[];
};

/**
 * Local baseline: intercept plus a weighted sum of the features.
 */
export class LinearPriceModel implements PriceModel {
  readonly name = 'linear';

  constructor(private readonly params: LinearModelParams) {
    if (params.coefficients.length !== FEATURE_NAMES.length) {
      throw new Error(
        `Linear model needs ${FEATURE_NAMES.length} coefficients, got ${params.coefficients.length}`,
      );
    }
  }

  async predict(features: FeatureVector): Promise<number> {
    const { intercept, coefficients } = this.params;
    if (features.length !== coefficients.length) {
      throw new Error(
        `Expected ${coefficients.length} features, got ${features.length}`,
      );
    }
    return features.reduce(
      (sum, value, i) => sum + value * coefficients[i],
      intercept,
    );
  }
}
