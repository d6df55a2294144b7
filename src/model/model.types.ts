import type { ResolvedRequest } from '../prediction/prediction.types';

/**
 * [area_size, bedrooms, has_parking, has_project, area_idx, subtype_idx,
 * registration_idx]
 */
export type FeatureVector = number[];

export const FEATURE_NAMES = [
  'area_size',
  'bedrooms',
  'has_parking',
  'has_project',
  'area_name',
  'subtype',
  'registration_type',
] as const;

export interface FeatureEncoder {
  encode(request: ResolvedRequest): FeatureVector;
}

export interface PriceModel {
  /** Short label for logs and /model/info */
  readonly name: string;
  predict(features: FeatureVector): Promise<number>;
}

export type EncoderClasses = {
  areas: string[];
  subtypes: string[];
  registration_types: string[];
};

export type ModelMetadata = {
  model_type: string;
  training_samples: number;
  r2_score: number;
  mae: number;
  price_bounds: { lower: number; upper: number };
};
