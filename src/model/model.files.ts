import path from 'node:path';
import { z } from 'zod';
import { describeIssues } from '../common/describe-issues';
import { readJsonFile } from '../common/read-json-file';
import type { LinearModelParams } from './linear-price.model';
import type { EncoderClasses, ModelMetadata } from './model.types';

const EncoderClassesZ = z.object({
  areas: z.array(z.string().min(1)).min(1),
  subtypes: z.array(z.string().min(1)).min(1),
  registration_types: z.array(z.string().min(1)).min(1),
});

const LinearModelZ = z.object({
  intercept: z.number().finite(),
  coefficients: z.array(z.number().finite()),
});

const ModelMetadataZ = z.object({
  model_type: z.string(),
  training_samples: z.number().int().min(0),
  r2_score: z.number(),
  mae: z.number(),
  price_bounds: z.object({ lower: z.number(), upper: z.number() }),
});

const ModelTimeoutZ = z.coerce
  .number({ invalid_type_error: 'must be a number of milliseconds' })
  .int('must be a whole number of milliseconds')
  .positive('must be greater than 0')
  .default(10_000);

/** MODEL_TIMEOUT_MS, with unset or empty meaning the 10s default. */
export function modelTimeoutMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.MODEL_TIMEOUT_MS;
  const parsed = ModelTimeoutZ.safeParse(raw === '' ? undefined : raw);
  if (!parsed.success) {
    throw new Error(`Invalid MODEL_TIMEOUT_MS: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function modelDir(): string {
  return process.env.MODEL_DIR ?? path.join(process.cwd(), 'data', 'model');
}

export function loadEncoderClasses(dir = modelDir()): Promise<EncoderClasses> {
  return readJsonFile(path.join(dir, 'encoders.json'), EncoderClassesZ);
}

export function loadLinearModel(dir = modelDir()): Promise<LinearModelParams> {
  return readJsonFile(path.join(dir, 'linear_model.json'), LinearModelZ);
}

export function loadModelMetadata(dir = modelDir()): Promise<ModelMetadata> {
  return readJsonFile(path.join(dir, 'metadata.json'), ModelMetadataZ);
}
