import { z } from 'zod';
import { describeIssues } from '../common/describe-issues';
import type { EngineOptions } from './prediction.engine';

export const PREDICTION_CONFIG = 'PREDICTION_CONFIG';

export type PredictionConfig = {
  engine: EngineOptions;
  maxBatchSize: number;
  /** Fraction either side of the adjusted price, 0.1 = +/-10% */
  priceRangeSpread: number;
};

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const PredictionEnvZ = z.object({
  SIZE_RANGE_LOWER_TOLERANCE: z.coerce.number().positive().max(1).default(0.7),
  SIZE_RANGE_UPPER_TOLERANCE: z.coerce.number().min(1).default(1.5),
  UNKNOWN_AREA_WARNING: flag.default('true'),
  MAX_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
  PRICE_RANGE_SPREAD: z.coerce.number().min(0).lt(1).default(0.1),
});

export function loadPredictionConfig(
  env: NodeJS.ProcessEnv = process.env,
): PredictionConfig {
  // Empty strings in .env files mean "use the default".
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = PredictionEnvZ.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Invalid prediction config: ${describeIssues(parsed.error)}`);
  }
  const cfg = parsed.data;
  return {
    engine: {
      sizeTolerance: {
        lower: cfg.SIZE_RANGE_LOWER_TOLERANCE,
        upper: cfg.SIZE_RANGE_UPPER_TOLERANCE,
      },
      warnUnknownArea: cfg.UNKNOWN_AREA_WARNING,
    },
    maxBatchSize: cfg.MAX_BATCH_SIZE,
    priceRangeSpread: cfg.PRICE_RANGE_SPREAD,
  };
}
