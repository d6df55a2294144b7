import { ComputationError } from './prediction.errors';
import type { ConfidenceLevel, ValidationWarning } from './prediction.types';

export type PriceAdjustment = {
  base_price: number;
  multiplier: number;
  adjusted_price: number;
  price_per_unit_area: number;
};

/**
 * Applies the area multiplier to the model's base price. No rounding here;
 * presentation rounds.
 */
export function adjustPrice(
  basePrice: number,
  multiplier: number,
  areaSize: number,
): PriceAdjustment {
  if (!Number.isFinite(areaSize) || areaSize <= 0) {
    throw new ComputationError(
      `Price per unit area is undefined for area_size ${areaSize}`,
    );
  }
  if (!Number.isFinite(basePrice)) {
    throw new ComputationError(`Base price ${basePrice} is not a finite number`);
  }
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new ComputationError(`Multiplier ${multiplier} must be positive`);
  }

  const adjusted = basePrice * multiplier;
  return {
    base_price: basePrice,
    multiplier,
    adjusted_price: adjusted,
    price_per_unit_area: adjusted / areaSize,
  };
}

/**
 * How well the request conforms to observed data, not model accuracy:
 * no warnings is High, advisory-only is Medium, anything structural or a
 * type/subtype mismatch is Low.
 */
export function confidenceFor(warnings: ValidationWarning[]): ConfidenceLevel {
  if (warnings.length === 0) return 'High';
  if (warnings.every((w) => w.kind === 'advisory')) return 'Medium';
  return 'Low';
}
