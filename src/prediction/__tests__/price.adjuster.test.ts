import { ComputationError } from '../prediction.errors';
import type { ValidationWarning } from '../prediction.types';
import { adjustPrice, confidenceFor } from '../price.adjuster';

describe('adjustPrice', () => {
  test('applies the multiplier and derives the per-unit price', () => {
    const result = adjustPrice(1_745_000, 1.2, 100);
    expect(result.base_price).toBe(1_745_000);
    expect(result.multiplier).toBe(1.2);
    expect(result.adjusted_price).toBeCloseTo(2_094_000, 6);
    expect(result.price_per_unit_area).toBeCloseTo(20_940, 6);
  });

  test('does not round', () => {
    const result = adjustPrice(1_000_001, 0.9, 3);
    expect(result.adjusted_price).toBeCloseTo(900_000.9, 6);
    expect(result.price_per_unit_area).toBeCloseTo(300_000.3, 6);
  });

  test.each([0, -5, NaN, Infinity])('rejects area_size %p', (area) => {
    expect(() => adjustPrice(1_000_000, 1, area)).toThrow(ComputationError);
  });

  test('rejects a non-finite base price', () => {
    expect(() => adjustPrice(NaN, 1, 100)).toThrow('Base price NaN is not a finite number');
  });

  test('rejects a non-positive multiplier', () => {
    expect(() => adjustPrice(1_000_000, 0, 100)).toThrow('Multiplier 0 must be positive');
  });
});

describe('confidenceFor', () => {
  const warning = (kind: ValidationWarning['kind']): ValidationWarning => ({
    kind,
    code: 'size_out_of_range',
    message: kind,
  });

  test('no warnings is High', () => {
    expect(confidenceFor([])).toBe('High');
  });

  test('advisory only is Medium', () => {
    expect(confidenceFor([warning('advisory'), warning('advisory')])).toBe('Medium');
  });

  test('any structural or mismatch warning is Low', () => {
    expect(confidenceFor([warning('advisory'), warning('structural')])).toBe('Low');
    expect(confidenceFor([warning('mismatch')])).toBe('Low');
  });

  test('adding a warning never raises confidence', () => {
    const rank = { High: 2, Medium: 1, Low: 0 };
    const base = [warning('advisory')];
    for (const kind of ['structural', 'advisory', 'mismatch'] as const) {
      expect(rank[confidenceFor([...base, warning(kind)])]).toBeLessThanOrEqual(
        rank[confidenceFor(base)],
      );
    }
  });
});
