import {
  AreaTierTable,
  FALLBACK_MULTIPLIER,
  FALLBACK_TIER,
  assertTierOrdering,
} from '../area-tier.table';
import { ReferenceDataError } from '../reference-data.errors';
import { referenceDataFixture } from './reference-data.fixture';

describe('AreaTierTable', () => {
  const table = new AreaTierTable(referenceDataFixture().areaTiers);

  test('matches after trimming and upper-casing', () => {
    expect(table.lookup('  dubai marina ')).toEqual({
      area_name: 'DUBAI MARINA',
      tier: 'Premium',
      multiplier: 1.2,
      matched: true,
    });
  });

  test('falls back to the neutral tier for an unknown area', () => {
    expect(table.lookup('UNKNOWN AREA')).toEqual({
      area_name: 'UNKNOWN AREA',
      tier: FALLBACK_TIER,
      multiplier: FALLBACK_MULTIPLIER,
      matched: false,
    });
    expect(FALLBACK_TIER).toBe('Average');
    expect(FALLBACK_MULTIPLIER).toBe(1);
  });

  test('falls back when no area is given', () => {
    expect(table.lookup(undefined).matched).toBe(false);
    expect(table.lookup('').multiplier).toBe(1);
  });

  test('lists areas sorted by name', () => {
    const names = table.list().map((entry) => entry.area_name);
    expect(names[0]).toBe('BUSINESS BAY');
    expect(names[names.length - 1]).toBe('PALM JUMEIRAH');
    expect(table.size).toBe(6);
  });

  test('rejects duplicate names after normalization', () => {
    expect(
      () =>
        new AreaTierTable([
          { area_name: 'Dubai Marina', tier: 'Premium', multiplier: 1.2 },
          { area_name: 'DUBAI MARINA ', tier: 'Premium', multiplier: 1.2 },
        ]),
    ).toThrow('Duplicate area tier entry: DUBAI MARINA');
  });

  test('rejects a non-positive multiplier', () => {
    expect(
      () => new AreaTierTable([{ area_name: 'X', tier: 'Budget', multiplier: 0 }]),
    ).toThrow(ReferenceDataError);
  });
});

describe('assertTierOrdering', () => {
  test('accepts equal multipliers across adjacent tiers', () => {
    expect(() =>
      assertTierOrdering([
        { area_name: 'A', tier: 'Premium', multiplier: 1.0 },
        { area_name: 'B', tier: 'Average', multiplier: 1.0 },
      ]),
    ).not.toThrow();
  });

  test('rejects a lower tier priced above a higher one', () => {
    expect(() =>
      assertTierOrdering([
        { area_name: 'A', tier: 'Luxury', multiplier: 1.3 },
        { area_name: 'B', tier: 'Premium', multiplier: 1.4 },
      ]),
    ).toThrow(
      'Tier ordering violated: Luxury multiplier 1.3 is below Premium multiplier 1.4',
    );
  });

  test('compares across a tier with no entries', () => {
    expect(() =>
      assertTierOrdering([
        { area_name: 'A', tier: 'UltraLuxury', multiplier: 1.1 },
        { area_name: 'B', tier: 'Average', multiplier: 1.2 },
      ]),
    ).toThrow(ReferenceDataError);
  });
});
