import { ReferenceDataError } from './reference-data.errors';
import {
  PRICE_TIERS,
  type AreaTierEntry,
  type PriceTier,
} from './reference-data.types';

export type AreaTierMatch = {
  area_name: string;
  tier: PriceTier;
  multiplier: number;
  matched: boolean;
};

// Neutral: no premium or discount assumed for an unknown location.
export const FALLBACK_TIER: PriceTier = 'Average';
export const FALLBACK_MULTIPLIER = 1.0;

export function normalizeAreaName(name: string): string {
  return name.trim().toUpperCase();
}

/**
 * Area name -> pricing tier and multiplier. Lookup is an exact match after
 * trimming and upper-casing; anything else gets the fallback.
 */
export class AreaTierTable {
  private readonly entries: ReadonlyMap<string, Readonly<AreaTierEntry>>;

  constructor(tiers: AreaTierEntry[]) {
    const entries = new Map<string, Readonly<AreaTierEntry>>();
    for (const entry of tiers) {
      const key = normalizeAreaName(entry.area_name);
      if (!key) {
        throw new ReferenceDataError('Area tier entry has an empty area name');
      }
      if (!(entry.multiplier > 0) || !Number.isFinite(entry.multiplier)) {
        throw new ReferenceDataError(
          `Multiplier for ${key} must be a positive number`,
        );
      }
      if (entries.has(key)) {
        throw new ReferenceDataError(`Duplicate area tier entry: ${key}`);
      }
      entries.set(key, Object.freeze({ ...entry, area_name: key }));
    }
    assertTierOrdering([...entries.values()]);
    this.entries = entries;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(areaName: string | undefined): AreaTierMatch {
    const key = areaName ? normalizeAreaName(areaName) : '';
    const entry = key ? this.entries.get(key) : undefined;
    if (!entry) {
      return {
        area_name: key,
        tier: FALLBACK_TIER,
        multiplier: FALLBACK_MULTIPLIER,
        matched: false,
      };
    }
    return {
      area_name: entry.area_name,
      tier: entry.tier,
      multiplier: entry.multiplier,
      matched: true,
    };
  }

  list(): AreaTierEntry[] {
    return [...this.entries.values()]
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.area_name.localeCompare(b.area_name));
  }
}

/**
 * Every multiplier of a higher tier must be >= every multiplier of a lower
 * tier. Tiers without entries are skipped.
 */
export function assertTierOrdering(entries: AreaTierEntry[]): void {
  const bounds = new Map<PriceTier, { min: number; max: number }>();
  for (const { tier, multiplier } of entries) {
    const current = bounds.get(tier);
    bounds.set(
      tier,
      current
        ? {
            min: Math.min(current.min, multiplier),
            max: Math.max(current.max, multiplier),
          }
        : { min: multiplier, max: multiplier },
    );
  }

  let higher: { tier: PriceTier; min: number } | null = null;
  for (const tier of PRICE_TIERS) {
    const range = bounds.get(tier);
    if (!range) continue;
    if (higher && higher.min < range.max) {
      throw new ReferenceDataError(
        `Tier ordering violated: ${higher.tier} multiplier ${higher.min} is below ${tier} multiplier ${range.max}`,
      );
    }
    higher = { tier, min: range.min };
  }
}
