import { ReferenceDataError } from './reference-data.errors';
import type { SizeRangeEntry } from './reference-data.types';

/**
 * Bucket key for a bedroom count: 0 is "Studio", n is "nBR".
 */
export function bedroomBucket(bedrooms: number): string {
  return bedrooms === 0 ? 'Studio' : `${bedrooms}BR`;
}

/**
 * Typical property sizes (sqm) per bedroom bucket, derived from historical
 * transactions. Immutable once constructed.
 */
export class SizeRangeTable {
  private readonly entries: ReadonlyMap<string, Readonly<SizeRangeEntry>>;

  constructor(ranges: Record<string, SizeRangeEntry>) {
    const entries = new Map<string, Readonly<SizeRangeEntry>>();
    for (const [bucket, entry] of Object.entries(ranges)) {
      const { min_typical, max_typical, median, average } = entry;
      if (!(min_typical > 0 && max_typical > 0 && average > 0 && median > 0)) {
        throw new ReferenceDataError(
          `Size range for ${bucket} must have positive bounds`,
        );
      }
      if (!(min_typical <= median && median <= max_typical)) {
        throw new ReferenceDataError(
          `Size range for ${bucket} must satisfy min_typical <= median <= max_typical`,
        );
      }
      entries.set(bucket, Object.freeze({ ...entry }));
    }
    this.entries = entries;
  }

  get(bucket: string): Readonly<SizeRangeEntry> | undefined {
    return this.entries.get(bucket);
  }

  forBedrooms(
    bedrooms: number,
  ): { bucket: string; range: Readonly<SizeRangeEntry> } | undefined {
    const bucket = bedroomBucket(bedrooms);
    const range = this.entries.get(bucket);
    return range ? { bucket, range } : undefined;
  }

  /** Average size for the bucket, used to pre-fill a missing area_size. */
  suggestAreaSize(bedrooms: number): number | undefined {
    return this.forBedrooms(bedrooms)?.range.average;
  }

  toJSON(): Record<string, SizeRangeEntry> {
    return Object.fromEntries(
      [...this.entries].map(([bucket, entry]) => [bucket, { ...entry }]),
    );
  }
}
