import { AreaTierTable } from './area-tier.table';
import { ReferenceDataError } from './reference-data.errors';
import type {
  FormRule,
  ReferenceData,
  SubtypeSpecifics,
} from './reference-data.types';
import { SizeRangeTable } from './size-range.table';

export type ReferenceTables = Readonly<{
  sizeRanges: SizeRangeTable;
  areaTiers: AreaTierTable;
  formRules: readonly FormRule[];
  subtypeSpecifics: Readonly<Record<string, SubtypeSpecifics>>;
}>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Builds the immutable lookup tables the engine is constructed with. Throws
 * ReferenceDataError when an invariant of the data does not hold.
 */
export function buildReferenceTables(data: ReferenceData): ReferenceTables {
  const seen = new Set<string>();
  for (const rule of data.formRules) {
    const key = `${rule.usage}:${rule.type}`;
    if (seen.has(key)) {
      throw new ReferenceDataError(`Duplicate form rule for ${key}`);
    }
    seen.add(key);
  }

  for (const [subtype, specifics] of Object.entries(data.subtypeSpecifics)) {
    const [min, max] = specifics.size_range;
    if (min > max) {
      throw new ReferenceDataError(
        `Size range for subtype ${subtype} has min ${min} above max ${max}`,
      );
    }
  }

  return Object.freeze({
    sizeRanges: new SizeRangeTable(data.sizeRanges),
    areaTiers: new AreaTierTable(data.areaTiers),
    formRules: deepFreeze(structuredClone(data.formRules)),
    subtypeSpecifics: deepFreeze(structuredClone(data.subtypeSpecifics)),
  });
}
