import { z } from 'zod';
import {
  PRICE_TIERS,
  PROPERTY_FIELDS,
  PROPERTY_TYPES,
  PROPERTY_USAGES,
  REGISTRATION_TYPES,
} from './reference-data.types';

export const PropertyFieldZ = z.enum(PROPERTY_FIELDS);

export const SizeRangeEntryZ = z.object({
  min_typical: z.number().positive(),
  max_typical: z.number().positive(),
  average: z.number().positive(),
  median: z.number().positive(),
});

export const SizeRangesZ = z.record(z.string().min(1), SizeRangeEntryZ);

export const AreaTierEntryZ = z.object({
  area_name: z.string().trim().min(1),
  tier: z.enum(PRICE_TIERS),
  multiplier: z.number().positive(),
});

export const AreaTiersZ = z.array(AreaTierEntryZ);

const SubtypeOverrideZ = z.object({
  required: z.array(PropertyFieldZ).optional(),
  hidden: z.array(PropertyFieldZ).optional(),
});

export const FormRuleZ = z.object({
  usage: z.enum(PROPERTY_USAGES),
  type: z.enum(PROPERTY_TYPES),
  required: z.array(PropertyFieldZ).default([]),
  hidden: z.array(PropertyFieldZ).default([]),
  auto_fill: z
    .array(
      z.object({
        field: z.literal('area_size'),
        source: z.literal('bedrooms'),
        strategy: z.literal('size_range_average'),
      }),
    )
    .default([]),
  subtypes: z.array(z.string().min(1)).default([]),
  registration_types: z.array(z.enum(REGISTRATION_TYPES)).default([]),
  subtype_overrides: z.record(z.string().min(1), SubtypeOverrideZ).optional(),
});

export const FormRulesZ = z.array(FormRuleZ);

export const SubtypeSpecificsZ = z.record(
  z.string().min(1),
  z.object({
    typical_bedrooms: z.array(z.number().int().min(0)),
    size_range: z.tuple([z.number().min(0), z.number().positive()]),
  }),
);
