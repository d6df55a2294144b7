export const PRICE_TIERS = [
  'UltraLuxury',
  'Luxury',
  'Premium',
  'Average',
  'Budget',
] as const;

export type PriceTier = (typeof PRICE_TIERS)[number];

export const PROPERTY_USAGES = [
  'Residential',
  'Commercial',
  'Industrial',
  'Hospitality',
  'MultiUse',
] as const;

export type PropertyUsage = (typeof PROPERTY_USAGES)[number];

export const PROPERTY_TYPES = ['Unit', 'Villa', 'Land', 'Building'] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const REGISTRATION_TYPES = ['OffPlan', 'Ready', 'Existing'] as const;

export type RegistrationType = (typeof REGISTRATION_TYPES)[number];

// Fields whose requirement varies with (usage, type). usage/type/subtype are
// the variant key and always required.
export const PROPERTY_FIELDS = [
  'area_size',
  'bedrooms',
  'has_parking',
  'has_project',
  'area_name',
  'registration_type',
] as const;

export type PropertyField = (typeof PROPERTY_FIELDS)[number];

export type SizeRangeEntry = {
  min_typical: number;
  max_typical: number;
  average: number;
  median: number;
};

export type AreaTierEntry = {
  area_name: string;
  tier: PriceTier;
  multiplier: number;
};

export type AutoFillRule = {
  field: 'area_size';
  source: 'bedrooms';
  strategy: 'size_range_average';
};

export type SubtypeOverride = {
  required?: PropertyField[];
  hidden?: PropertyField[];
};

export type FormRule = {
  usage: PropertyUsage;
  type: PropertyType;
  required: PropertyField[];
  hidden: PropertyField[];
  auto_fill: AutoFillRule[];
  subtypes: string[];
  registration_types: RegistrationType[];
  subtype_overrides?: Record<string, SubtypeOverride>;
};

export type SubtypeSpecifics = {
  typical_bedrooms: number[];
  size_range: [number, number];
};

/**
 * Raw reference data as read from configuration, before the lookup tables
 * are built and their invariants asserted.
 */
export type ReferenceData = {
  sizeRanges: Record<string, SizeRangeEntry>;
  areaTiers: AreaTierEntry[];
  formRules: FormRule[];
  subtypeSpecifics: Record<string, SubtypeSpecifics>;
};
