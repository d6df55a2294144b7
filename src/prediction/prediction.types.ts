import type {
  AutoFillRule,
  PriceTier,
  PropertyField,
  PropertyType,
  PropertyUsage,
  RegistrationType,
} from '../reference-data/reference-data.types';

/**
 * A request as the client supplied it, after shape parsing. Fields other
 * than the (usage, type, subtype) key are optional here; which of them are
 * legal depends on the FieldPolicy of the variant.
 */
export type PropertyRequest = {
  usage: PropertyUsage;
  type: PropertyType;
  subtype: string;
  area_size?: number;
  bedrooms?: number; // 0 = Studio
  has_parking?: boolean;
  has_project?: boolean;
  area_name?: string;
  registration_type?: RegistrationType;
};

/** The complete feature set handed to the encoder. */
export type ResolvedRequest = {
  usage: PropertyUsage;
  type: PropertyType;
  subtype: string;
  area_size: number;
  bedrooms: number;
  has_parking: boolean;
  has_project: boolean;
  area_name: string;
  registration_type: RegistrationType;
};

export type FieldRequirement = 'Required' | 'Optional' | 'Hidden' | 'AutoFilled';

export type FieldPolicy = {
  usage: PropertyUsage;
  type: PropertyType;
  subtype: string;
  /** false when no rule exists for (usage, type) and everything is Optional */
  known: boolean;
  fields: Record<PropertyField, FieldRequirement>;
  autoFill: AutoFillRule[];
  subtypes: string[] | null;
  registrationTypes: RegistrationType[] | null;
};

export type WarningKind = 'structural' | 'advisory' | 'mismatch';

export type WarningCode =
  | 'hidden_field_supplied'
  | 'required_field_missing'
  | 'size_out_of_range'
  | 'subtype_size_out_of_range'
  | 'subtype_bedrooms_atypical'
  | 'area_size_auto_filled'
  | 'unknown_area'
  | 'land_with_bedrooms'
  | 'unknown_subtype';

export type ValidationWarning = {
  kind: WarningKind;
  code: WarningCode;
  field?: PropertyField;
  message: string;
};

export type ConfidenceLevel = 'High' | 'Medium' | 'Low';

export type PredictionState =
  | 'Received'
  | 'FormResolved'
  | 'Validated'
  | 'Priced'
  | 'Rejected';

export type PredictionResult = {
  base_price: number;
  multiplier: number;
  adjusted_price: number;
  price_per_unit_area: number;
  confidence_level: ConfidenceLevel;
  tier: PriceTier;
  area_name: string;
  warnings: string[];
  input: ResolvedRequest;
};

export type RejectionCode =
  | 'invalid_request'
  | 'land_with_bedrooms'
  | 'missing_required_field'
  | 'model_failure'
  | 'computation_error';

export type Rejection = {
  code: RejectionCode;
  message: string;
  /** State the item was in when it was rejected */
  stage: Exclude<PredictionState, 'Rejected'>;
};

export type PredictionOutcome =
  | { ok: true; result: PredictionResult }
  | { ok: false; rejection: Rejection };

export type BatchSummary = {
  /** successful predictions; the aggregates below cover these only */
  count: number;
  total_items: number;
  rejected: number;
  average_adjusted_price: number | null;
  total_value: number;
  min_adjusted_price: number | null;
  max_adjusted_price: number | null;
};

export type BatchOutcome = {
  items: PredictionOutcome[];
  summary: BatchSummary;
};
