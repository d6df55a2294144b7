import { ownEntry } from '../common/own-entry';
import type { ReferenceTables } from '../reference-data/reference-tables';
import { PROPERTY_FIELDS } from '../reference-data/reference-data.types';
import type {
  FieldPolicy,
  PropertyRequest,
  ValidationWarning,
  WarningKind,
} from './prediction.types';

export type SizeTolerance = {
  /** area_size below min_typical * lower is flagged */
  lower: number;
  /** area_size above max_typical * upper is flagged */
  upper: number;
};

const KIND_ORDER: Record<WarningKind, number> = {
  structural: 0,
  advisory: 1,
  mismatch: 2,
};

/** Structural first, then advisory, then mismatch; stable within a kind. */
export function orderWarnings(warnings: ValidationWarning[]): ValidationWarning[] {
  return warnings
    .map((warning, index) => ({ warning, index }))
    .sort(
      (a, b) =>
        KIND_ORDER[a.warning.kind] - KIND_ORDER[b.warning.kind] ||
        a.index - b.index,
    )
    .map(({ warning }) => warning);
}

export function formatMeasure(n: number): string {
  return String(Math.round(n * 100) / 100);
}

// A hidden field set to its empty value (0 bedrooms, no parking) is not a
// violation.
function isSupplied(value: unknown): boolean {
  return value !== undefined && value !== false && value !== 0 && value !== '';
}

/**
 * Advisory checks of a request against observed data and its field policy.
 * Never blocks and never mutates the request.
 */
export class RequestValidator {
  constructor(
    private readonly tables: Pick<ReferenceTables, 'sizeRanges' | 'subtypeSpecifics'>,
    private readonly tolerance: SizeTolerance = { lower: 0.7, upper: 1.5 },
  ) {}

  validate(request: PropertyRequest, policy: FieldPolicy): ValidationWarning[] {
    return [
      ...this.checkFieldPolicy(request, policy),
      ...this.checkSizeRange(request, policy),
      ...this.checkSubtypeSpecifics(request, policy),
      ...this.checkMismatch(request, policy),
    ];
  }

  private checkFieldPolicy(
    request: PropertyRequest,
    policy: FieldPolicy,
  ): ValidationWarning[] {
    const warnings: ValidationWarning[] = [];
    const variant = `${policy.usage} ${policy.type}`;
    for (const field of PROPERTY_FIELDS) {
      const value = request[field];
      const requirement = policy.fields[field];
      if (requirement === 'Hidden' && isSupplied(value)) {
        warnings.push({
          kind: 'structural',
          code: 'hidden_field_supplied',
          field,
          message: `${field} is not applicable to ${variant} and was ignored`,
        });
      } else if (requirement === 'Required' && value === undefined) {
        warnings.push({
          kind: 'structural',
          code: 'required_field_missing',
          field,
          message: `${field} is required for ${variant}`,
        });
      }
    }
    return warnings;
  }

  private checkSizeRange(
    request: PropertyRequest,
    policy: FieldPolicy,
  ): ValidationWarning[] {
    const { area_size, bedrooms } = request;
    if (
      area_size === undefined ||
      bedrooms === undefined ||
      policy.fields.bedrooms === 'Hidden'
    ) {
      return [];
    }
    const match = this.tables.sizeRanges.forBedrooms(bedrooms);
    if (!match) return [];

    const { min_typical, max_typical } = match.range;
    const typical = `[${formatMeasure(min_typical)},${formatMeasure(max_typical)}]`;
    let position: 'below' | 'above' | null = null;
    if (area_size < min_typical * this.tolerance.lower) position = 'below';
    else if (area_size > max_typical * this.tolerance.upper) position = 'above';
    if (!position) return [];

    return [
      {
        kind: 'advisory',
        code: 'size_out_of_range',
        field: 'area_size',
        message: `area_size ${formatMeasure(area_size)} ${position} typical range ${typical} for ${match.bucket}`,
      },
    ];
  }

  private checkSubtypeSpecifics(
    request: PropertyRequest,
    policy: FieldPolicy,
  ): ValidationWarning[] {
    const specifics = ownEntry(this.tables.subtypeSpecifics, request.subtype);
    if (!specifics) return [];

    const warnings: ValidationWarning[] = [];
    const { typical_bedrooms, size_range } = specifics;
    if (
      request.bedrooms !== undefined &&
      policy.fields.bedrooms !== 'Hidden' &&
      typical_bedrooms.length > 0 &&
      !typical_bedrooms.includes(request.bedrooms)
    ) {
      warnings.push({
        kind: 'advisory',
        code: 'subtype_bedrooms_atypical',
        field: 'bedrooms',
        message: `${request.subtype} typically has ${Math.min(...typical_bedrooms)}-${Math.max(...typical_bedrooms)} bedrooms`,
      });
    }

    const [low, high] = size_range;
    if (
      request.area_size !== undefined &&
      (request.area_size < low || request.area_size > high)
    ) {
      warnings.push({
        kind: 'advisory',
        code: 'subtype_size_out_of_range',
        field: 'area_size',
        message: `${request.subtype} typically ranges ${formatMeasure(low)}-${formatMeasure(high)} sqm`,
      });
    }
    return warnings;
  }

  private checkMismatch(
    request: PropertyRequest,
    policy: FieldPolicy,
  ): ValidationWarning[] {
    const warnings: ValidationWarning[] = [];
    if (request.type === 'Land' && (request.bedrooms ?? 0) > 0) {
      warnings.push({
        kind: 'mismatch',
        code: 'land_with_bedrooms',
        field: 'bedrooms',
        message: 'Land cannot have bedrooms',
      });
    }
    if (policy.subtypes && !policy.subtypes.includes(request.subtype)) {
      warnings.push({
        kind: 'mismatch',
        code: 'unknown_subtype',
        message: `Subtype ${request.subtype} is not a known subtype for ${policy.usage} ${policy.type}`,
      });
    }
    return warnings;
  }
}
