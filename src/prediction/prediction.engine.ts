import type { FeatureEncoder, PriceModel } from '../model/model.types';
import { normalizeAreaName } from '../reference-data/area-tier.table';
import type { ReferenceTables } from '../reference-data/reference-tables';
import type {
  PropertyType,
  PropertyUsage,
} from '../reference-data/reference-data.types';
import { FormDependencyResolver } from './form-dependency.resolver';
import { PredictionError, StructuralError } from './prediction.errors';
import type {
  BatchOutcome,
  BatchSummary,
  FieldPolicy,
  PredictionOutcome,
  PredictionResult,
  PredictionState,
  PropertyRequest,
  ResolvedRequest,
  ValidationWarning,
} from './prediction.types';
import { adjustPrice, confidenceFor } from './price.adjuster';
import { parsePropertyRequest } from './property-request.parser';
import {
  RequestValidator,
  formatMeasure,
  orderWarnings,
  type SizeTolerance,
} from './request.validator';

export type EngineOptions = {
  sizeTolerance: SizeTolerance;
  /** Add an advisory warning when the area falls back to the neutral tier */
  warnUnknownArea: boolean;
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  sizeTolerance: { lower: 0.7, upper: 1.5 },
  warnUnknownArea: true,
};

export const UNKNOWN_AREA = 'UNKNOWN';
const DEFAULT_REGISTRATION_TYPE = 'Existing';

export type PredictionEngineDeps = {
  tables: ReferenceTables;
  encoder: FeatureEncoder;
  model: PriceModel;
  options?: Partial<EngineOptions>;
};

const TRANSITIONS: Record<PredictionState, readonly PredictionState[]> = {
  Received: ['FormResolved', 'Rejected'],
  FormResolved: ['Validated', 'Rejected'],
  Validated: ['Priced', 'Rejected'],
  Priced: [],
  Rejected: [],
};

/** One item's walk through Received -> FormResolved -> Validated -> Priced. */
class PredictionRun {
  private current: PredictionState = 'Received';

  get state(): PredictionState {
    return this.current;
  }

  advance(next: PredictionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal prediction transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  reject(error: PredictionError): void {
    const stage = this.current;
    if (stage === 'Rejected' || stage === 'Priced') return;
    error.stage ??= stage;
    this.advance('Rejected');
  }
}

/**
 * Sequences form resolution, validation, the external encoder and model, and
 * the price adjustment. Holds no per-call state: the same request always
 * yields the same result for a deterministic model.
 */
export class PredictionEngine {
  private readonly resolver: FormDependencyResolver;
  private readonly validator: RequestValidator;
  private readonly options: EngineOptions;

  constructor(private readonly deps: PredictionEngineDeps) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...deps.options };
    this.resolver = new FormDependencyResolver(deps.tables.formRules);
    this.validator = new RequestValidator(
      deps.tables,
      this.options.sizeTolerance,
    );
  }

  get tables(): ReferenceTables {
    return this.deps.tables;
  }

  resolvePolicy(
    usage: PropertyUsage,
    type: PropertyType,
    subtype: string,
  ): FieldPolicy {
    return this.resolver.resolve(usage, type, subtype);
  }

  /** Throwing variant of predictOne: rejects with a PredictionError. */
  async evaluate(input: unknown): Promise<PredictionResult> {
    const run = new PredictionRun();
    try {
      return await this.execute(input, run);
    } catch (err) {
      if (err instanceof PredictionError) run.reject(err);
      throw err;
    }
  }

  async predictOne(input: unknown): Promise<PredictionOutcome> {
    try {
      return { ok: true, result: await this.evaluate(input) };
    } catch (err) {
      if (!(err instanceof PredictionError)) throw err;
      return {
        ok: false,
        rejection: {
          code: err.code,
          message: err.message,
          stage: err.stage ?? 'Received',
        },
      };
    }
  }

  /** Items are independent: a rejected item never affects its siblings. */
  async predictBatch(inputs: readonly unknown[]): Promise<BatchOutcome> {
    const items = await Promise.all(inputs.map((input) => this.predictOne(input)));
    return { items, summary: summarizeBatch(items) };
  }

  private async execute(
    input: unknown,
    run: PredictionRun,
  ): Promise<PredictionResult> {
    const request = parsePropertyRequest(input);

    const policy = this.resolver.resolve(
      request.usage,
      request.type,
      request.subtype,
    );
    if (request.type === 'Land' && (request.bedrooms ?? 0) > 0) {
      throw new StructuralError('land_with_bedrooms', 'Land cannot have bedrooms');
    }
    const { resolved, notes } = this.resolveFields(request, policy);
    run.advance('FormResolved');

    const area = this.deps.tables.areaTiers.lookup(resolved.area_name);
    const warnings = orderWarnings([
      ...this.validator.validate(request, policy),
      ...notes,
      ...(area.matched || !this.options.warnUnknownArea
        ? []
        : [unknownAreaWarning(request.area_name)]),
    ]);
    run.advance('Validated');

    let basePrice: number;
    try {
      basePrice = await this.deps.model.predict(this.deps.encoder.encode(resolved));
    } catch (err) {
      throw new StructuralError(
        'model_failure',
        err instanceof Error ? err.message : String(err),
      );
    }
    const adjustment = adjustPrice(basePrice, area.multiplier, resolved.area_size);
    run.advance('Priced');

    return {
      ...adjustment,
      confidence_level: confidenceFor(warnings),
      tier: area.tier,
      area_name: resolved.area_name,
      warnings: warnings.map((w) => w.message),
      input: resolved,
    };
  }

  /**
   * Applies the field policy: auto-fills what it can, rejects a missing
   * mandatory number, drops hidden values and fills defaults.
   */
  private resolveFields(
    request: PropertyRequest,
    policy: FieldPolicy,
  ): { resolved: ResolvedRequest; notes: ValidationWarning[] } {
    const notes: ValidationWarning[] = [];
    const variant = `${policy.usage} ${policy.type}`;
    const visible = (field: keyof FieldPolicy['fields']) =>
      policy.fields[field] !== 'Hidden';

    const bedrooms = visible('bedrooms') ? request.bedrooms : undefined;
    if (bedrooms === undefined && policy.fields.bedrooms === 'Required') {
      throw new StructuralError(
        'missing_required_field',
        `bedrooms is required for ${variant}`,
      );
    }

    let areaSize = request.area_size;
    if (
      areaSize === undefined &&
      bedrooms !== undefined &&
      policy.autoFill.some((rule) => rule.field === 'area_size')
    ) {
      const suggestion = this.deps.tables.sizeRanges.forBedrooms(bedrooms);
      if (suggestion) {
        areaSize = suggestion.range.average;
        notes.push({
          kind: 'advisory',
          code: 'area_size_auto_filled',
          field: 'area_size',
          message: `area_size not supplied; using typical ${formatMeasure(areaSize)} sqm for ${suggestion.bucket}`,
        });
      }
    }
    // Needed for the per-unit price whatever the policy says.
    if (areaSize === undefined) {
      throw new StructuralError(
        'missing_required_field',
        `area_size is required for ${variant}`,
      );
    }

    const areaName = visible('area_name') ? request.area_name : undefined;
    return {
      resolved: {
        usage: request.usage,
        type: request.type,
        subtype: request.subtype,
        area_size: areaSize,
        bedrooms: bedrooms ?? 0,
        has_parking: visible('has_parking') ? (request.has_parking ?? false) : false,
        has_project: visible('has_project') ? (request.has_project ?? true) : false,
        area_name: areaName ? normalizeAreaName(areaName) : UNKNOWN_AREA,
        registration_type: visible('registration_type')
          ? (request.registration_type ?? DEFAULT_REGISTRATION_TYPE)
          : DEFAULT_REGISTRATION_TYPE,
      },
      notes,
    };
  }
}

function unknownAreaWarning(areaName: string | undefined): ValidationWarning {
  const subject = areaName
    ? `Area ${normalizeAreaName(areaName)} is not a known area`
    : 'area_name not supplied';
  return {
    kind: 'advisory',
    code: 'unknown_area',
    field: 'area_name',
    message: `${subject}; using Average tier (multiplier 1)`,
  };
}

export function summarizeBatch(items: PredictionOutcome[]): BatchSummary {
  const prices = items.flatMap((item) =>
    item.ok ? [item.result.adjusted_price] : [],
  );
  const total = prices.reduce((sum, price) => sum + price, 0);
  return {
    count: prices.length,
    total_items: items.length,
    rejected: items.length - prices.length,
    average_adjusted_price: prices.length > 0 ? total / prices.length : null,
    total_value: total,
    min_adjusted_price: prices.length > 0 ? Math.min(...prices) : null,
    max_adjusted_price: prices.length > 0 ? Math.max(...prices) : null,
  };
}
