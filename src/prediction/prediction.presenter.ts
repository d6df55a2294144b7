import { stringify } from 'csv-stringify/sync';
import type {
  BatchOutcome,
  BatchSummary,
  PredictionOutcome,
  PredictionResult,
} from './prediction.types';

export type PriceRange = { lower_bound: number; upper_bound: number };

export type PredictionView = PredictionResult & {
  price_range: PriceRange;
  formatted: {
    price: string;
    price_range: string;
    price_per_unit_area: string;
  };
};

export type BatchItemView =
  | { index: number; ok: true; prediction: PredictionView }
  | { index: number; ok: false; error: string; code: string; stage: string };

export type BatchView = {
  predictions: BatchItemView[];
  summary: BatchSummary;
};

const round2 = (n: number) => Math.round(n * 100) / 100;

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** "2.09M", "12.5M", "850K", "900" */
export function formatPriceMillions(price: number): string {
  if (price >= 1_000_000) {
    const millions = price / 1_000_000;
    return `${millions < 10 ? millions.toFixed(2) : millions.toFixed(1)}M`;
  }
  if (price >= 1_000) return `${(price / 1_000).toFixed(0)}K`;
  return price.toFixed(0);
}

/**
 * Client-facing view of a result: 2-decimal rounding and a +/- spread range
 * around the adjusted price.
 */
export function presentPrediction(
  result: PredictionResult,
  spread: number,
): PredictionView {
  const lower = result.adjusted_price * (1 - spread);
  const upper = result.adjusted_price * (1 + spread);
  return {
    base_price: round2(result.base_price),
    multiplier: result.multiplier,
    adjusted_price: round2(result.adjusted_price),
    price_per_unit_area: round2(result.price_per_unit_area),
    price_range: { lower_bound: round2(lower), upper_bound: round2(upper) },
    confidence_level: result.confidence_level,
    tier: result.tier,
    area_name: result.area_name,
    warnings: [...result.warnings],
    formatted: {
      price: `${wholeNumber.format(result.adjusted_price)} AED`,
      price_range: `${formatPriceMillions(lower)} - ${formatPriceMillions(upper)} AED`,
      price_per_unit_area: `${formatPriceMillions(result.price_per_unit_area)} AED`,
    },
    input: { ...result.input },
  };
}

function presentItem(
  item: PredictionOutcome,
  index: number,
  spread: number,
): BatchItemView {
  if (item.ok) {
    return { index, ok: true, prediction: presentPrediction(item.result, spread) };
  }
  const { message, code, stage } = item.rejection;
  return { index, ok: false, error: message, code, stage };
}

export function presentBatch(batch: BatchOutcome, spread: number): BatchView {
  const { summary } = batch;
  return {
    predictions: batch.items.map((item, index) => presentItem(item, index, spread)),
    summary: {
      ...summary,
      average_adjusted_price:
        summary.average_adjusted_price === null
          ? null
          : round2(summary.average_adjusted_price),
      total_value: round2(summary.total_value),
      min_adjusted_price:
        summary.min_adjusted_price === null ? null : round2(summary.min_adjusted_price),
      max_adjusted_price:
        summary.max_adjusted_price === null ? null : round2(summary.max_adjusted_price),
    },
  };
}

export const BATCH_CSV_COLUMNS = [
  'index',
  'status',
  'usage',
  'type',
  'subtype',
  'area_size',
  'bedrooms',
  'area_name',
  'tier',
  'multiplier',
  'base_price',
  'adjusted_price',
  'price_per_sqm',
  'confidence_level',
  'warnings',
  'error',
] as const;

type CsvRow = Record<(typeof BATCH_CSV_COLUMNS)[number], string | number>;

export function batchToCsv(batch: BatchOutcome): string {
  const rows: CsvRow[] = batch.items.map((item, index) => {
    if (!item.ok) {
      return {
        index,
        status: 'rejected',
        usage: '',
        type: '',
        subtype: '',
        area_size: '',
        bedrooms: '',
        area_name: '',
        tier: '',
        multiplier: '',
        base_price: '',
        adjusted_price: '',
        price_per_sqm: '',
        confidence_level: '',
        warnings: '',
        error: item.rejection.message,
      };
    }
    const { result } = item;
    return {
      index,
      status: 'ok',
      usage: result.input.usage,
      type: result.input.type,
      subtype: result.input.subtype,
      area_size: result.input.area_size,
      bedrooms: result.input.bedrooms,
      area_name: result.area_name,
      tier: result.tier,
      multiplier: result.multiplier,
      base_price: round2(result.base_price),
      adjusted_price: round2(result.adjusted_price),
      price_per_sqm: round2(result.price_per_unit_area),
      confidence_level: result.confidence_level,
      warnings: result.warnings.join(' | '),
      error: '',
    };
  });
  return stringify(rows, { header: true, columns: [...BATCH_CSV_COLUMNS] });
}

export const BATCH_TEMPLATE_ROWS = [
  {
    usage: 'Residential',
    type: 'Unit',
    subtype: 'Flat',
    area_size: 100,
    bedrooms: 2,
    has_parking: 1,
    has_project: 1,
    area_name: 'DUBAI MARINA',
    registration_type: 'OffPlan',
  },
  {
    usage: 'Residential',
    type: 'Unit',
    subtype: 'Flat',
    area_size: 150,
    bedrooms: 3,
    has_parking: 1,
    has_project: 1,
    area_name: 'BUSINESS BAY',
    registration_type: 'OffPlan',
  },
  {
    usage: 'Residential',
    type: 'Unit',
    subtype: 'Flat',
    area_size: 80,
    bedrooms: 1,
    has_parking: 0,
    has_project: 1,
    area_name: 'JUMEIRAH VILLAGE CIRCLE',
    registration_type: 'OffPlan',
  },
];

export function batchTemplateCsv(): string {
  return stringify(BATCH_TEMPLATE_ROWS, { header: true });
}
