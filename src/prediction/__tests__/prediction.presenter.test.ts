import {
  BATCH_CSV_COLUMNS,
  batchTemplateCsv,
  batchToCsv,
  formatPriceMillions,
  presentBatch,
  presentPrediction,
} from '../prediction.presenter';
import type { BatchOutcome, PredictionResult } from '../prediction.types';

const result: PredictionResult = {
  base_price: 1_745_000,
  multiplier: 1.2,
  adjusted_price: 2_094_000,
  price_per_unit_area: 20_940,
  confidence_level: 'High',
  tier: 'Premium',
  area_name: 'DUBAI MARINA',
  warnings: [],
  input: {
    usage: 'Residential',
    type: 'Unit',
    subtype: 'Flat',
    area_size: 100,
    bedrooms: 2,
    has_parking: false,
    has_project: true,
    area_name: 'DUBAI MARINA',
    registration_type: 'Existing',
  },
};

describe('formatPriceMillions', () => {
  test('formats by magnitude', () => {
    expect(formatPriceMillions(2_094_000)).toBe('2.09M');
    expect(formatPriceMillions(12_500_000)).toBe('12.5M');
    expect(formatPriceMillions(850_000)).toBe('850K');
    expect(formatPriceMillions(900)).toBe('900');
  });
});

describe('presentPrediction', () => {
  test('adds the price range and formatted strings', () => {
    const view = presentPrediction(result, 0.1);
    expect(view.price_range).toEqual({ lower_bound: 1_884_600, upper_bound: 2_303_400 });
    expect(view.formatted).toEqual({
      price: '2,094,000 AED',
      price_range: '1.88M - 2.30M AED',
      price_per_unit_area: '21K AED',
    });
  });

  test('rounds prices to two decimals', () => {
    const view = presentPrediction(
      { ...result, base_price: 1000.456, adjusted_price: 1200.5472, price_per_unit_area: 12.005472 },
      0,
    );
    expect(view.base_price).toBe(1000.46);
    expect(view.adjusted_price).toBe(1200.55);
    expect(view.price_per_unit_area).toBe(12.01);
  });
});

const batch: BatchOutcome = {
  items: [
    { ok: true, result },
    {
      ok: false,
      rejection: {
        code: 'land_with_bedrooms',
        message: 'Land cannot have bedrooms',
        stage: 'Received',
      },
    },
  ],
  summary: {
    count: 1,
    total_items: 2,
    rejected: 1,
    average_adjusted_price: 2_094_000.004,
    total_value: 2_094_000.004,
    min_adjusted_price: 2_094_000.004,
    max_adjusted_price: 2_094_000.004,
  },
};

describe('presentBatch', () => {
  test('keeps item positions and rounds the summary', () => {
    const view = presentBatch(batch, 0.1);
    expect(view.predictions[1]).toEqual({
      index: 1,
      ok: false,
      error: 'Land cannot have bedrooms',
      code: 'land_with_bedrooms',
      stage: 'Received',
    });
    expect(view.predictions[0].ok).toBe(true);
    expect(view.summary.average_adjusted_price).toBe(2_094_000);
    expect(view.summary.total_value).toBe(2_094_000);
  });
});

describe('batchToCsv', () => {
  test('writes one row per item under a header', () => {
    const lines = batchToCsv(batch).trimEnd().split('\n');
    expect(lines).toEqual([
      BATCH_CSV_COLUMNS.join(','),
      '0,ok,Residential,Unit,Flat,100,2,DUBAI MARINA,Premium,1.2,1745000,2094000,20940,High,,',
      ['1', 'rejected', ...Array<string>(13).fill(''), 'Land cannot have bedrooms'].join(','),
    ]);
  });

  test('quotes warnings that contain commas', () => {
    const csv = batchToCsv({
      items: [{ ok: true, result: { ...result, warnings: ['a, b', 'c'] } }],
      summary: batch.summary,
    });
    expect(csv.trimEnd().split('\n')[1]).toBe(
      '0,ok,Residential,Unit,Flat,100,2,DUBAI MARINA,Premium,1.2,1745000,2094000,20940,High,"a, b | c",',
    );
  });
});

describe('batchTemplateCsv', () => {
  test('has a header and three sample rows', () => {
    const lines = batchTemplateCsv().trimEnd().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(
      'usage,type,subtype,area_size,bedrooms,has_parking,has_project,area_name,registration_type',
    );
    expect(lines[1]).toBe('Residential,Unit,Flat,100,2,1,1,DUBAI MARINA,OffPlan');
  });
});
