import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';
import { FEATURE_ENCODER, PRICE_MODEL } from '../../model/model.constants';
import type { FeatureEncoder, PriceModel } from '../../model/model.types';
import { referenceDataFixture } from '../../reference-data/__tests__/reference-data.fixture';
import { REFERENCE_DATA_SOURCE } from '../../reference-data/reference-data.constants';
import { ReferenceDataService } from '../../reference-data/reference-data.service';
import { StaticReferenceDataSource } from '../../reference-data/reference-data.source';
import { PREDICTION_CONFIG, loadPredictionConfig } from '../prediction.config';
import { PredictionController } from '../prediction.controller';
import { PredictionService } from '../prediction.service';

const encoder: FeatureEncoder = { encode: (request) => [request.area_size] };
const model: PriceModel = { name: 'fixed', predict: async () => 1_745_000 };

const marinaFlat = {
  usage: 'Residential',
  type: 'Unit',
  subtype: 'Flat',
  area_size: 100,
  bedrooms: 2,
  area_name: 'DUBAI MARINA',
};

function responseOf(err: unknown): unknown {
  if (err instanceof BadRequestException || err instanceof NotFoundException) {
    return err.getResponse();
  }
  throw err;
}

describe('PredictionController', () => {
  let moduleRef: TestingModule;
  let controller: PredictionController;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      controllers: [PredictionController],
      providers: [
        PredictionService,
        ReferenceDataService,
        {
          provide: REFERENCE_DATA_SOURCE,
          useValue: new StaticReferenceDataSource(referenceDataFixture()),
        },
        { provide: FEATURE_ENCODER, useValue: encoder },
        { provide: PRICE_MODEL, useValue: model },
        {
          provide: PREDICTION_CONFIG,
          useValue: loadPredictionConfig({ MAX_BATCH_SIZE: '2' }),
        },
      ],
    }).compile();
    await moduleRef.init();
    controller = moduleRef.get(PredictionController);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  test('POST /predict returns the presented prediction', async () => {
    const { ok, prediction } = await controller.predict(marinaFlat);
    expect(ok).toBe(true);
    expect(prediction.adjusted_price).toBe(2_094_000);
    expect(prediction.tier).toBe('Premium');
    expect(prediction.formatted.price).toBe('2,094,000 AED');
    expect(prediction.price_range).toEqual({ lower_bound: 1_884_600, upper_bound: 2_303_400 });
  });

  test('POST /predict turns a rejection into a 400', async () => {
    const body = await controller
      .predict({ ...marinaFlat, type: 'Land', subtype: 'Residential Land' })
      .then(
        () => undefined,
        (err: unknown) => responseOf(err),
      );
    expect(body).toEqual({
      ok: false,
      error: 'Land cannot have bedrooms',
      code: 'land_with_bedrooms',
      stage: 'Received',
    });
  });

  test('POST /predict/batch reports items and a summary', async () => {
    const view = await controller.predictBatch({
      properties: [marinaFlat, { ...marinaFlat, area_size: -1 }],
    });
    expect(view.predictions.map((item) => item.ok)).toEqual([true, false]);
    expect(view.summary).toMatchObject({ count: 1, rejected: 1, total_value: 2_094_000 });
  });

  test('POST /predict/batch needs a properties array within the limit', async () => {
    await expect(controller.predictBatch({ items: [] })).rejects.toThrow(
      'properties must be an array',
    );
    await expect(
      controller.predictBatch({ properties: [marinaFlat, marinaFlat, marinaFlat] }),
    ).rejects.toThrow('Batch of 3 exceeds the limit of 2');
  });

  test('POST /predict/batch/csv returns CSV text', async () => {
    const csv = await controller.predictBatchCsv({ properties: [marinaFlat] });
    expect(csv.split('\n')[0]).toBe(
      'index,status,usage,type,subtype,area_size,bedrooms,area_name,tier,multiplier,base_price,adjusted_price,price_per_sqm,confidence_level,warnings,error',
    );
  });

  test('GET /predict/form-policy resolves the field policy', () => {
    const { policy } = controller.formPolicy('Residential', 'Land', 'Residential Land');
    expect(policy.fields.bedrooms).toBe('Hidden');
    expect(() => controller.formPolicy('Farm', 'Land', '')).toThrow(BadRequestException);
  });

  test('GET /predict/size-suggestion returns the bucket average', () => {
    expect(controller.sizeSuggestion('2')).toEqual({
      ok: true,
      bedrooms: 2,
      bucket: '2BR',
      suggested_area_size: 124,
      min_typical: 106,
      max_typical: 143,
    });
    expect(() => controller.sizeSuggestion('9')).toThrow(NotFoundException);
    expect(() => controller.sizeSuggestion('two')).toThrow(BadRequestException);
  });

  test('picks up reloaded reference data', async () => {
    const referenceData = moduleRef.get(ReferenceDataService);
    const source = moduleRef.get<StaticReferenceDataSource>(REFERENCE_DATA_SOURCE);
    const data = referenceDataFixture();
    data.areaTiers = data.areaTiers.map((entry) =>
      entry.area_name === 'DUBAI MARINA' ? { ...entry, multiplier: 1.3 } : entry,
    );
    source.replace(data);
    await referenceData.reload();

    const { prediction } = await controller.predict(marinaFlat);
    expect(prediction.multiplier).toBe(1.3);
  });
});
