import type { PriceModel } from '../../model/model.types';
import { referenceDataFixture } from '../../reference-data/__tests__/reference-data.fixture';
import { ReferenceDataService } from '../../reference-data/reference-data.service';
import { StaticReferenceDataSource } from '../../reference-data/reference-data.source';
import { HealthController } from '../health.controller';

describe('HealthController', () => {
  const model: PriceModel = { name: 'linear', predict: async () => 0 };

  test('reports not ok until reference data is loaded', async () => {
    const referenceData = new ReferenceDataService(
      new StaticReferenceDataSource(referenceDataFixture()),
    );
    const controller = new HealthController(referenceData, model);

    expect(controller.health()).toMatchObject({
      ok: false,
      model: 'linear',
      reference_data: { loaded: false },
    });

    await referenceData.reload();
    expect(controller.health()).toMatchObject({
      ok: true,
      reference_data: { loaded: true, version: 1 },
    });
  });
});
