import { Controller, Get, Inject } from '@nestjs/common';
import { PRICE_MODEL } from '../model/model.constants';
import type { PriceModel } from '../model/model.types';
import { ReferenceDataService } from '../reference-data/reference-data.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly referenceData: ReferenceDataService,
    @Inject(PRICE_MODEL) private readonly model: PriceModel,
  ) {}

  @Get()
  health() {
    const loaded = this.referenceData.isLoaded();
    return {
      ok: loaded,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      model: this.model.name,
      reference_data: loaded
        ? { loaded, version: this.referenceData.current().version }
        : { loaded },
    };
  }
}
