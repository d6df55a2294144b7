import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  NotFoundException,
  Post,
  Query,
} from '@nestjs/common';
import {
  PROPERTY_TYPES,
  PROPERTY_USAGES,
  type PropertyType,
  type PropertyUsage,
} from '../reference-data/reference-data.types';
import {
  batchTemplateCsv,
  batchToCsv,
  presentBatch,
  presentPrediction,
  type BatchView,
  type PredictionView,
} from './prediction.presenter';
import { PredictionService, type SizeSuggestion } from './prediction.service';
import type { FieldPolicy } from './prediction.types';

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

@Controller('predict')
export class PredictionController {
  constructor(private readonly service: PredictionService) {}

  @Post()
  @HttpCode(200)
  async predict(
    @Body() body: unknown,
  ): Promise<{ ok: true; prediction: PredictionView }> {
    const outcome = await this.service.predictOne(body);
    if (!outcome.ok) {
      const { message, code, stage } = outcome.rejection;
      throw new BadRequestException({ ok: false, error: message, code, stage });
    }
    return {
      ok: true,
      prediction: presentPrediction(
        outcome.result,
        this.service.config.priceRangeSpread,
      ),
    };
  }

  /**
   * POST /predict/batch
   * Body: { properties: [...] }. One bad item never fails the others.
   */
  @Post('batch')
  @HttpCode(200)
  async predictBatch(@Body() body: unknown): Promise<{ ok: true } & BatchView> {
    const properties = this.batchItems(body);
    const batch = await this.service.predictBatch(properties);
    return {
      ok: true,
      ...presentBatch(batch, this.service.config.priceRangeSpread),
    };
  }

  @Post('batch/csv')
  @HttpCode(200)
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="predictions.csv"')
  async predictBatchCsv(@Body() body: unknown): Promise<string> {
    const batch = await this.service.predictBatch(this.batchItems(body));
    return batchToCsv(batch);
  }

  @Get('batch/template')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="batch_template.csv"')
  template(): string {
    return batchTemplateCsv();
  }

  /**
   * Field policy for the smart form: which inputs to show, require or
   * pre-fill for the selected usage, type and subtype.
   */
  @Get('form-policy')
  formPolicy(
    @Query('usage') usage = '',
    @Query('type') type = '',
    @Query('subtype') subtype = '',
  ): { ok: true; policy: FieldPolicy } {
    if (!isOneOf<PropertyUsage>(PROPERTY_USAGES, usage)) {
      throw new BadRequestException(
        `usage must be one of ${PROPERTY_USAGES.join(', ')}`,
      );
    }
    if (!isOneOf<PropertyType>(PROPERTY_TYPES, type)) {
      throw new BadRequestException(
        `type must be one of ${PROPERTY_TYPES.join(', ')}`,
      );
    }
    return {
      ok: true,
      policy: this.service.resolvePolicy(usage, type, subtype.trim()),
    };
  }

  @Get('size-suggestion')
  sizeSuggestion(
    @Query('bedrooms') bedrooms = '',
  ): { ok: true } & SizeSuggestion {
    const count = /^\d+$/.test(bedrooms.trim()) ? parseInt(bedrooms, 10) : NaN;
    if (isNaN(count)) {
      throw new BadRequestException('bedrooms must be a whole number');
    }
    const suggestion = this.service.suggestAreaSize(count);
    if (!suggestion) {
      throw new NotFoundException(`No typical size range for ${count} bedrooms`);
    }
    return { ok: true, ...suggestion };
  }

  private batchItems(body: unknown): unknown[] {
    const properties =
      body && typeof body === 'object' && 'properties' in body
        ? body.properties
        : undefined;
    if (!Array.isArray(properties)) {
      throw new BadRequestException('properties must be an array');
    }
    const { maxBatchSize } = this.service.config;
    if (properties.length > maxBatchSize) {
      throw new BadRequestException(
        `Batch of ${properties.length} exceeds the limit of ${maxBatchSize}`,
      );
    }
    return properties;
  }
}
