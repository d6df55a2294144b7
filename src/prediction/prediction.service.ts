import { Inject, Injectable, Logger } from '@nestjs/common';
import { FEATURE_ENCODER, PRICE_MODEL } from '../model/model.constants';
import type { FeatureEncoder, PriceModel } from '../model/model.types';
import {
  ReferenceDataService,
  type ReferenceSnapshot,
} from '../reference-data/reference-data.service';
import type {
  PropertyType,
  PropertyUsage,
} from '../reference-data/reference-data.types';
import { PREDICTION_CONFIG, type PredictionConfig } from './prediction.config';
import { PredictionEngine } from './prediction.engine';
import type {
  BatchOutcome,
  FieldPolicy,
  PredictionOutcome,
} from './prediction.types';

export type SizeSuggestion = {
  bedrooms: number;
  bucket: string;
  suggested_area_size: number;
  min_typical: number;
  max_typical: number;
};

@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);
  private cached: { snapshot: ReferenceSnapshot; engine: PredictionEngine } | null =
    null;

  constructor(
    private readonly referenceData: ReferenceDataService,
    @Inject(FEATURE_ENCODER) private readonly encoder: FeatureEncoder,
    @Inject(PRICE_MODEL) private readonly model: PriceModel,
    @Inject(PREDICTION_CONFIG) readonly config: PredictionConfig,
  ) {}

  /**
   * Engine bound to the current reference snapshot. A reload swaps the
   * snapshot; calls already running keep the engine they started with.
   */
  engine(): PredictionEngine {
    const snapshot = this.referenceData.current();
    if (this.cached && this.cached.snapshot === snapshot) {
      return this.cached.engine;
    }
    const engine = new PredictionEngine({
      tables: snapshot.tables,
      encoder: this.encoder,
      model: this.model,
      options: this.config.engine,
    });
    this.cached = { snapshot, engine };
    this.logger.log(`Prediction engine built on reference data v${snapshot.version}`);
    return engine;
  }

  async predictOne(input: unknown): Promise<PredictionOutcome> {
    const outcome = await this.engine().predictOne(input);
    if (!outcome.ok) {
      this.logger.warn(
        `Prediction rejected at ${outcome.rejection.stage} (${outcome.rejection.code}): ${outcome.rejection.message}`,
      );
    }
    return outcome;
  }

  async predictBatch(inputs: readonly unknown[]): Promise<BatchOutcome> {
    const batch = await this.engine().predictBatch(inputs);
    this.logger.log(
      `Batch of ${batch.summary.total_items}: ${batch.summary.count} priced, ${batch.summary.rejected} rejected`,
    );
    return batch;
  }

  resolvePolicy(
    usage: PropertyUsage,
    type: PropertyType,
    subtype: string,
  ): FieldPolicy {
    return this.engine().resolvePolicy(usage, type, subtype);
  }

  suggestAreaSize(bedrooms: number): SizeSuggestion | null {
    const match = this.referenceData.current().tables.sizeRanges.forBedrooms(bedrooms);
    if (!match) return null;
    return {
      bedrooms,
      bucket: match.bucket,
      suggested_area_size: match.range.average,
      min_typical: match.range.min_typical,
      max_typical: match.range.max_typical,
    };
  }
}
