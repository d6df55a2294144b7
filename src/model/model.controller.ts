import { Controller, Get, Inject } from '@nestjs/common';
import { ENCODER_CLASSES, MODEL_METADATA, PRICE_MODEL } from './model.constants';
import type {
  EncoderClasses,
  ModelMetadata,
  PriceModel,
} from './model.types';

export type ModelInfoResponse = {
  model_type: string;
  provider: string;
  training_samples: number;
  r2_score: number;
  mae: number;
  available_areas: string[];
  available_property_subtypes: string[];
  available_registration_types: string[];
  price_range: { lower_bound: number; upper_bound: number };
};

@Controller('model')
export class ModelController {
  constructor(
    @Inject(MODEL_METADATA) private readonly metadata: ModelMetadata,
    @Inject(ENCODER_CLASSES) private readonly classes: EncoderClasses,
    @Inject(PRICE_MODEL) private readonly model: PriceModel,
  ) {}

  @Get('info')
  info(): ModelInfoResponse {
    const { metadata, classes } = this;
    return {
      model_type: metadata.model_type,
      provider: this.model.name,
      training_samples: metadata.training_samples,
      r2_score: Math.round(metadata.r2_score * 10_000) / 10_000,
      mae: Math.round(metadata.mae * 100) / 100,
      // Top 20 only; GET /reference/areas has the full tier table
      available_areas: [...classes.areas].sort().slice(0, 20),
      available_property_subtypes: [...classes.subtypes].sort(),
      available_registration_types: [...classes.registration_types].sort(),
      price_range: {
        lower_bound: Math.round(metadata.price_bounds.lower * 100) / 100,
        upper_bound: Math.round(metadata.price_bounds.upper * 100) / 100,
      },
    };
  }
}
