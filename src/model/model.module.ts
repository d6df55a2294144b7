import { Global, Logger, Module } from '@nestjs/common';
import { HttpPriceModel } from './http-price.model';
import { LabelEncoder } from './label.encoder';
import { LinearPriceModel } from './linear-price.model';
import {
  ENCODER_CLASSES,
  FEATURE_ENCODER,
  MODEL_METADATA,
  PRICE_MODEL,
} from './model.constants';
import { ModelController } from './model.controller';
import {
  loadEncoderClasses,
  loadLinearModel,
  loadModelMetadata,
  modelTimeoutMs,
} from './model.files';
import type { EncoderClasses, FeatureEncoder, PriceModel } from './model.types';

@Global()
@Module({
  controllers: [ModelController],
  providers: [
    {
      provide: ENCODER_CLASSES,
      useFactory: (): Promise<EncoderClasses> => loadEncoderClasses(),
    },
    {
      provide: FEATURE_ENCODER,
      useFactory: (classes: EncoderClasses): FeatureEncoder =>
        new LabelEncoder(classes),
      inject: [ENCODER_CLASSES],
    },
    {
      provide: PRICE_MODEL,
      useFactory: async (): Promise<PriceModel> => {
        const provider = process.env.MODEL_PROVIDER ?? 'linear';
        const logger = new Logger('ModelModule');

        if (provider === 'http') {
          const url = process.env.MODEL_URL;
          if (!url) throw new Error('Missing MODEL_URL');
          const timeoutMs = modelTimeoutMs();
          logger.log(`Using remote model at ${url}`);
          return new HttpPriceModel(url, timeoutMs);
        }
        if (provider === 'linear') {
          logger.log('Using local linear baseline model');
          return new LinearPriceModel(await loadLinearModel());
        }
        throw new Error(`Unknown MODEL_PROVIDER "${provider}"`);
      },
    },
    {
      provide: MODEL_METADATA,
      useFactory: () => loadModelMetadata(),
    },
  ],
  exports: [ENCODER_CLASSES, FEATURE_ENCODER, PRICE_MODEL, MODEL_METADATA],
})
export class ModelModule {}
