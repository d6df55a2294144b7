import { Module } from '@nestjs/common';
import { loadPredictionConfig, PREDICTION_CONFIG } from './prediction.config';
import { PredictionController } from './prediction.controller';
import { PredictionService } from './prediction.service';

@Module({
  controllers: [PredictionController],
  providers: [
    {
      provide: PREDICTION_CONFIG,
      useFactory: () => loadPredictionConfig(),
    },
    PredictionService,
  ],
  exports: [PredictionService],
})
export class PredictionModule {}
