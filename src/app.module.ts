import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { HealthController } from './health/health.controller';
import { ModelModule } from './model/model.module';
import { PredictionModule } from './prediction/prediction.module';
import { ReferenceDataModule } from './reference-data/reference-data.module';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ReferenceDataModule,
    ModelModule,
    PredictionModule,
  ],
  controllers: [AppController, HealthController],
})
export class AppModule {}
