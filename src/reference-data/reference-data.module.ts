import path from 'node:path';
import { Global, Module } from '@nestjs/common';
import { REFERENCE_DATA_SOURCE } from './reference-data.constants';
import { ReferenceDataController } from './reference-data.controller';
import { ReferenceDataService } from './reference-data.service';
import {
  FileReferenceDataSource,
  type ReferenceDataSource,
} from './reference-data.source';

@Global()
@Module({
  controllers: [ReferenceDataController],
  providers: [
    {
      provide: REFERENCE_DATA_SOURCE,
      useFactory: (): ReferenceDataSource =>
        new FileReferenceDataSource(
          process.env.REFERENCE_DATA_DIR ??
            path.join(process.cwd(), 'data', 'reference'),
        ),
    },
    ReferenceDataService,
  ],
  exports: [ReferenceDataService],
})
export class ReferenceDataModule {}
