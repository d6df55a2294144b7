import { Inject, Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { REFERENCE_DATA_SOURCE } from './reference-data.constants';
import type { ReferenceDataSource } from './reference-data.source';
import { buildReferenceTables, type ReferenceTables } from './reference-tables';

export type ReferenceSnapshot = Readonly<{
  version: number;
  loadedAt: string;
  source: string;
  tables: ReferenceTables;
}>;

/**
 * Holds the current reference tables. A reload builds a complete snapshot
 * first and then swaps the single reference, so readers never observe a
 * half-loaded state.
 */
@Injectable()
export class ReferenceDataService implements OnModuleInit {
  private readonly logger = new Logger(ReferenceDataService.name);
  private snapshot: ReferenceSnapshot | null = null;

  constructor(
    @Inject(REFERENCE_DATA_SOURCE) private readonly source: ReferenceDataSource,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.reload();
  }

  current(): ReferenceSnapshot {
    if (!this.snapshot) {
      throw new Error('Reference data has not been loaded');
    }
    return this.snapshot;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  async reload(): Promise<ReferenceSnapshot> {
    const data = await this.source.load();
    const tables = buildReferenceTables(data);
    const next: ReferenceSnapshot = Object.freeze({
      version: (this.snapshot?.version ?? 0) + 1,
      loadedAt: new Date().toISOString(),
      source: this.source.description,
      tables,
    });
    this.snapshot = next;

    this.logger.log(
      `Loaded reference data v${next.version} from ${next.source}: ${tables.areaTiers.size} areas, ${tables.formRules.length} form rules`,
    );
    return next;
  }

  /**
   * Hourly refresh, enabled with REFERENCE_AUTO_RELOAD=true. A failed reload
   * keeps serving the previous snapshot.
   */
  @Cron(CronExpression.EVERY_HOUR, { name: 'reference-data-reload' })
  async handleScheduledReload(): Promise<void> {
    if (process.env.REFERENCE_AUTO_RELOAD !== 'true') return;
    try {
      await this.reload();
    } catch (err) {
      this.logger.error(
        `Scheduled reference reload failed: ${err instanceof Error ? err.message : 'Unknown error'}`,
      );
    }
  }
}
