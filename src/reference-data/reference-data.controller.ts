import { Controller, Get, Headers, Post } from '@nestjs/common';
import { ReferenceDataService } from './reference-data.service';
import type {
  AreaTierEntry,
  FormRule,
  SizeRangeEntry,
  SubtypeSpecifics,
} from './reference-data.types';

export type AreasResponse = {
  total_areas: number;
  areas: AreaTierEntry[];
};

export type ValidationRulesResponse = {
  version: number;
  size_ranges: Record<string, SizeRangeEntry>;
  subtype_specifics: Record<string, SubtypeSpecifics>;
  form_rules: FormRule[];
};

export type ReloadResponse =
  | { ok: true; version: number; loaded_at: string; areas: number }
  | { ok: false; error: string };

@Controller('reference')
export class ReferenceDataController {
  constructor(private readonly referenceData: ReferenceDataService) {}

  @Get('areas')
  areas(): AreasResponse {
    const areas = this.referenceData.current().tables.areaTiers.list();
    return { total_areas: areas.length, areas };
  }

  @Get('validation-rules')
  validationRules(): ValidationRulesResponse {
    const { version, tables } = this.referenceData.current();
    return {
      version,
      size_ranges: tables.sizeRanges.toJSON(),
      subtype_specifics: { ...tables.subtypeSpecifics },
      form_rules: [...tables.formRules],
    };
  }

  /**
   * POST /reference/reload
   * Re-reads the reference tables. Needs x-reload-token to match RELOAD_TOKEN;
   * without RELOAD_TOKEN the endpoint is disabled.
   */
  @Post('reload')
  async reload(
    @Headers('x-reload-token') token?: string,
  ): Promise<ReloadResponse> {
    const expected = process.env.RELOAD_TOKEN;
    if (!expected) {
      return { ok: false, error: 'Reload is disabled' };
    }
    if ((token ?? '').trim() !== expected) {
      return { ok: false, error: 'Unauthorized' };
    }

    try {
      const snapshot = await this.referenceData.reload();
      return {
        ok: true,
        version: snapshot.version,
        loaded_at: snapshot.loadedAt,
        areas: snapshot.tables.areaTiers.size,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return { ok: false, error: message };
    }
  }
}
