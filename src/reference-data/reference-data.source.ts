import path from 'node:path';
import type { z } from 'zod';
import { readJsonFile } from '../common/read-json-file';
import { ReferenceDataError } from './reference-data.errors';
import {
  AreaTiersZ,
  FormRulesZ,
  SizeRangesZ,
  SubtypeSpecificsZ,
} from './reference-data.schemas';
import type { ReferenceData } from './reference-data.types';

export interface ReferenceDataSource {
  /** Human-readable origin, for logs. */
  readonly description: string;
  load(): Promise<ReferenceData>;
}

export const REFERENCE_FILES = {
  sizeRanges: 'size_ranges.json',
  areaTiers: 'area_tiers.json',
  formRules: 'form_rules.json',
  subtypeSpecifics: 'subtype_specifics.json',
} as const;

/**
 * Reads the four reference tables from JSON files in one directory.
 */
export class FileReferenceDataSource implements ReferenceDataSource {
  constructor(private readonly dir: string) {}

  get description(): string {
    return this.dir;
  }

  async load(): Promise<ReferenceData> {
    const [sizeRanges, areaTiers, formRules, subtypeSpecifics] =
      await Promise.all([
        this.readFile(REFERENCE_FILES.sizeRanges, SizeRangesZ),
        this.readFile(REFERENCE_FILES.areaTiers, AreaTiersZ),
        this.readFile(REFERENCE_FILES.formRules, FormRulesZ),
        this.readFile(REFERENCE_FILES.subtypeSpecifics, SubtypeSpecificsZ),
      ]);
    return { sizeRanges, areaTiers, formRules, subtypeSpecifics };
  }

  private readFile<S extends z.ZodTypeAny>(
    name: string,
    schema: S,
  ): Promise<z.output<S>> {
    return readJsonFile(
      path.join(this.dir, name),
      schema,
      (message) => new ReferenceDataError(message),
    );
  }
}

/** Serves reference data already held in memory. */
export class StaticReferenceDataSource implements ReferenceDataSource {
  readonly description = 'in-memory';

  constructor(private data: ReferenceData) {}

  replace(data: ReferenceData): void {
    this.data = data;
  }

  async load(): Promise<ReferenceData> {
    return structuredClone(this.data);
  }
}
