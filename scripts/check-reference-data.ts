import * as dotenv from 'dotenv';
import * as path from 'path';
import { FileReferenceDataSource } from '../src/reference-data/reference-data.source';
import { buildReferenceTables } from '../src/reference-data/reference-tables';

dotenv.config();

// Usage: npm run check:reference -- [dir]
async function main() {
  const dir =
    process.argv[2] ??
    process.env.REFERENCE_DATA_DIR ??
    path.join(process.cwd(), 'data', 'reference');

  console.log(`[Check] Reading reference data from ${dir}`);
  const data = await new FileReferenceDataSource(dir).load();
  const tables = buildReferenceTables(data);

  console.log(`[Check] Size ranges: ${Object.keys(tables.sizeRanges.toJSON()).join(', ')}`);
  console.log(`[Check] Areas: ${tables.areaTiers.size}`);
  console.log(`[Check] Form rules: ${tables.formRules.length}`);
  console.log(`[Check] Subtypes with specifics: ${Object.keys(tables.subtypeSpecifics).length}`);
  console.log('[Check] OK');
}

main().catch((err: unknown) => {
  console.error('[Check] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
