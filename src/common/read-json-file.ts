import fs from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import { describeIssues } from './describe-issues';

/**
 * Reads and schema-checks one JSON file. Every failure (missing file, bad
 * JSON, wrong shape) is reported through `toError` with the file name.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
  toError: (message: string) => Error = (message) => new Error(message),
): Promise<z.output<S>> {
  const name = path.basename(filePath);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw toError(
      `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw toError(
      `Invalid JSON in ${name}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw toError(`${name}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
