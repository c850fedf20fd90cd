import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

let cached: string | null = null;

/**
 * Version from package.json. It sits one level above both src/ and dist/.
 */
export function packageVersion(): string {
  if (cached === null) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
    cached = packageJsonSchema.parse(raw).version;
  }
  return cached;
}
