import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Read a bundled .sql file that sits beside this module. */
export function readSchemaFile(fileName: string): string {
  try {
    return readFileSync(join(__dirname, fileName), 'utf-8');
  } catch {
    // In compiled dist/ the .sql stays in src/series
    return readFileSync(join(__dirname, '..', '..', '..', 'src', 'series', fileName), 'utf-8');
  }
}
