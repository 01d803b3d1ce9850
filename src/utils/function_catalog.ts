import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const CATALOG_PATH = fileURLToPath(new URL('../dialects/function_catalog.json', import.meta.url));

const functionCatalogSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type FunctionCatalog = ReadonlyMap<string, ReadonlyMap<string, string>>;

let cachedCatalog: FunctionCatalog | null = null;

/**
 * Per-dialect built-in function tables: `dialect -> FUNCTION_NAME -> implementation`.
 * Two dialects share an implementation identity only when the function behaves the same in both.
 */
export function loadFunctionCatalog(): FunctionCatalog {
  if (cachedCatalog) {
    return cachedCatalog;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(CATALOG_PATH, 'utf-8'));
  const parsed = functionCatalogSchema.parse(raw);

  cachedCatalog = new Map(
    Object.entries(parsed).map(([dialect, functions]) => [
      dialect,
      new Map(Object.entries(functions).map(([name, implementation]) => [name.toUpperCase(), implementation])),
    ])
  );
  return cachedCatalog;
}
