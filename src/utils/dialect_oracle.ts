import { getDialectProfile } from './dialect_registry';
import type { FunctionNode } from './dialect_profile';
import { logger } from './logger';

/**
 * True when `node` renders differently under at least two of `dialects`, or when
 * any dialect cannot render it at all.
 */
export function functionDiffers(node: FunctionNode, dialects: readonly string[]): boolean {
  const renderings = new Set<string>();

  for (const dialect of dialects) {
    try {
      renderings.add(getDialectProfile(dialect).render(node));
    } catch (error) {
      logger.debug(`Treating ${node.call.name} as non-portable: ${error instanceof Error ? error.message : String(error)}`);
      return true;
    }
  }

  return renderings.size > 1;
}

/**
 * Built-in function names whose implementation is not identical across every
 * dialect, including names missing from at least one dialect's catalog.
 */
export function catalogDifferences(dialects: readonly string[]): string[] {
  const catalogs = dialects.map(dialect => getDialectProfile(dialect).catalog());

  const allFunctions = new Set<string>();
  for (const catalog of catalogs) {
    for (const name of catalog.keys()) {
      allFunctions.add(name);
    }
  }

  const differing: string[] = [];
  for (const name of allFunctions) {
    const implementations = new Set<string>();
    let presentIn = 0;
    for (const catalog of catalogs) {
      const implementation = catalog.get(name);
      if (implementation !== undefined) {
        implementations.add(implementation);
        presentIn++;
      }
    }
    if (implementations.size > 1 || presentIn < catalogs.length) {
      differing.push(name);
    }
  }

  return differing.sort();
}
