import fs from 'fs';
import _ from 'lodash';
import { canSafelyRewrite, classify, extractMaskedSpans } from './template_classifier';
import { SqlParseError } from './sql_parser';
import { getDialectProfile } from './dialect_registry';
import { catalogDifferences } from './dialect_oracle';
import { collectFunctionCandidates } from './rewrite_engine';
import { findSqlFiles } from './file_finder';
import { logger } from './logger';

export type FunctionFrequencies = Record<string, number>;

/**
 * Canonical names of every function called in one model. Unsafe templates and
 * spans that fail to parse contribute nothing.
 */
export function scanSource(source: string, primaryDialect: string): string[] {
  const regions = classify(source);
  if (!canSafelyRewrite(regions).canRewrite) {
    return [];
  }

  const profile = getDialectProfile(primaryDialect);
  return extractMaskedSpans(regions).flatMap(span => {
    try {
      return collectFunctionCandidates(span.maskedText, profile).map(candidate => candidate.renderedName);
    } catch (error) {
      if (error instanceof SqlParseError) {
        logger.debug(`Skipping unparseable span: ${error.message}`);
        return [];
      }
      throw error;
    }
  });
}

function scanFile(filePath: string, primaryDialect: string): string[] {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.debug(`Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
  return scanSource(source, primaryDialect);
}

/**
 * Occurrence counts of dialect-divergent functions across every model under
 * `modelRoots`. Functions that are uniform across `dialects` are left out.
 */
export function scan(modelRoots: readonly string[], dialects: readonly string[]): FunctionFrequencies {
  const [primaryDialect] = dialects;
  if (primaryDialect === undefined) {
    return {};
  }

  const names = modelRoots.flatMap(root => findSqlFiles(root)).flatMap(file => scanFile(file, primaryDialect));
  const tally = _.countBy(names);
  const known = new Set(catalogDifferences(dialects));

  return _.pickBy(tally, (_count, name) => known.has(name));
}
